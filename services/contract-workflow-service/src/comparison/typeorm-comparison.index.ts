import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { IndexUnavailable, toError } from '@contractflow/shared';
import { ComparisonRecordEntity } from '../entities/ComparisonRecordEntity';
import {
  ComparisonIndex,
  ComparisonMatch,
  ComparisonRecord,
  QueryOptions,
  assertQuery,
  assertVector,
  rankBySimilarity,
  recordKind,
} from './comparison-index';

const toRecord = (row: ComparisonRecordEntity): ComparisonRecord => ({
  recordId: row.recordId,
  kind: row.kind,
  vector: row.vector,
  metadata: row.metadata,
  updatedAt: row.updatedAt,
});

/**
 * Comparison records in Postgres. An upsert is one INSERT .. ON CONFLICT
 * statement, so readers see either the old row or the new one.
 */
@Injectable()
export class TypeOrmComparisonIndex implements ComparisonIndex {
  constructor(
    @InjectRepository(ComparisonRecordEntity) private readonly recordRepo: Repository<ComparisonRecordEntity>
  ) {}

  async upsert(recordId: string, vector: number[], metadata: Record<string, string>): Promise<void> {
    assertVector(vector);
    await this.guard('upsert', () =>
      this.recordRepo.upsert(
        { recordId, kind: recordKind(recordId), vector, metadata, updatedAt: new Date() },
        ['recordId']
      )
    );
  }

  async query(vector: number[], k: number, options: QueryOptions = {}): Promise<ComparisonMatch[]> {
    assertQuery(vector, k);
    const rows = await this.guard('query', () =>
      this.recordRepo.find({ where: options.kind ? { kind: options.kind } : {} })
    );
    return rankBySimilarity(rows.map(toRecord), vector, k, options);
  }

  async get(recordId: string): Promise<ComparisonRecord | null> {
    const row = await this.guard('get', () => this.recordRepo.findOne({ where: { recordId } }));
    return row ? toRecord(row) : null;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const error = toError(err);
      throw new IndexUnavailable(`Comparison index ${operation} failed: ${error.message}`, error);
    }
  }
}
