import { InvalidQueryError } from '@contractflow/shared';

export const COMPARISON_INDEX = Symbol('COMPARISON_INDEX');

export type RecordKind = 'document' | 'plan';

export interface ComparisonRecord {
  recordId: string;
  kind: RecordKind;
  vector: number[];
  metadata: Record<string, string>;
  updatedAt: Date;
}

export interface ComparisonMatch {
  recordId: string;
  kind: RecordKind;
  score: number;
  metadata: Record<string, string>;
}

export interface QueryOptions {
  kind?: RecordKind;
  excludeRecordId?: string;
}

export interface ComparisonIndex {
  /** Replaces any record stored under `recordId` in a single write. */
  upsert(recordId: string, vector: number[], metadata: Record<string, string>): Promise<void>;
  /** @throws InvalidQueryError unless `k` is a positive integer */
  query(vector: number[], k: number, options?: QueryOptions): Promise<ComparisonMatch[]>;
  get(recordId: string): Promise<ComparisonRecord | null>;
}

export const documentRecordId = (documentId: string): string => `document:${documentId}`;
export const planRecordId = (planId: string): string => `plan:${planId}`;
export const recordKind = (recordId: string): RecordKind => (recordId.startsWith('plan:') ? 'plan' : 'document');

export function assertVector(vector: number[]): void {
  if (vector.length === 0 || !vector.every((v) => Number.isFinite(v))) {
    throw new InvalidQueryError('vector must be a non-empty list of finite numbers');
  }
}

export function assertQuery(vector: number[], k: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidQueryError(`k must be a positive integer, got ${k}`);
  }
  assertVector(vector);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  if (magA === 0 || magB === 0) return 0;
  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

/**
 * Descending cosine similarity; ties go to the most recently updated record,
 * then to record id. Records of another dimension are not comparable and
 * are left out.
 */
export function rankBySimilarity(
  records: Iterable<ComparisonRecord>,
  vector: number[],
  k: number,
  options: QueryOptions = {}
): ComparisonMatch[] {
  const scored: Array<{ record: ComparisonRecord; score: number }> = [];
  for (const record of records) {
    if (record.vector.length !== vector.length) continue;
    if (options.kind && record.kind !== options.kind) continue;
    if (options.excludeRecordId && record.recordId === options.excludeRecordId) continue;
    scored.push({ record, score: cosineSimilarity(vector, record.vector) });
  }

  scored.sort(
    (a, b) =>
      b.score - a.score ||
      b.record.updatedAt.getTime() - a.record.updatedAt.getTime() ||
      a.record.recordId.localeCompare(b.record.recordId)
  );

  return scored.slice(0, k).map(({ record, score }) => ({
    recordId: record.recordId,
    kind: record.kind,
    score,
    metadata: { ...record.metadata },
  }));
}

export class InMemoryComparisonIndex implements ComparisonIndex {
  private readonly records = new Map<string, Readonly<ComparisonRecord>>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async upsert(recordId: string, vector: number[], metadata: Record<string, string>): Promise<void> {
    assertVector(vector);
    this.records.set(
      recordId,
      Object.freeze({
        recordId,
        kind: recordKind(recordId),
        vector: [...vector],
        metadata: { ...metadata },
        updatedAt: this.clock(),
      })
    );
  }

  async query(vector: number[], k: number, options?: QueryOptions): Promise<ComparisonMatch[]> {
    assertQuery(vector, k);
    return rankBySimilarity(Array.from(this.records.values()), vector, k, options);
  }

  async get(recordId: string): Promise<ComparisonRecord | null> {
    const record = this.records.get(recordId);
    return record ? { ...record, vector: [...record.vector], metadata: { ...record.metadata } } : null;
  }

  size(): number {
    return this.records.size;
  }
}
