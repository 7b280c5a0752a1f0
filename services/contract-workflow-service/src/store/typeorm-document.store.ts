import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { ConflictError, NotFoundError } from '@contractflow/shared';
import { ContractDocument, NewDocument } from '../domain/document';
import { ContractDocumentEntity } from '../entities/ContractDocumentEntity';
import { DocumentFilter, DocumentMutator, DocumentStore } from './document-store';

const toDocument = (entity: ContractDocumentEntity): ContractDocument => ({
  id: entity.documentId,
  role: entity.role,
  templateId: entity.templateId,
  inputs: entity.inputs,
  signers: entity.signers,
  content: entity.content,
  renderedBlobRef: entity.renderedBlobRef,
  envelopeId: entity.envelopeId,
  state: entity.state,
  failure: entity.failure,
  claim: entity.claim,
  metadata: entity.metadata || {},
  version: entity.version,
  createdAt: entity.createdAt,
  updatedAt: entity.updatedAt,
});

@Injectable()
export class TypeOrmDocumentStore implements DocumentStore {
  constructor(
    @InjectRepository(ContractDocumentEntity) private readonly documentRepo: Repository<ContractDocumentEntity>
  ) {}

  async create(input: NewDocument): Promise<ContractDocument> {
    const now = new Date();
    const entity = this.documentRepo.create({
      documentId: uuidv4(),
      role: input.role,
      templateId: input.templateId,
      inputs: input.inputs,
      signers: input.signers,
      content: null,
      renderedBlobRef: null,
      envelopeId: null,
      state: 'REQUESTED',
      failure: null,
      claim: null,
      metadata: input.metadata,
      version: 1,
      createdAt: now,
      updatedAt: now,
    });

    await this.documentRepo.save(entity);
    return toDocument(entity);
  }

  async get(id: string): Promise<ContractDocument> {
    const entity = await this.documentRepo.findOne({ where: { documentId: id } });
    if (!entity) {
      throw new NotFoundError(`Document ${id} not found`);
    }
    return toDocument(entity);
  }

  async update(id: string, mutator: DocumentMutator): Promise<ContractDocument> {
    const current = await this.get(id);
    const patch = mutator(current);
    if (!patch) {
      return current;
    }

    const version = current.version + 1;
    const updatedAt = new Date();

    // Conditional on the version we read; zero affected rows means someone else won.
    const result = await this.documentRepo
      .createQueryBuilder()
      .update(ContractDocumentEntity)
      .set({ ...patch, version, updatedAt })
      .where('document_id = :id AND version = :expected', { id, expected: current.version })
      .execute();

    if (!result.affected) {
      throw new ConflictError(id, current.version);
    }

    return { ...current, ...patch, version, updatedAt };
  }

  async list(filter: DocumentFilter = {}): Promise<ContractDocument[]> {
    const qb = this.documentRepo.createQueryBuilder('d');

    if (filter.state) qb.andWhere('d.state = :state', { state: filter.state });
    if (filter.role) qb.andWhere('d.role = :role', { role: filter.role });
    if (filter.envelopeId) {
      qb.andWhere("(d.envelope_id = :envelopeId OR d.failure ->> 'envelopeId' = :envelopeId)", {
        envelopeId: filter.envelopeId,
      });
    }

    qb.orderBy('d.updated_at', 'ASC');
    if (filter.limit !== undefined) qb.limit(filter.limit);
    if (filter.offset !== undefined) qb.offset(filter.offset);

    const rows = await qb.getMany();
    return rows.map(toDocument);
  }
}
