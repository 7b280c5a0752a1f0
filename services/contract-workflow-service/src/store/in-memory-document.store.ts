import { v4 as uuidv4 } from 'uuid';
import { ConflictError, NotFoundError } from '@contractflow/shared';
import { ContractDocument, NewDocument } from '../domain/document';
import { DocumentFilter, DocumentMutator, DocumentStore } from './document-store';

/**
 * Process-local store with the same optimistic-concurrency contract as the
 * database store. The write happens on a later tick than the read, so
 * interleaved updates of one record conflict just as they would against
 * a database round trip.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly records = new Map<string, ContractDocument>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(input: NewDocument): Promise<ContractDocument> {
    const now = this.clock();
    const doc: ContractDocument = {
      id: uuidv4(),
      role: input.role,
      templateId: input.templateId,
      inputs: { ...input.inputs },
      signers: input.signers.map((s) => ({ ...s })),
      content: null,
      renderedBlobRef: null,
      envelopeId: null,
      state: 'REQUESTED',
      failure: null,
      claim: null,
      metadata: { ...input.metadata },
      version: 1,
      createdAt: now,
      updatedAt: now,
    };
    this.records.set(doc.id, doc);
    return structuredClone(doc);
  }

  async get(id: string): Promise<ContractDocument> {
    return structuredClone(this.read(id));
  }

  async update(id: string, mutator: DocumentMutator): Promise<ContractDocument> {
    const current = structuredClone(this.read(id));
    const patch = mutator(current);
    if (!patch) {
      return current;
    }

    await Promise.resolve();

    const stored = this.read(id);
    if (stored.version !== current.version) {
      throw new ConflictError(id, current.version);
    }

    const next: ContractDocument = {
      ...current,
      ...patch,
      version: current.version + 1,
      updatedAt: this.clock(),
    };
    this.records.set(id, next);
    return structuredClone(next);
  }

  async list(filter: DocumentFilter = {}): Promise<ContractDocument[]> {
    const matches = Array.from(this.records.values())
      .filter((d) => !filter.state || d.state === filter.state)
      .filter((d) => !filter.role || d.role === filter.role)
      .filter((d) => !filter.envelopeId || (d.envelopeId || d.failure?.envelopeId) === filter.envelopeId)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime());

    const offset = filter.offset || 0;
    const end = filter.limit === undefined ? undefined : offset + filter.limit;
    return matches.slice(offset, end).map((d) => structuredClone(d));
  }

  private read(id: string): ContractDocument {
    const doc = this.records.get(id);
    if (!doc) {
      throw new NotFoundError(`Document ${id} not found`);
    }
    return doc;
  }
}
