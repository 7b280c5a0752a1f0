import { ContractDocument, DocumentPatch, DocumentRole, DocumentState, NewDocument } from '../domain/document';

export const DOCUMENT_STORE = Symbol('DOCUMENT_STORE');

export interface DocumentFilter {
  state?: DocumentState;
  role?: DocumentRole;
  /** Also matches a failed document by the envelope it held when it failed. */
  envelopeId?: string;
  limit?: number;
  offset?: number;
}

/**
 * Receives the freshly read record and returns the fields to change, or
 * null to leave the record as it is.
 */
export type DocumentMutator = (current: ContractDocument) => DocumentPatch | null;

export interface DocumentStore {
  create(input: NewDocument): Promise<ContractDocument>;
  /** @throws NotFoundError */
  get(id: string): Promise<ContractDocument>;
  /**
   * Read-modify-write guarded by the record version.
   * @throws ConflictError when the record changed between the read and the write
   */
  update(id: string, mutator: DocumentMutator): Promise<ContractDocument>;
  list(filter?: DocumentFilter): Promise<ContractDocument[]>;
}
