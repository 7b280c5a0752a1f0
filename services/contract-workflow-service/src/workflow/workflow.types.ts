import { ContractDocument, DocumentState } from '../domain/document';
import { RecordKind } from '../comparison/comparison-index';

export interface SignerRequest {
  name: string;
  email: string;
  clientUserId?: string;
}

export interface DocumentRequest {
  role: string;
  templateId?: string;
  inputs: Record<string, string>;
  signers: SignerRequest[];
  metadata?: Record<string, string>;
}

export type StatusSource = 'poll' | 'callback';

export interface StatusEvent {
  envelopeId: string;
  status: string;
  source: StatusSource;
}

/**
 * applied: the status moved the document forward.
 * duplicate: the document already reflects the status.
 * stale: the status is older than, or conflicts with, what is recorded.
 * discarded: the document was failed before the status arrived.
 */
export type ReconcileDecision = 'applied' | 'duplicate' | 'stale' | 'discarded';

export interface ReconcileOutcome {
  document: ContractDocument;
  decision: ReconcileDecision;
  previousState: DocumentState;
}

export interface ComparisonRequest {
  k: number;
  text?: string;
  documentId?: string;
  vector?: number[];
  kind?: RecordKind;
}

export interface ReindexSummary {
  reindexed: string[];
  failed: Array<{ documentId: string; code: string }>;
}
