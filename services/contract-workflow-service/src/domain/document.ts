export const DOCUMENT_ROLES = ['patient', 'provider', 'insurer', 'pharmacy', 'administrator'] as const;
export type DocumentRole = (typeof DOCUMENT_ROLES)[number];

export const DOCUMENT_STATES = [
  'REQUESTED',
  'DRAFTED',
  'RENDERED',
  'SENT',
  'SIGNED',
  'DECLINED',
  'FAILED',
  'INDEXED',
] as const;
export type DocumentState = (typeof DOCUMENT_STATES)[number];

export const isDocumentRole = (value: string): value is DocumentRole =>
  (DOCUMENT_ROLES as readonly string[]).includes(value);

export interface Signer {
  name: string;
  email: string;
  clientUserId: string;
}

export interface FailureRecord {
  kind: string;
  message: string;
  lastStableState: DocumentState;
  envelopeId?: string;
  at: string;
}

/** Marks the outbound call of a lifecycle step as taken by one caller. */
export interface StepClaim {
  state: DocumentState;
  token: string;
  at: string;
}

export interface ContractDocument {
  id: string;
  role: DocumentRole;
  templateId: string;
  inputs: Record<string, string>;
  signers: Signer[];
  content: string | null;
  renderedBlobRef: string | null;
  envelopeId: string | null;
  state: DocumentState;
  failure: FailureRecord | null;
  claim: StepClaim | null;
  metadata: Record<string, string>;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export type DocumentPatch = Partial<
  Pick<ContractDocument, 'content' | 'renderedBlobRef' | 'envelopeId' | 'state' | 'failure' | 'claim' | 'metadata'>
>;

export interface NewDocument {
  role: DocumentRole;
  templateId: string;
  inputs: Record<string, string>;
  signers: Signer[];
  metadata: Record<string, string>;
}
