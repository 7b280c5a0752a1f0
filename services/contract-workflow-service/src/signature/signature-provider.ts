import { Signer } from '../domain/document';

export const SIGNATURE_PROVIDER = Symbol('SIGNATURE_PROVIDER');

export const ENVELOPE_STATUSES = ['created', 'sent', 'delivered', 'signed', 'declined', 'voided'] as const;
export type EnvelopeStatus = (typeof ENVELOPE_STATUSES)[number];

export interface EnvelopeRequest {
  documentId: string;
  title: string;
  pdf: Buffer;
  signers: Signer[];
}

export interface SigningUrl {
  url: string;
  expiresAt: Date;
}

/**
 * Envelope lifecycle at the e-signature provider. Implementations report
 * the provider's raw status string; normalisation happens in the adapter.
 */
export interface SignatureProvider {
  createEnvelope(request: EnvelopeRequest): Promise<string>;
  getSigningUrl(envelopeId: string, signer: Signer): Promise<SigningUrl>;
  getEnvelopeStatus(envelopeId: string): Promise<string>;
  /** Withdraws an envelope so its signers can no longer act on it. */
  voidEnvelope(envelopeId: string, reason: string): Promise<void>;
}
