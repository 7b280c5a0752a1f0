import { Inject, Injectable } from '@nestjs/common';
import { AppError, InvalidQueryError, SignatureUnavailable, toError } from '@contractflow/shared';
import { ContractDocument, Signer } from '../domain/document';
import { BLOB_STORE, BlobStore } from '../render/blob-store';
import { TemplateCatalog } from '../templates/template-catalog';
import { ENVELOPE_STATUSES, EnvelopeStatus, SIGNATURE_PROVIDER, SignatureProvider, SigningUrl } from './signature-provider';

// Provider vocabulary outside the envelope lifecycle we track.
const STATUS_ALIASES: Record<string, EnvelopeStatus> = {
  completed: 'signed',
};

export function parseEnvelopeStatus(raw: string): EnvelopeStatus | undefined {
  const status = raw.trim().toLowerCase();
  const known = ENVELOPE_STATUSES.find((s) => s === status);
  return known || STATUS_ALIASES[status];
}

@Injectable()
export class SignatureAdapter {
  constructor(
    @Inject(SIGNATURE_PROVIDER) private readonly provider: SignatureProvider,
    @Inject(BLOB_STORE) private readonly blobs: BlobStore,
    private readonly catalog: TemplateCatalog
  ) {}

  async createEnvelope(document: ContractDocument, signers: Signer[]): Promise<string> {
    if (!document.renderedBlobRef) {
      throw new InvalidQueryError(`Document ${document.id} has no rendered artifact`);
    }
    const pdf = await this.blobs.read(document.renderedBlobRef);
    const template = this.catalog.get(document.templateId);

    return this.call(() =>
      this.provider.createEnvelope({ documentId: document.id, title: template.title, pdf, signers })
    );
  }

  async getSigningUrl(envelopeId: string, signer: Signer): Promise<SigningUrl> {
    return this.call(() => this.provider.getSigningUrl(envelopeId, signer));
  }

  async getEnvelopeStatus(envelopeId: string): Promise<EnvelopeStatus> {
    const raw = await this.call(() => this.provider.getEnvelopeStatus(envelopeId));
    const status = parseEnvelopeStatus(raw);
    if (!status) {
      throw new SignatureUnavailable(`Unrecognised envelope status "${raw}" for ${envelopeId}`);
    }
    return status;
  }

  async voidEnvelope(envelopeId: string, reason: string): Promise<void> {
    return this.call(() => this.provider.voidEnvelope(envelopeId, reason));
  }

  private async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof AppError) throw err;
      const error = toError(err);
      throw new SignatureUnavailable(`Signature provider error: ${error.message}`, error);
    }
  }
}
