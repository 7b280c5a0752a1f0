import { ProviderRejected, SignatureUnavailable } from '@contractflow/shared';
import { ContractDocument } from '../src/domain/document';
import { SignatureAdapter, parseEnvelopeStatus } from '../src/signature/signature.adapter';
import { FakeSignatureProvider, MemoryBlobStore, jane, testCatalog } from './support';

const signer = { ...jane, clientUserId: 'jane-1' };

const rendered = (renderedBlobRef: string | null): ContractDocument => ({
  id: 'doc-1',
  role: 'patient',
  templateId: 'T1',
  inputs: { name: 'Jane Doe' },
  signers: [signer],
  content: 'Agreement',
  renderedBlobRef,
  envelopeId: null,
  state: 'RENDERED',
  failure: null,
  claim: null,
  metadata: {},
  version: 3,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
});

describe('parseEnvelopeStatus', () => {
  it('normalises provider vocabulary', () => {
    expect(parseEnvelopeStatus('Completed')).toBe('signed');
    expect(parseEnvelopeStatus(' declined ')).toBe('declined');
    expect(parseEnvelopeStatus('delivered')).toBe('delivered');
    expect(parseEnvelopeStatus('archived')).toBeUndefined();
  });
});

describe('SignatureAdapter', () => {
  async function setup() {
    const provider = new FakeSignatureProvider();
    const blobs = new MemoryBlobStore();
    const ref = await blobs.put('a.pdf', Buffer.from('%PDF-1.3 test'));
    return { provider, blobs, ref, adapter: new SignatureAdapter(provider, blobs, testCatalog()) };
  }

  it('sends the rendered PDF under the template title', async () => {
    const { provider, adapter, ref } = await setup();

    await expect(adapter.createEnvelope(rendered(ref), [signer])).resolves.toBe('E1');
    expect(provider.envelopes[0]).toMatchObject({ documentId: 'doc-1', title: 'Patient Agreement', signers: [signer] });
    expect(provider.envelopes[0].pdf.toString()).toBe('%PDF-1.3 test');
  });

  it('refuses a document without a rendered artifact', async () => {
    const { adapter } = await setup();
    await expect(adapter.createEnvelope(rendered(null), [signer])).rejects.toMatchObject({ code: 'INVALID_QUERY' });
  });

  it('wraps unexpected provider errors as retryable', async () => {
    const { provider, adapter, ref } = await setup();
    provider.createFailures = [new Error('socket closed')];

    const error = await adapter.createEnvelope(rendered(ref), [signer]).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SignatureUnavailable);
    expect(error).toMatchObject({ message: 'Signature provider error: socket closed' });
  });

  it('passes provider rejections through unchanged', async () => {
    const { provider, adapter } = await setup();
    const rejection = new ProviderRejected('envelope voided by sender');
    provider.statusFailures = [rejection];

    await expect(adapter.getEnvelopeStatus('E1')).rejects.toBe(rejection);
  });

  it('maps the provider status and rejects unknown values', async () => {
    const { provider, adapter } = await setup();
    provider.statuses.set('E1', 'completed');
    provider.statuses.set('E2', 'corrected');

    await expect(adapter.getEnvelopeStatus('E1')).resolves.toBe('signed');
    await expect(adapter.getEnvelopeStatus('E2')).rejects.toMatchObject({
      code: 'SIGNATURE_UNAVAILABLE',
      message: 'Unrecognised envelope status "corrected" for E2',
    });
  });
});
