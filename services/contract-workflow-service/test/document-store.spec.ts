import { ConflictError } from '@contractflow/shared';
import { NewDocument } from '../src/domain/document';
import { InMemoryDocumentStore } from '../src/store/in-memory-document.store';

const request: NewDocument = {
  role: 'patient',
  templateId: 'T1',
  inputs: { name: 'Jane Doe' },
  signers: [{ name: 'Jane Doe', email: 'jane@example.com', clientUserId: 'jane@example.com' }],
  metadata: { source: 'test' },
};

describe('InMemoryDocumentStore', () => {
  it('creates documents in REQUESTED at version 1', async () => {
    const store = new InMemoryDocumentStore(() => new Date('2024-05-01T00:00:00Z'));
    const doc = await store.create(request);

    expect(doc).toMatchObject({ state: 'REQUESTED', version: 1, content: null, envelopeId: null, failure: null });
    expect(doc.createdAt).toEqual(new Date('2024-05-01T00:00:00Z'));
  });

  it('raises NOT_FOUND for unknown ids', async () => {
    await expect(new InMemoryDocumentStore().get('missing')).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('applies a patch and bumps the version', async () => {
    const store = new InMemoryDocumentStore();
    const doc = await store.create(request);

    const updated = await store.update(doc.id, () => ({ state: 'DRAFTED', content: 'Text' }));

    expect(updated).toMatchObject({ state: 'DRAFTED', content: 'Text', version: 2 });
    expect(await store.get(doc.id)).toMatchObject({ version: 2 });
  });

  it('leaves the record alone when the mutator returns null', async () => {
    const store = new InMemoryDocumentStore();
    const doc = await store.create(request);

    const same = await store.update(doc.id, () => null);
    expect(same.version).toBe(1);
  });

  it('rejects the second of two interleaved updates', async () => {
    const store = new InMemoryDocumentStore();
    const doc = await store.create(request);

    const results = await Promise.allSettled([
      store.update(doc.id, () => ({ state: 'DRAFTED' })),
      store.update(doc.id, () => ({ state: 'FAILED' })),
    ]);

    expect(results[0].status).toBe('fulfilled');
    expect(results[1].status).toBe('rejected');
    if (results[1].status === 'rejected') {
      expect(results[1].reason).toBeInstanceOf(ConflictError);
    }
    expect(await store.get(doc.id)).toMatchObject({ state: 'DRAFTED', version: 2 });
  });

  it('does not expose internal state to callers', async () => {
    const store = new InMemoryDocumentStore();
    const doc = await store.create(request);
    doc.inputs.name = 'Mallory';

    expect((await store.get(doc.id)).inputs.name).toBe('Jane Doe');
  });

  it('filters and pages by state and envelope', async () => {
    let tick = 0;
    const store = new InMemoryDocumentStore(() => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)));
    const a = await store.create(request);
    const b = await store.create(request);
    await store.create(request);
    await store.update(b.id, () => ({ state: 'SENT', envelopeId: 'E7' }));
    await store.update(a.id, () => ({ state: 'SENT', envelopeId: 'E8' }));

    expect((await store.list({ state: 'SENT' })).map((d) => d.id)).toEqual([b.id, a.id]);
    expect((await store.list({ state: 'SENT', limit: 1, offset: 1 })).map((d) => d.id)).toEqual([a.id]);
    expect((await store.list({ envelopeId: 'E8' })).map((d) => d.id)).toEqual([a.id]);
  });

  it('finds a failed document by the envelope it held', async () => {
    const store = new InMemoryDocumentStore();
    const doc = await store.create(request);
    await store.update(doc.id, () => ({
      state: 'FAILED',
      envelopeId: null,
      failure: { kind: 'CANCELLED', message: 'stop', lastStableState: 'SENT', envelopeId: 'E9', at: '2024-01-01T00:00:00Z' },
    }));

    expect((await store.list({ envelopeId: 'E9' })).map((d) => d.id)).toEqual([doc.id]);
  });
});
