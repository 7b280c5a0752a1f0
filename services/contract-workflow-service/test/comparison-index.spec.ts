import { InMemoryComparisonIndex, cosineSimilarity, rankBySimilarity } from '../src/comparison/comparison-index';

describe('cosineSimilarity', () => {
  it('scores parallel, orthogonal and zero vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('InMemoryComparisonIndex', () => {
  it('returns the stored record after an upsert', async () => {
    const index = new InMemoryComparisonIndex(() => new Date('2024-03-01T00:00:00Z'));
    await index.upsert('document:a', [0.5, 0.5], { documentId: 'a' });

    expect(await index.get('document:a')).toEqual({
      recordId: 'document:a',
      kind: 'document',
      vector: [0.5, 0.5],
      metadata: { documentId: 'a' },
      updatedAt: new Date('2024-03-01T00:00:00Z'),
    });
    expect(await index.get('document:b')).toBeNull();
  });

  it('replaces a record on repeated upsert', async () => {
    const index = new InMemoryComparisonIndex();
    await index.upsert('plan:gold', [1, 0], { tier: 'gold' });
    await index.upsert('plan:gold', [0, 1], { tier: 'gold-2025' });

    expect(index.size()).toBe(1);
    const [match] = await index.query([0, 1], 1);
    expect(match).toEqual({ recordId: 'plan:gold', kind: 'plan', score: 1, metadata: { tier: 'gold-2025' } });
  });

  it('rejects k <= 0 and malformed vectors', async () => {
    const index = new InMemoryComparisonIndex();
    await expect(index.query([1, 0], 0)).rejects.toMatchObject({ code: 'INVALID_QUERY' });
    await expect(index.query([1, 0], 1.5)).rejects.toMatchObject({ code: 'INVALID_QUERY' });
    await expect(index.query([], 1)).rejects.toMatchObject({ code: 'INVALID_QUERY' });
    await expect(index.upsert('plan:x', [Number.NaN], {})).rejects.toMatchObject({ code: 'INVALID_QUERY' });
  });

  it('does not let callers mutate stored records', async () => {
    const index = new InMemoryComparisonIndex();
    const vector = [1, 0];
    await index.upsert('plan:a', vector, {});
    vector[0] = 0;

    const record = await index.get('plan:a');
    expect(record?.vector).toEqual([1, 0]);
  });
});

describe('rankBySimilarity', () => {
  const at = (iso: string) => new Date(iso);

  it('breaks score ties by recency, then by record id', () => {
    const records = [
      { recordId: 'plan:b', kind: 'plan' as const, vector: [1, 0], metadata: {}, updatedAt: at('2024-01-01T00:00:00Z') },
      { recordId: 'plan:a', kind: 'plan' as const, vector: [1, 0], metadata: {}, updatedAt: at('2024-01-01T00:00:00Z') },
      { recordId: 'plan:c', kind: 'plan' as const, vector: [2, 0], metadata: {}, updatedAt: at('2024-02-01T00:00:00Z') },
      { recordId: 'plan:d', kind: 'plan' as const, vector: [0, 1], metadata: {}, updatedAt: at('2024-03-01T00:00:00Z') },
    ];

    expect(rankBySimilarity(records, [1, 0], 3).map((m) => m.recordId)).toEqual(['plan:c', 'plan:a', 'plan:b']);
  });

  it('skips records of another dimension', () => {
    const records = [
      { recordId: 'plan:a', kind: 'plan' as const, vector: [1, 0, 0], metadata: {}, updatedAt: at('2024-01-01T00:00:00Z') },
      { recordId: 'plan:b', kind: 'plan' as const, vector: [1, 0], metadata: {}, updatedAt: at('2024-01-01T00:00:00Z') },
    ];
    expect(rankBySimilarity(records, [1, 0], 5).map((m) => m.recordId)).toEqual(['plan:b']);
  });
});
