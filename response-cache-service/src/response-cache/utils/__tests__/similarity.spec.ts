import {
  cosineSimilarity,
  isEmbeddingVector,
  rankCandidates,
} from '../similarity';

describe('cosineSimilarity', () => {
  it('is 1 for identical directions', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBe(0);
  });

  it('computes the angle between unit vectors', () => {
    expect(cosineSimilarity([1, 0, 0], [0.96, 0.28, 0])).toBeCloseTo(0.96, 10);
  });

  it('returns 0 for mismatched lengths and zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });
});

describe('rankCandidates', () => {
  it('orders by score, then most recently inserted first', () => {
    const ranked = rankCandidates([
      { key: 'a', score: 0.96, insertedAt: 1000 },
      { key: 'b', score: 0.99, insertedAt: 500 },
      { key: 'c', score: 0.96, insertedAt: 2000 },
    ]);

    expect(ranked.map((candidate) => candidate.key)).toEqual(['b', 'c', 'a']);
  });

  it('does not mutate its input', () => {
    const input = [
      { key: 'a', score: 0.5, insertedAt: 1 },
      { key: 'b', score: 0.9, insertedAt: 1 },
    ];
    rankCandidates(input);

    expect(input.map((candidate) => candidate.key)).toEqual(['a', 'b']);
  });
});

describe('isEmbeddingVector', () => {
  it('accepts non-empty arrays of finite numbers only', () => {
    expect(isEmbeddingVector([0.1, -0.2])).toBe(true);
    expect(isEmbeddingVector([])).toBe(false);
    expect(isEmbeddingVector([0.1, Number.NaN])).toBe(false);
    expect(isEmbeddingVector(['0.1'])).toBe(false);
    expect(isEmbeddingVector(undefined)).toBe(false);
  });
});
