import { InMemorySemanticIndex } from '../in-memory-semantic-index';
import { ManualClock } from '../../testing/manual-clock';

describe('InMemorySemanticIndex', () => {
  let clock: ManualClock;
  let index: InMemorySemanticIndex;

  beforeEach(() => {
    clock = new ManualClock();
    index = new InMemorySemanticIndex(clock);
  });

  function insert(key: string, embedding: number[], ttlMs = 60_000) {
    return index.insert({
      level: 'full_response',
      key,
      embedding,
      insertedAt: clock.now(),
      expiresAt: clock.now() + ttlMs,
    });
  }

  it('returns candidates of the requested level ordered by score', async () => {
    await insert('full_response:a', [1, 0, 0]);
    await insert('full_response:b', [0.96, 0.28, 0]);
    await index.insert({
      level: 'knowledge',
      key: 'knowledge:c',
      embedding: [1, 0, 0],
      insertedAt: clock.now(),
      expiresAt: clock.now() + 60_000,
    });

    const candidates = await index.query('full_response', [1, 0, 0], 5);

    expect(candidates.map((candidate) => candidate.key)).toEqual([
      'full_response:a',
      'full_response:b',
    ]);
    expect(candidates[1].score).toBeCloseTo(0.96, 10);
  });

  it('limits results to topK', async () => {
    await insert('full_response:a', [1, 0, 0]);
    await insert('full_response:b', [0.96, 0.28, 0]);

    await expect(index.query('full_response', [1, 0, 0], 1)).resolves.toHaveLength(1);
  });

  it('breaks score ties by most recent insertion', async () => {
    await insert('full_response:first', [0, 1, 0]);
    await insert('full_response:second', [0, 1, 0]);
    clock.advance(1000);
    await insert('full_response:third', [0, 1, 0]);

    const candidates = await index.query('full_response', [0, 1, 0], 5);

    expect(candidates.map((candidate) => candidate.key)).toEqual([
      'full_response:third',
      'full_response:second',
      'full_response:first',
    ]);
  });

  it('hides expired vectors and purges them on removeExpired', async () => {
    await insert('full_response:short', [1, 0, 0], 1000);
    await insert('full_response:long', [1, 0, 0], 60_000);
    clock.advance(1000);

    const candidates = await index.query('full_response', [1, 0, 0], 5);
    expect(candidates.map((candidate) => candidate.key)).toEqual([
      'full_response:long',
    ]);

    await expect(index.removeExpired(clock.now())).resolves.toBe(1);
    expect(index.size()).toBe(1);
  });

  it('replaces the vector when a key is re-inserted', async () => {
    await insert('full_response:a', [1, 0, 0]);
    await insert('full_response:a', [0, 1, 0]);

    const [candidate] = await index.query('full_response', [0, 1, 0], 5);
    expect(index.size()).toBe(1);
    expect(candidate.score).toBeCloseTo(1, 10);
  });

  it('removes keys', async () => {
    await insert('full_response:a', [1, 0, 0]);
    await index.remove(['full_response:a', 'full_response:missing']);

    expect(index.size()).toBe(0);
  });

  it('is unavailable after close and available again after open', async () => {
    await index.close();
    expect(index.isAvailable()).toBe(false);
    await expect(index.healthCheck()).resolves.toBe(false);

    await index.open();
    expect(index.isAvailable()).toBe(true);
  });
});
