import { decodeEnvelope, encodeEnvelope } from '../cache-envelope';
import { CacheSerializationError } from '../../errors/cache-errors';
import type { CacheEnvelope } from '../../types/cache.types';

const KEY = 'full_response:4f2a';

function envelope(overrides: Partial<CacheEnvelope> = {}): CacheEnvelope {
  return {
    format: 'response-cache/v1',
    level: 'full_response',
    key: KEY,
    createdAt: 1_700_000_000_000,
    expiresAt: 1_700_086_400_000,
    value: {
      text: 'Refunds are accepted within 30 days.',
      confidence: 0.92,
      citations: [{ documentId: 'doc-7', chunkId: 'c-3', title: 'Refund policy' }],
      metadata: { intent: 'refund', escalate: false, tags: ['billing', null] },
    },
    ...overrides,
  };
}

describe('cache envelope codec', () => {
  it('preserves nested payloads', () => {
    const original = envelope();

    expect(decodeEnvelope(KEY, encodeEnvelope(original))).toEqual(original);
  });

  it('rejects malformed JSON', () => {
    expect(() => decodeEnvelope(KEY, '{not json')).toThrow(
      CacheSerializationError,
    );
  });

  it('rejects an unknown format tag', () => {
    const raw = JSON.stringify({ ...envelope(), format: 'response-cache/v0' });

    expect(() => decodeEnvelope(KEY, raw)).toThrow(CacheSerializationError);
  });

  it('rejects an envelope without a payload object', () => {
    const raw = JSON.stringify({ ...envelope(), value: 'plain text' });

    expect(() => decodeEnvelope(KEY, raw)).toThrow(/^Stored entry/);
  });

  it('rejects an envelope stored under another key', () => {
    const raw = encodeEnvelope(envelope({ key: 'full_response:other' }));

    expect(() => decodeEnvelope(KEY, raw)).toThrow(
      `Stored entry "${KEY}" could not be decoded: envelope belongs to "full_response:other"`,
    );
  });
});
