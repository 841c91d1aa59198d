import { z } from 'zod';
import { CacheSerializationError } from '../errors/cache-errors';
import {
  CACHE_CONSTANTS,
  CACHE_LEVELS,
  CacheEnvelope,
  JsonValue,
} from '../types/cache.types';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const cacheEnvelopeSchema = z.object({
  format: z.literal(CACHE_CONSTANTS.ENVELOPE_FORMAT),
  level: z.enum(CACHE_LEVELS),
  key: z.string().min(1),
  createdAt: z.number().int().nonnegative(),
  expiresAt: z.number().int().nonnegative(),
  value: z.record(jsonValueSchema),
});

export function encodeEnvelope(envelope: CacheEnvelope): string {
  return JSON.stringify(envelope);
}

/**
 * Parse and validate a stored envelope.
 * Throws CacheSerializationError when the raw value is not a valid
 * envelope for the key it was read under.
 */
export function decodeEnvelope(key: string, raw: string): CacheEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CacheSerializationError(
      key,
      error instanceof Error ? error.message : 'malformed JSON',
    );
  }

  const result = cacheEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new CacheSerializationError(
      key,
      issue ? `${issue.path.join('.') || 'envelope'}: ${issue.message}` : 'invalid envelope',
    );
  }

  if (result.data.key !== key) {
    throw new CacheSerializationError(
      key,
      `envelope belongs to "${result.data.key}"`,
    );
  }

  return result.data;
}
