import { z } from 'zod';

export const FixedWindowRecordSchema = z.union([
  z.number().int().nonnegative().transform((count) => ({ count })),
  z.object({
    count: z.number().int().nonnegative(),
    windowStart: z.number(),
  }),
]);

export const SlidingWindowRecordSchema = z.object({
  timestamps: z.array(z.number()),
});

export const TokenBucketRecordSchema = z.object({
  tokens: z.number().nonnegative(),
  lastRefill: z.number(),
});

export type FixedWindowRecord = z.output<typeof FixedWindowRecordSchema>;
export type SlidingWindowRecord = z.output<typeof SlidingWindowRecordSchema>;
export type TokenBucketRecord = z.output<typeof TokenBucketRecordSchema>;

/**
 * Decodes a stored record. Unparseable or malformed values are treated as
 * absent, so a corrupt record resets the caller rather than failing them.
 */
export function decodeRecord<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: string | undefined,
): T | undefined {
  if (raw === undefined) return undefined;

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error: unknown) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }

  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}
