import { z } from 'zod';
import { DOMAINS, levelForName, metricForAlias, periodSchema } from '@geoinsight/shared';

/**
 * Version of the structured-query shape. Part of every cache fingerprint:
 * bumping it leaves older entries in place but stops them from matching.
 */
export const STRUCTURED_QUERY_SCHEMA_VERSION = 'v1';

const optionalText = z.string().trim().min(1).nullish();
const domainList = z.array(z.enum(DOMAINS)).min(1).nullish();

// Names stay as the translator wrote them; the operation canonicalizes.
const levelName = z
  .string()
  .trim()
  .refine((value) => levelForName(value.toLowerCase()) !== undefined, 'unknown level')
  .nullish();
const metricName = z
  .string()
  .trim()
  .refine((value) => metricForAlias(value.toLowerCase()) !== undefined, 'unknown metric');

export const compareDomainsQuerySchema = z.object({
  operation: z.literal('compare_domains'),
  region: optionalText,
  periodFrom: periodSchema.nullish(),
  periodTo: periodSchema.nullish(),
  domains: domainList,
  level: levelName,
});

export const getRankingsQuerySchema = z.object({
  operation: z.literal('get_rankings'),
  metric: metricName,
  period: periodSchema,
  topK: z.number().int().min(1).max(100).nullish(),
  level: levelName,
});

export const detectAnomalyQuerySchema = z.object({
  operation: z.literal('detect_anomaly'),
  region: optionalText,
  domain: z.enum(DOMAINS),
  period: periodSchema,
  zThreshold: z.number().gt(0).nullish(),
  level: levelName,
});

export const getAdvancedInsightQuerySchema = z.object({
  operation: z.literal('get_advanced_insight'),
  region: optionalText,
  period: periodSchema,
  domains: domainList,
  level: levelName,
});

/**
 * What a free-text request means: one insight operation and its
 * arguments, held to the bounds the operation enforces so that a
 * translation the operation would reject is never cached.
 */
export const structuredQuerySchema = z.discriminatedUnion('operation', [
  compareDomainsQuerySchema,
  getRankingsQuerySchema,
  detectAnomalyQuerySchema,
  getAdvancedInsightQuerySchema,
]);

export type StructuredQuery = z.infer<typeof structuredQuerySchema>;
export type QueryOperation = StructuredQuery['operation'];

/** Used when a request cannot be translated: both domains for the caller's default region. */
export const DEFAULT_STRUCTURED_QUERY: StructuredQuery = Object.freeze({
  operation: 'compare_domains',
  domains: [...DOMAINS],
});

/** Null when `value` is not a structured query of the current version. */
export function parseStructuredQuery(value: unknown): StructuredQuery | null {
  const parsed = structuredQuerySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
