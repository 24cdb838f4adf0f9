import { z } from 'zod';
import {
  DOMAINS,
  metricForAlias,
  domainSchema,
  periodSchema,
  regionSchema,
  spatialLevelSchema,
} from '@geoinsight/shared';
import type { RankableMetric } from '@geoinsight/shared';

const domainsSchema = z
  .array(domainSchema)
  .min(1, 'domains must include at least one of: population, sales')
  .default([...DOMAINS])
  .transform((domains) => [...new Set(domains)]);

const metricSchema = z
  .string()
  .trim()
  .transform((value, ctx): RankableMetric => {
    const metric = metricForAlias(value.toLowerCase());
    if (!metric) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'metric must be one of: activity_volume, foot_traffic, sales',
      });
      return z.NEVER;
    }
    return metric;
  });

export const compareDomainsSchema = z.object({
  region: regionSchema,
  periodFrom: periodSchema.nullish(),
  periodTo: periodSchema.nullish(),
  domains: domainsSchema,
  level: spatialLevelSchema.optional(),
});

export type CompareDomainsInput = z.input<typeof compareDomainsSchema>;

export const getRankingsSchema = z.object({
  metric: metricSchema,
  period: periodSchema,
  topK: z
    .number()
    .int('topK must be an integer')
    .min(1, 'topK must be between 1 and 100')
    .max(100, 'topK must be between 1 and 100')
    .default(10),
  level: spatialLevelSchema.optional(),
});

export type GetRankingsInput = z.input<typeof getRankingsSchema>;

export const detectAnomalySchema = z.object({
  region: regionSchema,
  domain: domainSchema,
  period: periodSchema,
  zThreshold: z.number().gt(0, 'zThreshold must be greater than 0').default(2),
  level: spatialLevelSchema.optional(),
});

export type DetectAnomalyInput = z.input<typeof detectAnomalySchema>;

export const getAdvancedInsightSchema = z.object({
  region: regionSchema,
  period: periodSchema,
  domains: domainsSchema,
  level: spatialLevelSchema.optional(),
});

export type GetAdvancedInsightInput = z.input<typeof getAdvancedInsightSchema>;
