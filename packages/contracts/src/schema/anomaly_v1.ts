// packages/contracts/src/schema/anomaly_v1.ts
import { z } from "zod";
import { IsoDateV1, WeatherFeatureV1 } from "./weather_record_v1";

export const AnomalyResultV1Schema = z.object({
  date: IsoDateV1,
  // isolation score in (0, 1]; higher = isolated in fewer random splits
  score: z.number().finite(),
  features: z.array(WeatherFeatureV1).min(1),
  is_anomaly: z.boolean(),
  dominant_feature: WeatherFeatureV1,
  z_scores: z.record(WeatherFeatureV1, z.number().finite()),
});

export type AnomalyResultV1 = z.infer<typeof AnomalyResultV1Schema>;

export const FlaggedDayV1Schema = z.object({
  date: IsoDateV1,
  score: z.number().finite(),
  dominant_feature: WeatherFeatureV1,
});

export type FlaggedDayV1 = z.infer<typeof FlaggedDayV1Schema>;

export const FeatureContributionV1Schema = z.object({
  feature: WeatherFeatureV1,
  count: z.number().int().positive(),
});

export type FeatureContributionV1 = z.infer<typeof FeatureContributionV1Schema>;

/**
 * AnomalySummaryV1Schema
 *
 * Summary of one detection run. This is the only anomaly input the report
 * generator reads, so it carries the flagged days and their dominant features.
 */
export const AnomalySummaryV1Schema = z.object({
  contamination: z.number().gt(0).lte(0.5),
  features: z.array(WeatherFeatureV1).min(1),
  seed: z.number().int(),
  total_records: z.number().int().nonnegative(),
  flagged_count: z.number().int().nonnegative(),
  threshold_score: z.number().finite().nullable(),
  flagged: z.array(FlaggedDayV1Schema),
  top_contributors: z.array(FeatureContributionV1Schema),
});

export type AnomalySummaryV1 = z.infer<typeof AnomalySummaryV1Schema>;
