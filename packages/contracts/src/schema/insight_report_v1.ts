// packages/contracts/src/schema/insight_report_v1.ts
import { z } from "zod";
import { FeatureContributionV1Schema, FlaggedDayV1Schema } from "./anomaly_v1";
import { IsoDateV1, SeasonV1, WeatherFeatureV1 } from "./weather_record_v1";

export const FeatureStatisticsV1Schema = z.object({
  count: z.number().int().nonnegative(),
  mean: z.number().finite(),
  median: z.number().finite(),
  std: z.number().finite(),
  min: z.number().finite(),
  min_date: IsoDateV1,
  max: z.number().finite(),
  max_date: IsoDateV1,
});

export type FeatureStatisticsV1 = z.infer<typeof FeatureStatisticsV1Schema>;

export const PrecipitationStatisticsV1Schema = FeatureStatisticsV1Schema.extend({
  total: z.number().finite(),
  wet_days: z.number().int().nonnegative(),
});

export type PrecipitationStatisticsV1 = z.infer<typeof PrecipitationStatisticsV1Schema>;

export const TrendDirectionV1 = z.enum(["rising", "falling", "stable"]);

export type TrendDirectionV1 = z.infer<typeof TrendDirectionV1>;

export const FeatureTrendV1Schema = z.object({
  direction: TrendDirectionV1,
  slope_per_day: z.number().finite(),
  slope_per_year: z.number().finite(),
});

export type FeatureTrendV1 = z.infer<typeof FeatureTrendV1Schema>;

export const CorrelationStrengthV1 = z.enum(["very weak", "weak", "moderate", "strong", "very strong"]);

export type CorrelationStrengthV1 = z.infer<typeof CorrelationStrengthV1>;

/** Pearson coefficient of one feature pair, over the whole series. */
export const FeatureCorrelationV1Schema = z.object({
  a: WeatherFeatureV1,
  b: WeatherFeatureV1,
  r: z.number().min(-1).max(1),
  strength: CorrelationStrengthV1,
});

export type FeatureCorrelationV1 = z.infer<typeof FeatureCorrelationV1Schema>;

export const SeasonalSummaryV1Schema = z.object({
  season: SeasonV1,
  count: z.number().int().positive(),
  mean: z.object({
    temperature: z.number().finite(),
    humidity: z.number().finite(),
    precipitation: z.number().finite(),
    wind_speed: z.number().finite(),
  }),
});

export type SeasonalSummaryV1 = z.infer<typeof SeasonalSummaryV1Schema>;

export const ReportStatisticsV1Schema = z.object({
  temperature: FeatureStatisticsV1Schema,
  humidity: FeatureStatisticsV1Schema,
  precipitation: PrecipitationStatisticsV1Schema,
  wind_speed: FeatureStatisticsV1Schema,
});

export type ReportStatisticsV1 = z.infer<typeof ReportStatisticsV1Schema>;

export const ReportTrendsV1Schema = z.object({
  temperature: FeatureTrendV1Schema,
  humidity: FeatureTrendV1Schema,
  precipitation: FeatureTrendV1Schema,
  wind_speed: FeatureTrendV1Schema,
});

export type ReportTrendsV1 = z.infer<typeof ReportTrendsV1Schema>;

export const ReportProvenanceV1 = z.enum(["generated", "template-fallback"]);

export type ReportProvenanceV1 = z.infer<typeof ReportProvenanceV1>;

/**
 * InsightReportV1Schema
 *
 * Every section except `narrative` and `provenance` is computed locally, so the
 * shape is identical whichever narrative strategy produced the text.
 * An empty series gives null dates, statistics and trends, and empty
 * correlations and seasonal lists.
 */
export const InsightReportV1Schema = z.object({
  type: z.literal("insight_report_v1"),
  schema_version: z.literal("1.0.0"),
  meta: z.object({
    start_date: IsoDateV1.nullable(),
    end_date: IsoDateV1.nullable(),
    record_count: z.number().int().nonnegative(),
    input_fingerprint: z.string().min(1),
  }),
  statistics: ReportStatisticsV1Schema.nullable(),
  trends: ReportTrendsV1Schema.nullable(),
  correlations: z.array(FeatureCorrelationV1Schema),
  seasonal: z.array(SeasonalSummaryV1Schema),
  anomalies: z.object({
    flagged_count: z.number().int().nonnegative(),
    total_records: z.number().int().nonnegative(),
    contamination: z.number(),
    features: z.array(WeatherFeatureV1),
    top_contributors: z.array(FeatureContributionV1Schema),
    notable: z.array(FlaggedDayV1Schema).max(3),
  }),
  highlights: z.array(z.string()),
  narrative: z.string().min(1),
  provenance: ReportProvenanceV1,
});

export type InsightReportV1 = z.infer<typeof InsightReportV1Schema>;
