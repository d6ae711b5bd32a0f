// packages/pipeline/src/report/report_facts.ts
//
// Everything in an insight report that does not depend on the narrative
// strategy. Computed locally, always.

import {
  AnomalySummaryV1Schema,
  SeasonV1,
  WEATHER_FEATURES,
  type AnomalySummaryV1,
  type CorrelationStrengthV1,
  type FeatureCorrelationV1,
  type FeatureStatisticsV1,
  type FeatureTrendV1,
  type InsightReportV1,
  type ReportStatisticsV1,
  type ReportTrendsV1,
  type SeasonalSummaryV1,
  type WeatherFeature,
  type WeatherRecordV1,
} from "@wxlens/contracts";

import { DAYS_PER_YEAR, daysBetween } from "../calendar";
import type { PipelineConfigV1 } from "../config";
import { ValidationError } from "../errors";
import type { PipelineLogger } from "../logger";
import { assertSeries } from "../series";
import { extremaIndex, linearFit, mean, median, pearson, std } from "../stats/descriptive";
import { fingerprint, roundTo } from "../util";

export type ReportFacts = Omit<InsightReportV1, "type" | "schema_version" | "narrative" | "provenance">;

export const FEATURE_LABELS: Record<WeatherFeature, string> = {
  temperature: "temperature",
  humidity: "humidity",
  precipitation: "precipitation",
  wind_speed: "wind speed",
};

export const FEATURE_UNITS: Record<WeatherFeature, string> = {
  temperature: "°C",
  humidity: "%",
  precipitation: "mm",
  wind_speed: "m/s",
};

function featureStatistics(records: readonly WeatherRecordV1[], feature: WeatherFeature): FeatureStatisticsV1 {
  const xs = records.map((r) => r[feature]);
  const { minIndex, maxIndex } = extremaIndex(xs);
  return {
    count: xs.length,
    mean: roundTo(mean(xs), 2),
    median: roundTo(median(xs), 2),
    std: roundTo(std(xs), 2),
    min: xs[minIndex],
    min_date: records[minIndex].date,
    max: xs[maxIndex],
    max_date: records[maxIndex].date,
  };
}

function featureTrend(records: readonly WeatherRecordV1[], feature: WeatherFeature, stablePerYear: number): FeatureTrendV1 {
  const first = records[0].date;
  const xs = records.map((r) => daysBetween(first, r.date));
  const { slope } = linearFit(xs, records.map((r) => r[feature]));
  const perYear = slope * DAYS_PER_YEAR;
  const direction = Math.abs(perYear) <= stablePerYear ? "stable" : perYear > 0 ? "rising" : "falling";
  return {
    direction,
    slope_per_day: roundTo(slope, 4),
    slope_per_year: roundTo(perYear, 3),
  };
}

export function correlationStrength(r: number): CorrelationStrengthV1 {
  const abs = Math.abs(r);
  if (abs < 0.2) return "very weak";
  if (abs < 0.4) return "weak";
  if (abs < 0.6) return "moderate";
  if (abs < 0.8) return "strong";
  return "very strong";
}

// every unordered feature pair, canonical order; needs two records
function featureCorrelations(records: readonly WeatherRecordV1[]): FeatureCorrelationV1[] {
  if (records.length < 2) return [];
  const out: FeatureCorrelationV1[] = [];
  WEATHER_FEATURES.forEach((a, i) => {
    for (const b of WEATHER_FEATURES.slice(i + 1)) {
      const r = roundTo(pearson(records.map((x) => x[a]), records.map((x) => x[b])), 3);
      out.push({ a, b, r, strength: correlationStrength(r) });
    }
  });
  return out;
}

function seasonalSummaries(records: readonly WeatherRecordV1[]): SeasonalSummaryV1[] {
  const out: SeasonalSummaryV1[] = [];
  for (const season of SeasonV1.options) {
    const rows = records.filter((r) => r.season === season);
    if (!rows.length) continue;
    const avg = (f: WeatherFeature) => roundTo(mean(rows.map((r) => r[f])), 2);
    out.push({
      season,
      count: rows.length,
      mean: { temperature: avg("temperature"), humidity: avg("humidity"), precipitation: avg("precipitation"), wind_speed: avg("wind_speed") },
    });
  }
  return out;
}

function anomalyHighlight(summary: AnomalySummaryV1): string {
  if (summary.flagged_count > 0) {
    const lead = summary.top_contributors[0];
    const driver = lead ? `, most often driven by ${FEATURE_LABELS[lead.feature]}` : "";
    return `${summary.flagged_count} anomalous days flagged${driver}.`;
  }
  return `No anomalous days stood out at ${(summary.contamination * 100).toFixed(1)}% contamination.`;
}

function buildHighlights(
  cfg: PipelineConfigV1,
  records: readonly WeatherRecordV1[],
  statistics: ReportStatisticsV1,
  summary: AnomalySummaryV1
): string[] {
  const out: string[] = [];
  const r = cfg.report;

  if (statistics.temperature.mean > r.heat_mean_temperature) {
    out.push(
      `Mean temperature of ${statistics.temperature.mean.toFixed(1)}°C is above ${r.heat_mean_temperature}°C; heat-wave risk is elevated.`
    );
  }

  const heavyRainDays = records.filter((x) => x.precipitation > r.heavy_rain_mm).length;
  if (heavyRainDays > r.heavy_rain_min_days) {
    out.push(`${heavyRainDays} heavy-rain days above ${r.heavy_rain_mm} mm; watch for local flooding.`);
  }

  out.push(anomalyHighlight(summary));
  return out;
}

export function buildReportFacts(
  cfg: PipelineConfigV1,
  series: readonly WeatherRecordV1[],
  anomalySummary: AnomalySummaryV1,
  logger?: PipelineLogger
): ReportFacts {
  const records = assertSeries(series, "report");

  const parsed = AnomalySummaryV1Schema.safeParse(anomalySummary);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`anomaly summary: ${issue.path.join(".")}: ${issue.message}`, { field: issue.path.join(".") });
  }
  const summary = parsed.data;
  if (summary.total_records !== records.length) {
    logger?.warn({ summary_records: summary.total_records, series_records: records.length }, "anomaly summary covers a different series length");
  }

  const anomalies: ReportFacts["anomalies"] = {
    flagged_count: summary.flagged_count,
    total_records: summary.total_records,
    contamination: summary.contamination,
    features: summary.features,
    top_contributors: summary.top_contributors,
    notable: summary.flagged.slice(0, cfg.report.notable_limit),
  };
  const input_fingerprint = fingerprint({ records, summary });

  if (!records.length) {
    logger?.warn({ summary_records: summary.total_records }, "insight report on an empty series");
    return {
      meta: { start_date: null, end_date: null, record_count: 0, input_fingerprint },
      statistics: null,
      trends: null,
      correlations: [],
      seasonal: [],
      anomalies,
      highlights: ["No records were supplied; statistics, trends and seasonal figures are unavailable."],
    };
  }

  const precipitation = records.map((r) => r.precipitation);
  const statistics: ReportStatisticsV1 = {
    temperature: featureStatistics(records, "temperature"),
    humidity: featureStatistics(records, "humidity"),
    precipitation: {
      ...featureStatistics(records, "precipitation"),
      total: roundTo(precipitation.reduce((a, b) => a + b, 0), 2),
      wet_days: precipitation.filter((p) => p > 0).length,
    },
    wind_speed: featureStatistics(records, "wind_speed"),
  };

  const stable = cfg.report.trend_stable_per_year;
  const trends: ReportTrendsV1 = {
    temperature: featureTrend(records, "temperature", stable.temperature),
    humidity: featureTrend(records, "humidity", stable.humidity),
    precipitation: featureTrend(records, "precipitation", stable.precipitation),
    wind_speed: featureTrend(records, "wind_speed", stable.wind_speed),
  };

  return {
    meta: {
      start_date: records[0].date,
      end_date: records[records.length - 1].date,
      record_count: records.length,
      input_fingerprint,
    },
    statistics,
    trends,
    correlations: featureCorrelations(records),
    seasonal: seasonalSummaries(records),
    anomalies,
    highlights: buildHighlights(cfg, records, statistics, summary),
  };
}

export function describeFeatures(features: readonly WeatherFeature[]): string {
  return WEATHER_FEATURES.filter((f) => features.includes(f))
    .map((f) => FEATURE_LABELS[f])
    .join(", ");
}
