// packages/pipeline/src/index.ts
//
// Public surface of the pipeline. The free functions build their services per
// call from the loaded config; nothing is cached between calls.

import type { AnomalySummaryV1, InsightReportV1, RawWeatherRowV1, WeatherRecordV1 } from "@wxlens/contracts";

import { AnomalyDetector, type DetectResult } from "./anomaly/anomaly_detector";
import { WeatherDataCleaner, type CleanResult } from "./cleaning/weather_cleaner";
import { loadPipelineConfig, resolveTextGenSettings, type PipelineConfigV1 } from "./config";
import { WeatherDataGenerator } from "./generator/weather_generator";
import { createLogger, type PipelineLogger } from "./logger";
import { InsightReportGenerator } from "./report/insight_report_generator";
import type { NarrativeStrategy } from "./report/narrative/narrative_strategy";
import { selectNarrativeStrategy } from "./report/narrative/select_strategy";
import type { FetchLike } from "./report/narrative/textgen_client";

export * from "./errors";
export * from "./config";
export * from "./logger";
export * from "./calendar";
export * from "./random";
export * from "./series";
export * from "./util";
export * from "./stats/descriptive";
export * from "./generator/weather_generator";
export * from "./cleaning/weather_cleaner";
export * from "./anomaly/isolation_forest";
export * from "./anomaly/anomaly_detector";
export * from "./report/report_facts";
export * from "./report/insight_report_generator";
export * from "./report/narrative/narrative_strategy";
export * from "./report/narrative/template_narrative";
export * from "./report/narrative/service_narrative";
export * from "./report/narrative/textgen_client";
export * from "./report/narrative/select_strategy";
export * from "./report/narrative/prompt";
export * from "./io/weather_csv";

export type PipelineOptions = {
  config?: PipelineConfigV1;
  logger?: PipelineLogger;
};

export type ReportOptions = PipelineOptions & {
  env?: NodeJS.ProcessEnv;
  strategy?: NarrativeStrategy;
  fetchImpl?: FetchLike;
};

function resolve(opts: PipelineOptions): { config: PipelineConfigV1; logger: PipelineLogger } {
  return { config: opts.config ?? loadPipelineConfig(), logger: opts.logger ?? createLogger("wxlens-pipeline") };
}

export function generate(startDate: string, endDate: string, seed: number, opts: PipelineOptions = {}): WeatherRecordV1[] {
  const { config, logger } = resolve(opts);
  return new WeatherDataGenerator(config, logger).generate(startDate, endDate, seed);
}

export function clean(rows: ReadonlyArray<RawWeatherRowV1>, opts: PipelineOptions = {}): WeatherRecordV1[] {
  return cleanWithReport(rows, opts).records;
}

export function cleanWithReport(rows: ReadonlyArray<RawWeatherRowV1>, opts: PipelineOptions = {}): CleanResult {
  const { config, logger } = resolve(opts);
  return new WeatherDataCleaner(config, logger).cleanWithReport(rows);
}

export function detect(
  series: readonly WeatherRecordV1[],
  features: Iterable<string>,
  contamination?: number,
  seed?: number,
  opts: PipelineOptions = {}
): DetectResult {
  const { config, logger } = resolve(opts);
  return new AnomalyDetector(config, logger).detect(series, features, contamination, seed);
}

/** Never rejects because of the text-generation service; only bad input rejects. */
export async function generateReport(
  series: readonly WeatherRecordV1[],
  summary: AnomalySummaryV1,
  opts: ReportOptions = {}
): Promise<InsightReportV1> {
  const { config, logger } = resolve(opts);
  const strategy =
    opts.strategy ??
    selectNarrativeStrategy(resolveTextGenSettings(config, opts.env ?? process.env), { logger, fetchImpl: opts.fetchImpl });
  return new InsightReportGenerator(config, strategy, logger).generate(series, summary);
}
