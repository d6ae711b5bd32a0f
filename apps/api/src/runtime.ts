import {
  AnomalySummaryV1Schema,
  InsightReportV1Schema,
  WEATHER_FEATURES,
  type AnomalySummaryV1,
  type InsightReportV1,
  type RawWeatherRowV1,
  type WeatherRecordV1,
} from "@wxlens/contracts";
import {
  AnomalyDetector,
  computeConfigHash,
  fingerprint,
  InsightReportGenerator,
  normalizeFeatures,
  parseDayInput,
  WeatherDataCleaner,
  WeatherDataGenerator,
  type CleanResult,
  type DetectResult,
  type NarrativeStrategy,
  type PipelineConfigV1,
  type PipelineLogger,
} from "@wxlens/pipeline";

import type { InsightSqliteStore } from "./store/sqlite_store";

export type InsightRunInput = {
  start_date: string;
  end_date: string;
  seed?: number;
  features?: string[];
  contamination?: number;
};

export type InsightRunOutput = {
  fingerprint: string;
  cached: boolean;
  summary: AnomalySummaryV1;
  report: InsightReportV1;
};

export type StoredInsightRun = InsightRunOutput & {
  created_at_ts: number;
  request: unknown;
};

export type InsightRuntimeDeps = {
  config: PipelineConfigV1;
  store: InsightSqliteStore;
  narrative: NarrativeStrategy;
  logger: PipelineLogger;
};

/**
 * Holds the pipeline services for the HTTP layer. Services keep only immutable
 * config; the store is the single piece of shared state, keyed by input fingerprint.
 */
export class InsightRuntime {
  readonly configHash: string;
  private readonly generator: WeatherDataGenerator;
  private readonly cleaner: WeatherDataCleaner;
  private readonly detector: AnomalyDetector;
  private readonly reporter: InsightReportGenerator;

  constructor(private readonly deps: InsightRuntimeDeps) {
    const { config, logger, narrative } = deps;
    this.configHash = computeConfigHash(config);
    this.generator = new WeatherDataGenerator(config, logger);
    this.cleaner = new WeatherDataCleaner(config, logger);
    this.detector = new AnomalyDetector(config, logger);
    this.reporter = new InsightReportGenerator(config, narrative, logger);
  }

  get narrativeName(): NarrativeStrategy["name"] {
    return this.deps.narrative.name;
  }

  generate(startDate: string, endDate: string, seed: number = this.deps.config.detector.default_seed): WeatherRecordV1[] {
    return this.generator.generate(startDate, endDate, seed);
  }

  clean(rows: readonly RawWeatherRowV1[]): CleanResult {
    return this.cleaner.cleanWithReport(rows);
  }

  detect(records: readonly WeatherRecordV1[], features: string[], contamination?: number, seed?: number): DetectResult {
    return this.detector.detect(records, features, contamination, seed);
  }

  report(records: readonly WeatherRecordV1[], summary: AnomalySummaryV1): Promise<InsightReportV1> {
    return this.reporter.generate(records, summary);
  }

  /**
   * Full generate -> clean -> detect -> report run, served from the store when seen before.
   * A run whose service narrative fell back to the template is returned but not stored.
   */
  async insights(input: InsightRunInput): Promise<InsightRunOutput> {
    const d = this.deps.config.detector;
    // unreadable dates pass through unchanged; the generator rejects them
    const request = {
      start_date: parseDayInput(input.start_date) ?? input.start_date,
      end_date: parseDayInput(input.end_date) ?? input.end_date,
      seed: input.seed ?? d.default_seed,
      features: normalizeFeatures(input.features ?? WEATHER_FEATURES),
      contamination: input.contamination ?? d.default_contamination,
    };
    const fp = fingerprint({ request, config_hash: this.configHash });

    const hit = this.deps.store.getRun(fp);
    if (hit) {
      this.deps.logger.debug({ fingerprint: fp }, "insight cache hit");
      return {
        fingerprint: fp,
        cached: true,
        summary: AnomalySummaryV1Schema.parse(JSON.parse(hit.summary_json)),
        report: InsightReportV1Schema.parse(JSON.parse(hit.report_json)),
      };
    }

    const records = this.cleaner.clean(this.generator.generate(request.start_date, request.end_date, request.seed));
    const { summary } = this.detector.detect(records, request.features, request.contamination, request.seed);
    const report = await this.reporter.generate(records, summary);

    if (this.deps.narrative.name === "service" && report.provenance === "template-fallback") {
      this.deps.logger.warn({ fingerprint: fp }, "insight run not stored: narrative service fell back to the template");
      return { fingerprint: fp, cached: false, summary, report };
    }

    this.deps.store.insertRun({
      fingerprint: fp,
      created_at_ts: Date.now(),
      request_json: JSON.stringify(request),
      summary_json: JSON.stringify(summary),
      report_json: JSON.stringify(report),
    });
    this.deps.logger.info({ fingerprint: fp, records: records.length, flagged: summary.flagged_count }, "insight run stored");
    return { fingerprint: fp, cached: false, summary, report };
  }

  listInsights(limit: number): StoredInsightRun[] {
    return this.deps.store.listRuns(limit).map((row) => ({
      fingerprint: row.fingerprint,
      created_at_ts: row.created_at_ts,
      cached: true,
      request: JSON.parse(row.request_json),
      summary: AnomalySummaryV1Schema.parse(JSON.parse(row.summary_json)),
      report: InsightReportV1Schema.parse(JSON.parse(row.report_json)),
    }));
  }

  close(): void {
    this.deps.store.close();
  }
}
