// packages/pipeline/src/report/insight_report_generator.ts

import type { AnomalySummaryV1, InsightReportV1, WeatherRecordV1 } from "@wxlens/contracts";

import type { PipelineConfigV1 } from "../config";
import type { PipelineLogger } from "../logger";
import type { NarrativeStrategy } from "./narrative/narrative_strategy";
import { buildReportFacts } from "./report_facts";

export class InsightReportGenerator {
  constructor(
    private readonly cfg: PipelineConfigV1,
    private readonly narrative: NarrativeStrategy,
    private readonly logger?: PipelineLogger
  ) {}

  async generate(series: readonly WeatherRecordV1[], anomalySummary: AnomalySummaryV1): Promise<InsightReportV1> {
    const facts = buildReportFacts(this.cfg, series, anomalySummary, this.logger);
    const { text, provenance } = await this.narrative.compose(facts);

    this.logger?.info(
      { records: facts.meta.record_count, strategy: this.narrative.name, provenance },
      "insight report generated"
    );
    return {
      type: "insight_report_v1",
      schema_version: "1.0.0",
      ...facts,
      narrative: text,
      provenance,
    };
  }
}
