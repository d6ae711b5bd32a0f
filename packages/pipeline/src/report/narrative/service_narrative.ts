// packages/pipeline/src/report/narrative/service_narrative.ts

import { errorMessage, ExternalServiceError } from "../../errors";
import type { PipelineLogger } from "../../logger";
import type { ReportFacts } from "../report_facts";
import type { NarrativeResult, NarrativeStrategy } from "./narrative_strategy";
import { buildNarrativePrompt } from "./prompt";
import type { TextGenerationClient } from "./textgen_client";

export type ServiceNarrativeOptions = {
  maxTokens: number;
  // extra attempts after the first failure (0 or 1)
  retries: number;
};

/**
 * Narrative from the external text-generation service. On failure the call is
 * retried at most `retries` times, then the fallback strategy writes the text
 * and the result is tagged template-fallback.
 */
export class ServiceNarrativeStrategy implements NarrativeStrategy {
  readonly name = "service";

  constructor(
    private readonly client: TextGenerationClient,
    private readonly fallback: NarrativeStrategy,
    private readonly opts: ServiceNarrativeOptions,
    private readonly logger?: PipelineLogger
  ) {}

  async compose(facts: ReportFacts): Promise<NarrativeResult> {
    const prompt = buildNarrativePrompt(facts);
    const attempts = 1 + Math.max(0, Math.min(1, this.opts.retries));

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const text = await this.client.complete({ prompt, maxTokens: this.opts.maxTokens });
        return { text, provenance: "generated" };
      } catch (err) {
        const kind = err instanceof ExternalServiceError ? err.kind : "unexpected";
        this.logger?.warn({ attempt, attempts, kind, err: errorMessage(err) }, "narrative service call failed");
      }
    }

    const fb = await this.fallback.compose(facts);
    this.logger?.warn({ fallback: this.fallback.name }, "narrative fell back to template");
    return { text: fb.text, provenance: "template-fallback" };
  }
}
