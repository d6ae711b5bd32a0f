import type { TextGenSettings } from "../../config";
import type { PipelineLogger } from "../../logger";
import type { NarrativeStrategy } from "./narrative_strategy";
import { ServiceNarrativeStrategy } from "./service_narrative";
import { TemplateNarrativeStrategy } from "./template_narrative";
import { ChatCompletionsClient, type FetchLike, type TextGenerationClient } from "./textgen_client";

export type NarrativeDeps = {
  logger?: PipelineLogger;
  fetchImpl?: FetchLike;
  // overrides the HTTP client entirely (tests, alternative providers)
  client?: TextGenerationClient;
};

/**
 * Chosen once per generator: service-backed when a credential is configured,
 * template otherwise. Absence of a credential is not an error.
 */
export function selectNarrativeStrategy(settings: TextGenSettings, deps: NarrativeDeps = {}): NarrativeStrategy {
  const template = new TemplateNarrativeStrategy();
  if (!settings.enabled) return template;

  const client = deps.client ?? new ChatCompletionsClient(settings, deps.fetchImpl);
  return new ServiceNarrativeStrategy(
    client,
    template,
    { maxTokens: settings.maxTokens, retries: settings.retries },
    deps.logger
  );
}
