import type { ReportProvenanceV1 } from "@wxlens/contracts";

import type { ReportFacts } from "../report_facts";

export type NarrativeResult = {
  text: string;
  provenance: ReportProvenanceV1;
};

/**
 * Produces the free-text narrative of an insight report from its computed facts.
 * Implementations must not throw.
 */
export interface NarrativeStrategy {
  readonly name: "service" | "template";
  compose(facts: ReportFacts): Promise<NarrativeResult>;
}
