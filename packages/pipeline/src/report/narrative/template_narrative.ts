// packages/pipeline/src/report/narrative/template_narrative.ts
//
// Fixed sentences filled from the report facts. Deterministic: identical facts
// always give identical text.

import {
  WEATHER_FEATURES,
  type FeatureCorrelationV1,
  type FeatureTrendV1,
  type SeasonalSummaryV1,
  type WeatherFeature,
} from "@wxlens/contracts";

import { describeFeatures, FEATURE_LABELS, FEATURE_UNITS, type ReportFacts } from "../report_facts";
import type { NarrativeResult, NarrativeStrategy } from "./narrative_strategy";

function signed(x: number): string {
  return `${x > 0 ? "+" : ""}${x.toFixed(2)}`;
}

export function describeTrend(feature: WeatherFeature, t: FeatureTrendV1): string {
  const label = FEATURE_LABELS[feature];
  if (t.direction === "stable") return `${label} stable`;
  return `${label} ${t.direction} (${signed(t.slope_per_year)} ${FEATURE_UNITS[feature]} per year)`;
}

export function describeCorrelation(c: FeatureCorrelationV1): string {
  const sign = c.r < 0 ? "negative" : "positive";
  return `${FEATURE_LABELS[c.a]} and ${FEATURE_LABELS[c.b]} (${c.strength} ${sign}, r = ${c.r.toFixed(2)})`;
}

/** Pair with the largest |r|; the earlier pair wins ties. */
export function strongestCorrelation(correlations: readonly FeatureCorrelationV1[]): FeatureCorrelationV1 | null {
  let best: FeatureCorrelationV1 | null = null;
  for (const c of correlations) if (!best || Math.abs(c.r) > Math.abs(best.r)) best = c;
  return best;
}

export function describeSeason(s: SeasonalSummaryV1): string {
  return `${s.season} ${s.mean.temperature.toFixed(1)}°C over ${s.count} days`;
}

export function renderTemplateNarrative(facts: ReportFacts): string {
  const { meta, statistics: s, trends, anomalies: a } = facts;
  if (!s || !trends) {
    return `No weather records were available, so no statistics or trends could be computed. ${a.flagged_count} anomalous days were reported.`;
  }

  const lines: string[] = [];
  lines.push(
    `Between ${meta.start_date} and ${meta.end_date} (${meta.record_count} days) the mean temperature was ` +
      `${s.temperature.mean.toFixed(1)}°C, ranging from ${s.temperature.min.toFixed(1)}°C on ${s.temperature.min_date} ` +
      `to ${s.temperature.max.toFixed(1)}°C on ${s.temperature.max_date}.`
  );
  lines.push(
    `Average humidity was ${s.humidity.mean.toFixed(1)}% and total precipitation reached ${s.precipitation.total.toFixed(1)} mm ` +
      `over ${s.precipitation.wet_days} wet days; mean wind speed was ${s.wind_speed.mean.toFixed(1)} m/s.`
  );
  lines.push(`Trends: ${WEATHER_FEATURES.map((f) => describeTrend(f, trends[f])).join(", ")}.`);

  const strongest = strongestCorrelation(facts.correlations);
  if (strongest) lines.push(`The strongest relationship is between ${describeCorrelation(strongest)}.`);
  if (facts.seasonal.length) lines.push(`Seasonal mean temperature: ${facts.seasonal.map(describeSeason).join(", ")}.`);

  if (a.flagged_count > 0) {
    const drivers = a.top_contributors.map((c) => `${FEATURE_LABELS[c.feature]} (${c.count})`).join(", ");
    const notable = a.notable.map((n) => n.date).join(", ");
    lines.push(
      `${a.flagged_count} of ${a.total_records} days were flagged as anomalous on ${describeFeatures(a.features)} ` +
        `at ${(a.contamination * 100).toFixed(1)}% contamination, driven by ${drivers}. Most notable: ${notable}.`
    );
  } else {
    lines.push(`No anomalous days were flagged among ${a.total_records} records on ${describeFeatures(a.features)}.`);
  }

  return lines.join("\n");
}

export class TemplateNarrativeStrategy implements NarrativeStrategy {
  readonly name = "template";

  async compose(facts: ReportFacts): Promise<NarrativeResult> {
    return { text: renderTemplateNarrative(facts), provenance: "template-fallback" };
  }
}
