import { WEATHER_FEATURES } from "@wxlens/contracts";

import { describeFeatures, FEATURE_LABELS, FEATURE_UNITS, type ReportFacts } from "../report_facts";
import { describeCorrelation, describeTrend } from "./template_narrative";

/** Prompt for the text-generation service, built only from computed facts. */
export function buildNarrativePrompt(facts: ReportFacts): string {
  const { meta, statistics, trends, anomalies: a } = facts;
  const out: string[] = [
    "You are a meteorologist writing a short insight report on a daily weather dataset.",
    "Write two or three paragraphs of plain prose. Use only the figures given below.",
    "",
  ];

  if (!statistics || !trends) {
    out.push("Period: no records were supplied (0 days)", "Statistics: unavailable", "Trends: unavailable");
  } else {
    out.push(`Period: ${meta.start_date} to ${meta.end_date} (${meta.record_count} days)`, "Statistics:");
    for (const f of WEATHER_FEATURES) {
      const s = statistics[f];
      const u = FEATURE_UNITS[f];
      out.push(
        `- ${FEATURE_LABELS[f]}: mean ${s.mean}${u}, median ${s.median}${u}, min ${s.min}${u} on ${s.min_date}, max ${s.max}${u} on ${s.max_date}`
      );
    }
    out.push(`- precipitation total ${statistics.precipitation.total} mm over ${statistics.precipitation.wet_days} wet days`);

    out.push("Trends (least-squares fit):");
    for (const f of WEATHER_FEATURES) out.push(`- ${describeTrend(f, trends[f])}`);
  }

  if (facts.correlations.length) {
    out.push("Correlations (Pearson):");
    for (const c of facts.correlations) out.push(`- ${describeCorrelation(c)}`);
  }
  if (facts.seasonal.length) {
    out.push("Seasonal means:");
    for (const s of facts.seasonal) {
      const m = s.mean;
      out.push(
        `- ${s.season} (${s.count} days): temperature ${m.temperature}°C, humidity ${m.humidity}%, ` +
          `precipitation ${m.precipitation} mm, wind speed ${m.wind_speed} m/s`
      );
    }
  }

  out.push(
    `Anomalies: ${a.flagged_count} of ${a.total_records} days flagged on ${describeFeatures(a.features)} ` +
      `(contamination ${(a.contamination * 100).toFixed(1)}%)`
  );
  if (a.top_contributors.length) {
    out.push(`Top contributors: ${a.top_contributors.map((c) => `${FEATURE_LABELS[c.feature]} (${c.count})`).join(", ")}`);
  }
  for (const n of a.notable) {
    out.push(`- notable day ${n.date}: score ${n.score.toFixed(3)}, driven by ${FEATURE_LABELS[n.dominant_feature]}`);
  }

  if (facts.highlights.length) {
    out.push("Highlights:");
    for (const h of facts.highlights) out.push(`- ${h}`);
  }
  return out.join("\n");
}
