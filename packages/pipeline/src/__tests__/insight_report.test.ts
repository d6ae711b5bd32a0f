import assert from "node:assert/strict";
import { test } from "node:test";
import { InsightReportV1Schema, type AnomalySummaryV1 } from "@wxlens/contracts";

import { ValidationError } from "../errors";
import { generateReport } from "../index";
import type { FetchLike } from "../report/narrative/textgen_client";
import { buildReportFacts, correlationStrength } from "../report/report_facts";
import { cfg, series, silent } from "./helpers";

const temps = [26, 28, 30, 27, 29];
const rain = [25, 0, 30, 22, 21];
const july = series("2023-07-01", 5, (i) => ({ temperature: temps[i], precipitation: rain[i], humidity: 50 }));

const summary: AnomalySummaryV1 = {
  contamination: 0.2,
  features: ["temperature"],
  seed: 42,
  total_records: 5,
  flagged_count: 1,
  threshold_score: 0.7,
  flagged: [{ date: "2023-07-03", score: 0.7, dominant_feature: "temperature" }],
  top_contributors: [{ feature: "temperature", count: 1 }],
};

const quiet = { config: cfg, logger: silent };

test("statistics, trends and highlights are computed locally", () => {
  const facts = buildReportFacts(cfg, july, summary);

  assert.deepEqual(facts.meta.start_date, "2023-07-01");
  assert.deepEqual(facts.meta.end_date, "2023-07-05");
  assert.equal(facts.meta.record_count, 5);
  assert.match(facts.meta.input_fingerprint, /^sha256:[0-9a-f]{64}$/);

  assert.ok(facts.statistics);
  assert.ok(facts.trends);
  assert.deepEqual(facts.statistics.temperature, {
    count: 5,
    mean: 28,
    median: 28,
    std: 1.41,
    min: 26,
    min_date: "2023-07-01",
    max: 30,
    max_date: "2023-07-03",
  });
  assert.equal(facts.statistics.precipitation.total, 98);
  assert.equal(facts.statistics.precipitation.wet_days, 4);

  assert.deepEqual(facts.trends.temperature, { direction: "rising", slope_per_day: 0.5, slope_per_year: 182.625 });
  assert.deepEqual(facts.trends.humidity, { direction: "stable", slope_per_day: 0, slope_per_year: 0 });

  assert.deepEqual(facts.highlights, [
    "Mean temperature of 28.0°C is above 25°C; heat-wave risk is elevated.",
    "4 heavy-rain days above 20 mm; watch for local flooding.",
    "1 anomalous days flagged, most often driven by temperature.",
  ]);
  assert.deepEqual(facts.anomalies.notable, summary.flagged);
});

test("a quiet summary gets the no-anomaly highlight", () => {
  const calm = series("2023-01-01", 3);
  const facts = buildReportFacts(cfg, calm, {
    ...summary,
    contamination: 0.05,
    total_records: 3,
    flagged_count: 0,
    threshold_score: null,
    flagged: [],
    top_contributors: [],
  });
  assert.deepEqual(facts.highlights, ["No anomalous days stood out at 5.0% contamination."]);
});

test("correlations cover every feature pair in canonical order", () => {
  const facts = buildReportFacts(cfg, july, summary);
  assert.deepEqual(facts.correlations, [
    { a: "temperature", b: "humidity", r: 0, strength: "very weak" },
    { a: "temperature", b: "precipitation", r: 0.124, strength: "very weak" },
    { a: "temperature", b: "wind_speed", r: 0, strength: "very weak" },
    { a: "humidity", b: "precipitation", r: 0, strength: "very weak" },
    { a: "humidity", b: "wind_speed", r: 0, strength: "very weak" },
    { a: "precipitation", b: "wind_speed", r: 0, strength: "very weak" },
  ]);
});

test("correlation strength bands follow |r|", () => {
  assert.deepEqual(
    [0.1, -0.25, 0.5, -0.79, 0.8, 1].map(correlationStrength),
    ["very weak", "weak", "moderate", "strong", "very strong", "very strong"]
  );
});

test("seasonal means group records by meteorological season", () => {
  assert.deepEqual(buildReportFacts(cfg, july, summary).seasonal, [
    { season: "summer", count: 5, mean: { temperature: 28, humidity: 50, precipitation: 19.6, wind_speed: 3 } },
  ]);

  // 2023-02-27 .. 2023-03-04: two winter days, then four spring days
  const turn = series("2023-02-27", 6, (i) => ({ temperature: i < 2 ? 2 : 8 + i }));
  const facts = buildReportFacts(cfg, turn, { ...summary, total_records: 6, flagged: [], flagged_count: 0, top_contributors: [] });
  assert.deepEqual(
    facts.seasonal.map((s) => [s.season, s.count, s.mean.temperature]),
    [
      ["spring", 4, 11.5],
      ["winter", 2, 2],
    ]
  );
});

test("a single record has flat, stable trends", () => {
  const facts = buildReportFacts(cfg, july.slice(0, 1), { ...summary, total_records: 1 });
  assert.ok(facts.statistics);
  assert.ok(facts.trends);
  assert.deepEqual(facts.correlations, []);
  assert.deepEqual(facts.trends.temperature, { direction: "stable", slope_per_day: 0, slope_per_year: 0 });
  assert.equal(facts.statistics.temperature.std, 0);
});

test("without a credential the report is template-backed and complete", async () => {
  const report = await generateReport(july, summary, { ...quiet, env: {} });
  InsightReportV1Schema.parse(report);
  assert.equal(report.provenance, "template-fallback");
  assert.equal(report.type, "insight_report_v1");
  assert.equal(
    report.narrative.split("\n")[0],
    "Between 2023-07-01 and 2023-07-05 (5 days) the mean temperature was 28.0°C, ranging from 26.0°C on 2023-07-01 to 30.0°C on 2023-07-03."
  );
});

test("a failing service still yields a template-backed report", async () => {
  let calls = 0;
  const fetchImpl: FetchLike = async () => {
    calls++;
    throw new TypeError("connection refused");
  };
  const report = await generateReport(july, summary, { ...quiet, env: { WXLENS_TEXTGEN_API_KEY: "test-secret" }, fetchImpl });
  assert.equal(report.provenance, "template-fallback");
  assert.equal(calls, 2);
  InsightReportV1Schema.parse(report);
});

test("a working service supplies the narrative", async () => {
  const fetchImpl: FetchLike = async () =>
    new Response(JSON.stringify({ choices: [{ message: { content: "A hot, stormy week." } }] }), { status: 200 });
  const report = await generateReport(july, summary, { ...quiet, env: { WXLENS_TEXTGEN_API_KEY: "test-secret" }, fetchImpl });
  assert.equal(report.provenance, "generated");
  assert.equal(report.narrative, "A hot, stormy week.");
});

test("only the narrative depends on the strategy", async () => {
  const a = await generateReport(july, summary, { ...quiet, env: {} });
  const b = await generateReport(july, summary, {
    ...quiet,
    strategy: { name: "service", compose: async () => ({ text: "stub", provenance: "generated" }) },
  });
  const { narrative: _na, provenance: _pa, ...restA } = a;
  const { narrative: _nb, provenance: _pb, ...restB } = b;
  assert.deepEqual(restA, restB);
});

test("an empty series still yields a template-backed report", async () => {
  const none: AnomalySummaryV1 = { ...summary, total_records: 0, flagged_count: 0, threshold_score: null, flagged: [], top_contributors: [] };
  const report = await generateReport([], none, { ...quiet, env: {} });
  InsightReportV1Schema.parse(report);
  assert.equal(report.provenance, "template-fallback");
  assert.deepEqual(report.meta, { start_date: null, end_date: null, record_count: 0, input_fingerprint: report.meta.input_fingerprint });
  assert.equal(report.statistics, null);
  assert.equal(report.trends, null);
  assert.deepEqual(report.correlations, []);
  assert.deepEqual(report.seasonal, []);
  assert.deepEqual(report.highlights, ["No records were supplied; statistics, trends and seasonal figures are unavailable."]);
  assert.equal(
    report.narrative,
    "No weather records were available, so no statistics or trends could be computed. 0 anomalous days were reported."
  );
});

test("an empty series with a working service still reports generated prose", async () => {
  const fetchImpl: FetchLike = async () =>
    new Response(JSON.stringify({ choices: [{ message: { content: "Nothing to report." } }] }), { status: 200 });
  const report = await generateReport([], summary, { ...quiet, env: { WXLENS_TEXTGEN_API_KEY: "test-secret" }, fetchImpl });
  assert.equal(report.provenance, "generated");
  assert.equal(report.meta.record_count, 0);
});

test("bad inputs are rejected before any narrative work", async () => {
  await assert.rejects(generateReport(july, { ...summary, contamination: 0.9 }, { ...quiet, env: {} }), ValidationError);
});
