import assert from "node:assert/strict";
import { test } from "node:test";

import { AnomalyResultV1Schema, AnomalySummaryV1Schema, FeatureContributionV1Schema } from "../index";

const summary = {
  contamination: 0.05,
  features: ["temperature"],
  seed: 42,
  total_records: 20,
  flagged_count: 1,
  threshold_score: 0.61,
  flagged: [{ date: "2023-01-05", score: 0.61, dominant_feature: "temperature" }],
  top_contributors: [{ feature: "temperature", count: 1 }],
};

test("AnomalySummaryV1 bounds contamination to (0, 0.5]", () => {
  assert.equal(AnomalySummaryV1Schema.safeParse(summary).success, true);
  assert.equal(AnomalySummaryV1Schema.safeParse({ ...summary, contamination: 0.6 }).success, false);
  assert.equal(AnomalySummaryV1Schema.safeParse({ ...summary, contamination: 0 }).success, false);
});

test("AnomalySummaryV1 needs at least one feature", () => {
  assert.equal(AnomalySummaryV1Schema.safeParse({ ...summary, features: [] }).success, false);
  assert.equal(AnomalySummaryV1Schema.safeParse({ ...summary, features: ["season"] }).success, false);
});

test("AnomalyResultV1 keys z-scores by feature", () => {
  const result = {
    date: "2023-01-05",
    score: 0.61,
    features: ["temperature", "humidity"],
    is_anomaly: true,
    dominant_feature: "temperature",
    z_scores: { temperature: 3.1, humidity: -0.4 },
  };
  assert.deepEqual(AnomalyResultV1Schema.parse(result), result);
  assert.equal(AnomalyResultV1Schema.safeParse({ ...result, z_scores: { dew_point: 1 } }).success, false);
});

test("a feature contribution counts at least one day", () => {
  assert.equal(FeatureContributionV1Schema.safeParse({ feature: "wind_speed", count: 0 }).success, false);
});
