import assert from "node:assert/strict";
import { test } from "node:test";
import { AnomalyResultV1Schema, AnomalySummaryV1Schema } from "@wxlens/contracts";

import { AnomalyDetector } from "../anomaly/anomaly_detector";
import { averagePathLength, IsolationForest } from "../anomaly/isolation_forest";
import { InsufficientDataError, ValidationError } from "../errors";
import { WeatherDataGenerator } from "../generator/weather_generator";
import { cfg, series, silent } from "./helpers";

const detector = new AnomalyDetector(cfg, silent);
const year = new WeatherDataGenerator(cfg).generate("2023-01-01", "2023-12-31", 42);

test("averagePathLength matches the closed form", () => {
  assert.equal(averagePathLength(1), 0);
  assert.equal(averagePathLength(2), 1);
  assert.ok(Math.abs(averagePathLength(256) - 10.2448) < 1e-3);
});

test("an isolated point scores higher than the cluster", () => {
  const points = [...Array.from({ length: 50 }, (_, i) => [i % 5, i % 3]), [40, 40]];
  const forest = IsolationForest.fit(points, { nTrees: 100, sampleSize: 64, seed: 1 });
  assert.ok(forest.score([40, 40]) > forest.score([2, 1]));
});

test("an identical-value series has no anomalies", () => {
  const { anomalies, summary } = detector.detect(series("2023-01-01", 20), ["temperature", "humidity"], 0.1, 42);
  assert.deepEqual(anomalies, []);
  assert.equal(summary.flagged_count, 0);
  assert.equal(summary.threshold_score, null);
  assert.equal(summary.total_records, 20);
});

test("tied scores at the cutoff go to the earlier date", () => {
  // 2023-03-11 and 2023-03-31 carry the same spike
  const spikes = series("2023-03-01", 40, (i) => ({ temperature: i === 10 || i === 30 ? 40 : 10 + (i % 3) / 10 }));
  const scored = detector.score(spikes, ["temperature", "humidity"], 42);
  assert.equal(scored[10].score, scored[30].score);
  assert.ok(scored.every((r, i) => i === 10 || i === 30 || r.score < scored[10].score));

  const { anomalies, summary } = detector.detect(spikes, ["temperature", "humidity"], 1 / 40, 42);
  assert.deepEqual(
    anomalies.map((a) => a.date),
    ["2023-03-11"]
  );
  assert.equal(anomalies[0].score, scored[30].score);
  assert.equal(summary.threshold_score, scored[30].score);
  assert.deepEqual(summary.flagged, [{ date: "2023-03-11", score: scored[10].score, dominant_feature: "temperature" }]);
});

test("a series shorter than the minimum raises InsufficientDataError", () => {
  assert.throws(
    () => detector.detect(series("2023-01-01", 5), ["temperature"], 0.1, 42),
    (err: unknown) => err instanceof InsufficientDataError && err.required === 10 && err.actual === 5 && err.status === 422
  );
});

test("an empty or unknown feature set raises ValidationError", () => {
  assert.throws(() => detector.detect(year, [], 0.05, 42), ValidationError);
  assert.throws(() => detector.detect(year, ["pressure"], 0.05, 42), ValidationError);
});

test("contamination outside (0, 0.5] raises ValidationError", () => {
  assert.throws(() => detector.detect(year, ["temperature"], 0, 42), ValidationError);
  assert.throws(() => detector.detect(year, ["temperature"], 0.6, 42), ValidationError);
  assert.throws(() => detector.detect(year, ["temperature"], Number.NaN, 42), ValidationError);
});

test("unordered series are rejected", () => {
  const s = series("2023-01-01", 12);
  assert.throws(() => detector.detect([s[1], s[0], ...s.slice(2)], ["temperature"]), ValidationError);
});

test("repeated runs flag the same days", () => {
  const a = detector.detect(year, ["temperature", "precipitation"], 0.05, 42);
  const b = new AnomalyDetector(cfg).detect(year, ["precipitation", "temperature"], 0.05, 42);
  assert.deepEqual(a, b);
});

test("flagged count tracks contamination * n", () => {
  for (const contamination of [0.01, 0.05, 0.1, 0.5]) {
    const { anomalies, summary } = detector.detect(year, ["temperature", "humidity", "wind_speed"], contamination, 3);
    assert.ok(Math.abs(anomalies.length - contamination * year.length) <= 1, `contamination ${contamination}`);
    assert.equal(summary.flagged_count, anomalies.length);
    assert.ok(anomalies.every((a) => a.is_anomaly));
  }
});

test("results satisfy their schemas and are ranked by score", () => {
  const { anomalies, summary } = detector.detect(year, ["temperature", "wind_speed"]);
  AnomalySummaryV1Schema.parse(summary);
  anomalies.forEach((a) => AnomalyResultV1Schema.parse(a));

  assert.equal(summary.contamination, cfg.detector.default_contamination);
  assert.equal(summary.seed, cfg.detector.default_seed);
  for (let i = 1; i < anomalies.length; i++) assert.ok(anomalies[i - 1].score >= anomalies[i].score);
  assert.equal(summary.threshold_score, anomalies[anomalies.length - 1].score);
  assert.deepEqual(Object.keys(anomalies[0].z_scores), ["temperature", "wind_speed"]);
  assert.equal(
    summary.top_contributors.reduce((n, c) => n + c.count, 0),
    summary.flagged_count
  );
});

test("a single spike is flagged and attributed to its feature", () => {
  const s = series("2023-03-01", 60, (i) => ({ temperature: i === 37 ? 40 : 10 + (i % 3) / 10 }));
  const { anomalies, summary } = detector.detect(s, ["temperature", "humidity"], 1 / 60, 42);
  assert.equal(anomalies.length, 1);
  assert.equal(anomalies[0].date, "2023-04-07");
  assert.equal(anomalies[0].dominant_feature, "temperature");
  assert.deepEqual(summary.top_contributors, [{ feature: "temperature", count: 1 }]);
  assert.deepEqual(summary.flagged, [{ date: "2023-04-07", score: anomalies[0].score, dominant_feature: "temperature" }]);
});

test("score covers every record without flagging", () => {
  const scored = detector.score(year.slice(0, 30), ["humidity"], 5);
  assert.equal(scored.length, 30);
  assert.ok(scored.every((s) => s.score > 0 && s.score <= 1));
});

test("the input series is not mutated", () => {
  const input = year.slice(0, 40);
  const before = structuredClone(input);
  detector.detect(input, ["temperature", "humidity", "precipitation", "wind_speed"], 0.1, 1);
  assert.deepEqual(input, before);
});
