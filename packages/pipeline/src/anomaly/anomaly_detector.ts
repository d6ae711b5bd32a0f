// packages/pipeline/src/anomaly/anomaly_detector.ts

import type {
  AnomalyResultV1,
  AnomalySummaryV1,
  FeatureContributionV1,
  FlaggedDayV1,
  WeatherFeature,
  WeatherRecordV1,
} from "@wxlens/contracts";

import type { PipelineConfigV1 } from "../config";
import { InsufficientDataError, ValidationError } from "../errors";
import type { PipelineLogger } from "../logger";
import { assertSeries, normalizeFeatures } from "../series";
import { std, zScores } from "../stats/descriptive";
import { IsolationForest } from "./isolation_forest";

export type ScoredRecord = {
  date: string;
  score: number;
  dominant_feature: WeatherFeature;
  z_scores: Partial<Record<WeatherFeature, number>>;
};

export type DetectResult = {
  anomalies: AnomalyResultV1[];
  summary: AnomalySummaryV1;
};

// score desc, then date asc
function byRank(a: ScoredRecord, b: ScoredRecord): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}

function topContributors(flagged: readonly FlaggedDayV1[], features: readonly WeatherFeature[]): FeatureContributionV1[] {
  const counts = new Map<WeatherFeature, number>();
  for (const f of flagged) counts.set(f.dominant_feature, (counts.get(f.dominant_feature) ?? 0) + 1);
  return features
    .filter((f) => counts.has(f))
    .map((feature) => ({ feature, count: counts.get(feature) ?? 0 }))
    .sort((a, b) => b.count - a.count);
}

export class AnomalyDetector {
  constructor(
    private readonly cfg: PipelineConfigV1,
    private readonly logger?: PipelineLogger
  ) {}

  /**
   * Flag the top `contamination` share of records by isolation score.
   * Ties at the cutoff go to the earlier date. A series with no variance in
   * any selected feature yields no anomalies.
   */
  detect(
    series: readonly WeatherRecordV1[],
    features: Iterable<string>,
    contamination: number = this.cfg.detector.default_contamination,
    seed: number = this.cfg.detector.default_seed
  ): DetectResult {
    if (!Number.isFinite(contamination) || contamination <= 0 || contamination > 0.5) {
      throw new ValidationError(`contamination must be in (0, 0.5], got ${contamination}`, { field: "contamination", value: contamination });
    }

    const { records, selected, scored } = this.scoreRecords(series, features, seed);
    const k = Math.round(contamination * records.length);
    const ranked = scored.slice().sort(byRank);
    const flat = ranked.length === 0 || ranked[0].score === ranked[ranked.length - 1].score;
    const chosen = flat ? [] : ranked.slice(0, k);

    const flagged: FlaggedDayV1[] = chosen.map((r) => ({ date: r.date, score: r.score, dominant_feature: r.dominant_feature }));
    const anomalies: AnomalyResultV1[] = chosen.map((r) => ({
      date: r.date,
      score: r.score,
      features: [...selected],
      is_anomaly: true,
      dominant_feature: r.dominant_feature,
      z_scores: r.z_scores,
    }));

    const summary: AnomalySummaryV1 = {
      contamination,
      features: [...selected],
      seed,
      total_records: records.length,
      flagged_count: flagged.length,
      threshold_score: flagged.length ? flagged[flagged.length - 1].score : null,
      flagged,
      top_contributors: topContributors(flagged, selected),
    };

    this.logger?.info(
      { records: records.length, features: selected, contamination, seed, flagged: flagged.length },
      "anomaly detection complete"
    );
    return { anomalies, summary };
  }

  /** Isolation score for every record, in series order. */
  score(series: readonly WeatherRecordV1[], features: Iterable<string>, seed: number = this.cfg.detector.default_seed): ScoredRecord[] {
    return this.scoreRecords(series, features, seed).scored;
  }

  private scoreRecords(
    series: readonly WeatherRecordV1[],
    features: Iterable<string>,
    seed: number
  ): { records: WeatherRecordV1[]; selected: WeatherFeature[]; scored: ScoredRecord[] } {
    const selected = normalizeFeatures(features);
    if (!Number.isSafeInteger(seed)) throw new ValidationError("seed must be an integer", { field: "seed", value: seed });

    const records = assertSeries(series, "detect");
    const minRecords = this.cfg.detector.min_records;
    if (records.length < minRecords) throw new InsufficientDataError("anomaly detection", minRecords, records.length);

    // Column-wise z-scores, built into new arrays; the input is never touched.
    const columns = selected.map((f) => zScores(records.map((r) => r[f])));
    const points = records.map((_, i) => columns.map((col) => col[i]));

    const varying = selected.some((f) => std(records.map((r) => r[f])) > 0);
    const forest = varying
      ? IsolationForest.fit(points, { nTrees: this.cfg.detector.n_trees, sampleSize: this.cfg.detector.sample_size, seed })
      : null;

    const scored = records.map((r, i): ScoredRecord => {
      const z_scores: Partial<Record<WeatherFeature, number>> = {};
      let best = 0;
      selected.forEach((f, j) => {
        z_scores[f] = points[i][j];
        if (Math.abs(points[i][j]) > Math.abs(points[i][best])) best = j;
      });
      return {
        date: r.date,
        // with no variance every point is equally (un)isolated
        score: forest ? forest.score(points[i]) : 0.5,
        dominant_feature: selected[best],
        z_scores,
      };
    });

    return { records, selected, scored };
  }
}
