// packages/pipeline/src/stats/descriptive.ts

export function mean(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  let s = 0;
  for (const x of xs) s += x;
  return s / xs.length;
}

export function median(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  const sorted = xs.slice().sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Population standard deviation. */
export function std(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  const m = mean(xs);
  let s = 0;
  for (const x of xs) s += (x - m) * (x - m);
  return Math.sqrt(s / xs.length);
}

/** Index of the first minimum and first maximum. */
export function extremaIndex(xs: readonly number[]): { minIndex: number; maxIndex: number } {
  let minIndex = 0;
  let maxIndex = 0;
  for (let i = 1; i < xs.length; i++) {
    if (xs[i] < xs[minIndex]) minIndex = i;
    if (xs[i] > xs[maxIndex]) maxIndex = i;
  }
  return { minIndex, maxIndex };
}

/** Ordinary least squares y = intercept + slope * x. A degenerate x axis gives slope 0. */
export function linearFit(xs: readonly number[], ys: readonly number[]): { slope: number; intercept: number } {
  if (xs.length !== ys.length || xs.length === 0) {
    throw new Error("Arrays must have the same non-zero length");
  }
  const mx = mean(xs);
  const my = mean(ys);
  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < xs.length; i++) {
    sxy += (xs[i] - mx) * (ys[i] - my);
    sxx += (xs[i] - mx) * (xs[i] - mx);
  }
  if (sxx === 0) return { slope: 0, intercept: my };
  const slope = sxy / sxx;
  return { slope, intercept: my - slope * mx };
}

/** z-scores against the sample's own mean and population std; zero variance maps to 0. */
export function zScores(xs: readonly number[]): number[] {
  const m = mean(xs);
  const s = std(xs);
  if (!(s > 0)) return xs.map(() => 0);
  return xs.map((x) => (x - m) / s);
}

/** Pearson correlation coefficient; 0 when either side has no variance. */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  if (xs.length !== ys.length || xs.length === 0) {
    throw new Error("Arrays must have the same non-zero length");
  }
  const n = xs.length;
  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;
  let sumY2 = 0;
  for (let i = 0; i < n; i++) {
    sumX += xs[i];
    sumY += ys[i];
    sumXY += xs[i] * ys[i];
    sumX2 += xs[i] * xs[i];
    sumY2 += ys[i] * ys[i];
  }

  const numerator = n * sumXY - sumX * sumY;
  const denominator = Math.sqrt((n * sumX2 - sumX * sumX) * (n * sumY2 - sumY * sumY));
  if (!(denominator > 0)) return 0;
  return Math.max(-1, Math.min(1, numerator / denominator));
}
