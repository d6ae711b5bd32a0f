// packages/pipeline/src/anomaly/isolation_forest.ts
//
// Isolation forest over dense numeric points (one row per record, one column per feature).
// Points separated from the rest in fewer random splits get shorter average paths and
// higher scores: score = 2^(-E[h(x)] / c(psi)).

import { mulberry32, randInt, sampleIndices, uniform, type Rng } from "../random";

const EULER_GAMMA = 0.5772156649015329;

type IsolationNode =
  | { kind: "leaf"; size: number }
  | { kind: "split"; feature: number; value: number; left: IsolationNode; right: IsolationNode };

export type IsolationForestOptions = {
  nTrees: number;
  sampleSize: number;
  seed: number;
};

/** Average path length of an unsuccessful BST search over n points, c(n). */
export function averagePathLength(n: number): number {
  if (n <= 1) return 0;
  if (n === 2) return 1;
  return 2 * (Math.log(n - 1) + EULER_GAMMA) - (2 * (n - 1)) / n;
}

function buildTree(rows: number[][], depth: number, heightLimit: number, rng: Rng): IsolationNode {
  if (rows.length <= 1 || depth >= heightLimit) return { kind: "leaf", size: rows.length };

  // Only columns that still vary inside this node can split it.
  const splittable: Array<{ feature: number; min: number; max: number }> = [];
  for (let f = 0; f < rows[0].length; f++) {
    let min = rows[0][f];
    let max = rows[0][f];
    for (const r of rows) {
      if (r[f] < min) min = r[f];
      if (r[f] > max) max = r[f];
    }
    if (max > min) splittable.push({ feature: f, min, max });
  }
  if (!splittable.length) return { kind: "leaf", size: rows.length };

  const pick = splittable[randInt(rng, splittable.length)];
  const value = uniform(rng, pick.min, pick.max);
  const left: number[][] = [];
  const right: number[][] = [];
  for (const r of rows) (r[pick.feature] < value ? left : right).push(r);

  return {
    kind: "split",
    feature: pick.feature,
    value,
    left: buildTree(left, depth + 1, heightLimit, rng),
    right: buildTree(right, depth + 1, heightLimit, rng),
  };
}

function pathLength(node: IsolationNode, point: readonly number[], depth: number): number {
  let cur = node;
  let d = depth;
  while (cur.kind === "split") {
    cur = point[cur.feature] < cur.value ? cur.left : cur.right;
    d++;
  }
  return d + averagePathLength(cur.size);
}

export class IsolationForest {
  private constructor(
    private readonly trees: readonly IsolationNode[],
    private readonly sampleSize: number
  ) {}

  static fit(points: number[][], opts: IsolationForestOptions): IsolationForest {
    if (points.length < 2) throw new Error("isolation forest needs at least 2 points");
    const rng = mulberry32(opts.seed);
    const psi = Math.min(opts.sampleSize, points.length);
    const heightLimit = Math.ceil(Math.log2(psi));

    const trees: IsolationNode[] = [];
    for (let t = 0; t < opts.nTrees; t++) {
      const sample = sampleIndices(rng, points.length, psi).map((i) => points[i]);
      trees.push(buildTree(sample, 0, heightLimit, rng));
    }
    return new IsolationForest(trees, psi);
  }

  score(point: readonly number[]): number {
    let total = 0;
    for (const tree of this.trees) total += pathLength(tree, point, 0);
    const avg = total / this.trees.length;
    return Math.pow(2, -avg / averagePathLength(this.sampleSize));
  }
}
