import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) {
    return x.map(canonicalize);
  }
  if (typeof x === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) out[k] = canonicalize(v);
    return out;
  }
  return x;
}

/** sha256 of the canonical JSON form, with a "sha256:" prefix. */
export function fingerprint(value: unknown): string {
  return `sha256:${sha256Hex(stableStringify(value))}`;
}

export function clamp(x: number, lo: number, hi: number): number {
  if (x < lo) return lo;
  if (x > hi) return hi;
  return x;
}

/** Round to `digits` decimals; never returns -0. */
export function roundTo(x: number, digits: number): number {
  const f = 10 ** digits;
  const r = Math.round(x * f) / f;
  return r === 0 ? 0 : r;
}

export function round1(x: number): number {
  return roundTo(x, 1);
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * Returns an absolute directory path. Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const candidate = path.join(cur, requiredRelativePath);
    if (fs.existsSync(candidate)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
