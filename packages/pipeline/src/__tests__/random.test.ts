import assert from "node:assert/strict";
import { test } from "node:test";

import { exponential, mulberry32, randn, sampleIndices } from "../random";

function draws(seed: number, n: number): number[] {
  const rng = mulberry32(seed);
  return Array.from({ length: n }, () => rng());
}

test("mulberry32 is reproducible per seed and stays in [0, 1)", () => {
  const a = draws(42, 1000);
  assert.deepEqual(a, draws(42, 1000));
  assert.notDeepEqual(a, draws(43, 1000));
  assert.ok(a.every((x) => x >= 0 && x < 1));
});

test("seeds a multiple of 2^32 apart give different streams", () => {
  assert.notDeepEqual(draws(0, 8), draws(4294967296, 8));
  assert.notDeepEqual(draws(7, 8), draws(7 + 2 * 4294967296, 8));
  assert.notDeepEqual(draws(-1, 8), draws(4294967295, 8));
  assert.deepEqual(draws(4294967296, 8), draws(4294967296, 8));
});

test("randn consumes exactly two draws", () => {
  const a = mulberry32(7);
  const b = mulberry32(7);
  randn(a);
  b();
  b();
  assert.equal(a(), b());
});

test("exponential draws are non-negative", () => {
  const rng = mulberry32(3);
  for (let i = 0; i < 200; i++) assert.ok(exponential(rng, 3) >= 0);
});

test("sampleIndices returns distinct in-range indices", () => {
  const idx = sampleIndices(mulberry32(1), 50, 20);
  assert.equal(idx.length, 20);
  assert.equal(new Set(idx).size, 20);
  assert.ok(idx.every((i) => Number.isInteger(i) && i >= 0 && i < 50));

  assert.deepEqual(
    sampleIndices(mulberry32(1), 5, 10).sort((x, y) => x - y),
    [0, 1, 2, 3, 4]
  );
});
