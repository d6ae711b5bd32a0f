import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";

import { computeConfigHash, loadPipelineConfig, parsePipelineConfig, resolveTextGenSettings } from "../config";
import { ValidationError } from "../errors";
import { cfg } from "./helpers";

test("default config loads from the repository SSOT", () => {
  assert.equal(cfg.detector.min_records, 10);
  assert.equal(cfg.detector.default_contamination, 0.05);
  assert.deepEqual(cfg.bounds.humidity, { min: 0, max: 100 });
  assert.deepEqual(cfg.cleaning.sentinels, [-9999, -999, 9999]);
});

test("config hash is stable across loads", () => {
  const h = computeConfigHash(cfg);
  assert.match(h, /^sha256:[0-9a-f]{64}$/);
  assert.equal(computeConfigHash(loadPipelineConfig({})), h);
});

test("parsePipelineConfig rejects inverted bounds", () => {
  const raw = structuredClone(cfg);
  raw.bounds.temperature = { min: 10, max: -10 };
  assert.throws(
    () => parsePipelineConfig(raw),
    (err: unknown) => err instanceof ValidationError && err.message.includes("bounds.temperature")
  );
});

test("WXLENS_CONFIG_PATH overrides the default location", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wxlens-config-"));
  const file = path.join(dir, "pipeline.json");
  const custom = structuredClone(cfg);
  custom.detector.min_records = 30;
  fs.writeFileSync(file, JSON.stringify(custom));
  try {
    assert.equal(loadPipelineConfig({ WXLENS_CONFIG_PATH: file }).detector.min_records, 30);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("text generation is disabled without a credential", () => {
  const s = resolveTextGenSettings(cfg, {});
  assert.equal(s.enabled, false);
  assert.equal(s.apiKey, null);
  assert.equal(s.baseUrl, cfg.narrative.base_url);
  assert.equal(resolveTextGenSettings(cfg, { WXLENS_TEXTGEN_API_KEY: "   " }).enabled, false);
});

test("text generation settings read the environment", () => {
  const s = resolveTextGenSettings(cfg, {
    WXLENS_TEXTGEN_API_KEY: "test-secret",
    WXLENS_TEXTGEN_BASE_URL: "http://localhost:9999/v1",
    WXLENS_TEXTGEN_MODEL: "test-model",
  });
  assert.deepEqual(s, {
    enabled: true,
    apiKey: "test-secret",
    baseUrl: "http://localhost:9999/v1",
    model: "test-model",
    timeoutMs: cfg.narrative.timeout_ms,
    maxTokens: cfg.narrative.max_tokens,
    retries: cfg.narrative.retries,
  });
});
