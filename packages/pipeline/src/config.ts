// packages/pipeline/src/config.ts
//
// Pipeline config SSOT loader.
//
// Source of truth:
//   config/pipeline/default.json (repo root), or the file named by WXLENS_CONFIG_PATH.
//
// The config is immutable once loaded; services copy what they need at construction.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ValidationError } from "./errors";
import { findRepoRoot, fingerprint } from "./util";

const CONFIG_RELATIVE_PATH = path.join("config", "pipeline", "default.json");

const BoundsSchema = z
  .object({ min: z.number().finite(), max: z.number().finite() })
  .refine((b) => b.min < b.max, { message: "min must be < max" });

const SeasonalCurveSchema = z.object({
  mean: z.number().finite(),
  amplitude: z.number().finite(),
  peak_day: z.number().int().min(1).max(366),
  trend_per_year: z.number().finite(),
  noise_sd: z.number().nonnegative(),
});

const PerFeature = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ temperature: schema, humidity: schema, precipitation: schema, wind_speed: schema });

export const PipelineConfigV1Schema = z.object({
  schema_version: z.string(),
  bounds: PerFeature(BoundsSchema),
  cleaning: z.object({
    sentinels: z.array(z.number().finite()),
    max_days: z.number().int().positive(),
  }),
  generator: z.object({
    max_days: z.number().int().positive(),
    extreme_event_rate: z.number().min(0).max(0.2),
    temperature: SeasonalCurveSchema,
    humidity: SeasonalCurveSchema,
    precipitation: z.object({
      dry_probability: z.number().min(0).max(1),
      dry_probability_amplitude: z.number().min(0).max(0.5),
      peak_day: z.number().int().min(1).max(366),
      mean_wet_mm: z.number().positive(),
      trend_per_year: z.number().finite(),
    }),
    wind_speed: SeasonalCurveSchema,
  }),
  detector: z.object({
    min_records: z.number().int().min(2),
    n_trees: z.number().int().positive(),
    sample_size: z.number().int().min(2),
    default_contamination: z.number().gt(0).lte(0.5),
    default_seed: z.number().int(),
  }),
  report: z.object({
    trend_stable_per_year: PerFeature(z.number().nonnegative()),
    heat_mean_temperature: z.number().finite(),
    heavy_rain_mm: z.number().nonnegative(),
    heavy_rain_min_days: z.number().int().nonnegative(),
    notable_limit: z.number().int().min(0).max(3),
  }),
  narrative: z.object({
    base_url: z.string().url(),
    model: z.string().min(1),
    timeout_ms: z.number().int().positive(),
    max_tokens: z.number().int().positive().max(4096),
    retries: z.number().int().min(0).max(1),
  }),
});

export type PipelineConfigV1 = z.infer<typeof PipelineConfigV1Schema>;

export type FeatureBounds = PipelineConfigV1["bounds"];

export function parsePipelineConfig(raw: unknown): PipelineConfigV1 {
  const parsed = PipelineConfigV1Schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError(`invalid pipeline config: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

function resolveConfigPath(env: NodeJS.ProcessEnv): string {
  // 1) explicit override
  if (env.WXLENS_CONFIG_PATH) return path.resolve(env.WXLENS_CONFIG_PATH);

  // 2) walk upward from this package until the SSOT file shows up
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.join(findRepoRoot(here, CONFIG_RELATIVE_PATH), CONFIG_RELATIVE_PATH);
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfigV1 {
  const p = resolveConfigPath(env);
  const raw: unknown = JSON.parse(fs.readFileSync(p, "utf8"));
  return parsePipelineConfig(raw);
}

export function computeConfigHash(cfg: PipelineConfigV1): string {
  return fingerprint(cfg);
}

export type TextGenSettings = {
  // false when no credential is present; the template strategy is then used silently
  enabled: boolean;
  apiKey: string | null;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  retries: number;
};

export function resolveTextGenSettings(cfg: PipelineConfigV1, env: NodeJS.ProcessEnv = process.env): TextGenSettings {
  const apiKey = env.WXLENS_TEXTGEN_API_KEY?.trim() || null;
  return {
    enabled: apiKey !== null,
    apiKey,
    baseUrl: env.WXLENS_TEXTGEN_BASE_URL?.trim() || cfg.narrative.base_url,
    model: env.WXLENS_TEXTGEN_MODEL?.trim() || cfg.narrative.model,
    timeoutMs: cfg.narrative.timeout_ms,
    maxTokens: cfg.narrative.max_tokens,
    retries: cfg.narrative.retries,
  };
}
