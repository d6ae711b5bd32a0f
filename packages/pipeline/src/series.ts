// packages/pipeline/src/series.ts
import { z } from "zod";
import { WEATHER_FEATURES, WeatherRecordV1Schema, isWeatherFeature, type WeatherFeature, type WeatherRecordV1 } from "@wxlens/contracts";

import { ValidationError } from "./errors";

const SeriesSchema = z.array(WeatherRecordV1Schema);

/**
 * Validate a cleaned series and return a private copy of it.
 * Dates must be strictly increasing; gaps are tolerated here.
 */
export function assertSeries(series: unknown, what: string): WeatherRecordV1[] {
  const parsed = SeriesSchema.safeParse(series);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const row = typeof issue.path[0] === "number" ? issue.path[0] : null;
    const field = issue.path.slice(1).join(".");
    throw new ValidationError(`${what}: row ${row ?? "?"}${field ? ` field ${field}` : ""}: ${issue.message}`, {
      row,
      field: field || null,
    });
  }

  const records = parsed.data;
  for (let i = 1; i < records.length; i++) {
    if (records[i].date <= records[i - 1].date) {
      throw new ValidationError(`${what}: row ${i}: dates must be strictly increasing (${records[i - 1].date} -> ${records[i].date})`, {
        row: i,
        field: "date",
      });
    }
  }
  return records;
}

/** Deduplicate and order a requested feature set canonically. */
export function normalizeFeatures(features: Iterable<string>): WeatherFeature[] {
  const requested = new Set<string>(features);
  if (requested.size === 0) throw new ValidationError("features must name at least one column", { features: [] });

  const unknown = Array.from(requested).filter((f) => !isWeatherFeature(f));
  if (unknown.length) {
    throw new ValidationError(`unknown features: ${unknown.join(",")}`, { unknown, allowed: [...WEATHER_FEATURES] });
  }
  return WEATHER_FEATURES.filter((f) => requested.has(f));
}
