// packages/contracts/src/schema/weather_record_v1.ts
import { z } from "zod";

/**
 * Numeric observation columns of a daily weather record, in canonical order.
 * Every per-feature structure in the pipeline iterates in this order.
 */
export const WEATHER_FEATURES = ["temperature", "humidity", "precipitation", "wind_speed"] as const;

export type WeatherFeature = (typeof WEATHER_FEATURES)[number];

export function isWeatherFeature(x: unknown): x is WeatherFeature {
  return typeof x === "string" && WEATHER_FEATURES.some((f) => f === x);
}

export const WeatherFeatureV1 = z.enum(WEATHER_FEATURES);

export const SeasonV1 = z.enum(["spring", "summer", "autumn", "winter"]);

export type SeasonV1 = z.infer<typeof SeasonV1>;

export const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export const IsoDateV1 = z.string().regex(ISO_DATE_RE, "date must be yyyy-MM-dd");

/**
 * WeatherRecordV1Schema
 *
 * One calendar day of observations. Units: °C, %, mm, m/s.
 * `season` is derived from `date` and never set independently.
 */
export const WeatherRecordV1Schema = z
  .object({
    date: IsoDateV1,
    temperature: z.number().finite(),
    humidity: z.number().finite(),
    precipitation: z.number().finite(),
    wind_speed: z.number().finite(),
    season: SeasonV1,
  })
  .strict();

export type WeatherRecordV1 = z.infer<typeof WeatherRecordV1Schema>;

// Loose ingestion shape: CSV cells arrive as strings, JSON may carry nulls or sentinels.
export const RawFieldV1Schema = z.union([z.number(), z.string(), z.null()]);

export const RawWeatherRowV1Schema = z.object({
  date: z.union([z.string(), z.date(), z.null()]).optional(),
  temperature: RawFieldV1Schema.optional(),
  humidity: RawFieldV1Schema.optional(),
  precipitation: RawFieldV1Schema.optional(),
  wind_speed: RawFieldV1Schema.optional(),
  season: z.string().nullable().optional(),
});

export type RawWeatherRowV1 = z.infer<typeof RawWeatherRowV1Schema>;
