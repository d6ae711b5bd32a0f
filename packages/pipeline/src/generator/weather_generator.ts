// packages/pipeline/src/generator/weather_generator.ts
//
// Synthetic daily weather. Each feature is
//   seasonal curve(day-of-year) + trend(years since start) + bounded noise + rare extreme event
// drawn from one seeded stream. Every day consumes the same number of draws,
// so (start, end, seed) fully determines the output.

import type { WeatherFeature, WeatherRecordV1 } from "@wxlens/contracts";

import { dayOfYear, DAYS_PER_YEAR, daysBetween, eachDayIso, parseDayInput, seasonOf } from "../calendar";
import type { PipelineConfigV1 } from "../config";
import { ValidationError } from "../errors";
import type { PipelineLogger } from "../logger";
import { exponential, mulberry32, randInt, randn, uniform, type Rng } from "../random";
import { clamp, round1 } from "../util";

export type ExtremeEventKind = "heat_wave" | "cold_snap" | "storm";

const EVENT_KINDS: readonly ExtremeEventKind[] = ["heat_wave", "cold_snap", "storm"];

type SeasonalCurve = PipelineConfigV1["generator"]["temperature"];

type DayValues = Record<WeatherFeature, number>;

function requireDay(value: string, name: string): string {
  const day = parseDayInput(value);
  if (!day) throw new ValidationError(`invalid ${name}: ${JSON.stringify(value)}`, { field: name, value });
  return day;
}

function cycle(doy: number, peakDay: number): number {
  return Math.cos((2 * Math.PI * (doy - peakDay)) / DAYS_PER_YEAR);
}

function boundedNoise(rng: Rng, sd: number): number {
  return clamp(randn(rng) * sd, -3 * sd, 3 * sd);
}

export class WeatherDataGenerator {
  constructor(
    private readonly cfg: PipelineConfigV1,
    private readonly logger?: PipelineLogger
  ) {}

  generate(startDate: string, endDate: string, seed: number): WeatherRecordV1[] {
    const start = requireDay(startDate, "start_date");
    const end = requireDay(endDate, "end_date");
    if (!Number.isSafeInteger(seed)) throw new ValidationError("seed must be an integer", { field: "seed", value: seed });
    if (start > end) {
      throw new ValidationError(`start_date ${start} must not be after end_date ${end}`, { start_date: start, end_date: end });
    }

    const span = daysBetween(start, end) + 1;
    if (span > this.cfg.generator.max_days) {
      throw new ValidationError(`date range spans ${span} days; at most ${this.cfg.generator.max_days} allowed`, { days: span });
    }
    const days = eachDayIso(start, end);

    const rng = mulberry32(seed);
    let events = 0;
    const out: WeatherRecordV1[] = [];
    for (let i = 0; i < days.length; i++) {
      const { values, event } = this.synthesizeDay(days[i], i / DAYS_PER_YEAR, rng);
      if (event) events++;
      out.push(this.toRecord(days[i], values));
    }

    this.logger?.debug({ start, end, seed, records: out.length, extreme_events: events }, "generated synthetic series");
    return out;
  }

  private synthesizeDay(day: string, years: number, rng: Rng): { values: DayValues; event: ExtremeEventKind | null } {
    const g = this.cfg.generator;
    const doy = dayOfYear(day);

    const curve = (c: SeasonalCurve) => c.mean + c.amplitude * cycle(doy, c.peak_day) + c.trend_per_year * years;

    const values: DayValues = {
      temperature: curve(g.temperature) + boundedNoise(rng, g.temperature.noise_sd),
      humidity: curve(g.humidity) + boundedNoise(rng, g.humidity.noise_sd),
      wind_speed: curve(g.wind_speed) + boundedNoise(rng, g.wind_speed.noise_sd),
      precipitation: 0,
    };

    const p = g.precipitation;
    const dryProbability = clamp(p.dry_probability - p.dry_probability_amplitude * cycle(doy, p.peak_day), 0, 1);
    const wet = rng() >= dryProbability;
    const amount = exponential(rng, Math.max(0.1, p.mean_wet_mm + p.trend_per_year * years));
    values.precipitation = wet ? amount : 0;

    // Draws are taken whether or not the day becomes an event.
    const eventDraw = rng();
    const kind = EVENT_KINDS[randInt(rng, EVENT_KINDS.length)];
    const magnitude = uniform(rng, 1, 1.5);
    if (eventDraw >= g.extreme_event_rate) return { values, event: null };

    switch (kind) {
      case "heat_wave":
        values.temperature += 10 * magnitude;
        values.humidity -= 15 * magnitude;
        break;
      case "cold_snap":
        values.temperature -= 12 * magnitude;
        break;
      case "storm":
        values.precipitation += 30 * magnitude;
        values.wind_speed += 12 * magnitude;
        values.humidity += 15 * magnitude;
        break;
    }
    return { values, event: kind };
  }

  private toRecord(day: string, values: DayValues): WeatherRecordV1 {
    const b = this.cfg.bounds;
    return {
      date: day,
      temperature: clamp(round1(values.temperature), b.temperature.min, b.temperature.max),
      humidity: clamp(round1(values.humidity), b.humidity.min, b.humidity.max),
      precipitation: clamp(round1(values.precipitation), b.precipitation.min, b.precipitation.max),
      wind_speed: clamp(round1(values.wind_speed), b.wind_speed.min, b.wind_speed.max),
      season: seasonOf(day),
    };
  }
}
