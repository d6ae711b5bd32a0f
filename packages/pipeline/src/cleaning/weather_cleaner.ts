// packages/pipeline/src/cleaning/weather_cleaner.ts
//
// Normalizes raw rows into a gap-free, range-checked series:
//   1. parse dates (unparseable -> ValidationError naming the row)
//   2. duplicate dates: keep the first occurrence, drop the rest
//   3. insert placeholder rows for missing calendar days
//   4. impute missing values: linear interpolation by day offset, nearest value at the edges
//   5. clip to physical bounds
//   6. recompute season
// A cleaned series passes through unchanged.

import { WEATHER_FEATURES, type RawWeatherRowV1, type WeatherFeature, type WeatherRecordV1 } from "@wxlens/contracts";

import { daysBetween, eachDayIso, parseDayInput, seasonOf } from "../calendar";
import type { PipelineConfigV1 } from "../config";
import { ValidationError } from "../errors";
import type { PipelineLogger } from "../logger";
import { clamp } from "../util";

export type CleaningReport = {
  input_rows: number;
  output_records: number;
  duplicates_dropped: Array<{ row: number; date: string }>;
  gaps_filled: string[];
  imputed: Record<WeatherFeature, string[]>;
  clipped: Record<WeatherFeature, string[]>;
};

export type CleanResult = {
  records: WeatherRecordV1[];
  report: CleaningReport;
};

function perFeature<T>(make: () => T): Record<WeatherFeature, T> {
  return { temperature: make(), humidity: make(), precipitation: make(), wind_speed: make() };
}

/**
 * Linear interpolation between the nearest valid neighbors; leading and
 * trailing runs take the nearest valid value. Returns null when nothing is valid.
 */
export function interpolateMissing(values: ReadonlyArray<number | null>): number[] | null {
  const at: number[] = [];
  const known: number[] = [];
  values.forEach((v, i) => {
    if (v !== null) {
      at.push(i);
      known.push(v);
    }
  });
  if (!known.length) return null;

  const out: number[] = [];
  let k = 0; // first known position >= i
  for (let i = 0; i < values.length; i++) {
    if (k < at.length && at[k] === i) {
      out.push(known[k]);
      k++;
    } else if (k === 0) {
      out.push(known[0]);
    } else if (k === at.length) {
      out.push(known[k - 1]);
    } else {
      const lo = known[k - 1];
      const hi = known[k];
      out.push(lo + ((hi - lo) * (i - at[k - 1])) / (at[k] - at[k - 1]));
    }
  }
  return out;
}

export class WeatherDataCleaner {
  private readonly sentinels: ReadonlySet<number>;

  constructor(
    private readonly cfg: PipelineConfigV1,
    private readonly logger?: PipelineLogger
  ) {
    this.sentinels = new Set(cfg.cleaning.sentinels);
  }

  clean(rows: ReadonlyArray<RawWeatherRowV1>): WeatherRecordV1[] {
    return this.cleanWithReport(rows).records;
  }

  cleanWithReport(rows: ReadonlyArray<RawWeatherRowV1>): CleanResult {
    const report: CleaningReport = {
      input_rows: rows.length,
      output_records: 0,
      duplicates_dropped: [],
      gaps_filled: [],
      imputed: perFeature<string[]>(() => []),
      clipped: perFeature<string[]>(() => []),
    };
    if (!rows.length) return { records: [], report };

    const byDay = new Map<string, RawWeatherRowV1>();
    rows.forEach((row, i) => {
      const day = parseDayInput(row.date);
      if (!day) {
        throw new ValidationError(`row ${i}: unparseable date ${JSON.stringify(row.date ?? null)}`, {
          row: i,
          value: row.date ?? null,
        });
      }
      if (byDay.has(day)) {
        report.duplicates_dropped.push({ row: i, date: day });
        return;
      }
      byDay.set(day, row);
    });

    const present = Array.from(byDay.keys()).sort();
    const first = present[0];
    const last = present[present.length - 1];
    const span = daysBetween(first, last) + 1;
    if (span > this.cfg.cleaning.max_days) {
      throw new ValidationError(`rows span ${span} days (${first}..${last}); at most ${this.cfg.cleaning.max_days} allowed`, {
        days: span,
      });
    }
    const calendar = eachDayIso(first, last);
    report.gaps_filled = calendar.filter((d) => !byDay.has(d));

    const columns = perFeature<number[]>(() => []);
    for (const feature of WEATHER_FEATURES) {
      const raw = calendar.map((d) => this.readCell(byDay.get(d)?.[feature]));
      const filled = interpolateMissing(raw);
      if (!filled) {
        throw new ValidationError(`feature ${feature} has no valid values to impute from`, { feature });
      }

      const { min, max } = this.cfg.bounds[feature];
      columns[feature] = filled.map((v, i) => {
        if (raw[i] === null) report.imputed[feature].push(calendar[i]);
        const c = clamp(v, min, max);
        if (c !== v) report.clipped[feature].push(calendar[i]);
        return c;
      });
    }

    const records: WeatherRecordV1[] = calendar.map((date, i) => ({
      date,
      temperature: columns.temperature[i],
      humidity: columns.humidity[i],
      precipitation: columns.precipitation[i],
      wind_speed: columns.wind_speed[i],
      season: seasonOf(date),
    }));
    report.output_records = records.length;

    this.logger?.debug(
      {
        input_rows: report.input_rows,
        output_records: records.length,
        duplicates: report.duplicates_dropped.length,
        gaps: report.gaps_filled.length,
      },
      "cleaned series"
    );
    return { records, report };
  }

  // null = missing: absent, blank, non-numeric, non-finite or a sentinel
  private readCell(v: unknown): number | null {
    let n: number;
    if (typeof v === "number") n = v;
    else if (typeof v === "string" && v.trim()) n = Number(v.trim());
    else return null;

    if (!Number.isFinite(n) || this.sentinels.has(n)) return null;
    return n;
  }
}
