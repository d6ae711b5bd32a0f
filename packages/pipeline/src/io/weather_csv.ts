// packages/pipeline/src/io/weather_csv.ts
//
// CSV codec for daily records. Reading yields loose rows (every cell a string)
// that still have to go through the cleaner; writing takes a cleaned series.

import fs from "node:fs";
import path from "node:path";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { RawWeatherRowV1Schema, type RawWeatherRowV1, type WeatherRecordV1 } from "@wxlens/contracts";

import { errorMessage, ValidationError } from "../errors";

export const WEATHER_CSV_COLUMNS = ["date", "temperature", "humidity", "precipitation", "wind_speed", "season"] as const;

const RowsSchema = z.array(RawWeatherRowV1Schema);

export function readWeatherCsv(text: string): RawWeatherRowV1[] {
  let rows: unknown;
  try {
    rows = parse(text, { columns: true, skip_empty_lines: true, trim: true, bom: true });
  } catch (err) {
    throw new ValidationError(`unreadable csv: ${errorMessage(err)}`);
  }

  const parsed = RowsSchema.safeParse(rows);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`csv row ${String(issue.path[0] ?? "?")}: ${issue.message}`, { row: issue.path[0] ?? null });
  }
  if (parsed.data.length && !("date" in parsed.data[0])) {
    throw new ValidationError("csv header has no date column", { expected: [...WEATHER_CSV_COLUMNS] });
  }
  return parsed.data;
}

export function writeWeatherCsv(records: readonly WeatherRecordV1[]): string {
  return stringify([...records], { header: true, columns: [...WEATHER_CSV_COLUMNS] });
}

export function readWeatherCsvFile(filePath: string): RawWeatherRowV1[] {
  return readWeatherCsv(fs.readFileSync(filePath, "utf8"));
}

export function writeWeatherCsvFile(filePath: string, records: readonly WeatherRecordV1[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, writeWeatherCsv(records), "utf8");
}
