import pino from "pino";
import type { WeatherRecordV1 } from "@wxlens/contracts";

import { addDaysIso, seasonOf } from "../calendar";
import { loadPipelineConfig } from "../config";

export const cfg = loadPipelineConfig({});

export const silent = pino({ level: "silent" });

/** `n` consecutive days from `start`, every feature from `values`. */
export function series(start: string, n: number, values: (i: number) => Partial<WeatherRecordV1> = () => ({})): WeatherRecordV1[] {
  return Array.from({ length: n }, (_, i) => {
    const date = addDaysIso(start, i);
    return {
      date,
      temperature: 10,
      humidity: 60,
      precipitation: 0,
      wind_speed: 3,
      ...values(i),
      season: seasonOf(date),
    };
  });
}
