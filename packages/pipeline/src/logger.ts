import pino, { type BaseLogger } from "pino";

export type PipelineLogger = BaseLogger;

export function createLogger(name: string, level: string = process.env.WXLENS_LOG_LEVEL ?? "info"): PipelineLogger {
  return pino({ name, level });
}
