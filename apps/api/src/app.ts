import Fastify, { type FastifyInstance } from "fastify";
import { PipelineError } from "@wxlens/pipeline";

import { registerWeatherRoutes } from "./routes";
import type { InsightRuntime } from "./runtime";

export type BuildAppOptions = {
  runtime: InsightRuntime;
  logger?: boolean;
};

export function buildApp(opts: BuildAppOptions): FastifyInstance {
  const app = Fastify({ logger: opts.logger ?? true });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof PipelineError) {
      req.log.warn({ code: err.code, status: err.status }, err.message);
      return reply.code(err.status).send({ ok: false, code: err.code, message: err.message, details: err.details });
    }
    // Fastify's own request errors (bad JSON, wrong content type) carry a 4xx status.
    if (typeof err.statusCode === "number" && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ ok: false, code: "BAD_REQUEST", message: err.message, details: {} });
    }
    req.log.error({ err }, "unhandled error");
    return reply.code(500).send({ ok: false, code: "INTERNAL_ERROR", message: "internal error", details: {} });
  });

  registerWeatherRoutes(app, opts.runtime);
  app.addHook("onClose", async () => {
    opts.runtime.close();
  });
  return app;
}

export { InsightRuntime } from "./runtime";
export { InsightSqliteStore } from "./store/sqlite_store";
