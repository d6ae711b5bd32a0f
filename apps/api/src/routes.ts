import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { AnomalySummaryV1Schema, RawWeatherRowV1Schema, WeatherRecordV1Schema } from "@wxlens/contracts";

import type { InsightRuntime } from "./runtime";
import { assertInt, parseRequest } from "./validate";

const GenerateBody = z.object({
  start_date: z.string(),
  end_date: z.string(),
  seed: z.number().int().optional(),
});

const CleanBody = z.object({
  rows: z.array(RawWeatherRowV1Schema),
});

const DetectBody = z.object({
  records: z.array(WeatherRecordV1Schema),
  features: z.array(z.string()),
  contamination: z.number().optional(),
  seed: z.number().int().optional(),
});

const ReportBody = z.object({
  records: z.array(WeatherRecordV1Schema),
  summary: AnomalySummaryV1Schema,
});

const InsightsBody = GenerateBody.extend({
  features: z.array(z.string()).optional(),
  contamination: z.number().optional(),
});

const ListQuery = z.object({ limit: z.unknown().optional() });

export function registerWeatherRoutes(app: FastifyInstance, runtime: InsightRuntime): void {
  app.get("/api/health", async (_req, reply) => {
    return reply.send({ ok: true, config_hash: runtime.configHash, narrative: runtime.narrativeName });
  });

  app.post("/api/weather/generate", async (req, reply) => {
    const body = parseRequest(GenerateBody, req.body, "generate request");
    return reply.send({ records: runtime.generate(body.start_date, body.end_date, body.seed) });
  });

  app.post("/api/weather/clean", async (req, reply) => {
    const body = parseRequest(CleanBody, req.body, "clean request");
    const { records, report } = runtime.clean(body.rows);
    return reply.send({ records, report });
  });

  app.post("/api/weather/detect", async (req, reply) => {
    const body = parseRequest(DetectBody, req.body, "detect request");
    return reply.send(runtime.detect(body.records, body.features, body.contamination, body.seed));
  });

  app.post("/api/weather/report", async (req, reply) => {
    const body = parseRequest(ReportBody, req.body, "report request");
    return reply.send(await runtime.report(body.records, body.summary));
  });

  app.post("/api/weather/insights", async (req, reply) => {
    const body = parseRequest(InsightsBody, req.body, "insights request");
    return reply.send(await runtime.insights(body));
  });

  app.get("/api/weather/insights", async (req, reply) => {
    const q = parseRequest(ListQuery, req.query, "query");
    const limit = typeof q.limit !== "undefined" ? assertInt(q.limit, "limit") : 100;
    return reply.send({ insights: runtime.listInsights(Math.max(1, Math.min(limit, 500))) });
  });
}
