import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  createLogger,
  loadPipelineConfig,
  resolveTextGenSettings,
  selectNarrativeStrategy,
} from "@wxlens/pipeline";

import { buildApp } from "./app";
import { InsightRuntime } from "./runtime";
import { InsightSqliteStore } from "./store/sqlite_store";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const APP_ROOT = path.resolve(__dirname, "..");
const REPO_ROOT = path.resolve(APP_ROOT, "..", "..");

function loadDotEnvFile(fp: string): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // explicit env wins over .env
    if (process.env[key] == null) process.env[key] = val;
  }
}

// repo root .env first, then the app's own for overrides
loadDotEnvFile(path.join(REPO_ROOT, ".env"));
loadDotEnvFile(path.join(APP_ROOT, ".env"));

const logger = createLogger("wxlens-api");

async function main(): Promise<void> {
  const config = loadPipelineConfig();
  const narrative = selectNarrativeStrategy(resolveTextGenSettings(config), { logger });
  const store = new InsightSqliteStore({
    filePath: process.env.WXLENS_DB_PATH ?? path.join(APP_ROOT, "data", "insights.sqlite"),
  });

  const runtime = new InsightRuntime({ config, store, narrative, logger });
  const app = buildApp({ runtime });

  const port = Number(process.env.PORT ?? 3102);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
  logger.info({ port, host, narrative: narrative.name }, "insight api listening");
}

main().catch((err: unknown) => {
  logger.error({ err }, "insight api failed to start");
  process.exit(1);
});
