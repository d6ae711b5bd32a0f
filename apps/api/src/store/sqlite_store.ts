import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";

export type InsightStoreConfig = {
  // ":memory:" keeps everything in process
  filePath: string;
};

export type InsightRunRow = {
  fingerprint: string;
  created_at_ts: number;
  request_json: string;
  summary_json: string;
  report_json: string;
};

const InsightRunRowSchema = z.object({
  fingerprint: z.string(),
  created_at_ts: z.number().int(),
  request_json: z.string(),
  summary_json: z.string(),
  report_json: z.string(),
});

export class InsightSqliteStore {
  private db: Database.Database;

  constructor(cfg: InsightStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // one row per distinct pipeline input; rows are never updated
    this.db.exec(`
      create table if not exists insight_runs (
        fingerprint text primary key,
        created_at_ts integer not null,
        request_json text not null,
        summary_json text not null,
        report_json text not null
      );

      create index if not exists idx_insight_runs_created on insight_runs(created_at_ts);
    `);
  }

  /** Returns false when a run with the same fingerprint already exists. */
  insertRun(row: InsightRunRow): boolean {
    const stmt = this.db.prepare(
      `insert or ignore into insight_runs (fingerprint, created_at_ts, request_json, summary_json, report_json) values (?, ?, ?, ?, ?)`
    );
    const info = stmt.run(row.fingerprint, row.created_at_ts, row.request_json, row.summary_json, row.report_json);
    return info.changes > 0;
  }

  getRun(fingerprint: string): InsightRunRow | null {
    const stmt = this.db.prepare(
      `select fingerprint, created_at_ts, request_json, summary_json, report_json from insight_runs where fingerprint = ?`
    );
    const row = stmt.get(fingerprint);
    return row === undefined ? null : InsightRunRowSchema.parse(row);
  }

  listRuns(limit: number): InsightRunRow[] {
    const stmt = this.db.prepare(
      `select fingerprint, created_at_ts, request_json, summary_json, report_json from insight_runs order by created_at_ts desc, rowid desc limit ?`
    );
    return stmt.all(limit).map((r) => InsightRunRowSchema.parse(r));
  }

  close(): void {
    this.db.close();
  }
}
