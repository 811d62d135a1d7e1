import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { Classification, Issue, SeenRecord } from "./types.js";

export const SEEN_WINDOW_MS = 30 * 60 * 1000;
export const NOTIFY_THROTTLE_MS = 19 * 60 * 1000;

interface SeenRow {
  identity: string;
  seen_at: string | null;
  last_notified_at: string | null;
  last_observed_at: string | null;
}

function toDate(value: string | null): Date | undefined {
  return value ? new Date(value) : undefined;
}

/**
 * Per-identity seen and notification timestamps.
 *
 * Every mutation writes a single column of a single row, so a mark-seen from the
 * dashboard and a notification record from the coordinator never clobber each other.
 */
export class StateStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.init();
  }

  private init() {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS nudge_meta (key TEXT PRIMARY KEY, value TEXT NOT NULL);

      CREATE TABLE IF NOT EXISTS seen_records (
        identity TEXT PRIMARY KEY,
        seen_at TEXT,
        last_notified_at TEXT,
        last_observed_at TEXT
      );
    `);
  }

  getMeta(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string }>("SELECT value FROM nudge_meta WHERE key = ?").get(key);
    return row?.value;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare(
        "INSERT INTO nudge_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
      )
      .run(key, value);
  }

  getRecord(identity: string): SeenRecord | undefined {
    const row = this.db.prepare<[string], SeenRow>("SELECT * FROM seen_records WHERE identity = ?").get(identity);
    if (!row) return undefined;
    return {
      identity: row.identity,
      seenAt: toDate(row.seen_at),
      lastNotifiedAt: toDate(row.last_notified_at),
      lastObservedAt: toDate(row.last_observed_at),
    };
  }

  classify(issue: Issue, now: Date): Classification {
    const record = this.getRecord(issue.identity);
    if (!record) return "Fresh";
    const t = now.getTime();
    if (record.seenAt && t - record.seenAt.getTime() < SEEN_WINDOW_MS) return "SeenRecently";
    if (record.lastNotifiedAt && t - record.lastNotifiedAt.getTime() < NOTIFY_THROTTLE_MS) return "Suppressed";
    return "Fresh";
  }

  markSeen(identity: string, now: Date): void {
    this.upsertColumn("seen_at", identity, now);
  }

  recordNotified(identity: string, now: Date): void {
    this.upsertColumn("last_notified_at", identity, now);
  }

  observe(identities: string[], now: Date): void {
    const tx = this.db.transaction((ids: string[]) => {
      for (const id of ids) this.upsertColumn("last_observed_at", id, now);
    });
    tx(identities);
  }

  /** Deletes records with no activity of any kind since `before`. */
  prune(before: Date): number {
    const cutoff = before.toISOString();
    const result = this.db
      .prepare(`
      DELETE FROM seen_records
      WHERE COALESCE(last_observed_at, '') < @cutoff
        AND COALESCE(seen_at, '') < @cutoff
        AND COALESCE(last_notified_at, '') < @cutoff
    `)
      .run({ cutoff });
    return result.changes;
  }

  getStats(now: Date): { records: number; seenRecently: number; throttled: number } {
    const seenCutoff = new Date(now.getTime() - SEEN_WINDOW_MS).toISOString();
    const notifyCutoff = new Date(now.getTime() - NOTIFY_THROTTLE_MS).toISOString();
    const count = (sql: string, ...params: string[]): number =>
      this.db.prepare<string[], { c: number }>(sql).get(...params)?.c ?? 0;
    return {
      records: count("SELECT COUNT(*) as c FROM seen_records"),
      seenRecently: count("SELECT COUNT(*) as c FROM seen_records WHERE seen_at > ?", seenCutoff),
      throttled: count("SELECT COUNT(*) as c FROM seen_records WHERE last_notified_at > ?", notifyCutoff),
    };
  }

  private upsertColumn(column: "seen_at" | "last_notified_at" | "last_observed_at", identity: string, at: Date) {
    this.db
      .prepare(
        `INSERT INTO seen_records (identity, ${column}) VALUES (?, ?)
         ON CONFLICT(identity) DO UPDATE SET ${column} = excluded.${column}`,
      )
      .run(identity, at.toISOString());
  }

  close(): void {
    this.db.close();
  }
}
