import Database, { Database as DatabaseType } from 'better-sqlite3';
import path from 'path';
import fs from 'fs-extra';

export function initDB(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    fs.ensureDirSync(path.dirname(dbPath));
  }
  const db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS unparsed_messages (
      message_id TEXT PRIMARY KEY,
      reason TEXT NOT NULL,
      subject TEXT,
      sender TEXT,
      date TEXT,
      attempts INTEGER DEFAULT 1,
      last_attempt DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS import_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL,
      scanned INTEGER NOT NULL,
      appended INTEGER NOT NULL,
      duplicates INTEGER NOT NULL,
      ignored INTEGER NOT NULL,
      unrecognized INTEGER NOT NULL,
      failed INTEGER NOT NULL,
      errors INTEGER NOT NULL,
      dry_run INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_import_runs_started ON import_runs(started_at);
  `);

  return db;
}

export interface UnparsedMessage {
  messageId: string;
  reason: string;
  subject: string;
  sender: string;
  date: string;
  attempts: number;
  lastAttempt: string;
}

export interface ImportRun {
  id?: number;
  startedAt: string;
  finishedAt: string;
  scanned: number;
  appended: number;
  duplicates: number;
  ignored: number;
  unrecognized: number;
  failed: number;
  errors: number;
  dryRun: boolean;
}

interface UnparsedRow {
  message_id: string;
  reason: string;
  subject: string | null;
  sender: string | null;
  date: string | null;
  attempts: number;
  last_attempt: string;
}

interface ImportRunRow {
  id: number;
  started_at: string;
  finished_at: string;
  scanned: number;
  appended: number;
  duplicates: number;
  ignored: number;
  unrecognized: number;
  failed: number;
  errors: number;
  dry_run: number;
}

/**
 * Local record of messages left for manual review and of past runs
 */
export class ImportLog {
  private readonly upsertUnparsed;
  private readonly deleteUnparsed;
  private readonly selectUnparsed;
  private readonly insertRun;
  private readonly selectRuns;

  constructor(private readonly db: DatabaseType) {
    this.upsertUnparsed = db.prepare(`
      INSERT INTO unparsed_messages (message_id, reason, subject, sender, date, attempts, last_attempt)
      VALUES (@messageId, @reason, @subject, @sender, @date, 1, CURRENT_TIMESTAMP)
      ON CONFLICT(message_id) DO UPDATE SET
        reason = excluded.reason,
        subject = excluded.subject,
        sender = excluded.sender,
        date = excluded.date,
        attempts = unparsed_messages.attempts + 1,
        last_attempt = CURRENT_TIMESTAMP
    `);
    this.deleteUnparsed = db.prepare(`DELETE FROM unparsed_messages WHERE message_id = ?`);
    this.selectUnparsed = db.prepare(`SELECT * FROM unparsed_messages ORDER BY date DESC, message_id ASC`);
    this.insertRun = db.prepare(`
      INSERT INTO import_runs (started_at, finished_at, scanned, appended, duplicates, ignored, unrecognized, failed, errors, dry_run)
      VALUES (@startedAt, @finishedAt, @scanned, @appended, @duplicates, @ignored, @unrecognized, @failed, @errors, @dryRun)
    `);
    this.selectRuns = db.prepare(`SELECT * FROM import_runs ORDER BY id DESC LIMIT ?`);
  }

  recordUnparsed(entry: { messageId: string; reason: string; subject: string; sender: string; date: string }): void {
    this.upsertUnparsed.run(entry);
  }

  resolve(messageId: string): void {
    this.deleteUnparsed.run(messageId);
  }

  listUnparsed(): UnparsedMessage[] {
    const rows = this.selectUnparsed.all() as UnparsedRow[];
    return rows.map(row => ({
      messageId: row.message_id,
      reason: row.reason,
      subject: row.subject ?? '',
      sender: row.sender ?? '',
      date: row.date ?? '',
      attempts: row.attempts,
      lastAttempt: row.last_attempt,
    }));
  }

  recordRun(run: ImportRun): number {
    const info = this.insertRun.run({ ...run, dryRun: run.dryRun ? 1 : 0 });
    return Number(info.lastInsertRowid);
  }

  listRuns(limit = 10): ImportRun[] {
    const rows = this.selectRuns.all(limit) as ImportRunRow[];
    return rows.map(row => ({
      id: row.id,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      scanned: row.scanned,
      appended: row.appended,
      duplicates: row.duplicates,
      ignored: row.ignored,
      unrecognized: row.unrecognized,
      failed: row.failed,
      errors: row.errors,
      dryRun: row.dry_run === 1,
    }));
  }

  close(): void {
    this.db.close();
  }
}
