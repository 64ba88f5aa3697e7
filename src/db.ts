import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { createLogger, errorMessage } from './logger';
import { ensureSchema, initPg, pgUpsertProcessedEmail, pgUpsertProcessedSignal } from './pg';

const logger = createLogger('db');

export const PENDING_STATUS = 'pending';

export interface SignalRecord {
  key: string;
  venue: string;
  symbol: string;
  side: string;
  timeframe: string;
  barTimeMs: number;
}

export interface EmailRecord {
  messageId: string;
  barTs?: string;
  symbol?: string;
  side?: string;
}

/** At-most-once bookkeeping for signals, keyed by dedup key. */
export interface SignalDedupStore {
  isProcessed(key: string): boolean;
  /** Atomically reserves the key; false when any row already holds it. */
  tryClaim(record: SignalRecord): boolean;
  markProcessed(record: SignalRecord, status: string): void;
  /** Drops a pending claim so a redelivery may retry. Finalized rows are kept. */
  release(key: string): void;
  prune(retentionMs: number): number;
  count(): number;
  pendingCount(): number;
  cacheSize(): number;
}

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(`
    CREATE TABLE IF NOT EXISTS processed_signals (
      signal_key TEXT PRIMARY KEY,
      exchange TEXT NOT NULL,
      symbol TEXT NOT NULL,
      side TEXT NOT NULL,
      timeframe TEXT NOT NULL,
      time_unix_ms INTEGER NOT NULL,
      processed_at INTEGER NOT NULL,
      result_status TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_signal_processed_at ON processed_signals(processed_at);

    CREATE TABLE IF NOT EXISTS processed_emails (
      message_id TEXT PRIMARY KEY,
      bar_ts TEXT,
      symbol_tv TEXT,
      side TEXT,
      processed_at INTEGER NOT NULL,
      result_status TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_processed_at ON processed_emails(processed_at);
  `);
  initPg();
  ensureSchema().catch((err) => logger.warn({ err: errorMessage(err) }, 'postgres mirror schema failed'));
  return db;
}

export class SqliteDedupStore implements SignalDedupStore {
  // Fast path only; starts empty on every boot, SQLite stays authoritative.
  private readonly seen = new Set<string>();

  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  isProcessed(key: string): boolean {
    if (this.seen.has(key)) return true;
    const row = this.db
      .prepare(`SELECT result_status FROM processed_signals WHERE signal_key = ?`)
      .get(key) as { result_status: string } | undefined;
    if (!row || row.result_status === PENDING_STATUS) return false;
    this.seen.add(key);
    return true;
  }

  tryClaim(record: SignalRecord): boolean {
    const info = this.db
      .prepare(
        `INSERT INTO processed_signals (signal_key, exchange, symbol, side, timeframe, time_unix_ms, processed_at, result_status)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(signal_key) DO NOTHING`,
      )
      .run(
        record.key,
        record.venue,
        record.symbol,
        record.side,
        record.timeframe,
        record.barTimeMs,
        this.now(),
        PENDING_STATUS,
      );
    return info.changes === 1;
  }

  markProcessed(record: SignalRecord, status: string): void {
    const processedAt = this.now();
    this.db
      .prepare(
        `INSERT INTO processed_signals (signal_key, exchange, symbol, side, timeframe, time_unix_ms, processed_at, result_status)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(signal_key) DO UPDATE SET
           exchange=excluded.exchange, symbol=excluded.symbol, side=excluded.side,
           timeframe=excluded.timeframe, time_unix_ms=excluded.time_unix_ms,
           processed_at=excluded.processed_at, result_status=excluded.result_status`,
      )
      .run(
        record.key,
        record.venue,
        record.symbol,
        record.side,
        record.timeframe,
        record.barTimeMs,
        processedAt,
        status,
      );
    this.seen.add(record.key);
    logger.debug({ key: record.key, status }, 'marked signal processed');
    pgUpsertProcessedSignal(
      record.key,
      record.venue,
      record.symbol,
      record.side,
      record.timeframe,
      record.barTimeMs,
      processedAt,
      status,
    ).catch((err) => logger.warn({ err: errorMessage(err), key: record.key }, 'postgres mirror write failed'));
  }

  release(key: string): void {
    this.db
      .prepare(`DELETE FROM processed_signals WHERE signal_key = ? AND result_status = ?`)
      .run(key, PENDING_STATUS);
  }

  prune(retentionMs: number): number {
    const cutoff = this.now() - retentionMs;
    const info = this.db.prepare(`DELETE FROM processed_signals WHERE processed_at < ?`).run(cutoff);
    this.seen.clear();
    if (info.changes > 0) logger.info({ deleted: info.changes }, 'pruned old signal records');
    return info.changes;
  }

  count(): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM processed_signals`).get() as { n: number };
    return row.n;
  }

  pendingCount(): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS n FROM processed_signals WHERE result_status = ?`)
      .get(PENDING_STATUS) as { n: number };
    return row.n;
  }

  cacheSize(): number {
    return this.seen.size;
  }

  status(key: string): string | undefined {
    const row = this.db
      .prepare(`SELECT result_status FROM processed_signals WHERE signal_key = ?`)
      .get(key) as { result_status: string } | undefined;
    return row?.result_status;
  }
}

/** Status of an e-mail whose execution failed; the next sweep runs it again. */
export const RETRY_STATUS = 'retry';

/** Transport-level dedup of alert e-mails by Message-ID. */
export class EmailDedupStore {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  isProcessed(messageId: string): boolean {
    const row = this.db
      .prepare(`SELECT 1 AS hit FROM processed_emails WHERE message_id = ? AND result_status != ?`)
      .get(messageId, RETRY_STATUS);
    return row !== undefined;
  }

  wasRetried(messageId: string): boolean {
    return this.status(messageId) === RETRY_STATUS;
  }

  markProcessed(record: EmailRecord, status: string): void {
    const processedAt = this.now();
    this.db
      .prepare(
        `INSERT INTO processed_emails (message_id, bar_ts, symbol_tv, side, processed_at, result_status)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(message_id) DO UPDATE SET
           bar_ts=excluded.bar_ts, symbol_tv=excluded.symbol_tv, side=excluded.side,
           processed_at=excluded.processed_at, result_status=excluded.result_status`,
      )
      .run(record.messageId, record.barTs ?? '', record.symbol ?? '', record.side ?? '', processedAt, status);
    logger.info({ messageId: record.messageId, status }, 'marked email processed');
    pgUpsertProcessedEmail(
      record.messageId,
      record.barTs ?? '',
      record.symbol ?? '',
      record.side ?? '',
      processedAt,
      status,
    ).catch((err) => logger.warn({ err: errorMessage(err), messageId: record.messageId }, 'postgres mirror write failed'));
  }

  status(messageId: string): string | undefined {
    const row = this.db
      .prepare(`SELECT result_status FROM processed_emails WHERE message_id = ?`)
      .get(messageId) as { result_status: string } | undefined;
    return row?.result_status;
  }

  prune(retentionMs: number): number {
    const cutoff = this.now() - retentionMs;
    const info = this.db.prepare(`DELETE FROM processed_emails WHERE processed_at < ?`).run(cutoff);
    if (info.changes > 0) logger.info({ deleted: info.changes }, 'pruned old email records');
    return info.changes;
  }

  count(): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM processed_emails`).get() as { n: number };
    return row.n;
  }
}
