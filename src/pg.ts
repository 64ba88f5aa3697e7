import { Pool } from 'pg';

// Optional Postgres mirror of the dedup tables; SQLite stays authoritative.
let pool: Pool | null = null;

export function initPg(): void {
  const url = process.env.DATABASE_URL;
  if (!url) return;
  if (pool) return;
  pool = new Pool({ connectionString: url, ssl: { rejectUnauthorized: false } });
}

function getPool(): Pool | null {
  if (!pool) initPg();
  return pool;
}

export async function ensureSchema(): Promise<void> {
  const p = getPool();
  if (!p) return;
  await p.query(`
    CREATE TABLE IF NOT EXISTS processed_signals (
      signal_key TEXT PRIMARY KEY,
      exchange TEXT NOT NULL,
      symbol TEXT NOT NULL,
      side TEXT NOT NULL,
      timeframe TEXT NOT NULL,
      time_unix_ms BIGINT NOT NULL,
      processed_at BIGINT NOT NULL,
      result_status TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_signal_processed_at ON processed_signals(processed_at);

    CREATE TABLE IF NOT EXISTS processed_emails (
      message_id TEXT PRIMARY KEY,
      bar_ts TEXT,
      symbol_tv TEXT,
      side TEXT,
      processed_at BIGINT NOT NULL,
      result_status TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_processed_at ON processed_emails(processed_at);
  `);
}

export async function pgUpsertProcessedSignal(
  key: string,
  exchange: string,
  symbol: string,
  side: string,
  timeframe: string,
  barTimeMs: number,
  processedAt: number,
  status: string,
): Promise<void> {
  const p = getPool();
  if (!p) return;
  await p.query(
    `INSERT INTO processed_signals (signal_key, exchange, symbol, side, timeframe, time_unix_ms, processed_at, result_status)
     VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
     ON CONFLICT (signal_key) DO UPDATE SET
       exchange = EXCLUDED.exchange, symbol = EXCLUDED.symbol, side = EXCLUDED.side,
       timeframe = EXCLUDED.timeframe, time_unix_ms = EXCLUDED.time_unix_ms,
       processed_at = EXCLUDED.processed_at, result_status = EXCLUDED.result_status`,
    [key, exchange, symbol, side, timeframe, barTimeMs, processedAt, status],
  );
}

export async function pgUpsertProcessedEmail(
  messageId: string,
  barTs: string,
  symbol: string,
  side: string,
  processedAt: number,
  status: string,
): Promise<void> {
  const p = getPool();
  if (!p) return;
  await p.query(
    `INSERT INTO processed_emails (message_id, bar_ts, symbol_tv, side, processed_at, result_status)
     VALUES ($1,$2,$3,$4,$5,$6)
     ON CONFLICT (message_id) DO UPDATE SET
       bar_ts = EXCLUDED.bar_ts, symbol_tv = EXCLUDED.symbol_tv, side = EXCLUDED.side,
       processed_at = EXCLUDED.processed_at, result_status = EXCLUDED.result_status`,
    [messageId, barTs, symbol, side, processedAt, status],
  );
}

export async function closePg(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
