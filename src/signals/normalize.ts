import { z } from 'zod';
import { mapInstrument } from '../trading/symbols';
import type { RejectReason, Signal, SignalSide } from './types';

// Numeric bar times above this are milliseconds, below it seconds.
const MS_THRESHOLD = 1e12;

const blankToUndefined = (v: unknown): unknown =>
  v === null || (typeof v === 'string' && v.trim() === '') ? undefined : v;

const optionalPositive = z.preprocess(blankToUndefined, z.coerce.number().finite().positive().optional());

const optionalText = z.preprocess(
  blankToUndefined,
  z.union([z.string(), z.number()]).transform((v) => String(v).trim()).optional(),
);

const lowerText = (v: unknown): unknown => (typeof v === 'string' ? v.trim().toLowerCase() : v);

const payloadSchema = z.object({
  side: z.preprocess(lowerText, z.enum(['long', 'short'])),
  symbol: optionalText,
  symbol_tv: optionalText,
  time_unix_ms: z.preprocess(blankToUndefined, z.union([z.string(), z.number()]).optional()),
  bar_ts: z.preprocess(blankToUndefined, z.union([z.string(), z.number()]).optional()),
  time: z.preprocess(blankToUndefined, z.union([z.string(), z.number()]).optional()),
  timeframe: optionalText,
  notional: optionalPositive,
  leverage: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  margin_mode: z.preprocess((v) => lowerText(blankToUndefined(v)), z.enum(['isolated', 'cross']).optional()),
  tp: optionalPositive,
  sl: optionalPositive,
  tp_pct: optionalPositive,
  sl_pct: optionalPositive,
  secret: optionalText,
});

export type NormalizeOutcome =
  | { ok: true; signal: Signal }
  | { ok: false; reason: Extract<RejectReason, 'InvalidSignal' | 'StaleSignal'>; detail: string };

export interface NormalizeOptions {
  now: number;
  maxAgeMs: number;
}

// Date and time with no zone designator.
const LOCAL_ISO = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(:\d{2}(\.\d+)?)?)$/;

/** Bar close time in epoch milliseconds from ISO-8601, unix seconds or unix milliseconds. */
export function parseBarTime(value: unknown): number | undefined {
  let numeric: number | undefined;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string') {
    const s = value.trim();
    if (!s) return undefined;
    if (/^\d+(\.\d+)?$/.test(s)) {
      numeric = Number(s);
    } else {
      // Bar times without an offset are UTC, whatever the host zone.
      const parsed = Date.parse(s.replace(LOCAL_ISO, '$1T$2Z'));
      return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
    }
  } else {
    return undefined;
  }
  if (!Number.isFinite(numeric) || numeric <= 0) return undefined;
  return Math.round(numeric > MS_THRESHOLD ? numeric : numeric * 1000);
}

export function buildDedupKey(
  venue: string,
  symbolAsReceived: string,
  side: SignalSide,
  timeframe: string,
  barTimeMs: number,
): string {
  return [venue, symbolAsReceived, side, timeframe, String(barTimeMs)].join(':');
}

export function normalizeSignal(payload: unknown, opts: NormalizeOptions): NormalizeOutcome {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return { ok: false, reason: 'InvalidSignal', detail: 'payload must be a JSON object' };
  }
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'payload';
    return { ok: false, reason: 'InvalidSignal', detail: `${field}: ${issue?.message ?? 'invalid'}` };
  }
  const p = parsed.data;

  const symbolAsReceived = p.symbol ?? p.symbol_tv;
  if (!symbolAsReceived) {
    return { ok: false, reason: 'InvalidSignal', detail: 'symbol is required' };
  }
  const instrument = mapInstrument(symbolAsReceived);
  if (!instrument) {
    return { ok: false, reason: 'InvalidSignal', detail: `unsupported symbol ${symbolAsReceived}` };
  }

  const rawTime = p.time_unix_ms ?? p.bar_ts ?? p.time;
  if (rawTime === undefined) {
    return { ok: false, reason: 'InvalidSignal', detail: 'bar time is required' };
  }
  const barTimeMs = parseBarTime(rawTime);
  if (barTimeMs === undefined) {
    return { ok: false, reason: 'InvalidSignal', detail: `unparseable bar time ${String(rawTime)}` };
  }

  const ageMs = opts.now - barTimeMs;
  if (ageMs > opts.maxAgeMs) {
    return {
      ok: false,
      reason: 'StaleSignal',
      detail: `bar age ${Math.round(ageMs / 1000)}s exceeds ${Math.round(opts.maxAgeMs / 1000)}s`,
    };
  }

  return {
    ok: true,
    signal: {
      side: p.side,
      symbolAsReceived,
      instrument,
      barTimeMs,
      timeframe: p.timeframe || 'unknown',
      notional: p.notional,
      leverage: p.leverage,
      marginMode: p.margin_mode,
      takeProfit: p.tp,
      stopLoss: p.sl,
      takeProfitPct: p.tp_pct,
      stopLossPct: p.sl_pct,
      secret: p.secret,
    },
  };
}
