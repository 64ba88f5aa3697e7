import type { ExchangePosition } from '../exchanges/types';
import type { PositionSide, SignalSide } from '../signals/types';

// Sizes below this are treated as flat (venues report dust as tiny floats).
const SIZE_EPSILON = 1e-9;

export interface PositionRecord {
  instrument: string;
  side: PositionSide;
  entryPrice?: number;
  size: number;
  /** Epoch ms; only the engine writes this, reconciliation leaves it alone. */
  cooldownUntil: number;
  updatedAt: number;
}

export type Transition =
  | { action: 'open' }
  | { action: 'flip'; from: SignalSide; closeSize: number }
  | { action: 'reject'; reason: 'AlreadyInPosition' | 'Cooldown'; detail: string };

/**
 * Per-instrument view of the account. Side, size and entry are a read-through
 * copy of what the venue reports; cooldown is the only locally owned field.
 */
export class PositionBook {
  private readonly records = new Map<string, PositionRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  get(instrument: string): PositionRecord {
    let record = this.records.get(instrument);
    if (!record) {
      record = { instrument, side: 'flat', size: 0, cooldownUntil: 0, updatedAt: this.now() };
      this.records.set(instrument, record);
    }
    return record;
  }

  /**
   * Replaces the local view with the venue's. When the venue omits the entry
   * price, the previous one is kept for an unchanged side, else `fallbackPrice`.
   */
  reconcile(instrument: string, positions: ExchangePosition[], fallbackPrice?: number): PositionRecord {
    const record = this.get(instrument);
    let signed = 0;
    let entryPrice: number | undefined;
    for (const p of positions) {
      if (p.instrument !== instrument || !Number.isFinite(p.signedSize)) continue;
      signed += p.signedSize;
      if (entryPrice === undefined && Math.abs(p.signedSize) > SIZE_EPSILON) entryPrice = p.entryPrice;
    }
    if (Math.abs(signed) <= SIZE_EPSILON) {
      record.side = 'flat';
      record.size = 0;
      record.entryPrice = undefined;
    } else {
      const side = signed > 0 ? 'long' : 'short';
      const previous = record.side === side ? record.entryPrice : undefined;
      record.side = side;
      record.size = Math.abs(signed);
      record.entryPrice = entryPrice ?? previous ?? fallbackPrice;
    }
    record.updatedAt = this.now();
    return record;
  }

  recordFill(instrument: string, side: SignalSide, size: number, entryPrice: number): PositionRecord {
    const record = this.get(instrument);
    record.side = side;
    record.size = size;
    record.entryPrice = entryPrice;
    record.updatedAt = this.now();
    return record;
  }

  armCooldown(instrument: string, until: number): void {
    this.get(instrument).cooldownUntil = until;
  }

  snapshot(): PositionRecord[] {
    return Array.from(this.records.values())
      .map((r) => ({ ...r }))
      .sort((a, b) => a.instrument.localeCompare(b.instrument));
  }
}

export function decideTransition(current: PositionRecord, signalSide: SignalSide, now: number): Transition {
  if (current.side === signalSide) {
    return {
      action: 'reject',
      reason: 'AlreadyInPosition',
      detail: `already ${current.side} ${current.size} on ${current.instrument}`,
    };
  }
  if (now < current.cooldownUntil) {
    return {
      action: 'reject',
      reason: 'Cooldown',
      detail: `cooldown on ${current.instrument} for another ${Math.ceil((current.cooldownUntil - now) / 1000)}s`,
    };
  }
  if (current.side === 'flat') return { action: 'open' };
  return { action: 'flip', from: current.side, closeSize: current.size };
}
