import type { ConditionalOrderRequest, OrderSide, TriggerDirection } from '../exchanges/types';
import type { SignalSide } from '../signals/types';

export interface ProtectiveOverrides {
  takeProfit?: number;
  stopLoss?: number;
  takeProfitPct?: number;
  stopLossPct?: number;
}

export interface ProtectiveDefaults {
  takeProfitPct?: number;
  stopLossPct?: number;
}

export interface ProtectiveTargets {
  takeProfit?: number;
  stopLoss?: number;
}

export function entrySide(side: SignalSide): OrderSide {
  return side === 'long' ? 'buy' : 'sell';
}

export function exitSide(side: SignalSide): OrderSide {
  return side === 'long' ? 'sell' : 'buy';
}

/**
 * Absolute price from the signal wins, then the signal's percentage, then the
 * configured default percentage. Percentages are in percent units.
 */
export function resolveProtectiveTargets(
  side: SignalSide,
  entryPrice: number,
  overrides: ProtectiveOverrides,
  defaults: ProtectiveDefaults = {},
): ProtectiveTargets {
  const tpPct = overrides.takeProfitPct ?? defaults.takeProfitPct;
  const slPct = overrides.stopLossPct ?? defaults.stopLossPct;
  const up = (pct: number) => entryPrice * (1 + pct / 100);
  const down = (pct: number) => entryPrice * (1 - pct / 100);

  const takeProfit =
    overrides.takeProfit ?? (tpPct === undefined ? undefined : side === 'long' ? up(tpPct) : down(tpPct));
  const stopLoss =
    overrides.stopLoss ?? (slPct === undefined ? undefined : side === 'long' ? down(slPct) : up(slPct));

  return {
    takeProfit: takeProfit !== undefined && takeProfit > 0 ? takeProfit : undefined,
    stopLoss: stopLoss !== undefined && stopLoss > 0 ? stopLoss : undefined,
  };
}

/**
 * Direction is decided by where the trigger sits relative to the current
 * price, not by position side: a stop above the market only fires on a rise.
 */
export function resolveTriggerDirection(
  triggerPrice: number,
  currentPrice: number,
  fallback: TriggerDirection,
): TriggerDirection {
  if (triggerPrice < currentPrice) return 'descending';
  if (triggerPrice > currentPrice) return 'ascending';
  return fallback;
}

export function planProtectiveOrders(
  instrument: string,
  side: SignalSide,
  contracts: number,
  targets: ProtectiveTargets,
  currentPrice: number,
): ConditionalOrderRequest[] {
  const orders: ConditionalOrderRequest[] = [];
  const closeSide = exitSide(side);
  if (targets.takeProfit !== undefined) {
    orders.push({
      instrument,
      kind: 'take_profit',
      side: closeSide,
      contracts,
      triggerPrice: targets.takeProfit,
      triggerDirection: resolveTriggerDirection(
        targets.takeProfit,
        currentPrice,
        side === 'long' ? 'ascending' : 'descending',
      ),
      reduceOnly: true,
    });
  }
  if (targets.stopLoss !== undefined) {
    orders.push({
      instrument,
      kind: 'stop_loss',
      side: closeSide,
      contracts,
      triggerPrice: targets.stopLoss,
      triggerDirection: resolveTriggerDirection(
        targets.stopLoss,
        currentPrice,
        side === 'long' ? 'descending' : 'ascending',
      ),
      reduceOnly: true,
    });
  }
  return orders;
}
