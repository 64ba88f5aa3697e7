import type { MarginMode } from '../exchanges/types';

export type SignalSide = 'long' | 'short';
export type SignalSource = 'webhook' | 'email' | 'manual';

export interface Signal {
  side: SignalSide;
  /** Symbol exactly as the front-end received it; part of the dedup key. */
  symbolAsReceived: string;
  /** Unified contract symbol, e.g. ETH/USDT:USDT. */
  instrument: string;
  barTimeMs: number;
  timeframe: string;
  notional?: number;
  leverage?: number;
  marginMode?: MarginMode;
  takeProfit?: number;
  stopLoss?: number;
  takeProfitPct?: number;
  stopLossPct?: number;
  secret?: string;
}

export type RejectReason =
  | 'InvalidSignal'
  | 'StaleSignal'
  | 'DuplicateSignal'
  | 'Cooldown'
  | 'AlreadyInPosition'
  | 'TradingDisabled'
  | 'Unauthorized';

export type ExecutionStage = 'price' | 'positions' | 'entry_order' | 'internal';

export type PositionSide = 'flat' | 'long' | 'short';

export interface RejectedResult {
  status: 'rejected';
  reason: RejectReason;
  detail: string;
  dedupKey?: string;
}

export interface FilledResult {
  status: 'filled';
  orderId: string;
  instrument: string;
  side: SignalSide;
  contracts: number;
  fillPrice: number;
  simulated: boolean;
  dedupKey: string;
  flippedFrom?: SignalSide;
  closeOrderId?: string;
  takeProfit?: number;
  stopLoss?: number;
  tpOrderId?: string;
  slOrderId?: string;
  /** Best-effort steps that failed without affecting the entry. */
  advisories: string[];
}

export interface ErrorResult {
  status: 'error';
  stage: ExecutionStage;
  detail: string;
  dedupKey?: string;
}

export type ExecutionResult = RejectedResult | FilledResult | ErrorResult;
