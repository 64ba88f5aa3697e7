import { createLogger, errorMessage } from './logger';
import type { Logger } from './logger';
import type { AppConfig } from './config';
import type { SignalDedupStore, SignalRecord } from './db';
import { toGatewayError } from './exchanges/types';
import type { ExchangeGateway, InstrumentMetadata, MarginMode, PlacedOrder } from './exchanges/types';
import { buildDedupKey, normalizeSignal } from './signals/normalize';
import type {
  ErrorResult,
  ExecutionResult,
  ExecutionStage,
  FilledResult,
  RejectedResult,
  Signal,
  SignalSide,
  SignalSource,
} from './signals/types';
import { KeyedMutex, withTimeout } from './trading/locks';
import { PositionBook, decideTransition } from './trading/positions';
import type { PositionRecord } from './trading/positions';
import { entrySide, exitSide, planProtectiveOrders, resolveProtectiveTargets } from './trading/protective';
import { contractsFor } from './trading/sizing';

export interface EngineConfig {
  defaultNotionalUsd: number;
  defaultLeverage: number;
  marginMode: MarginMode;
  cooldownMs: number;
  maxSignalAgeMs: number;
  defaultTpPct?: number;
  defaultSlPct?: number;
  tradingEnabled: boolean;
  dryRun: boolean;
  webhookSecret?: string;
  gatewayTimeoutMs: number;
}

export function engineConfigFrom(cfg: AppConfig): EngineConfig {
  return {
    defaultNotionalUsd: cfg.POSITION_USDT,
    defaultLeverage: cfg.DEFAULT_LEVERAGE,
    marginMode: cfg.MARGIN_MODE,
    cooldownMs: cfg.cooldownMs,
    maxSignalAgeMs: cfg.maxSignalAgeMs,
    defaultTpPct: cfg.DEFAULT_TP_PCT,
    defaultSlPct: cfg.DEFAULT_SL_PCT,
    tradingEnabled: cfg.tradingEnabled,
    dryRun: cfg.dryRun,
    webhookSecret: cfg.webhookSecret,
    gatewayTimeoutMs: cfg.GATEWAY_TIMEOUT_MS,
  };
}

export interface ExecuteOptions {
  source?: SignalSource;
  /** Transports that authenticate by shared secret reject a missing one. */
  requireSecret?: boolean;
}

export interface EngineStatus {
  venue: string;
  tradingEnabled: boolean;
  dryRun: boolean;
  positions: PositionRecord[];
  dedupCacheSize: number;
  processedSignals: number;
  pendingClaims: number;
  inFlight: string[];
}

interface PreparedEntry {
  lastPrice: number;
  contracts: number;
  leverage: number;
  flippedFrom?: SignalSide;
  closeOrderId?: string;
  advisories: string[];
}

class StageError extends Error {
  constructor(
    readonly stage: ExecutionStage,
    readonly original: unknown,
  ) {
    super(errorMessage(original));
    this.name = 'StageError';
  }
}

export interface SignalEngineDeps {
  config: EngineConfig;
  gateway: ExchangeGateway;
  dedup: SignalDedupStore;
  positions?: PositionBook;
  locks?: KeyedMutex;
  now?: () => number;
  logger?: Logger;
}

/**
 * Single entry point shared by every front-end. Executions for one
 * instrument are serialized; each dedup key yields at most one entry order.
 */
export class SignalEngine {
  private readonly cfg: EngineConfig;
  private readonly gateway: ExchangeGateway;
  private readonly dedup: SignalDedupStore;
  private readonly positions: PositionBook;
  private readonly locks: KeyedMutex;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(deps: SignalEngineDeps) {
    this.cfg = deps.config;
    this.gateway = deps.gateway;
    this.dedup = deps.dedup;
    this.now = deps.now ?? Date.now;
    this.positions = deps.positions ?? new PositionBook(this.now);
    this.locks = deps.locks ?? new KeyedMutex();
    this.logger = deps.logger ?? createLogger('engine');
  }

  async execute(payload: unknown, opts: ExecuteOptions = {}): Promise<ExecutionResult> {
    const source = opts.source ?? 'manual';
    if (!this.cfg.tradingEnabled) {
      return this.reject('TradingDisabled', 'trading is disabled by configuration');
    }

    const normalized = normalizeSignal(payload, { now: this.now(), maxAgeMs: this.cfg.maxSignalAgeMs });
    if (!normalized.ok) {
      this.logger.warn({ source, reason: normalized.reason, detail: normalized.detail }, 'signal rejected');
      return { status: 'rejected', reason: normalized.reason, detail: normalized.detail };
    }
    const signal = normalized.signal;

    const expected = this.cfg.webhookSecret;
    if (expected && (opts.requireSecret || signal.secret !== undefined) && signal.secret !== expected) {
      this.logger.warn({ source, symbol: signal.symbolAsReceived }, 'signal rejected: bad secret');
      return this.reject('Unauthorized', 'secret mismatch');
    }

    const record: SignalRecord = {
      key: buildDedupKey(
        this.gateway.venue,
        signal.symbolAsReceived,
        signal.side,
        signal.timeframe,
        signal.barTimeMs,
      ),
      venue: this.gateway.venue,
      symbol: signal.symbolAsReceived,
      side: signal.side,
      timeframe: signal.timeframe,
      barTimeMs: signal.barTimeMs,
    };
    let seen: boolean;
    try {
      seen = this.dedup.isProcessed(record.key);
    } catch (err) {
      return this.failure(err, record.key);
    }
    if (seen) {
      this.logger.info({ source, key: record.key }, 'duplicate signal ignored');
      return this.reject('DuplicateSignal', 'signal already processed', record.key);
    }

    this.logger.info(
      { source, key: record.key, instrument: signal.instrument, side: signal.side },
      'executing signal',
    );
    return this.locks.run(signal.instrument, () => this.executeLocked(signal, record));
  }

  status(): EngineStatus {
    return {
      venue: this.gateway.venue,
      tradingEnabled: this.cfg.tradingEnabled,
      dryRun: this.cfg.dryRun,
      positions: this.positions.snapshot(),
      dedupCacheSize: this.dedup.cacheSize(),
      processedSignals: this.dedup.count(),
      pendingClaims: this.dedup.pendingCount(),
      inFlight: this.locks.activeKeys(),
    };
  }

  private async executeLocked(signal: Signal, record: SignalRecord): Promise<ExecutionResult> {
    // A concurrent delivery of the same key may have finished while we queued.
    let claimed: boolean;
    try {
      claimed = this.dedup.tryClaim(record);
    } catch (err) {
      return this.failure(err, record.key);
    }
    if (!claimed) {
      this.logger.info({ key: record.key }, 'duplicate signal ignored (claimed)');
      return this.reject('DuplicateSignal', 'signal already processed', record.key);
    }

    const outcome = await this.prepareAndPlace(signal, record.key).catch((err: unknown) =>
      this.failure(err, record.key),
    );
    if ('status' in outcome) {
      try {
        this.dedup.release(record.key);
      } catch (err) {
        // The pending row keeps blocking this key until it is cleared by hand.
        this.logger.error({ err: errorMessage(err), key: record.key }, 'failed to release dedup claim');
      }
      return outcome;
    }

    // The entry exists on the venue from here on: bookkeeping must complete.
    return this.finalize(signal, record, outcome.prepared, outcome.placed);
  }

  private async prepareAndPlace(
    signal: Signal,
    key: string,
  ): Promise<{ prepared: PreparedEntry; placed: PlacedOrder } | RejectedResult> {
    const prepared = await this.prepare(signal, key);
    if ('status' in prepared) return prepared;
    const placed = await this.placeEntry(signal, prepared);
    return { prepared, placed };
  }

  private async prepare(signal: Signal, key: string): Promise<PreparedEntry | RejectedResult> {
    const instrument = signal.instrument;
    const advisories: string[] = [];
    const leverage = signal.leverage ?? this.cfg.defaultLeverage;

    if (!this.cfg.dryRun) {
      await this.configureMargin(instrument, leverage, signal.marginMode ?? this.cfg.marginMode, advisories);
    }

    const lastPrice = await this.stage('price', () => this.gateway.getLastPrice(instrument));

    let current: PositionRecord;
    if (this.cfg.dryRun) {
      current = this.positions.get(instrument);
    } else {
      const venuePositions = await this.stage('positions', () => this.gateway.listPositions([instrument]));
      current = this.positions.reconcile(instrument, venuePositions, lastPrice);
    }

    const transition = decideTransition(current, signal.side, this.now());
    if (transition.action === 'reject') {
      this.logger.info({ key, instrument, reason: transition.reason }, transition.detail);
      return this.reject(transition.reason, transition.detail, key);
    }

    let flippedFrom: SignalSide | undefined;
    let closeOrderId: string | undefined;
    if (transition.action === 'flip') {
      flippedFrom = transition.from;
      if (!this.cfg.dryRun) {
        try {
          const closed = await this.call('close_position', () =>
            this.gateway.createMarketOrder({
              instrument,
              side: exitSide(transition.from),
              contracts: transition.closeSize,
              reduceOnly: true,
            }),
          );
          closeOrderId = closed.orderId;
          this.logger.info({ instrument, from: transition.from, size: transition.closeSize }, 'closed position for flip');
        } catch (err) {
          // Open the new side regardless; the close is best-effort.
          advisories.push(`close ${transition.from} failed: ${errorMessage(err)}`);
          this.logger.warn({ err: errorMessage(err), instrument }, 'close before flip failed');
        }
      }
    }

    let metadata: InstrumentMetadata | undefined;
    try {
      metadata = await this.call('instrument_metadata', () => this.gateway.instrumentMetadata(instrument));
    } catch (err) {
      advisories.push(`metadata unavailable: ${errorMessage(err)}`);
      this.logger.warn({ err: errorMessage(err), instrument }, 'instrument metadata failed; using fallback size');
    }

    const notional = signal.notional ?? this.cfg.defaultNotionalUsd;
    const contracts = contractsFor(instrument, notional, lastPrice, metadata);

    return { lastPrice, contracts, leverage, flippedFrom, closeOrderId, advisories };
  }

  private async configureMargin(
    instrument: string,
    leverage: number,
    mode: MarginMode,
    advisories: string[],
  ): Promise<void> {
    try {
      await this.call('set_margin_mode', () => this.gateway.setMarginMode(instrument, mode));
    } catch (err) {
      advisories.push(`margin mode not set: ${errorMessage(err)}`);
      this.logger.warn({ err: errorMessage(err), instrument, mode }, 'set margin mode failed');
    }
    try {
      await this.call('set_leverage', () => this.gateway.setLeverage(instrument, leverage));
    } catch (err) {
      advisories.push(`leverage not set: ${errorMessage(err)}`);
      this.logger.warn({ err: errorMessage(err), instrument, leverage }, 'set leverage failed');
    }
  }

  private async placeEntry(signal: Signal, prepared: PreparedEntry): Promise<PlacedOrder> {
    if (this.cfg.dryRun) {
      const orderId = `sim-${signal.instrument}-${signal.side}-${signal.barTimeMs}`;
      this.logger.info({ orderId, contracts: prepared.contracts }, 'DRY_RUN order');
      return { orderId, fillPrice: prepared.lastPrice };
    }
    return this.stage('entry_order', () =>
      this.gateway.createMarketOrder({
        instrument: signal.instrument,
        side: entrySide(signal.side),
        contracts: prepared.contracts,
      }),
    );
  }

  private async finalize(
    signal: Signal,
    record: SignalRecord,
    prepared: PreparedEntry,
    placed: PlacedOrder,
  ): Promise<FilledResult> {
    const instrument = signal.instrument;
    const fillPrice = placed.fillPrice ?? prepared.lastPrice;
    const advisories = [...prepared.advisories];

    this.positions.recordFill(instrument, signal.side, prepared.contracts, fillPrice);
    this.positions.armCooldown(instrument, this.now() + this.cfg.cooldownMs);
    try {
      this.dedup.markProcessed(record, this.cfg.dryRun ? 'simulated_ok' : 'ok');
    } catch (err) {
      // The pending claim still blocks redelivery of this key.
      advisories.push(`dedup record not finalized: ${errorMessage(err)}`);
      this.logger.error({ err, key: record.key }, 'failed to finalize dedup record');
    }
    this.logger.info(
      { key: record.key, orderId: placed.orderId, instrument, side: signal.side, contracts: prepared.contracts, fillPrice },
      'entry filled',
    );

    const targets = resolveProtectiveTargets(
      signal.side,
      fillPrice,
      {
        takeProfit: signal.takeProfit,
        stopLoss: signal.stopLoss,
        takeProfitPct: signal.takeProfitPct,
        stopLossPct: signal.stopLossPct,
      },
      { takeProfitPct: this.cfg.defaultTpPct, stopLossPct: this.cfg.defaultSlPct },
    );

    const result: FilledResult = {
      status: 'filled',
      orderId: placed.orderId,
      instrument,
      side: signal.side,
      contracts: prepared.contracts,
      fillPrice,
      simulated: this.cfg.dryRun,
      dedupKey: record.key,
      flippedFrom: prepared.flippedFrom,
      closeOrderId: prepared.closeOrderId,
      takeProfit: targets.takeProfit,
      stopLoss: targets.stopLoss,
      advisories,
    };
    if (this.cfg.dryRun) return result;

    const orders = planProtectiveOrders(instrument, signal.side, prepared.contracts, targets, prepared.lastPrice);
    const settled = await Promise.allSettled(
      orders.map((order) => this.call(order.kind, () => this.gateway.createConditionalOrder(order))),
    );
    settled.forEach((outcome, i) => {
      const order = orders[i];
      if (outcome.status === 'fulfilled') {
        if (order.kind === 'take_profit') result.tpOrderId = outcome.value.orderId;
        else result.slOrderId = outcome.value.orderId;
        this.logger.info(
          { instrument, kind: order.kind, triggerPrice: order.triggerPrice, direction: order.triggerDirection },
          'protective order placed',
        );
      } else {
        advisories.push(errorMessage(outcome.reason));
        this.logger.warn({ err: errorMessage(outcome.reason), instrument, kind: order.kind }, 'protective order failed');
      }
    });
    return result;
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withTimeout(
      fn().catch((err: unknown) => {
        throw toGatewayError(err, operation);
      }),
      this.cfg.gatewayTimeoutMs,
      operation,
    );
  }

  private async stage<T>(stage: ExecutionStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.call(stage, fn);
    } catch (err) {
      throw new StageError(stage, err);
    }
  }

  private failure(err: unknown, key: string): ErrorResult {
    const stage: ExecutionStage = err instanceof StageError ? err.stage : 'internal';
    const detail = errorMessage(err);
    this.logger.error({ err: detail, stage, key }, 'signal execution failed');
    return { status: 'error', stage, detail, dedupKey: key };
  }

  private reject(reason: RejectedResult['reason'], detail: string, dedupKey?: string): RejectedResult {
    return { status: 'rejected', reason, detail, dedupKey };
  }
}
