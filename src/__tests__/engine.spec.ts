import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { SqliteDedupStore, openDatabase } from '../db';
import { SignalEngine } from '../engine';
import type { EngineConfig } from '../engine';
import type {
  ConditionalOrderRequest,
  ExchangeGateway,
  ExchangePosition,
  InstrumentMetadata,
  MarginMode,
  MarketOrderRequest,
  PlacedOrder,
} from '../exchanges/types';

const ETH = 'ETH/USDT:USDT';
const T0 = Date.UTC(2024, 5, 1, 12, 0, 0);

/** In-process venue: fills at the last price and keeps net positions per instrument. */
class FakeGateway implements ExchangeGateway {
  readonly venue = 'mexc';
  price = 100;
  positions: ExchangePosition[] = [];
  metadata: InstrumentMetadata | Error = { contractSize: 1, minContracts: 1 };
  priceError?: Error;
  conditionalError?: Error;
  hangEntry = false;
  marketOrders: MarketOrderRequest[] = [];
  conditionalOrders: ConditionalOrderRequest[] = [];
  leverageCalls: Array<[string, number]> = [];
  marginCalls: Array<[string, MarginMode]> = [];
  private orderSeq = 0;
  private conditionalSeq = 0;

  async getLastPrice(): Promise<number> {
    if (this.priceError) throw this.priceError;
    return this.price;
  }

  async setLeverage(instrument: string, leverage: number): Promise<void> {
    this.leverageCalls.push([instrument, leverage]);
  }

  async setMarginMode(instrument: string, mode: MarginMode): Promise<void> {
    this.marginCalls.push([instrument, mode]);
  }

  async createMarketOrder(req: MarketOrderRequest): Promise<PlacedOrder> {
    this.marketOrders.push(req);
    if (this.hangEntry && !req.reduceOnly) return new Promise<PlacedOrder>(() => undefined);
    const others = this.positions.filter((p) => p.instrument !== req.instrument);
    this.positions = req.reduceOnly
      ? others
      : [
          ...others,
          { instrument: req.instrument, signedSize: req.side === 'buy' ? req.contracts : -req.contracts, entryPrice: this.price },
        ];
    this.orderSeq += 1;
    return { orderId: `ord-${this.orderSeq}`, fillPrice: this.price };
  }

  async createConditionalOrder(req: ConditionalOrderRequest): Promise<PlacedOrder> {
    this.conditionalOrders.push(req);
    if (this.conditionalError) throw this.conditionalError;
    this.conditionalSeq += 1;
    return { orderId: `cond-${this.conditionalSeq}` };
  }

  async listPositions(instruments?: string[]): Promise<ExchangePosition[]> {
    return this.positions.filter((p) => !instruments || instruments.includes(p.instrument));
  }

  async instrumentMetadata(): Promise<InstrumentMetadata | undefined> {
    if (this.metadata instanceof Error) throw this.metadata;
    return this.metadata;
  }
}

const baseConfig: EngineConfig = {
  defaultNotionalUsd: 1000,
  defaultLeverage: 5,
  marginMode: 'isolated',
  cooldownMs: 300_000,
  maxSignalAgeMs: 48 * 3600 * 1000,
  tradingEnabled: true,
  dryRun: false,
  gatewayTimeoutMs: 50,
};

function alert(side: 'long' | 'short', barTimeMs: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { side, symbol: 'ETHUSDT', time_unix_ms: barTimeMs, timeframe: '15', ...extra };
}

describe('SignalEngine', () => {
  let db: Database.Database;
  let dedup: SqliteDedupStore;
  let gateway: FakeGateway;
  let clock: number;

  const engineWith = (overrides: Partial<EngineConfig> = {}) =>
    new SignalEngine({ config: { ...baseConfig, ...overrides }, gateway, dedup, now: () => clock });

  beforeEach(() => {
    db = openDatabase(':memory:');
    clock = T0;
    dedup = new SqliteDedupStore(db, () => clock);
    gateway = new FakeGateway();
  });

  afterEach(() => {
    db.close();
  });

  it('opens a sized long and records the key', async () => {
    const result = await engineWith().execute(alert('long', T0), { source: 'webhook' });

    expect(result).toEqual({
      status: 'filled',
      orderId: 'ord-1',
      instrument: ETH,
      side: 'long',
      contracts: 10,
      fillPrice: 100,
      simulated: false,
      dedupKey: `mexc:ETHUSDT:long:15:${T0}`,
      flippedFrom: undefined,
      closeOrderId: undefined,
      takeProfit: undefined,
      stopLoss: undefined,
      advisories: [],
    });
    expect(gateway.marketOrders).toEqual([{ instrument: ETH, side: 'buy', contracts: 10 }]);
    expect(gateway.leverageCalls).toEqual([[ETH, 5]]);
    expect(gateway.marginCalls).toEqual([[ETH, 'isolated']]);
    expect(dedup.status(`mexc:ETHUSDT:long:15:${T0}`)).toBe('ok');
  });

  it('rejects a redelivered signal without touching the venue', async () => {
    const engine = engineWith();
    await engine.execute(alert('long', T0));
    const again = await engine.execute(alert('long', T0));

    expect(again).toMatchObject({ status: 'rejected', reason: 'DuplicateSignal' });
    expect(gateway.marketOrders).toHaveLength(1);
  });

  it('places a single order for concurrent deliveries of one key', async () => {
    const engine = engineWith();
    const results = await Promise.all(Array.from({ length: 5 }, () => engine.execute(alert('long', T0))));

    expect(results.filter((r) => r.status === 'filled')).toHaveLength(1);
    expect(results.filter((r) => r.status === 'rejected' && r.reason === 'DuplicateSignal')).toHaveLength(4);
    expect(gateway.marketOrders).toHaveLength(1);
  });

  it('walks flat, long, same side, cooldown and flip', async () => {
    const engine = engineWith();

    const opened = await engine.execute(alert('long', T0));
    expect(opened.status).toBe('filled');

    clock = T0 + 60_000;
    const sameSide = await engine.execute(alert('long', clock));
    expect(sameSide).toMatchObject({ status: 'rejected', reason: 'AlreadyInPosition' });
    expect(dedup.status(`mexc:ETHUSDT:long:15:${clock}`)).toBeUndefined();

    clock = T0 + 120_000;
    const cooling = await engine.execute(alert('short', clock));
    expect(cooling).toMatchObject({ status: 'rejected', reason: 'Cooldown' });

    clock = T0 + 301_000;
    const flipped = await engine.execute(alert('short', clock));
    expect(flipped).toMatchObject({ status: 'filled', side: 'short', flippedFrom: 'long', closeOrderId: 'ord-2', orderId: 'ord-3' });
    expect(gateway.marketOrders).toEqual([
      { instrument: ETH, side: 'buy', contracts: 10 },
      { instrument: ETH, side: 'sell', contracts: 10, reduceOnly: true },
      { instrument: ETH, side: 'sell', contracts: 10 },
    ]);
    expect(engine.status().positions).toMatchObject([{ instrument: ETH, side: 'short', size: 10, cooldownUntil: clock + 300_000 }]);
  });

  it('reconciles an externally opened position before deciding', async () => {
    gateway.positions = [{ instrument: ETH, signedSize: -3, entryPrice: 120 }];
    const engine = engineWith();

    const same = await engine.execute(alert('short', T0));
    expect(same).toMatchObject({ status: 'rejected', reason: 'AlreadyInPosition' });

    const flip = await engine.execute(alert('long', T0));
    expect(flip).toMatchObject({ status: 'filled', side: 'long', flippedFrom: 'short' });
    expect(gateway.marketOrders[0]).toEqual({ instrument: ETH, side: 'buy', contracts: 3, reduceOnly: true });
  });

  it('leaves the key retryable when the price lookup fails', async () => {
    gateway.priceError = new Error('ticker down');
    const engine = engineWith();

    const failed = await engine.execute(alert('long', T0));
    expect(failed).toEqual({
      status: 'error',
      stage: 'price',
      detail: 'price failed: ticker down',
      dedupKey: `mexc:ETHUSDT:long:15:${T0}`,
    });
    expect(dedup.count()).toBe(0);

    gateway.priceError = undefined;
    const retried = await engine.execute(alert('long', T0));
    expect(retried.status).toBe('filled');
  });

  it('reports a hung entry order as an error and does not record it', async () => {
    gateway.hangEntry = true;
    const result = await engineWith().execute(alert('long', T0));

    expect(result).toMatchObject({ status: 'error', stage: 'entry_order', detail: 'entry_order timed out after 50ms' });
    expect(dedup.count()).toBe(0);
  });

  it('places reduce-only take profit and stop loss with trigger directions from the market', async () => {
    const result = await engineWith().execute(alert('long', T0, { tp: 110, sl: 95 }));

    expect(result).toMatchObject({ status: 'filled', takeProfit: 110, stopLoss: 95, tpOrderId: 'cond-1', slOrderId: 'cond-2' });
    expect(gateway.conditionalOrders).toEqual([
      {
        instrument: ETH,
        kind: 'take_profit',
        side: 'sell',
        contracts: 10,
        triggerPrice: 110,
        triggerDirection: 'ascending',
        reduceOnly: true,
      },
      {
        instrument: ETH,
        kind: 'stop_loss',
        side: 'sell',
        contracts: 10,
        triggerPrice: 95,
        triggerDirection: 'descending',
        reduceOnly: true,
      },
    ]);
  });

  it('arms a long stop above the market to fire on a rise', async () => {
    await engineWith().execute(alert('long', T0, { sl: 105 }));
    expect(gateway.conditionalOrders).toMatchObject([{ kind: 'stop_loss', triggerPrice: 105, triggerDirection: 'ascending' }]);
  });

  it('keeps the fill when protective orders are refused', async () => {
    gateway.conditionalError = new Error('rejected by venue');
    const result = await engineWith().execute(alert('long', T0, { sl: 95 }));

    expect(result).toMatchObject({ status: 'filled', advisories: ['stop_loss failed: rejected by venue'] });
    expect(result).not.toHaveProperty('slOrderId');
    expect(dedup.status(`mexc:ETHUSDT:long:15:${T0}`)).toBe('ok');
  });

  it('falls back to the built-in contract size without venue metadata', async () => {
    gateway.metadata = new Error('detail unavailable');
    const result = await engineWith().execute(alert('long', T0));

    expect(result).toMatchObject({
      status: 'filled',
      contracts: 1000,
      advisories: ['metadata unavailable: instrument_metadata failed: detail unavailable'],
    });
  });

  it('deduplicates one bar across the webhook and e-mail channels', async () => {
    const engine = engineWith();
    const viaWebhook = await engine.execute(alert('long', T0), { source: 'webhook' });
    const viaEmail = await engine.execute(
      { side: 'long', symbol_tv: 'ETHUSDT', time_unix_ms: T0, timeframe: '15' },
      { source: 'email' },
    );

    expect(viaWebhook.status).toBe('filled');
    expect(viaEmail).toMatchObject({ status: 'rejected', reason: 'DuplicateSignal', dedupKey: `mexc:ETHUSDT:long:15:${T0}` });
    expect(gateway.marketOrders).toHaveLength(1);
  });

  it('reports dedup store failures as internal errors without trading', async () => {
    class BrokenClaims extends SqliteDedupStore {
      tryClaim(): boolean {
        throw new Error('database is locked');
      }
    }
    const broken = new SignalEngine({ config: baseConfig, gateway, dedup: new BrokenClaims(db, () => clock), now: () => clock });
    const result = await broken.execute(alert('long', T0), { source: 'webhook' });

    expect(result).toEqual({
      status: 'error',
      stage: 'internal',
      detail: 'database is locked',
      dedupKey: `mexc:ETHUSDT:long:15:${T0}`,
    });
    expect(gateway.marketOrders).toHaveLength(0);
  });

  it('reports a failing processed lookup as an internal error', async () => {
    class BrokenLookup extends SqliteDedupStore {
      isProcessed(): boolean {
        throw new Error('disk I/O error');
      }
    }
    const broken = new SignalEngine({ config: baseConfig, gateway, dedup: new BrokenLookup(db, () => clock), now: () => clock });

    await expect(broken.execute(alert('long', T0), { source: 'webhook' })).resolves.toMatchObject({
      status: 'error',
      stage: 'internal',
      detail: 'disk I/O error',
    });
    expect(gateway.marketOrders).toHaveLength(0);
  });

  it('requires the shared secret from webhook deliveries', async () => {
    const engine = engineWith({ webhookSecret: 'test-secret' });

    const missing = await engine.execute(alert('long', T0), { source: 'webhook', requireSecret: true });
    expect(missing).toEqual({ status: 'rejected', reason: 'Unauthorized', detail: 'secret mismatch', dedupKey: undefined });

    const wrong = await engine.execute(alert('long', T0, { secret: 'nope' }), { source: 'email' });
    expect(wrong).toMatchObject({ reason: 'Unauthorized' });

    const ok = await engine.execute(alert('long', T0, { secret: 'test-secret' }), { source: 'webhook', requireSecret: true });
    expect(ok.status).toBe('filled');
  });

  it('rejects everything while trading is disabled', async () => {
    const result = await engineWith({ tradingEnabled: false }).execute(alert('long', T0));
    expect(result).toMatchObject({ status: 'rejected', reason: 'TradingDisabled' });
    expect(gateway.marketOrders).toHaveLength(0);
  });

  it('simulates fills in dry run without sending orders', async () => {
    const engine = engineWith({ dryRun: true });

    const opened = await engine.execute(alert('long', T0, { sl: 95 }));
    expect(opened).toMatchObject({
      status: 'filled',
      orderId: `sim-${ETH}-long-${T0}`,
      simulated: true,
      contracts: 10,
      stopLoss: 95,
    });
    expect(dedup.status(`mexc:ETHUSDT:long:15:${T0}`)).toBe('simulated_ok');

    clock = T0 + 301_000;
    const flipped = await engine.execute(alert('short', clock));
    expect(flipped).toMatchObject({ status: 'filled', flippedFrom: 'long', simulated: true });

    expect(gateway.marketOrders).toHaveLength(0);
    expect(gateway.conditionalOrders).toHaveLength(0);
    expect(gateway.leverageCalls).toHaveLength(0);
  });

  it('reports status', async () => {
    const engine = engineWith();
    await engine.execute(alert('long', T0));

    expect(engine.status()).toEqual({
      venue: 'mexc',
      tradingEnabled: true,
      dryRun: false,
      positions: [{ instrument: ETH, side: 'long', size: 10, entryPrice: 100, cooldownUntil: T0 + 300_000, updatedAt: T0 }],
      dedupCacheSize: 1,
      processedSignals: 1,
      pendingClaims: 0,
      inFlight: [],
    });
  });
});
