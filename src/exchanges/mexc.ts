import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { createHmac } from 'crypto';
import { splitInstrument } from '../trading/symbols';
import { GatewayError, toGatewayError } from './types';
import type {
  ConditionalOrderRequest,
  ExchangeGateway,
  ExchangePosition,
  InstrumentMetadata,
  MarginMode,
  MarketOrderRequest,
  OrderSide,
  PlacedOrder,
  TriggerDirection,
} from './types';

export const MEXC_CONTRACT_BASE = 'https://contract.mexc.com';

interface MexcEnvelope<T> {
  success: boolean;
  code: number;
  message?: string;
  data: T;
}

export interface MexcPosition {
  symbol: string;
  positionType: number; // 1 long, 2 short
  holdVol: number;
  holdAvgPrice?: number;
}

export interface MexcContractDetail {
  symbol: string;
  contractSize: number;
  minVol: number;
}

export interface MexcGatewayOptions {
  apiKey?: string;
  apiSecret?: string;
  baseURL?: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

// Order side codes of the contract API.
const OPEN_LONG = 1;
const CLOSE_SHORT = 2;
const OPEN_SHORT = 3;
const CLOSE_LONG = 4;
const ORDER_TYPE_LIMIT = 1;
const ORDER_TYPE_MARKET = 5;
const TRIGGER_GTE = 1;
const TRIGGER_LTE = 2;

export function toVenueSymbol(instrument: string): string {
  const { base, quote } = splitInstrument(instrument);
  return `${base}_${quote}`;
}

export function fromVenueSymbol(symbol: string): string {
  const [base, quote] = symbol.split('_');
  return `${base}/${quote}:${quote}`;
}

export function orderSideCode(side: OrderSide, reduceOnly: boolean): number {
  if (side === 'buy') return reduceOnly ? CLOSE_SHORT : OPEN_LONG;
  return reduceOnly ? CLOSE_LONG : OPEN_SHORT;
}

export function triggerTypeCode(direction: TriggerDirection): number {
  return direction === 'ascending' ? TRIGGER_GTE : TRIGGER_LTE;
}

export function openTypeCode(mode: MarginMode): number {
  return mode === 'isolated' ? 1 : 2;
}

/** Query string with keys in dictionary order, as the signature expects. */
export function canonicalQuery(params: Record<string, string | number | undefined>): string {
  return Object.keys(params)
    .filter((k) => params[k] !== undefined)
    .sort()
    .map((k) => `${k}=${encodeURIComponent(String(params[k]))}`)
    .join('&');
}

export function signRequest(apiKey: string, apiSecret: string, reqTime: string, paramString: string): string {
  return createHmac('sha256', apiSecret).update(`${apiKey}${reqTime}${paramString}`).digest('hex');
}

export function parsePositions(rows: MexcPosition[]): ExchangePosition[] {
  return rows
    .filter((r) => Number.isFinite(Number(r.holdVol)) && Number(r.holdVol) > 0)
    .map((r) => ({
      instrument: fromVenueSymbol(r.symbol),
      signedSize: Number(r.holdVol) * (r.positionType === 2 ? -1 : 1),
      entryPrice: r.holdAvgPrice !== undefined ? Number(r.holdAvgPrice) : undefined,
    }));
}

export class MexcContractGateway implements ExchangeGateway {
  readonly venue = 'mexc';
  private readonly client: AxiosInstance;
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly leverageBySymbol = new Map<string, number>();
  private readonly marginBySymbol = new Map<string, MarginMode>();
  private readonly metadataCache = new Map<string, InstrumentMetadata>();

  constructor(options: MexcGatewayOptions = {}) {
    this.apiKey = options.apiKey ?? '';
    this.apiSecret = options.apiSecret ?? '';
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseURL ?? MEXC_CONTRACT_BASE,
        timeout: options.timeoutMs ?? 8000,
      });
  }

  async getLastPrice(instrument: string): Promise<number> {
    const data = await this.publicGet<{ lastPrice: number }>('get_last_price', '/api/v1/contract/ticker', {
      symbol: toVenueSymbol(instrument),
    });
    const price = Number(data?.lastPrice);
    if (!Number.isFinite(price) || price <= 0) {
      throw new GatewayError(`Invalid last price for ${instrument}`, 'get_last_price');
    }
    return price;
  }

  async setLeverage(instrument: string, leverage: number): Promise<void> {
    const symbol = toVenueSymbol(instrument);
    const openType = openTypeCode(this.marginBySymbol.get(symbol) ?? 'isolated');
    // Leverage is per position side on this venue.
    for (const positionType of [1, 2]) {
      await this.privateRequest<unknown>('set_leverage', 'POST', '/api/v1/private/position/change_leverage', {
        symbol,
        leverage,
        openType,
        positionType,
      });
    }
    this.leverageBySymbol.set(symbol, leverage);
  }

  async setMarginMode(instrument: string, mode: MarginMode): Promise<void> {
    // Margin mode travels with each order (openType); nothing to call up front.
    this.marginBySymbol.set(toVenueSymbol(instrument), mode);
  }

  async createMarketOrder(req: MarketOrderRequest): Promise<PlacedOrder> {
    const symbol = toVenueSymbol(req.instrument);
    const orderId = await this.privateRequest<string | number>(
      'create_market_order',
      'POST',
      '/api/v1/private/order/submit',
      {
        symbol,
        price: 0,
        vol: req.contracts,
        leverage: this.leverageBySymbol.get(symbol),
        side: orderSideCode(req.side, req.reduceOnly ?? false),
        type: ORDER_TYPE_MARKET,
        openType: openTypeCode(this.marginBySymbol.get(symbol) ?? 'isolated'),
        reduceOnly: req.reduceOnly ? true : undefined,
      },
    );
    return { orderId: String(orderId) };
  }

  async createConditionalOrder(req: ConditionalOrderRequest): Promise<PlacedOrder> {
    const symbol = toVenueSymbol(req.instrument);
    const openType = openTypeCode(this.marginBySymbol.get(symbol) ?? 'isolated');
    if (req.kind === 'take_profit') {
      const orderId = await this.privateRequest<string | number>(
        'take_profit',
        'POST',
        '/api/v1/private/order/submit',
        {
          symbol,
          price: req.triggerPrice,
          vol: req.contracts,
          leverage: this.leverageBySymbol.get(symbol),
          side: orderSideCode(req.side, req.reduceOnly),
          type: ORDER_TYPE_LIMIT,
          openType,
          reduceOnly: req.reduceOnly ? true : undefined,
        },
      );
      return { orderId: String(orderId) };
    }
    const orderId = await this.privateRequest<string | number>(
      'stop_loss',
      'POST',
      '/api/v1/private/planorder/place',
      {
        symbol,
        vol: req.contracts,
        leverage: this.leverageBySymbol.get(symbol),
        side: orderSideCode(req.side, req.reduceOnly),
        openType,
        triggerPrice: req.triggerPrice,
        triggerType: triggerTypeCode(req.triggerDirection),
        executeCycle: 2,
        orderType: ORDER_TYPE_MARKET,
        trend: 1,
      },
    );
    return { orderId: String(orderId) };
  }

  async listPositions(instruments?: string[]): Promise<ExchangePosition[]> {
    const symbol = instruments && instruments.length === 1 ? toVenueSymbol(instruments[0]) : undefined;
    const rows = await this.privateRequest<MexcPosition[]>(
      'list_positions',
      'GET',
      '/api/v1/private/position/open_positions',
      { symbol },
    );
    const positions = parsePositions(Array.isArray(rows) ? rows : []);
    if (!instruments || instruments.length === 0) return positions;
    const wanted = new Set(instruments);
    return positions.filter((p) => wanted.has(p.instrument));
  }

  async instrumentMetadata(instrument: string): Promise<InstrumentMetadata | undefined> {
    const cached = this.metadataCache.get(instrument);
    if (cached) return cached;
    const detail = await this.publicGet<MexcContractDetail | undefined>(
      'instrument_metadata',
      '/api/v1/contract/detail',
      { symbol: toVenueSymbol(instrument) },
    );
    const contractSize = Number(detail?.contractSize);
    if (!Number.isFinite(contractSize) || contractSize <= 0) return undefined;
    const minVol = Number(detail?.minVol);
    const meta: InstrumentMetadata = {
      contractSize,
      minContracts: Number.isFinite(minVol) && minVol > 0 ? minVol : 1,
    };
    this.metadataCache.set(instrument, meta);
    return meta;
  }

  private async publicGet<T>(
    operation: string,
    path: string,
    params: Record<string, string | number | undefined>,
  ): Promise<T> {
    try {
      const res = await this.client.get<MexcEnvelope<T>>(path, { params });
      return unwrap(res.data, operation);
    } catch (err) {
      throw toGatewayError(err, operation);
    }
  }

  private async privateRequest<T>(
    operation: string,
    method: 'GET' | 'POST',
    path: string,
    params: Record<string, string | number | boolean | undefined>,
  ): Promise<T> {
    if (!this.apiKey || !this.apiSecret) {
      throw new GatewayError(`${operation} requires MEXC_KEY/MEXC_SECRET`, operation);
    }
    const reqTime = String(Date.now());
    const defined = Object.fromEntries(Object.entries(params).filter(([, v]) => v !== undefined));
    try {
      if (method === 'GET') {
        const query: Record<string, string | number | undefined> = {};
        for (const [k, v] of Object.entries(defined)) query[k] = typeof v === 'boolean' ? String(v) : v;
        const paramString = canonicalQuery(query);
        const res = await this.client.get<MexcEnvelope<T>>(paramString ? `${path}?${paramString}` : path, {
          headers: this.authHeaders(reqTime, paramString),
        });
        return unwrap(res.data, operation);
      }
      const body = JSON.stringify(defined);
      const res = await this.client.post<MexcEnvelope<T>>(path, body, {
        headers: { ...this.authHeaders(reqTime, body), 'Content-Type': 'application/json' },
      });
      return unwrap(res.data, operation);
    } catch (err) {
      throw toGatewayError(err, operation);
    }
  }

  private authHeaders(reqTime: string, paramString: string): Record<string, string> {
    return {
      ApiKey: this.apiKey,
      'Request-Time': reqTime,
      Signature: signRequest(this.apiKey, this.apiSecret, reqTime, paramString),
    };
  }
}

function unwrap<T>(envelope: MexcEnvelope<T> | undefined, operation: string): T {
  if (!envelope || envelope.success !== true) {
    const code = envelope?.code ?? 'unknown';
    throw new GatewayError(`MEXC ${operation} error ${code}: ${envelope?.message ?? 'no response body'}`, operation);
  }
  return envelope.data;
}
