export type OrderSide = 'buy' | 'sell';
export type MarginMode = 'isolated' | 'cross';
export type ProtectiveKind = 'take_profit' | 'stop_loss';

/** Price movement that arms a conditional order. */
export type TriggerDirection = 'ascending' | 'descending';

export interface InstrumentMetadata {
  contractSize: number;
  minContracts: number;
}

export interface ExchangePosition {
  instrument: string;
  signedSize: number; // positive long, negative short (contracts)
  entryPrice?: number;
}

export interface MarketOrderRequest {
  instrument: string;
  side: OrderSide;
  contracts: number;
  reduceOnly?: boolean;
}

export interface ConditionalOrderRequest {
  instrument: string;
  kind: ProtectiveKind;
  side: OrderSide;
  contracts: number;
  triggerPrice: number;
  triggerDirection: TriggerDirection;
  reduceOnly: boolean;
}

export interface PlacedOrder {
  orderId: string;
  fillPrice?: number;
}

/**
 * Venue operations the execution engine depends on. Instruments are always
 * in unified `BASE/QUOTE:SETTLE` notation; adapters translate to venue ids.
 */
export interface ExchangeGateway {
  readonly venue: string;
  getLastPrice(instrument: string): Promise<number>;
  setLeverage(instrument: string, leverage: number): Promise<void>;
  setMarginMode(instrument: string, mode: MarginMode): Promise<void>;
  createMarketOrder(req: MarketOrderRequest): Promise<PlacedOrder>;
  createConditionalOrder(req: ConditionalOrderRequest): Promise<PlacedOrder>;
  listPositions(instruments?: string[]): Promise<ExchangePosition[]>;
  instrumentMetadata(instrument: string): Promise<InstrumentMetadata | undefined>;
}

export class GatewayError extends Error {
  readonly operation: string;

  constructor(message: string, operation: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'GatewayError';
    this.operation = operation;
  }
}

export function toGatewayError(err: unknown, operation: string): GatewayError {
  if (err instanceof GatewayError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new GatewayError(`${operation} failed: ${msg}`, operation, err);
}
