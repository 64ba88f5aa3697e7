import type { InstrumentMetadata } from '../exchanges/types';

// Used when the venue does not report contract metadata for an instrument.
export const FALLBACK_CONTRACT_SIZES: Readonly<Record<string, number>> = {
  'BTC/USDT:USDT': 0.0001,
  'ETH/USDT:USDT': 0.01,
  'SOL/USDT:USDT': 0.1,
  'XRP/USDT:USDT': 1,
  'DOGE/USDT:USDT': 100,
};

export const DEFAULT_CONTRACT_SIZE = 1;

// Absorbs float noise such as 0.9999999999 contracts from an exact division.
const FLOOR_EPSILON = 1e-9;

export function resolveContractSize(instrument: string, metadata?: InstrumentMetadata): number {
  if (metadata && Number.isFinite(metadata.contractSize) && metadata.contractSize > 0) {
    return metadata.contractSize;
  }
  return FALLBACK_CONTRACT_SIZES[instrument] ?? DEFAULT_CONTRACT_SIZE;
}

/**
 * Whole contracts for a USD notional. Never returns less than one contract
 * (or the venue minimum when that is larger).
 */
export function computeContracts(
  notionalUsd: number,
  lastPrice: number,
  contractSize: number,
  minContracts = 1,
): number {
  if (!(notionalUsd > 0)) throw new RangeError(`notional must be positive, got ${notionalUsd}`);
  if (!(lastPrice > 0)) throw new RangeError(`price must be positive, got ${lastPrice}`);
  if (!(contractSize > 0)) throw new RangeError(`contract size must be positive, got ${contractSize}`);
  const raw = notionalUsd / (lastPrice * contractSize);
  const floor = Math.max(1, Number.isFinite(minContracts) ? Math.ceil(minContracts) : 1);
  return Math.max(Math.floor(raw + FLOOR_EPSILON), floor);
}

export function contractsFor(
  instrument: string,
  notionalUsd: number,
  lastPrice: number,
  metadata?: InstrumentMetadata,
): number {
  return computeContracts(
    notionalUsd,
    lastPrice,
    resolveContractSize(instrument, metadata),
    metadata?.minContracts ?? 1,
  );
}
