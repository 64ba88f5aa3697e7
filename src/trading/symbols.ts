const QUOTES = ['USDT', 'USDC', 'USD'];
const UNIFIED = /^([A-Z0-9]+)\/([A-Z0-9]+):([A-Z0-9]+)$/;
const PERP_SUFFIX = /(\.P|[-_.]?PERP|-SWAP)$/;

/**
 * Maps a chart ticker as received ("MEXC:ETHUSDT", "ETHUSDT.P", "ETH_USDT",
 * "ETH/USDT") to unified quote-margined contract notation ("ETH/USDT:USDT").
 * Returns undefined when the input has no recognizable base/quote split.
 */
export function mapInstrument(raw: string): string | undefined {
  let s = raw.trim().toUpperCase();
  if (!s) return undefined;
  if (UNIFIED.test(s)) return s;

  const prefix = s.indexOf(':');
  if (prefix >= 0) s = s.slice(prefix + 1);
  s = s.replace(PERP_SUFFIX, '');

  const parts = s.split(/[/_-]/).filter(Boolean);
  if (parts.length === 2) {
    return unified(parts[0], parts[1]);
  }
  if (parts.length !== 1) return undefined;

  for (const quote of QUOTES) {
    if (s.endsWith(quote) && s.length > quote.length) {
      return unified(s.slice(0, -quote.length), quote);
    }
  }
  return undefined;
}

function unified(base: string, quote: string): string | undefined {
  if (!/^[A-Z0-9]+$/.test(base) || !/^[A-Z0-9]+$/.test(quote)) return undefined;
  return `${base}/${quote}:${quote}`;
}

export function splitInstrument(instrument: string): { base: string; quote: string } {
  const m = UNIFIED.exec(instrument);
  if (!m) throw new Error(`Not a unified contract symbol: ${instrument}`);
  return { base: m[1], quote: m[2] };
}
