const SEPARATORS = /[/\-_:]/;
const KNOWN_QUOTES = ["BUSD", "USDT", "USDC", "USD"];

export const DEFAULT_QUOTE = "USD";

/**
 * Canonical form is uppercase base followed by the quote currency, so
 * "btc/usd", "BTC-USDT", "btcusd" and "BTC" all become "BTCUSD".
 */
export function normalizeSymbol(raw: string, quote = DEFAULT_QUOTE): string {
  const canonicalQuote = quote.trim().toUpperCase();
  const upper = raw.trim().toUpperCase();
  if (!upper) {
    return "";
  }

  const base = stripQuote(upper.split(SEPARATORS, 1)[0], canonicalQuote);
  if (!base) {
    return "";
  }
  return `${base}${canonicalQuote}`;
}

/** Base asset of any accepted spelling: "btc/usdt" and "BTCUSD" give "BTC". */
export function baseOf(symbol: string, quote = DEFAULT_QUOTE): string {
  const canonicalQuote = quote.trim().toUpperCase();
  const canonical = normalizeSymbol(symbol, canonicalQuote);
  return canonical.slice(0, canonical.length - canonicalQuote.length);
}

/** The configured quote is checked first so canonical input stays unchanged. */
function stripQuote(value: string, canonicalQuote: string): string {
  for (const candidate of [canonicalQuote, ...KNOWN_QUOTES]) {
    if (value.endsWith(candidate) && value.length > candidate.length) {
      return value.slice(0, -candidate.length);
    }
  }
  return value;
}
