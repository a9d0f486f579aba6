import YahooFinance from "yahoo-finance2";
import { describeError } from "../errors.js";
import type { PriceSnapshot } from "../types.js";

export interface DayLowQuote {
  symbol: string;
  dayLow?: number;
}

export interface QuoteSource {
  quote(symbols: string[]): Promise<DayLowQuote[]>;
}

const yf = new YahooFinance({
  queue: { concurrency: 1 },
});

export const yahooQuoteSource: QuoteSource = {
  async quote(symbols) {
    const quotes = await yf.quote(symbols);
    const quoteArray = Array.isArray(quotes) ? quotes : [quotes];
    return quoteArray.map((q) => ({ symbol: q.symbol, dayLow: q.regularMarketDayLow }));
  },
};

/** Appends the exchange suffix to bare tickers ("TCS" -> "TCS.NS"). */
export function normalizeSymbol(raw: string, suffix = ".NS"): string {
  return raw.includes(".") ? raw : raw + suffix;
}

export function uniqueSymbols(raws: Iterable<string>, suffix?: string): string[] {
  const set = new Set<string>();
  for (const raw of raws) set.add(normalizeSymbol(raw, suffix));
  return [...set];
}

function isUsableLow(value: number | undefined): value is number {
  return value != null && Number.isFinite(value);
}

/**
 * One lookup per symbol. A symbol that fails or has no low is left out of
 * the snapshot; the rest of the batch carries on.
 */
export async function fetchDayLows(symbols: string[], source: QuoteSource = yahooQuoteSource): Promise<PriceSnapshot> {
  const prices: PriceSnapshot = new Map();
  for (const symbol of symbols) {
    try {
      const [q] = await source.quote([symbol]);
      if (q && isUsableLow(q.dayLow)) {
        prices.set(symbol, q.dayLow);
        console.log(`  ${symbol}: day low ₹${q.dayLow.toFixed(2)}`);
      } else {
        console.warn(`  ${symbol}: no price data`);
      }
    } catch (err) {
      console.error(`  ${symbol}: price lookup failed:`, describeError(err));
    }
  }
  return prices;
}

/**
 * A single quote call for every symbol. Missing entries are left out; a
 * failure of the call itself is thrown to the caller.
 */
export async function fetchDayLowsBatch(symbols: string[], source: QuoteSource = yahooQuoteSource): Promise<PriceSnapshot> {
  const prices: PriceSnapshot = new Map();
  if (symbols.length === 0) return prices;

  const wanted = new Set(symbols);
  for (const q of await source.quote(symbols)) {
    if (wanted.has(q.symbol) && isUsableLow(q.dayLow)) {
      prices.set(q.symbol, q.dayLow);
    }
  }
  for (const symbol of symbols) {
    const low = prices.get(symbol);
    if (low != null) {
      console.log(`  ${symbol}: day low ₹${low.toFixed(2)}`);
    } else {
      console.warn(`  ${symbol}: no price data`);
    }
  }
  return prices;
}
