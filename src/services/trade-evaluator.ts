import { describeError } from "../errors.js";
import { timestamp } from "../log.js";
import { isAtOrAfter, isMarketOpen, parseStoredTimestamp, TRADE_WINDOW } from "../market-hours.js";
import type { Notifier, PriceSnapshot, RunSummary, TradePatch, TradeRecord, TradeStore } from "../types.js";
import { bold, escapeMarkdown, reportFailure } from "./notifier.js";
import { fetchDayLowsBatch, normalizeSymbol, uniqueSymbols, yahooQuoteSource } from "./price-fetcher.js";
import type { QuoteSource } from "./price-fetcher.js";

export const TRADE_APPROACH_PCT = 0.02;
export const COOLDOWN_MINUTES = 30;
export const END_OF_DAY = "15:30";

export type TradeDecision =
  | { kind: "approaching" | "entry"; message: string; patch: TradePatch }
  | { kind: "reset"; patch: TradePatch }
  | { kind: "cooldown" }
  | { kind: "none" };

export interface ValidTrade extends TradeRecord {
  symbol: string;
  entryPrice: number;
}

export function isValidTrade(trade: TradeRecord): trade is ValidTrade {
  return Boolean(trade.id) && Boolean(trade.symbol) &&
    typeof trade.entryPrice === "number" && Number.isFinite(trade.entryPrice);
}

export function isInCooldown(trade: TradeRecord, now: Date, timeZone: string): boolean {
  if (!trade.lastAlertTime) return false;
  const last = parseStoredTimestamp(trade.lastAlertTime, timeZone);
  return now.getTime() - last.getTime() < COOLDOWN_MINUTES * 60 * 1000;
}

/**
 * First matching branch wins: a trade moves through approaching, then
 * entry, and is re-armed for the next session if entry never came.
 */
export function evaluateTrade(trade: ValidTrade, dayLow: number, now: Date, timeZone: string): TradeDecision {
  if (isInCooldown(trade, now, timeZone)) return { kind: "cooldown" };

  const { symbol, entryPrice } = trade;
  const prices = `Entry: ₹${entryPrice.toFixed(2)}\nDay Low: ₹${dayLow.toFixed(2)}`;
  const distance = Math.abs(entryPrice - dayLow) / entryPrice;

  if (!trade.alertSent && distance > 0 && distance <= TRADE_APPROACH_PCT) {
    return {
      kind: "approaching",
      message: `📶 ${bold(symbol)} approaching entry\n${prices}`,
      patch: { alertSent: true, lastAlertTime: now },
    };
  }

  if (!trade.entryAlertSent && dayLow <= entryPrice) {
    return {
      kind: "entry",
      message: `🎯 ${bold(symbol)} entry hit!\n${prices}`,
      patch: { entryAlertSent: true, lastAlertTime: now },
    };
  }

  if (trade.alertSent && !trade.entryAlertSent && isAtOrAfter(now, END_OF_DAY, timeZone)) {
    return { kind: "reset", patch: { alertSent: false, lastAlertTime: now } };
  }

  return { kind: "none" };
}

export interface TradeJobDeps {
  store: TradeStore;
  notifier: Notifier;
  timeZone: string;
  suffix?: string;
  quotes?: QuoteSource;
  now?: () => Date;
}

export async function checkTrades(deps: TradeJobDeps): Promise<RunSummary> {
  const summary: RunSummary = { marketOpen: false, records: 0, notifications: 0, skipped: 0, failed: 0 };
  const now = deps.now?.() ?? new Date();

  if (!isMarketOpen(now, TRADE_WINDOW, deps.timeZone)) {
    console.log(`[${timestamp()}] Outside market hours (${TRADE_WINDOW.open}-${TRADE_WINDOW.close}), skipping trades.`);
    return summary;
  }
  summary.marketOpen = true;

  const trades = await deps.store.findOpenTrades();
  summary.records = trades.length;
  if (trades.length === 0) {
    console.log(`[${timestamp()}] No open trades.`);
    return summary;
  }

  const symbols = uniqueSymbols(
    trades.flatMap((t) => (t.symbol ? [t.symbol] : [])),
    deps.suffix
  );
  console.log(`[${timestamp()}] Checking ${trades.length} trade(s) across ${symbols.length} symbol(s): ${symbols.join(", ")}`);

  let prices: PriceSnapshot = new Map();
  try {
    prices = await fetchDayLowsBatch(symbols, deps.quotes ?? yahooQuoteSource);
  } catch (err) {
    const msg = describeError(err);
    console.error(`[${timestamp()}] Failed to fetch prices:`, msg);
    await reportFailure(deps.notifier, `⚠️ Price fetch failed for open trades: ${escapeMarkdown(msg)}`);
  }

  for (const trade of trades) {
    if (!isValidTrade(trade)) {
      console.warn(`  Skipping trade ${trade.id || "(no id)"}: missing symbol, id or numeric entry price`);
      summary.skipped++;
      continue;
    }

    const dayLow = prices.get(normalizeSymbol(trade.symbol, deps.suffix));
    if (dayLow == null) {
      console.log(`  Skipping ${trade.symbol}: no price data`);
      summary.skipped++;
      continue;
    }

    try {
      const decision = evaluateTrade(trade, dayLow, now, deps.timeZone);
      switch (decision.kind) {
        case "cooldown":
          console.log(`  ${trade.symbol}: in cooldown, skipping`);
          summary.skipped++;
          break;
        case "approaching":
        case "entry":
          await deps.notifier.send(decision.message);
          await deps.store.updateTrade(trade.id, decision.patch);
          summary.notifications++;
          console.log(`  [ALERT] ${trade.symbol} ${decision.kind} at ₹${dayLow.toFixed(2)}`);
          break;
        case "reset":
          await deps.store.updateTrade(trade.id, decision.patch);
          console.log(`  ${trade.symbol}: end of day, approach alert re-armed`);
          break;
        case "none":
          break;
      }
    } catch (err) {
      summary.failed++;
      const msg = describeError(err);
      console.error(`  Error processing trade ${trade.symbol}:`, msg);
      await reportFailure(deps.notifier, `⚠️ Error processing trade ${bold(trade.symbol)}: ${escapeMarkdown(msg)}`);
    }
  }

  return summary;
}

export async function runTradeAlerts(deps: TradeJobDeps): Promise<RunSummary | null> {
  try {
    return await checkTrades(deps);
  } catch (err) {
    const msg = describeError(err);
    console.error(`[${timestamp()}] Trade alerts failed:`, msg);
    await reportFailure(deps.notifier, `⚠️ Error in trade alerts: ${escapeMarkdown(msg)}`);
    return null;
  }
}
