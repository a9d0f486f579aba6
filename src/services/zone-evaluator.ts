import { describeError } from "../errors.js";
import { timestamp } from "../log.js";
import { isMarketOpen, ZONE_WINDOW } from "../market-hours.js";
import type { Notifier, PriceSnapshot, RunSummary, ZonePatch, ZoneRecord, ZoneStore } from "../types.js";
import { bold, escapeMarkdown, reportFailure } from "./notifier.js";
import { fetchDayLows, normalizeSymbol, uniqueSymbols, yahooQuoteSource } from "./price-fetcher.js";
import type { QuoteSource } from "./price-fetcher.js";

export const ZONE_APPROACH_PCT = 0.03;

export type ZoneAlertKind = "approaching" | "entry" | "breached";

export interface ZoneAlert {
  kind: ZoneAlertKind;
  message: string;
  patch: ZonePatch;
}

const inr = (n: number) => `₹${n.toFixed(2)}`;

/**
 * Every rule is checked on its own, in order, so one pass can both
 * announce an entry and invalidate the zone.
 */
export function evaluateZone(zone: ZoneRecord, dayLow: number): ZoneAlert[] {
  const { ticker, zoneId, proximalLine: proximal, distalLine: distal } = zone;
  const header = (icon: string, text: string) => `${icon} ${bold(ticker)} ${text}\nZone ID: \`${zoneId}\``;
  const alerts: ZoneAlert[] = [];

  const distance = Math.abs(proximal - dayLow) / proximal;
  if (!zone.zoneAlertSent && distance > 0 && distance <= ZONE_APPROACH_PCT) {
    alerts.push({
      kind: "approaching",
      message: `${header("📶", "approaching zone entry")}\nProximal: ${inr(proximal)}\nDay Low: ${inr(dayLow)}`,
      patch: { zoneAlertSent: true },
    });
  }

  if (!zone.zoneEntrySent && dayLow <= proximal) {
    alerts.push({
      kind: "entry",
      message: `${header("🎯", "zone entry hit!")}\nProximal: ${inr(proximal)}\nDay Low: ${inr(dayLow)}`,
      patch: { zoneEntrySent: true },
    });
  }

  if (dayLow < distal) {
    alerts.push({
      kind: "breached",
      message:
        `${header("🛑", "zone invalidated, distal breached")}\nDistal: ${inr(distal)}\nDay Low: ${inr(dayLow)}` +
        `\n⚠️ Zone marked stale`,
      patch: { freshness: 0, tradeScore: 0 },
    });
  }

  return alerts;
}

export interface ZoneJobDeps {
  store: ZoneStore;
  notifier: Notifier;
  timeZone: string;
  suffix?: string;
  quotes?: QuoteSource;
  now?: () => Date;
}

export async function checkZones(deps: ZoneJobDeps): Promise<RunSummary> {
  const summary: RunSummary = { marketOpen: false, records: 0, notifications: 0, skipped: 0, failed: 0 };
  const now = deps.now?.() ?? new Date();

  if (!isMarketOpen(now, ZONE_WINDOW, deps.timeZone)) {
    console.log(`[${timestamp()}] Outside market hours (${ZONE_WINDOW.open}-${ZONE_WINDOW.close}), skipping zones.`);
    return summary;
  }
  summary.marketOpen = true;

  const zones = await deps.store.findFreshZones();
  summary.records = zones.length;
  if (zones.length === 0) {
    console.log(`[${timestamp()}] No fresh zones.`);
    return summary;
  }

  const symbols = uniqueSymbols(zones.map((z) => z.ticker), deps.suffix);
  console.log(`[${timestamp()}] Checking ${zones.length} zone(s) across ${symbols.length} symbol(s): ${symbols.join(", ")}`);
  const prices: PriceSnapshot = await fetchDayLows(symbols, deps.quotes ?? yahooQuoteSource);

  for (const zone of zones) {
    const dayLow = prices.get(normalizeSymbol(zone.ticker, deps.suffix));
    if (dayLow == null) {
      console.log(`  Skipping ${zone.ticker} (${zone.zoneId}): no price data`);
      summary.skipped++;
      continue;
    }

    try {
      for (const alert of evaluateZone(zone, dayLow)) {
        await deps.notifier.send(alert.message);
        await deps.store.updateZone(zone.id, alert.patch);
        summary.notifications++;
        console.log(`  [ALERT] ${zone.ticker} (${zone.zoneId}) ${alert.kind} at ₹${dayLow.toFixed(2)}`);
      }
    } catch (err) {
      summary.failed++;
      console.error(`  Error processing zone ${zone.zoneId}:`, describeError(err));
    }
  }

  return summary;
}

/** Entry for a scheduled run: nothing escapes, failures are logged and reported. */
export async function runZoneAlerts(deps: ZoneJobDeps): Promise<RunSummary | null> {
  try {
    return await checkZones(deps);
  } catch (err) {
    const msg = describeError(err);
    console.error(`[${timestamp()}] Zone alerts failed:`, msg);
    await reportFailure(deps.notifier, `⚠️ Error in zone alerts: ${escapeMarkdown(msg)}`);
    return null;
  }
}
