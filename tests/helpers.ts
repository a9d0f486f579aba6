import type { DayLowQuote, QuoteSource } from "../src/services/price-fetcher.js";
import type {
  Notifier, TradePatch, TradeRecord, TradeStore, ZonePatch, ZoneRecord, ZoneStore,
} from "../src/types.js";

/** 2026-10-19 is a Monday; IST is UTC+05:30. */
export function ist(time: string, date = "2026-10-19"): Date {
  const full = time.length === 5 ? `${time}:00` : time;
  return new Date(`${date}T${full}+05:30`);
}

export function makeZone(overrides: Partial<ZoneRecord> = {}): ZoneRecord {
  return {
    id: "zone-1",
    ticker: "TCS",
    zoneId: "Z1",
    proximalLine: 100,
    distalLine: 95,
    freshness: 1,
    tradeScore: 7,
    zoneAlertSent: false,
    zoneEntrySent: false,
    ...overrides,
  };
}

export function makeTrade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    id: "trade-1",
    symbol: "RELIANCE",
    entryPrice: 100,
    status: "OPEN",
    alertSent: false,
    entryAlertSent: false,
    lastAlertTime: null,
    ...overrides,
  };
}

export class MemoryZoneStore implements ZoneStore {
  updates: { id: string; patch: ZonePatch }[] = [];

  constructor(public zones: ZoneRecord[]) {}

  async findFreshZones(): Promise<ZoneRecord[]> {
    return this.zones.filter((z) => z.freshness > 0).map((z) => ({ ...z }));
  }

  async updateZone(id: string, patch: ZonePatch): Promise<void> {
    this.updates.push({ id, patch });
    const zone = this.zones.find((z) => z.id === id);
    if (zone) Object.assign(zone, patch);
  }
}

export class MemoryTradeStore implements TradeStore {
  updates: { id: string; patch: TradePatch }[] = [];
  failOn = new Set<string>();

  constructor(public trades: TradeRecord[]) {}

  async findOpenTrades(): Promise<TradeRecord[]> {
    return this.trades.filter((t) => t.status === "OPEN").map((t) => ({ ...t }));
  }

  async updateTrade(id: string, patch: TradePatch): Promise<void> {
    if (this.failOn.has(id)) throw new Error(`write rejected for ${id}`);
    this.updates.push({ id, patch });
    const trade = this.trades.find((t) => t.id === id);
    if (trade) Object.assign(trade, patch);
  }
}

export class RecordingNotifier implements Notifier {
  messages: string[] = [];
  failWith: Error | null = null;

  async send(message: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.messages.push(message);
  }
}

export class FakeQuotes implements QuoteSource {
  calls: string[][] = [];
  failing = new Set<string>();
  batchError: Error | null = null;

  constructor(private lows: Record<string, number>) {}

  async quote(symbols: string[]): Promise<DayLowQuote[]> {
    this.calls.push(symbols);
    if (this.batchError) throw this.batchError;
    const found: DayLowQuote[] = [];
    for (const symbol of symbols) {
      if (this.failing.has(symbol)) throw new Error(`lookup failed for ${symbol}`);
      if (symbol in this.lows) found.push({ symbol, dayLow: this.lows[symbol] });
    }
    return found;
  }
}
