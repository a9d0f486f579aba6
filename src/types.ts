export interface ZoneRecord {
  id: string;
  ticker: string;
  zoneId: string;
  proximalLine: number;
  distalLine: number;
  freshness: number;
  tradeScore: number;
  zoneAlertSent: boolean;
  zoneEntrySent: boolean;
}

export type ZonePatch = Partial<
  Pick<ZoneRecord, "zoneAlertSent" | "zoneEntrySent" | "freshness" | "tradeScore">
>;

export interface TradeRecord {
  id: string;
  symbol: string | null;
  entryPrice: number | null;
  status: string;
  alertSent: boolean;
  entryAlertSent: boolean;
  /** May come back without zone information from older rows. */
  lastAlertTime: Date | string | null;
}

export interface TradePatch {
  alertSent?: boolean;
  entryAlertSent?: boolean;
  lastAlertTime?: Date;
}

export interface ZoneStore {
  findFreshZones(): Promise<ZoneRecord[]>;
  updateZone(id: string, patch: ZonePatch): Promise<void>;
}

export interface TradeStore {
  findOpenTrades(): Promise<TradeRecord[]>;
  updateTrade(id: string, patch: TradePatch): Promise<void>;
}

/** Canonical symbol -> session day low. Rebuilt every run. */
export type PriceSnapshot = Map<string, number>;

export interface Notifier {
  send(message: string): Promise<void>;
}

export interface MarketWindow {
  open: string;
  close: string;
}

export interface RunSummary {
  marketOpen: boolean;
  records: number;
  notifications: number;
  skipped: number;
  failed: number;
}
