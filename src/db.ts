import pg from "pg";
import type { TradePatch, TradeRecord, TradeStore, ZonePatch, ZoneRecord, ZoneStore } from "./types.js";

export interface Queryable {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
}

export interface Database extends Queryable {
  end(): Promise<void>;
}

// Zone-less TIMESTAMP columns; left as text so the market time zone decides the instant.
export const TIMESTAMP_OID = 1114;

export function keepNaiveTimestampsAsText(): void {
  pg.types.setTypeParser(TIMESTAMP_OID, (value: string) => value);
}

/** Opens the pool for a process or a single run; the caller owns `end()`. */
export function openDatabase(databaseUrl: string): Database {
  keepNaiveTimestampsAsText();
  const isLocal = databaseUrl.includes("localhost");
  const url = !isLocal && !databaseUrl.includes("sslmode=")
    ? databaseUrl + (databaseUrl.includes("?") ? "&" : "?") + "sslmode=require"
    : databaseUrl;

  const pool = new pg.Pool({
    connectionString: url,
    ssl: isLocal ? false : { rejectUnauthorized: false },
  });

  return {
    query<R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, values?: unknown[]) {
      return pool.query<R>(text, values);
    },
    end: () => pool.end(),
  };
}

// ── Schema initialization ────────────────────────────────────────────────

export async function initDb(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS demand_zones (
      id              TEXT PRIMARY KEY,
      ticker          TEXT NOT NULL,
      zone_id         TEXT NOT NULL,
      proximal_line   DOUBLE PRECISION NOT NULL,
      distal_line     DOUBLE PRECISION NOT NULL,
      freshness       DOUBLE PRECISION NOT NULL DEFAULT 0,
      trade_score     DOUBLE PRECISION NOT NULL DEFAULT 0,
      zone_alert_sent BOOLEAN NOT NULL DEFAULT false,
      zone_entry_sent BOOLEAN NOT NULL DEFAULT false
    );

    CREATE TABLE IF NOT EXISTS trades (
      id               TEXT PRIMARY KEY,
      symbol           TEXT,
      entry_price      DOUBLE PRECISION,
      status           TEXT NOT NULL DEFAULT 'OPEN',
      alert_sent       BOOLEAN NOT NULL DEFAULT false,
      entry_alert_sent BOOLEAN NOT NULL DEFAULT false,
      last_alert_time  TIMESTAMPTZ
    );
  `);
}

type ColumnMap<P> = ReadonlyArray<readonly [keyof P, string]>;

// ── Zone functions ──────────────────────────────────────────────────────

export interface ZoneRow {
  id: string;
  ticker: string;
  zoneId: string;
  proximalLine: number;
  distalLine: number;
  freshness: number;
  tradeScore: number;
  zoneAlertSent: boolean | null;
  zoneEntrySent: boolean | null;
}

export function rowToZone(row: ZoneRow): ZoneRecord {
  return {
    ...row,
    zoneAlertSent: row.zoneAlertSent ?? false,
    zoneEntrySent: row.zoneEntrySent ?? false,
  };
}

const ZONE_COLUMNS = `
  id, ticker, zone_id AS "zoneId",
  proximal_line AS "proximalLine", distal_line AS "distalLine",
  freshness, trade_score AS "tradeScore",
  zone_alert_sent AS "zoneAlertSent", zone_entry_sent AS "zoneEntrySent"
`;

const ZONE_PATCH_COLUMNS: ColumnMap<ZonePatch> = [
  ["zoneAlertSent", "zone_alert_sent"],
  ["zoneEntrySent", "zone_entry_sent"],
  ["freshness", "freshness"],
  ["tradeScore", "trade_score"],
];

export async function findFreshZones(db: Queryable): Promise<ZoneRecord[]> {
  const { rows } = await db.query<ZoneRow>(
    `SELECT ${ZONE_COLUMNS} FROM demand_zones WHERE freshness > 0`,
  );
  return rows.map(rowToZone);
}

export async function updateZone(db: Queryable, id: string, patch: ZonePatch): Promise<void> {
  const update = buildUpdate("demand_zones", ZONE_PATCH_COLUMNS, id, patch);
  if (update) await db.query(update.text, update.values);
}

// ── Trade functions ─────────────────────────────────────────────────────

export interface TradeRow {
  id: string;
  symbol: string | null;
  entryPrice: number | null;
  status: string;
  alertSent: boolean | null;
  entryAlertSent: boolean | null;
  lastAlertTime: Date | string | null;
}

export function rowToTrade(row: TradeRow): TradeRecord {
  return {
    ...row,
    alertSent: row.alertSent ?? false,
    entryAlertSent: row.entryAlertSent ?? false,
  };
}

const TRADE_COLUMNS = `
  id, symbol, entry_price AS "entryPrice", status,
  alert_sent AS "alertSent", entry_alert_sent AS "entryAlertSent",
  last_alert_time AS "lastAlertTime"
`;

const TRADE_PATCH_COLUMNS: ColumnMap<TradePatch> = [
  ["alertSent", "alert_sent"],
  ["entryAlertSent", "entry_alert_sent"],
  ["lastAlertTime", "last_alert_time"],
];

export async function findOpenTrades(db: Queryable): Promise<TradeRecord[]> {
  const { rows } = await db.query<TradeRow>(
    `SELECT ${TRADE_COLUMNS} FROM trades WHERE status = 'OPEN'`,
  );
  return rows.map(rowToTrade);
}

export async function updateTrade(db: Queryable, id: string, patch: TradePatch): Promise<void> {
  const update = buildUpdate("trades", TRADE_PATCH_COLUMNS, id, patch);
  if (update) await db.query(update.text, update.values);
}

// ── Shared ──────────────────────────────────────────────────────────────

/** Sets only the patched columns; unknown keys never reach the SQL text. */
export function buildUpdate<P extends object>(
  table: string,
  columns: ColumnMap<P>,
  id: string,
  patch: P,
): { text: string; values: unknown[] } | null {
  const sets: string[] = [];
  const values: unknown[] = [];
  for (const [key, column] of columns) {
    const value = patch[key];
    if (value === undefined) continue;
    values.push(value);
    sets.push(`${column} = $${values.length}`);
  }
  if (sets.length === 0) return null;
  values.push(id);
  return { text: `UPDATE ${table} SET ${sets.join(", ")} WHERE id = $${values.length}`, values };
}

export function createStore(db: Queryable): ZoneStore & TradeStore {
  return {
    findFreshZones: () => findFreshZones(db),
    updateZone: (id, patch) => updateZone(db, id, patch),
    findOpenTrades: () => findOpenTrades(db),
    updateTrade: (id, patch) => updateTrade(db, id, patch),
  };
}
