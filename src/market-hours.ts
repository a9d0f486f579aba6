import type { MarketWindow } from "./types.js";

export const ZONE_WINDOW: MarketWindow = { open: "09:15", close: "15:30" };
// Runs a little past the close so the 15:30 end-of-day reset has a tick to land on.
export const TRADE_WINDOW: MarketWindow = { open: "09:15", close: "15:45" };

export interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** 0 = Sunday */
  weekday: number;
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const formatters = new Map<string, Intl.DateTimeFormat>();

function formatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      weekday: "short",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function wallClock(date: Date, timeZone: string): WallClock {
  const parts = formatter(timeZone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return {
    year: Number(get("year")),
    month: Number(get("month")),
    day: Number(get("day")),
    hour: Number(get("hour")),
    minute: Number(get("minute")),
    second: Number(get("second")),
    weekday: WEEKDAYS.indexOf(get("weekday")),
  };
}

function secondsOfDay(clock: Pick<WallClock, "hour" | "minute" | "second">): number {
  return clock.hour * 3600 + clock.minute * 60 + clock.second;
}

function parseHhMm(value: string): number {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  if (!match) throw new Error(`Invalid time of day "${value}", expected HH:MM`);
  return secondsOfDay({ hour: Number(match[1]), minute: Number(match[2]), second: 0 });
}

export function isMarketOpen(now: Date, window: MarketWindow, timeZone: string): boolean {
  const clock = wallClock(now, timeZone);
  if (clock.weekday < 1 || clock.weekday > 5) return false;
  const secs = secondsOfDay(clock);
  return secs >= parseHhMm(window.open) && secs <= parseHhMm(window.close);
}

export function isAtOrAfter(now: Date, timeOfDay: string, timeZone: string): boolean {
  return secondsOfDay(wallClock(now, timeZone)) >= parseHhMm(timeOfDay);
}

function zoneOffsetMs(date: Date, timeZone: string): number {
  const c = wallClock(date, timeZone);
  const asUtc = Date.UTC(c.year, c.month - 1, c.day, c.hour, c.minute, c.second);
  return asUtc - (date.getTime() - date.getUTCMilliseconds());
}

const ZONED = /\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}(:?\d{2})?)$/i;
const NAIVE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?$/;

/**
 * Turns a stored alert timestamp into an instant. Strings without an offset
 * are read as wall-clock time in `timeZone`.
 */
export function parseStoredTimestamp(value: Date | string, timeZone: string): Date {
  if (value instanceof Date) return value;

  const text = value.trim();
  if (ZONED.test(text)) {
    const iso = text.replace(" ", "T").replace(/([+-]\d{2})$/, "$1:00");
    const parsed = new Date(iso);
    if (Number.isNaN(parsed.getTime())) throw new Error(`Unrecognised timestamp "${value}"`);
    return parsed;
  }

  const match = NAIVE.exec(text);
  if (!match) throw new Error(`Unrecognised timestamp "${value}"`);
  const [, y, mo, d, h, mi, s, frac] = match;
  const ms = frac ? Number(frac.padEnd(3, "0").slice(0, 3)) : 0;
  const guess = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s ?? 0), ms);

  const offset = zoneOffsetMs(new Date(guess), timeZone);
  const corrected = zoneOffsetMs(new Date(guess - offset), timeZone);
  return new Date(guess - corrected);
}
