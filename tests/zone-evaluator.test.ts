import { describe, it, expect } from "vitest";
import { checkZones, evaluateZone, runZoneAlerts } from "../src/services/zone-evaluator.js";
import { FakeQuotes, ist, makeZone, MemoryZoneStore, RecordingNotifier } from "./helpers.js";

const TZ = "Asia/Kolkata";

describe("evaluateZone", () => {
  it("fires approaching when the low is exactly 3% under proximal", () => {
    const alerts = evaluateZone(makeZone({ zoneEntrySent: true }), 97);
    expect(alerts).toHaveLength(1);
    expect(alerts[0].kind).toBe("approaching");
    expect(alerts[0].patch).toEqual({ zoneAlertSent: true });
    expect(alerts[0].message).toBe("📶 *TCS* approaching zone entry\nZone ID: `Z1`\nProximal: ₹100.00\nDay Low: ₹97.00");
  });

  it("fires approaching from above the proximal line", () => {
    const alerts = evaluateZone(makeZone(), 102);
    expect(alerts.map((a) => a.kind)).toEqual(["approaching"]);
  });

  it("does not re-fire approaching once the flag is set", () => {
    const alerts = evaluateZone(makeZone({ zoneAlertSent: true, zoneEntrySent: true }), 97);
    expect(alerts).toHaveLength(0);
  });

  it("fires approaching and entry together when the low is inside the band", () => {
    const alerts = evaluateZone(makeZone(), 98);
    expect(alerts.map((a) => a.kind)).toEqual(["approaching", "entry"]);
    expect(alerts[1].patch).toEqual({ zoneEntrySent: true });
  });

  it("treats a low exactly on proximal as entry only", () => {
    const alerts = evaluateZone(makeZone(), 100);
    expect(alerts.map((a) => a.kind)).toEqual(["entry"]);
  });

  it("breaches below distal regardless of flags", () => {
    const zone = makeZone({ proximalLine: 101, distalLine: 99.5, zoneAlertSent: true, zoneEntrySent: true });
    const alerts = evaluateZone(zone, 99);
    expect(alerts).toHaveLength(1);
    expect(alerts[0].kind).toBe("breached");
    expect(alerts[0].patch).toEqual({ freshness: 0, tradeScore: 0 });
    expect(alerts[0].message).toBe(
      "🛑 *TCS* zone invalidated, distal breached\nZone ID: `Z1`\nDistal: ₹99.50\nDay Low: ₹99.00\n⚠️ Zone marked stale"
    );
  });

  it("can enter and breach in the same pass", () => {
    const alerts = evaluateZone(makeZone({ proximalLine: 100, distalLine: 99.5 }), 99);
    expect(alerts.map((a) => a.kind)).toEqual(["approaching", "entry", "breached"]);
  });

  it("stays quiet when the low is far from the zone", () => {
    expect(evaluateZone(makeZone(), 110)).toHaveLength(0);
  });

  it("keeps underscores in a bold ticker literal", () => {
    const [alert] = evaluateZone(makeZone({ ticker: "M_M", zoneEntrySent: true }), 97);
    expect(alert.message.startsWith("📶 *M_M* approaching")).toBe(true);
  });
});

describe("checkZones", () => {
  it("does nothing outside market hours", async () => {
    const store = new MemoryZoneStore([makeZone()]);
    const quotes = new FakeQuotes({ "TCS.NS": 97 });
    const notifier = new RecordingNotifier();

    const summary = await checkZones({ store, notifier, quotes, timeZone: TZ, now: () => ist("09:00") });

    expect(summary.marketOpen).toBe(false);
    expect(quotes.calls).toHaveLength(0);
    expect(notifier.messages).toHaveLength(0);
  });

  it("does nothing on a weekend", async () => {
    const quotes = new FakeQuotes({ "TCS.NS": 97 });
    const summary = await checkZones({
      store: new MemoryZoneStore([makeZone()]),
      notifier: new RecordingNotifier(),
      quotes,
      timeZone: TZ,
      now: () => ist("11:00", "2026-10-24"),
    });
    expect(summary.marketOpen).toBe(false);
    expect(quotes.calls).toHaveLength(0);
  });

  it("fetches each unique symbol once and updates flags by id", async () => {
    const store = new MemoryZoneStore([
      makeZone({ id: "a", zoneId: "Z1", zoneEntrySent: true }),
      makeZone({ id: "b", ticker: "TCS.NS", zoneId: "Z2", proximalLine: 120, distalLine: 110 }),
      makeZone({ id: "c", ticker: "INFY", zoneId: "Z3", proximalLine: 101, distalLine: 99.5 }),
    ]);
    const quotes = new FakeQuotes({ "TCS.NS": 97, "INFY.NS": 99 });
    const notifier = new RecordingNotifier();

    const summary = await checkZones({ store, notifier, quotes, timeZone: TZ, now: () => ist("11:00") });

    expect(quotes.calls).toEqual([["TCS.NS"], ["INFY.NS"]]);
    // a: approaching; b: entry + breach (97 < 110); c: approaching + entry + breach
    expect(summary).toEqual({ marketOpen: true, records: 3, notifications: 6, skipped: 0, failed: 0 });
    expect(store.updates).toEqual([
      { id: "a", patch: { zoneAlertSent: true } },
      { id: "b", patch: { zoneEntrySent: true } },
      { id: "b", patch: { freshness: 0, tradeScore: 0 } },
      { id: "c", patch: { zoneAlertSent: true } },
      { id: "c", patch: { zoneEntrySent: true } },
      { id: "c", patch: { freshness: 0, tradeScore: 0 } },
    ]);
  });

  it("sends nothing new when rerun with unchanged prices", async () => {
    const store = new MemoryZoneStore([
      makeZone({ id: "a" }),
      makeZone({ id: "b", ticker: "INFY", proximalLine: 101, distalLine: 99.5 }),
    ]);
    const quotes = new FakeQuotes({ "TCS.NS": 98, "INFY.NS": 99 });
    const notifier = new RecordingNotifier();
    const deps = { store, notifier, quotes, timeZone: TZ, now: () => ist("11:00") };

    await checkZones(deps);
    const sentFirst = notifier.messages.length;
    const second = await checkZones(deps);

    expect(sentFirst).toBe(5);
    expect(second.records).toBe(1);
    expect(second.notifications).toBe(0);
    expect(notifier.messages).toHaveLength(5);
  });

  it("skips zones whose symbol lookup failed and keeps going", async () => {
    const store = new MemoryZoneStore([
      makeZone({ id: "a", ticker: "BAD" }),
      makeZone({ id: "b", zoneEntrySent: true }),
    ]);
    const quotes = new FakeQuotes({ "TCS.NS": 97 });
    quotes.failing.add("BAD.NS");
    const notifier = new RecordingNotifier();

    const summary = await checkZones({ store, notifier, quotes, timeZone: TZ, now: () => ist("11:00") });

    expect(summary.skipped).toBe(1);
    expect(summary.notifications).toBe(1);
    expect(store.updates).toEqual([{ id: "b", patch: { zoneAlertSent: true } }]);
  });

  it("leaves the flag unset when the notification fails", async () => {
    const store = new MemoryZoneStore([makeZone({ zoneEntrySent: true })]);
    const notifier = new RecordingNotifier();
    notifier.failWith = new Error("telegram down");

    const summary = await checkZones({
      store, notifier, quotes: new FakeQuotes({ "TCS.NS": 97 }), timeZone: TZ, now: () => ist("11:00"),
    });

    expect(summary.failed).toBe(1);
    expect(store.updates).toHaveLength(0);
    expect(store.zones[0].zoneAlertSent).toBe(false);
  });
});

describe("runZoneAlerts", () => {
  it("reports an unexpected failure once and resolves", async () => {
    const notifier = new RecordingNotifier();
    const store = new MemoryZoneStore([]);
    store.findFreshZones = async () => {
      throw new Error("connection_refused");
    };

    const result = await runZoneAlerts({ store, notifier, timeZone: TZ, now: () => ist("11:00") });

    expect(result).toBeNull();
    expect(notifier.messages).toEqual(["⚠️ Error in zone alerts: connection\\_refused"]);
  });

  it("does not throw when the failure report cannot be sent either", async () => {
    const notifier = new RecordingNotifier();
    notifier.failWith = new Error("telegram down");
    const store = new MemoryZoneStore([]);
    store.findFreshZones = async () => {
      throw new Error("db down");
    };

    await expect(runZoneAlerts({ store, notifier, timeZone: TZ, now: () => ist("11:00") })).resolves.toBeNull();
  });
});
