#!/usr/bin/env node
import { Command } from "commander";
import { config, ConfigError } from "./config.js";
import { findFreshZones, findOpenTrades, initDb, openDatabase } from "./db.js";
import type { Queryable } from "./db.js";
import { describeError } from "./errors.js";
import { isJobName, JOB_NAMES, runOnce } from "./jobs.js";
import type { JobName } from "./jobs.js";

async function withDatabase<T>(fn: (db: Queryable) => Promise<T>): Promise<T> {
  if (!config.databaseUrl) throw new ConfigError(["DATABASE_URL"]);
  const db = openDatabase(config.databaseUrl);
  try {
    return await fn(db);
  } finally {
    await db.end();
  }
}

function parseTarget(target: string): JobName {
  if (!isJobName(target)) {
    console.error(`Error: unknown target "${target}". Use one of: ${JOB_NAMES.join(", ")}`);
    process.exit(1);
  }
  return target;
}

const program = new Command();

program
  .name("zone-alerts")
  .description("Telegram alerts for demand zones and open trades");

program
  .command("init-db")
  .description("Create the demand_zones and trades tables if missing")
  .action(async () => {
    await withDatabase(initDb);
    console.log("Schema ready.");
  });

program
  .command("check <target>")
  .description(`Run one check now (${JOB_NAMES.join(" | ")})`)
  .action(async (target: string) => {
    const summary = await runOnce(parseTarget(target));
    if (!summary) {
      process.exitCode = 1;
      return;
    }
    if (!summary.marketOpen) return;
    console.log(
      `\nRecords: ${summary.records}  Sent: ${summary.notifications}  Skipped: ${summary.skipped}  Failed: ${summary.failed}`
    );
  });

program
  .command("list <target>")
  .description(`List tracked records (${JOB_NAMES.join(" | ")})`)
  .action(async (target: string) => {
    if (parseTarget(target) === "zones") {
      const zones = await withDatabase(findFreshZones);
      if (zones.length === 0) {
        console.log("No fresh zones.");
        return;
      }
      console.log(`\n${"Ticker".padEnd(14)} ${"Zone".padEnd(12)} ${"Proximal".padEnd(10)} ${"Distal".padEnd(10)} ${"Fresh".padEnd(6)} Alerts`);
      console.log("-".repeat(70));
      for (const z of zones) {
        const flags = [z.zoneAlertSent ? "approach" : "", z.zoneEntrySent ? "entry" : ""].filter(Boolean).join(",") || "-";
        console.log(
          `${z.ticker.padEnd(14)} ${z.zoneId.slice(0, 11).padEnd(12)} ${z.proximalLine.toFixed(2).padEnd(10)} ${z.distalLine.toFixed(2).padEnd(10)} ${String(z.freshness).padEnd(6)} ${flags}`
        );
      }
    } else {
      const trades = await withDatabase(findOpenTrades);
      if (trades.length === 0) {
        console.log("No open trades.");
        return;
      }
      console.log(`\n${"Symbol".padEnd(14)} ${"Entry".padEnd(10)} ${"Alerts".padEnd(16)} Last Alert`);
      console.log("-".repeat(60));
      for (const t of trades) {
        const entry = t.entryPrice != null ? t.entryPrice.toFixed(2) : "-";
        const flags = [t.alertSent ? "approach" : "", t.entryAlertSent ? "entry" : ""].filter(Boolean).join(",") || "-";
        const last = !t.lastAlertTime
          ? "Never"
          : typeof t.lastAlertTime === "string" ? t.lastAlertTime : t.lastAlertTime.toLocaleString();
        console.log(`${(t.symbol ?? "?").padEnd(14)} ${entry.padEnd(10)} ${flags.padEnd(16)} ${last}`);
      }
    }
    console.log();
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${describeError(err)}`);
  process.exit(1);
});
