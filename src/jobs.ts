import { assertConfigured, config } from "./config.js";
import { createStore, openDatabase } from "./db.js";
import type { Queryable } from "./db.js";
import { createTelegramSender } from "./services/telegram-sender.js";
import { runTradeAlerts } from "./services/trade-evaluator.js";
import { runZoneAlerts } from "./services/zone-evaluator.js";
import type { RunSummary } from "./types.js";

export const JOB_NAMES = ["zones", "trades"] as const;
export type JobName = (typeof JOB_NAMES)[number];

export function isJobName(value: string): value is JobName {
  return JOB_NAMES.some((name) => name === value);
}

export function runJob(name: JobName, db: Queryable): Promise<RunSummary | null> {
  const deps = {
    store: createStore(db),
    notifier: createTelegramSender(config.telegram),
    timeZone: config.market.timeZone,
    suffix: config.market.defaultSuffix,
  };
  return name === "zones" ? runZoneAlerts(deps) : runTradeAlerts(deps);
}

/** Validates settings, opens the pool for one run and always closes it. */
export async function runOnce(name: JobName): Promise<RunSummary | null> {
  assertConfigured();
  const db = openDatabase(config.databaseUrl);
  try {
    return await runJob(name, db);
  } finally {
    await db.end();
  }
}
