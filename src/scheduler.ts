import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { assertConfigured, config } from "./config.js";
import { openDatabase } from "./db.js";
import type { Queryable } from "./db.js";
import { describeError } from "./errors.js";
import { JOB_NAMES, runJob } from "./jobs.js";
import type { JobName } from "./jobs.js";
import { timestamp } from "./log.js";

/**
 * Wraps a job so a tick that fires while the previous run of the same job
 * is still going is skipped.
 */
export function createTick(name: JobName, run: (name: JobName) => Promise<unknown>): () => Promise<void> {
  let running = false;
  return async () => {
    if (running) {
      console.warn(`[${timestamp()}] ${name}: previous run still in progress, skipping tick`);
      return;
    }
    running = true;
    try {
      await run(name);
    } catch (err) {
      console.error(`[${timestamp()}] ${name}: run failed:`, describeError(err));
    } finally {
      running = false;
    }
  };
}

/**
 * Runs the ticks one after the other. A cycle that fires while the previous
 * one is still going is skipped whole, so two jobs never send at once.
 */
export function createCycle(ticks: Array<() => Promise<void>>): () => Promise<void> {
  let running = false;
  return async () => {
    if (running) {
      console.warn(`[${timestamp()}] previous cycle still in progress, skipping`);
      return;
    }
    running = true;
    try {
      for (const tick of ticks) await tick();
    } finally {
      running = false;
    }
  };
}

export function startScheduler(db: Queryable): ScheduledTask {
  console.log("Zone & Trade Alert Scheduler");
  console.log("============================");
  console.log(`Schedule: ${config.checkIntervalCron} (${config.market.timeZone})`);
  console.log(`Jobs:     ${JOB_NAMES.join(", ")}`);
  console.log();

  const ticks = JOB_NAMES.map((name) => createTick(name, (n) => runJob(n, db)));
  const runAll = createCycle(ticks);

  void runAll();

  const task = cron.schedule(config.checkIntervalCron, () => {
    void runAll();
  }, { timezone: config.market.timeZone });

  console.log("Scheduler running.\n");
  return task;
}

// Allow standalone execution: npx tsx src/scheduler.ts
const isDirectRun = process.argv[1]?.includes("scheduler");
if (isDirectRun) {
  assertConfigured();
  const db = openDatabase(config.databaseUrl);
  const task = startScheduler(db);

  const shutdown = () => {
    console.log(`[${timestamp()}] Shutting down scheduler.`);
    task.stop();
    db.end().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Failed to close database pool:", describeError(err));
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
