#!/usr/bin/env node
/**
 * POS report ingest – CLI
 * Commands: ingest | backfill | seed | schedule | init-db | check-source | check-db | history
 */

import { program, type Command } from "commander";
import { config as loadEnv } from "dotenv";
import { ConfigService, resolveConfigPath } from "./infrastructure/services/config.service.js";
import type { Config } from "./core/domain/entities/config.entity.js";
import type { DateScope } from "./core/domain/entities/date-scope.entity.js";
import { ConfigError, errorMessage } from "./core/domain/errors.js";
import {
  dateRangeScope,
  describeScope,
  singleDateScope,
  yesterdayUtc,
} from "./core/domain/services/date-scope.service.js";
import {
  formatZodError,
  RunOptionsSchema,
  type RunOptions,
} from "./adapters/validation.js";
import { createSource, runIngest, runSeed } from "./infrastructure/services/ingest-runner.service.js";
import { CronSchedulerService } from "./infrastructure/services/cron-scheduler.service.js";
import { createPool, PgReportRepository } from "./infrastructure/database/pg-report.repository.js";
import { openStateDb, stateDbPath } from "./infrastructure/database/sqlite.utils.js";
import { SqliteRunHistoryRepository } from "./infrastructure/database/sqlite-run-history.repository.js";

loadEnv();

// Supervisor stop signal: exit without waiting for the current pass
process.on("SIGTERM", () => process.exit(143));

// ─── Shared helpers ───────────────────────────────────────────────────────────

function configPath(): string {
  return program.opts<{ config: string }>().config;
}

function parseRunOptions(raw: unknown): RunOptions {
  const result = RunOptionsSchema.safeParse(raw);
  if (!result.success) throw new ConfigError(formatZodError(result.error));
  return result.data;
}

function applyOverrides(config: Config, opts: RunOptions): Config {
  return {
    ...config,
    source: opts.local
      ? { driver: "local", root: opts.local, excludeEntities: config.source.excludeEntities }
      : config.source,
    retry: {
      maxAttempts: opts.maxAttempts ?? config.retry.maxAttempts,
      sleepSeconds: opts.sleepSeconds ?? config.retry.sleepSeconds,
    },
  };
}

async function runAndReport(config: Config, scope: DateScope): Promise<void> {
  const summary = await runIngest(config, scope);
  console.log("\nIngest Summary");
  console.log("--------------");
  console.log(`Run:       ${summary.runId}`);
  console.log(`Scope:     ${describeScope(summary.scope)}`);
  console.log(`Status:    ${summary.status}`);
  console.log(`Attempts:  ${summary.attempts}`);
  console.log(`Processed: ${summary.processed.length}/${summary.universe.length}`);
  if (summary.remaining.length > 0) {
    console.log(`Remaining: ${summary.remaining.join(", ")}`);
  }
}

/** Config errors and crashes exit 1; an exhausted run is not a failure. */
function action<A extends unknown[]>(label: string, fn: (...args: A) => Promise<void>) {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (e) {
      console.error(`${label} failed:`, errorMessage(e));
      process.exit(1);
    }
  };
}

function withRunOptions(cmd: Command): Command {
  return cmd
    .option("--max-attempts <n>", "Max passes before giving up")
    .option("--sleep-seconds <n>", "Seconds to wait between passes")
    .option("--local <dir>", "Read store folders from a local directory instead of the configured source");
}

program
  .name("pos-report-ingest")
  .description("Harvest daily POS exports per store and load interval reports into Postgres")
  .option("-c, --config <path>", "Config file path", resolveConfigPath());

// ─── ingest ───────────────────────────────────────────────────────────────────

withRunOptions(
  program
    .command("ingest")
    .description("Ingest one business date (default: yesterday, UTC), retrying until every store is in")
    .option("-d, --date <yyyyMMdd>", "Business date to ingest"),
).action(
  action("Ingest", async (raw: unknown) => {
    const opts = parseRunOptions(raw);
    const config = applyOverrides(ConfigService.load(configPath()), opts);
    await runAndReport(config, singleDateScope(opts.date ?? yesterdayUtc()));
  }),
);

// ─── backfill ─────────────────────────────────────────────────────────────────

withRunOptions(
  program
    .command("backfill")
    .description("Ingest the first complete date folder per store within a date range")
    .requiredOption("--from <yyyyMMdd>", "First date of the range (inclusive)")
    .requiredOption("--to <yyyyMMdd>", "Last date of the range (inclusive)"),
).action(
  action("Backfill", async (raw: unknown) => {
    const opts = parseRunOptions(raw);
    if (!opts.from || !opts.to) throw new ConfigError("--from and --to are required");
    const config = applyOverrides(ConfigService.load(configPath()), opts);
    await runAndReport(config, dateRangeScope(opts.from, opts.to));
  }),
);

// ─── seed ─────────────────────────────────────────────────────────────────────

function seedScope(opts: RunOptions): DateScope | undefined {
  if (opts.date) return singleDateScope(opts.date);
  if (opts.from || opts.to) {
    if (!opts.from || !opts.to) throw new ConfigError("--from and --to must be given together");
    return dateRangeScope(opts.from, opts.to);
  }
  return undefined;
}

program
  .command("seed")
  .description("Load every store folder holding both exports (all dates in scope), without checkpoints or retries")
  .option("-d, --date <yyyyMMdd>", "Only folders for this date")
  .option("--from <yyyyMMdd>", "First folder date to load (inclusive)")
  .option("--to <yyyyMMdd>", "Last folder date to load (inclusive)")
  .option("--local <dir>", "Read store folders from a local directory instead of the configured source")
  .action(
    action("Seed", async (raw: unknown) => {
      const opts = parseRunOptions(raw);
      const config = applyOverrides(ConfigService.load(configPath()), opts);
      const scope = seedScope(opts);
      const result = await runSeed(config, scope);
      console.log("\nSeed Summary");
      console.log("------------");
      console.log(`Scope:   ${scope ? describeScope(scope) : "all folders"}`);
      console.log(`Loaded:  ${result.loaded.length}`);
      console.log(`Skipped: ${result.skipped.length}`);
      console.log(`Failed:  ${result.failed.length}`);
      for (const f of result.failed) {
        console.log(` - ${f.entity}${f.folder ? `/${f.folder}` : ""}: ${f.error}`);
      }
    }),
  );

// ─── schedule ─────────────────────────────────────────────────────────────────

program
  .command("schedule")
  .description("Run the yesterday ingest on the configured cron schedule")
  .action(
    action("Schedule", async () => {
      const config = ConfigService.load(configPath());
      const scheduler = new CronSchedulerService(config.schedule, () =>
        runAndReport(config, singleDateScope(yesterdayUtc())),
      );
      scheduler.start();
      process.on("SIGINT", () => {
        scheduler.stop();
        process.exit(0);
      });
    }),
  );

// ─── init-db ──────────────────────────────────────────────────────────────────

program
  .command("init-db")
  .description("Create the report tables in Postgres")
  .action(
    action("init-db", async () => {
      const config = ConfigService.load(configPath());
      const repo = new PgReportRepository(createPool(config.database.url));
      try {
        await repo.initSchema();
        console.log("Schema created.");
      } finally {
        await repo.close();
      }
    }),
  );

// ─── check-source / check-db ──────────────────────────────────────────────────

program
  .command("check-source")
  .description("Connect to the configured source and list the store folders")
  .action(
    action("check-source", async () => {
      const config = ConfigService.load(configPath());
      const source = createSource(config.source);
      console.log(`Connecting to ${source.describe()}...`);
      const session = await source.connect();
      try {
        const entities = await session.listEntities();
        console.log(`Connected. ${entities.length} top-level folder(s):`);
        for (const name of entities.sort()) console.log(` - ${name}`);
      } finally {
        await session.close();
      }
    }),
  );

program
  .command("check-db")
  .description("Run SELECT 1 against the configured database")
  .action(
    action("check-db", async () => {
      const config = ConfigService.load(configPath());
      const repo = new PgReportRepository(createPool(config.database.url));
      try {
        console.log(`DB connection OK, SELECT 1 returned: ${JSON.stringify(await repo.ping())}`);
      } finally {
        await repo.close();
      }
    }),
  );

// ─── history ──────────────────────────────────────────────────────────────────

program
  .command("history")
  .description("Show recent runs")
  .option("--limit <n>", "Number of runs to show", "20")
  .action(
    action("history", async (opts: { limit: string }) => {
      const config = ConfigService.load(configPath());
      const db = openStateDb(stateDbPath(config.state.dir));
      try {
        const limit = Number.parseInt(opts.limit, 10);
        const runs = await new SqliteRunHistoryRepository(db).getRecentRuns(
          Number.isNaN(limit) ? 20 : limit,
        );
        if (runs.length === 0) console.log("No runs recorded yet.");
        for (const r of runs) {
          const tail = r.remaining.length ? ` remaining=[${r.remaining.join(", ")}]` : "";
          console.log(
            `${r.finishedAt}  ${r.runId}  ${r.scope}  ${r.status}  attempts=${r.attempts}  processed=${r.processed.length}${tail}`,
          );
        }
      } finally {
        db.close();
      }
    }),
  );

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
