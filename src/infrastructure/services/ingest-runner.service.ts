import { format } from "date-fns";
import type Database from "better-sqlite3";
import { errorMessage } from "../../core/domain/errors.js";
import type { ILogger } from "../../core/domain/services/logger.service.js";
import type { Config } from "../../core/domain/entities/config.entity.js";
import type { DateScope } from "../../core/domain/entities/date-scope.entity.js";
import type { RunSummary, SeedResult } from "../../core/domain/entities/run.entity.js";
import type { ICheckpointRepository } from "../../core/domain/repositories/checkpoint.repository.js";
import {
  checkpointKeyForScope,
  createDateScopeResolver,
} from "../../core/domain/services/date-scope.service.js";
import type { IRemoteSource } from "../../core/domain/services/remote-source.service.js";
import { IngestionPassUseCase } from "../../core/use-cases/ingestion-pass.use-case.js";
import { RetryIngestUseCase } from "../../core/use-cases/retry-ingest.use-case.js";
import { SeedReportsUseCase } from "../../core/use-cases/seed-reports.use-case.js";
import { JsonCheckpointRepository } from "../database/json-checkpoint.repository.js";
import { createPool, PgReportRepository } from "../database/pg-report.repository.js";
import { SqliteCheckpointRepository } from "../database/sqlite-checkpoint.repository.js";
import { SqliteRunHistoryRepository } from "../database/sqlite-run-history.repository.js";
import { openStateDb, stateDbPath } from "../database/sqlite.utils.js";
import { AwsS3SourceService } from "./aws-s3-source.service.js";
import { CsvReportTransformService } from "./csv-report-transform.service.js";
import { JsonLogger } from "./json-logger.service.js";
import { LocalSourceService } from "./local-source.service.js";
import { NodemailerNotificationService } from "./nodemailer-notification.service.js";
import { SftpSourceService } from "./sftp-source.service.js";

export function createSource(config: Config["source"]): IRemoteSource {
  switch (config.driver) {
    case "sftp":
      return new SftpSourceService(config);
    case "s3":
      return new AwsS3SourceService(config);
    case "local":
      return new LocalSourceService(config.root);
  }
}

export function createCheckpointRepository(
  config: Config["state"],
  scope: DateScope,
  db: Database.Database,
): ICheckpointRepository {
  const key = checkpointKeyForScope(scope);
  return config.checkpointDriver === "sqlite"
    ? new SqliteCheckpointRepository(db, key)
    : new JsonCheckpointRepository(config.dir, key);
}

export function createSink(config: Config["database"], logger: ILogger): PgReportRepository {
  return new PgReportRepository(
    createPool(config.url, (e) =>
      logger.log({
        level: "warn",
        event: "db.idle_error",
        message: `Postgres idle client error: ${errorMessage(e)}`,
        error: errorMessage(e),
      }),
    ),
  );
}

export function newRunId(now: Date = new Date(), prefix = "RUN"): string {
  return `${prefix}-${format(now, "yyyyMMdd-HHmmss")}`;
}

/**
 * Wires one retry-controlled run from configuration and releases the
 * database pool, state database and log file when it ends.
 */
export async function runIngest(config: Config, scope: DateScope): Promise<RunSummary> {
  const runId = newRunId();
  const logger = new JsonLogger(config.logging.dir, config.logging.runLog);
  const stateDb = openStateDb(stateDbPath(config.state.dir));
  const sink = createSink(config.database, logger);
  logger.init(runId);

  try {
    const checkpointRepo = createCheckpointRepository(config.state, scope, stateDb);
    const pass = new IngestionPassUseCase(
      createSource(config.source),
      createDateScopeResolver(scope),
      new CsvReportTransformService(config.transform.intervalMinutes),
      sink,
      checkpointRepo,
      logger,
      { excludeEntities: config.source.excludeEntities },
    );
    const controller = new RetryIngestUseCase(pass, checkpointRepo, logger, {
      maxAttempts: config.retry.maxAttempts,
      sleepMs: config.retry.sleepSeconds * 1000,
      runHistory: new SqliteRunHistoryRepository(stateDb),
      notifier: config.notifications.email
        ? NodemailerNotificationService.fromConfig(config.notifications.email)
        : undefined,
    });
    return await controller.execute({ runId, scope });
  } finally {
    await sink.close();
    stateDb.close();
    await logger.close();
  }
}

/** One bulk load of every complete folder in scope; no checkpoint, no retry. */
export async function runSeed(config: Config, scope?: DateScope): Promise<SeedResult> {
  const runId = newRunId(new Date(), "SEED");
  const logger = new JsonLogger(config.logging.dir, config.logging.runLog);
  const sink = createSink(config.database, logger);
  logger.init(runId);

  try {
    const seed = new SeedReportsUseCase(
      createSource(config.source),
      new CsvReportTransformService(config.transform.intervalMinutes),
      sink,
      logger,
      { excludeEntities: config.source.excludeEntities },
    );
    return await seed.execute({ runId, scope });
  } finally {
    await sink.close();
    await logger.close();
  }
}
