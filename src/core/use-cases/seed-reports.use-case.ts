import type { DateScope } from "../domain/entities/date-scope.entity.js";
import type { SeedResult } from "../domain/entities/run.entity.js";
import { errorMessage } from "../domain/errors.js";
import { matchArtifacts } from "../domain/services/artifact-matcher.service.js";
import { describeScope, folderInScope } from "../domain/services/date-scope.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import {
  withFileStreams,
  type IRemoteSession,
  type IRemoteSource,
} from "../domain/services/remote-source.service.js";
import type { IReportSink } from "../domain/services/report-sink.service.js";
import type { ITransformPipeline } from "../domain/services/transform.service.js";

export interface SeedReportsRequest {
  runId: string;
  /** Without a scope every subfolder of every store is loaded. */
  scope?: DateScope;
}

export interface SeedReportsOptions {
  excludeEntities?: readonly string[];
}

/**
 * Bulk load: every (store, date folder) pair that holds both exports goes
 * through the transform and into the sink. One pass, no checkpoint and no
 * retry; incomplete or unreadable folders are logged and skipped.
 */
export class SeedReportsUseCase {
  private readonly excluded: ReadonlySet<string>;

  constructor(
    private readonly source: IRemoteSource,
    private readonly transformer: ITransformPipeline,
    private readonly sink: IReportSink,
    private readonly logger: ILogger,
    options: SeedReportsOptions = {},
  ) {
    this.excluded = new Set(options.excludeEntities ?? []);
  }

  async execute(request: SeedReportsRequest): Promise<SeedResult> {
    const { runId, scope } = request;
    const result: SeedResult = { loaded: [], skipped: [], failed: [] };

    this.logger.log({
      level: "info",
      event: "seed.start",
      message: `Seeding from ${this.source.describe()} (${scope ? describeScope(scope) : "all folders"})`,
      runId,
    });

    const session = await this.source.connect();
    try {
      const entities = (await session.listEntities())
        .filter((e) => !this.excluded.has(e))
        .sort();

      for (const entity of entities) {
        const listing = await session.listSubfolders(entity);
        if (listing.kind === "not-found") {
          result.skipped.push({ entity, reason: "no-date-folder" });
          continue;
        }
        if (listing.kind === "error") {
          const error = errorMessage(listing.cause);
          this.logger.log({
            level: "warn",
            event: "seed.list_failed",
            message: `Could not list store folder ${entity}: ${error}`,
            runId,
            entity,
            error,
          });
          result.failed.push({ entity, error });
          continue;
        }

        const folders = listing.value
          .filter((name) => (scope ? folderInScope(name, scope) : true))
          .sort();
        for (const folder of folders) {
          await this.seedFolder(session, entity, folder, runId, result);
        }
      }
    } finally {
      await session.close();
    }

    this.logger.log({
      level: "info",
      event: "seed.finished",
      message: `Loaded ${result.loaded.length} report(s), skipped ${result.skipped.length}, failed ${result.failed.length}`,
      runId,
      details: {
        loaded: result.loaded.length,
        skipped: result.skipped.length,
        failed: result.failed.length,
      },
    });
    return result;
  }

  private async seedFolder(
    session: IRemoteSession,
    entity: string,
    folder: string,
    runId: string,
    result: SeedResult,
  ): Promise<void> {
    const ctx = { runId, entity, folder };

    const listing = await session.listFiles(entity, folder);
    if (listing.kind === "not-found") {
      result.skipped.push({ entity, folder, reason: "no-date-folder" });
      return;
    }
    if (listing.kind === "error") {
      const error = errorMessage(listing.cause);
      this.logger.log({
        level: "warn",
        event: "seed.folder_failed",
        message: `Could not list ${entity}/${folder}: ${error}`,
        error,
        ...ctx,
      });
      result.failed.push({ entity, folder, error });
      return;
    }

    const match = matchArtifacts([...listing.value].sort());
    if (match.kind === "missing") {
      this.logger.log({
        level: "warn",
        event: "seed.missing_artifacts",
        message: `Missing ${match.missing.join(" and ")} export in ${entity}/${folder}, skipping`,
        ...ctx,
      });
      result.skipped.push({ entity, folder, reason: "missing-artifacts" });
      return;
    }

    try {
      const { itemFile, modifierFile } = match.pair;
      const transformed = await withFileStreams(
        session,
        { entity, folder },
        [itemFile, modifierFile],
        (items, modifiers) => this.transformer.transform(items, modifiers),
      );
      if (transformed.kind === "empty") {
        this.logger.log({
          level: "info",
          event: "seed.empty_report",
          message: `No usable data in ${entity}/${folder} (${transformed.reason}), skipping`,
          ...ctx,
        });
        result.skipped.push({ entity, folder, reason: "empty-report" });
        return;
      }

      const { report } = transformed;
      const rows = await this.sink.upsert(report.date, report.location, report);
      result.loaded.push({
        entity,
        folder,
        reportDate: report.date,
        location: report.location,
        rows,
      });
      this.logger.log({
        level: "info",
        event: "seed.loaded",
        message: `Saved ${rows} row(s) for '${report.location}' on ${report.date} from ${entity}/${folder}`,
        ...ctx,
      });
    } catch (e) {
      const error = errorMessage(e);
      this.logger.log({
        level: "error",
        event: "seed.folder_failed",
        message: `Error loading ${entity}/${folder}: ${error}`,
        error,
        ...ctx,
      });
      result.failed.push({ entity, folder, error });
    }
  }
}
