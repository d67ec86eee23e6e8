import type { DateFolder } from "../domain/entities/date-scope.entity.js";
import type {
  EntityFailure,
  NotReadyReason,
  PassResult,
} from "../domain/entities/run.entity.js";
import { errorMessage } from "../domain/errors.js";
import { matchArtifacts } from "../domain/services/artifact-matcher.service.js";
import {
  describeScope,
  type DateScopeResolver,
} from "../domain/services/date-scope.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import {
  withFileStreams,
  type IRemoteSession,
  type IRemoteSource,
} from "../domain/services/remote-source.service.js";
import type { IReportSink } from "../domain/services/report-sink.service.js";
import type { ITransformPipeline } from "../domain/services/transform.service.js";
import type { ICheckpointRepository } from "../domain/repositories/checkpoint.repository.js";

export interface IngestionPassRequest {
  runId: string;
  attempt: number;
  /** Mutated in place: successful entities are added and saved immediately. */
  checkpoints: Set<string>;
}

export interface IngestionPassOptions {
  /** Known-bad entity ids dropped from the root listing. */
  excludeEntities?: readonly string[];
}

type EntityOutcome =
  | { kind: "processed" }
  | { kind: "not-ready"; reason: NotReadyReason }
  | { kind: "failed"; failures: EntityFailure[] };

type FolderOutcome =
  | { kind: "processed" }
  | { kind: "not-ready"; reason: NotReadyReason }
  | { kind: "failed"; error: string };

/**
 * One scan over every entity at the remote root. Entities are handled one at
 * a time in sorted order; a failure in one entity never stops the pass.
 * Only connection-level errors escape.
 */
export class IngestionPassUseCase {
  private readonly excluded: ReadonlySet<string>;

  constructor(
    private readonly source: IRemoteSource,
    private readonly resolver: DateScopeResolver,
    private readonly transformer: ITransformPipeline,
    private readonly sink: IReportSink,
    private readonly checkpointRepo: ICheckpointRepository,
    private readonly logger: ILogger,
    options: IngestionPassOptions = {},
  ) {
    this.excluded = new Set(options.excludeEntities ?? []);
  }

  async execute(request: IngestionPassRequest): Promise<PassResult> {
    const { runId, attempt } = request;
    const result: PassResult = {
      seen: [],
      processed: [],
      notReady: [],
      failed: [],
    };

    this.logger.log({
      level: "info",
      event: "pass.start",
      message: `Connecting to ${this.source.describe()} for ${describeScope(this.resolver.scope)}`,
      runId,
      attempt,
    });

    const session = await this.source.connect();
    try {
      const listed = await session.listEntities();
      const entities = listed.filter((e) => !this.excluded.has(e)).sort();
      result.seen = entities;

      this.logger.log({
        level: "info",
        event: "pass.entities",
        message: `Found ${entities.length} store folder(s)`,
        runId,
        attempt,
        details: {
          entities,
          excluded: listed.filter((e) => this.excluded.has(e)),
        },
      });

      for (const entity of entities) {
        if (request.checkpoints.has(entity)) {
          this.logger.log({
            level: "info",
            event: "entity.already_processed",
            message: `Store ${entity} already processed earlier, skipping`,
            runId,
            attempt,
            entity,
          });
          continue;
        }

        const outcome = await this.processEntity(session, entity, request);
        switch (outcome.kind) {
          case "processed":
            result.processed.push(entity);
            break;
          case "not-ready":
            result.notReady.push({ entity, reason: outcome.reason });
            break;
          case "failed":
            result.failed.push(...outcome.failures);
            break;
        }
      }
    } finally {
      await this.closeSession(session, runId, attempt);
    }

    return result;
  }

  private async processEntity(
    session: IRemoteSession,
    entity: string,
    request: IngestionPassRequest,
  ): Promise<EntityOutcome> {
    const { runId, attempt } = request;
    const candidates = await this.resolver.resolve(session, entity);

    if (candidates.kind === "not-found") {
      this.logger.log({
        level: "info",
        event: "entity.no_folder",
        message: `Store folder ${entity} not found, skipping`,
        runId,
        attempt,
        entity,
      });
      return { kind: "not-ready", reason: "no-date-folder" };
    }
    if (candidates.kind === "error") {
      const error = errorMessage(candidates.cause);
      this.logger.log({
        level: "warn",
        event: "entity.list_failed",
        message: `Could not list store folder ${entity}: ${error}`,
        runId,
        attempt,
        entity,
        error,
      });
      return { kind: "failed", failures: [{ entity, error }] };
    }
    if (candidates.value.length === 0) {
      this.logger.log({
        level: "info",
        event: "entity.no_folder",
        message: `No date folders in range for store ${entity}`,
        runId,
        attempt,
        entity,
      });
      return { kind: "not-ready", reason: "no-date-folder" };
    }

    const failures: EntityFailure[] = [];
    let lastReason: NotReadyReason = "no-date-folder";

    for (const candidate of candidates.value) {
      const outcome = await this.processFolder(session, candidate, request);
      if (outcome.kind === "processed") {
        return { kind: "processed" };
      }
      if (outcome.kind === "failed") {
        failures.push({ entity, folder: candidate.folder, error: outcome.error });
      } else {
        lastReason = outcome.reason;
      }
    }

    if (failures.length > 0) return { kind: "failed", failures };

    this.logger.log({
      level: "info",
      event: "entity.not_ready",
      message: `Store ${entity} not ready yet (${lastReason})`,
      runId,
      attempt,
      entity,
    });
    return { kind: "not-ready", reason: lastReason };
  }

  private async processFolder(
    session: IRemoteSession,
    candidate: DateFolder,
    request: IngestionPassRequest,
  ): Promise<FolderOutcome> {
    const { runId, attempt, checkpoints } = request;
    const { entity, folder } = candidate;
    const ctx = { runId, attempt, entity, folder };

    const listing = await session.listFiles(entity, folder);
    if (listing.kind === "not-found") {
      this.logger.log({
        level: "info",
        event: "folder.missing",
        message: `No data folder for ${entity} on ${folder}, skipping`,
        ...ctx,
      });
      return { kind: "not-ready", reason: "no-date-folder" };
    }
    if (listing.kind === "error") {
      const error = errorMessage(listing.cause);
      this.logger.log({
        level: "warn",
        event: "folder.list_failed",
        message: `Could not list ${entity}/${folder}: ${error}`,
        error,
        ...ctx,
      });
      return { kind: "failed", error };
    }

    try {
      const files = [...listing.value].sort();
      const match = matchArtifacts(files);
      if (match.kind === "missing") {
        this.logger.log({
          level: "info",
          event: "folder.missing_artifacts",
          message: `Missing ${match.missing.join(" and ")} export for ${entity} on ${folder}, skipping`,
          details: { files },
          ...ctx,
        });
        return { kind: "not-ready", reason: "missing-artifacts" };
      }

      const { itemFile, modifierFile } = match.pair;
      this.logger.log({
        level: "info",
        event: "folder.matched",
        message: `Using ${itemFile} and ${modifierFile} for ${entity} on ${folder}`,
        ...ctx,
      });

      const result = await withFileStreams(
        session,
        candidate,
        [itemFile, modifierFile],
        (items, modifiers) => this.transformer.transform(items, modifiers),
      );
      if (result.kind === "empty") {
        this.logger.log({
          level: "info",
          event: "folder.empty_report",
          message: `No usable data for ${entity} on ${folder} (${result.reason}), skipping`,
          ...ctx,
        });
        return { kind: "not-ready", reason: "empty-report" };
      }

      const { report } = result;
      const rows = await this.sink.upsert(report.date, report.location, report);

      checkpoints.add(entity);
      await this.checkpointRepo.save(checkpoints);

      this.logger.log({
        level: "info",
        event: "entity.processed",
        message: `Saved ${rows} row(s) for store ${entity} / location '${report.location}' on ${report.date}`,
        details: { rows, reportDate: report.date, location: report.location },
        ...ctx,
      });
      return { kind: "processed" };
    } catch (e) {
      const error = errorMessage(e);
      this.logger.log({
        level: "error",
        event: "entity.failed",
        message: `Error processing store ${entity} on ${folder}: ${error}`,
        error,
        ...ctx,
      });
      return { kind: "failed", error };
    }
  }

  private async closeSession(
    session: IRemoteSession,
    runId: string,
    attempt: number,
  ): Promise<void> {
    try {
      await session.close();
      this.logger.log({
        level: "info",
        event: "pass.closed",
        message: "Remote connection closed",
        runId,
        attempt,
      });
    } catch (e) {
      this.logger.log({
        level: "warn",
        event: "pass.close_failed",
        message: `Failed to close remote connection: ${errorMessage(e)}`,
        runId,
        attempt,
        error: errorMessage(e),
      });
    }
  }
}
