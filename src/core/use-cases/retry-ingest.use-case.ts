import { setTimeout as delay } from "node:timers/promises";
import type { DateScope } from "../domain/entities/date-scope.entity.js";
import type { RunSummary } from "../domain/entities/run.entity.js";
import { errorMessage } from "../domain/errors.js";
import { describeScope } from "../domain/services/date-scope.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { INotificationService } from "../domain/services/notification.service.js";
import type { ICheckpointRepository } from "../domain/repositories/checkpoint.repository.js";
import type { IRunHistoryRepository } from "../domain/repositories/run-history.repository.js";
import type { IngestionPassUseCase } from "./ingestion-pass.use-case.js";

export interface RetryIngestOptions {
  maxAttempts: number;
  sleepMs: number;
  sleep?: (ms: number) => Promise<void>;
  runHistory?: IRunHistoryRepository;
  notifier?: INotificationService;
}

export interface RetryIngestRequest {
  runId: string;
  scope: DateScope;
}

/**
 * Drives ingestion passes until every store seen during the run is
 * checkpointed or the attempt budget runs out. Exhaustion is reported, not
 * thrown. Range runs delete their checkpoint record when they finish;
 * single-date runs keep it so a restarted process resumes.
 */
export class RetryIngestUseCase {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly pass: IngestionPassUseCase,
    private readonly checkpointRepo: ICheckpointRepository,
    private readonly logger: ILogger,
    private readonly options: RetryIngestOptions,
  ) {
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async execute(request: RetryIngestRequest): Promise<RunSummary> {
    const { runId, scope } = request;
    const { maxAttempts, sleepMs } = this.options;
    const startedAt = new Date().toISOString();
    const label = describeScope(scope);

    try {
      const checkpoints = await this.checkpointRepo.load();
      this.logger.log({
        level: "info",
        event: "run.start",
        message: `Starting ingest for ${label}; already processed: ${JSON.stringify([...checkpoints].sort())}`,
        runId,
      });

      const universe = new Set<string>();
      let attempts = 0;
      let complete = false;

      while (attempts < maxAttempts) {
        attempts++;
        this.logger.log({
          level: "info",
          event: "attempt.start",
          message: `===== Attempt ${attempts}/${maxAttempts} for ${label} =====`,
          runId,
          attempt: attempts,
        });

        let passSucceeded = false;
        try {
          const result = await this.pass.execute({
            runId,
            attempt: attempts,
            checkpoints,
          });
          for (const entity of result.seen) universe.add(entity);
          passSucceeded = true;
        } catch (e) {
          this.logger.log({
            level: "error",
            event: "pass.failed",
            message: `Pass ${attempts} failed: ${errorMessage(e)}`,
            runId,
            attempt: attempts,
            error: errorMessage(e),
          });
        }

        const remaining = difference(universe, checkpoints);
        const done = universe.size - remaining.length;
        this.logger.log({
          level: "info",
          event: "attempt.progress",
          message: `Progress: ${done}/${universe.size} stores processed`,
          runId,
          attempt: attempts,
          details: { remaining },
        });

        if (passSucceeded && remaining.length === 0) {
          complete = true;
          break;
        }

        if (remaining.length > 0) {
          this.logger.log({
            level: "info",
            event: "attempt.remaining",
            message: `Remaining stores (missing files or not ready yet): ${JSON.stringify(remaining)}`,
            runId,
            attempt: attempts,
          });
        }

        if (attempts < maxAttempts) {
          this.logger.log({
            level: "info",
            event: "attempt.sleep",
            message: `Not all stores ready. Sleeping ${Math.round(sleepMs / 1000)} seconds before next attempt...`,
            runId,
            attempt: attempts,
          });
          await this.sleep(sleepMs);
        }
      }

      const remaining = difference(universe, checkpoints);
      const summary: RunSummary = {
        runId,
        scope,
        status: complete ? "complete" : "exhausted",
        attempts,
        universe: [...universe].sort(),
        processed: [...checkpoints].filter((e) => universe.has(e)).sort(),
        remaining,
        startedAt,
        finishedAt: new Date().toISOString(),
      };

      if (summary.status === "complete") {
        this.logger.log({
          level: "info",
          event: "run.complete",
          message: `All stores processed for ${label}`,
          runId,
        });
      } else {
        this.logger.log({
          level: "warn",
          event: "run.exhausted",
          message: `Finished retries with unprocessed stores for ${label}: ${JSON.stringify(remaining)}`,
          runId,
          details: { remaining, attempts },
        });
        await this.notify(summary);
      }

      await this.record(summary);
      return summary;
    } finally {
      if (scope.kind === "range") await this.clearCheckpoints(runId);
    }
  }

  private async notify(summary: RunSummary): Promise<void> {
    if (!this.options.notifier) return;
    try {
      await this.options.notifier.notifyExhausted(summary);
    } catch (e) {
      this.logger.log({
        level: "warn",
        event: "notify.failed",
        message: `Failed to send exhaustion notice: ${errorMessage(e)}`,
        runId: summary.runId,
        error: errorMessage(e),
      });
    }
  }

  private async record(summary: RunSummary): Promise<void> {
    if (!this.options.runHistory) return;
    try {
      await this.options.runHistory.appendRun(summary);
    } catch (e) {
      this.logger.log({
        level: "warn",
        event: "history.failed",
        message: `Failed to record run history: ${errorMessage(e)}`,
        runId: summary.runId,
        error: errorMessage(e),
      });
    }
  }

  private async clearCheckpoints(runId: string): Promise<void> {
    try {
      await this.checkpointRepo.clear();
      this.logger.log({
        level: "info",
        event: "checkpoint.cleared",
        message: "Cleared processed stores record",
        runId,
      });
    } catch (e) {
      this.logger.log({
        level: "error",
        event: "checkpoint.clear_failed",
        message: `Failed to clear processed stores record: ${errorMessage(e)}`,
        runId,
        error: errorMessage(e),
      });
    }
  }
}

function difference(universe: ReadonlySet<string>, done: ReadonlySet<string>): string[] {
  return [...universe].filter((e) => !done.has(e)).sort();
}
