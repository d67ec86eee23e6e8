import cron, { type ScheduledTask } from "node-cron";
import type { ScheduleConfig } from "../../core/domain/entities/config.entity.js";
import { errorMessage } from "../../core/domain/errors.js";

export interface ScheduleLogEntry {
  outcome: "executed" | "skipped" | "failed";
  level: "info" | "warn" | "error";
  message: string;
}

/**
 * Runs a job on a cron expression. A tick that fires while the previous run
 * is still going is skipped rather than queued.
 */
export class CronSchedulerService {
  private task: ScheduledTask | null = null;
  private running = false;

  constructor(
    private readonly schedule: ScheduleConfig,
    private readonly job: () => Promise<void>,
    private readonly onLog: (entry: ScheduleLogEntry) => void = defaultLog,
  ) {}

  start(): void {
    if (!cron.validate(this.schedule.cron)) {
      throw new Error(`Invalid cron expression "${this.schedule.cron}"`);
    }
    this.stop();
    this.task = cron.schedule(this.schedule.cron, () => this.tick(), {
      timezone: this.schedule.timezone,
    });
    this.onLog({
      outcome: "executed",
      level: "info",
      message: `Scheduled ingest "${this.schedule.cron}" (${this.schedule.timezone})`,
    });
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  async tick(): Promise<void> {
    if (this.running) {
      this.onLog({
        outcome: "skipped",
        level: "warn",
        message: "Scheduled job skipped: previous run is still in progress",
      });
      return;
    }
    this.running = true;
    try {
      this.onLog({ outcome: "executed", level: "info", message: "Scheduled job started" });
      await this.job();
    } catch (e) {
      this.onLog({
        outcome: "failed",
        level: "error",
        message: `Scheduled job failed: ${errorMessage(e)}`,
      });
    } finally {
      this.running = false;
    }
  }
}

function defaultLog(entry: ScheduleLogEntry): void {
  const line = `[schedule] ${entry.message}`;
  if (entry.level === "error") console.error(line);
  else if (entry.level === "warn") console.warn(line);
  else console.log(line);
}
