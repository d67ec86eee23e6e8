import type Database from "better-sqlite3";
import type { RunSummary } from "../../core/domain/entities/run.entity.js";
import type {
  IRunHistoryRepository,
  RunHistoryEntry,
} from "../../core/domain/repositories/run-history.repository.js";
import { describeScope } from "../../core/domain/services/date-scope.service.js";
import { toEntitySet } from "./json-checkpoint.repository.js";

interface RunHistoryRow {
  id: number;
  run_id: string;
  scope: string;
  status: string;
  attempts: number;
  processed: string;
  remaining: string;
  started_at: string;
  finished_at: string;
}

export class SqliteRunHistoryRepository implements IRunHistoryRepository {
  constructor(private readonly db: Database.Database) {}

  async appendRun(summary: RunSummary): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO run_history
           (run_id, scope, status, attempts, processed, remaining, started_at, finished_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        summary.runId,
        describeScope(summary.scope),
        summary.status,
        summary.attempts,
        JSON.stringify(summary.processed),
        JSON.stringify(summary.remaining),
        summary.startedAt,
        summary.finishedAt,
      );
  }

  async getRecentRuns(limit = 20): Promise<RunHistoryEntry[]> {
    const rows = this.db
      .prepare("SELECT * FROM run_history ORDER BY id DESC LIMIT ?")
      .all(limit) as RunHistoryRow[];
    return rows.map(rowToEntry);
  }
}

function rowToEntry(r: RunHistoryRow): RunHistoryEntry {
  return {
    id: r.id,
    runId: r.run_id,
    scope: r.scope,
    status: r.status === "complete" ? "complete" : "exhausted",
    attempts: r.attempts,
    processed: parseList(r.processed),
    remaining: parseList(r.remaining),
    startedAt: r.started_at,
    finishedAt: r.finished_at,
  };
}

function parseList(raw: string): string[] {
  try {
    return [...toEntitySet(JSON.parse(raw))];
  } catch {
    return [];
  }
}
