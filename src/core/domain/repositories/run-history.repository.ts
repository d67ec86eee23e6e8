import type { RunSummary } from "../entities/run.entity.js";

export interface RunHistoryEntry {
  id: number;
  runId: string;
  scope: string;
  status: RunSummary["status"];
  attempts: number;
  processed: string[];
  remaining: string[];
  startedAt: string;
  finishedAt: string;
}

export interface IRunHistoryRepository {
  appendRun(summary: RunSummary): Promise<void>;
  getRecentRuns(limit?: number): Promise<RunHistoryEntry[]>;
}
