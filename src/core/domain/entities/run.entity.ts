import type { DateScope } from "./date-scope.entity.js";

export type RunStatus = "running" | "complete" | "exhausted";

export type NotReadyReason =
  | "no-date-folder"
  | "missing-artifacts"
  | "empty-report";

export interface EntityFailure {
  entity: string;
  folder?: string;
  error: string;
}

export interface PassResult {
  /** Root listing after exclusions, sorted. */
  seen: string[];
  processed: string[];
  notReady: Array<{ entity: string; reason: NotReadyReason }>;
  failed: EntityFailure[];
}

export interface RunSummary {
  runId: string;
  scope: DateScope;
  status: Exclude<RunStatus, "running">;
  attempts: number;
  universe: string[];
  processed: string[];
  remaining: string[];
  startedAt: string;
  finishedAt: string;
}

export interface SeededReport {
  entity: string;
  folder: string;
  reportDate: string;
  location: string;
  rows: number;
}

/** Outcome of a bulk load: every folder lands in exactly one list. */
export interface SeedResult {
  loaded: SeededReport[];
  skipped: Array<{ entity: string; folder?: string; reason: NotReadyReason }>;
  failed: EntityFailure[];
}
