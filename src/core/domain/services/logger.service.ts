export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  /** Dot-separated event name, e.g. `entity.processed`. */
  event: string;
  message: string;
  runId?: string;
  attempt?: number;
  entity?: string;
  folder?: string;
  error?: string;
  details?: Record<string, unknown>;
}

export interface ILogger {
  init(runId: string): void;
  log(entry: LogEntry): void;
  /** Resolves once buffered entries are flushed. */
  close(): Promise<void>;
}
