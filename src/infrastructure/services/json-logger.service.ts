import { createWriteStream, mkdirSync, existsSync, type WriteStream } from "node:fs";
import { join } from "node:path";
import type { ILogger, LogEntry } from "../../core/domain/services/logger.service.js";

/**
 * Appends one JSON object per line to `<dir>/<runLog>_<runId>.jsonl` and
 * echoes each message to the console.
 */
export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;
  private runId: string | null = null;

  constructor(
    private logDir: string,
    private logNameTemplate: string,
    private echo: boolean = true,
  ) {}

  init(runId: string): void {
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    const filename =
      this.logNameTemplate.replace(/\.[^.]+$/, "") + `_${runId}.jsonl`;
    const path = join(this.logDir, filename);
    this.logStream = createWriteStream(path, { flags: "a" });
    this.runId = runId;
  }

  log(entry: LogEntry): void {
    if (this.echo) echoToConsole(entry);
    if (this.logStream?.writable) {
      const full = {
        timestamp: new Date().toISOString(),
        ...entry,
        runId: entry.runId ?? this.runId ?? undefined,
      };
      this.logStream.write(JSON.stringify(full) + "\n");
    }
  }

  async close(): Promise<void> {
    const stream = this.logStream;
    if (!stream) return;
    this.logStream = null;
    await new Promise<void>((resolve) => stream.end(resolve));
  }
}

function echoToConsole(entry: LogEntry): void {
  const prefix = entry.entity ? `[${entry.entity}] ` : "";
  const line = `${prefix}${entry.message}`;
  if (entry.level === "error") console.error(line);
  else if (entry.level === "warn") console.warn(line);
  else console.log(line);
}
