import { Readable } from "node:stream";
import { text } from "node:stream/consumers";
import type { Report, TransformResult } from "../domain/entities/report.entity.js";
import { SourceConnectionError } from "../domain/errors.js";
import type { ILogger, LogEntry } from "../domain/services/logger.service.js";
import {
  found,
  notFound,
  sourceError,
  type IRemoteSession,
  type IRemoteSource,
  type SourceResult,
} from "../domain/services/remote-source.service.js";
import type { IReportSink } from "../domain/services/report-sink.service.js";
import type { ITransformPipeline } from "../domain/services/transform.service.js";
import type { ICheckpointRepository } from "../domain/repositories/checkpoint.repository.js";

/** entity → date folder → filename → contents */
export type RemoteTree = Record<string, Record<string, Record<string, string>>>;

export const ITEM_FILE = "ItemSelectionDetails.csv";
export const MODIFIER_FILE = "ModifiersSelectionDetails.csv";

/** A folder holding both exports; the item contents name the report location. */
export function readyFolder(location: string): Record<string, string> {
  return { [ITEM_FILE]: location, [MODIFIER_FILE]: "" };
}

/**
 * In-memory remote store. `tree` may be mutated between passes to model
 * files arriving late.
 */
export class FakeRemoteSource implements IRemoteSource {
  connects = 0;
  closes = 0;
  failConnects = 0;
  readonly listFileErrors = new Map<string, Error>();

  constructor(public tree: RemoteTree) {}

  describe(): string {
    return "fake remote";
  }

  async connect(): Promise<IRemoteSession> {
    this.connects++;
    if (this.failConnects > 0) {
      this.failConnects--;
      throw new SourceConnectionError("connection refused");
    }
    return {
      listEntities: async () => Object.keys(this.tree),
      listSubfolders: async (entity): Promise<SourceResult<string[]>> => {
        const folders = this.tree[entity];
        return folders ? found(Object.keys(folders)) : notFound();
      },
      listFiles: async (entity, folder): Promise<SourceResult<string[]>> => {
        const err = this.listFileErrors.get(`${entity}/${folder}`);
        if (err) return sourceError(err);
        const files = this.tree[entity]?.[folder];
        return files ? found(Object.keys(files)) : notFound();
      },
      openFile: async (entity, folder, filename) =>
        Readable.from([this.tree[entity]?.[folder]?.[filename] ?? ""]),
      close: async () => {
        this.closes++;
      },
    };
  }
}

/**
 * Reads the item stream as the location name. `EMPTY` yields an empty
 * result and `BAD` throws.
 */
export class StubTransform implements ITransformPipeline {
  constructor(private readonly date = "2025-01-02") {}

  async transform(items: Readable, modifiers: Readable): Promise<TransformResult> {
    const location = (await text(items)).trim();
    await text(modifiers);
    if (location === "EMPTY") return { kind: "empty", reason: "report is empty" };
    if (location === "BAD") throw new Error("unreadable export");
    const report: Report = {
      date: this.date,
      location,
      intervalMinutes: 60,
      buckets: [
        {
          intervalStart: "11:00",
          orders: 1,
          itemQuantity: 1,
          itemNetSales: 9.5,
          modifierQuantity: 0,
          modifierNetSales: 0,
        },
      ],
    };
    return { kind: "report", report };
  }
}

export class RecordingSink implements IReportSink {
  readonly upserts: Array<{ date: string; location: string }> = [];

  async upsert(date: string, location: string, report: Report): Promise<number> {
    this.upserts.push({ date, location });
    return report.buckets.length;
  }
}

export class MemoryCheckpointRepository implements ICheckpointRepository {
  saves = 0;
  clears = 0;
  failSaves = false;

  constructor(public stored: string[] = []) {}

  async load(): Promise<Set<string>> {
    return new Set(this.stored);
  }

  async save(entities: ReadonlySet<string>): Promise<void> {
    if (this.failSaves) throw new Error("disk full");
    this.saves++;
    this.stored = [...entities].sort();
  }

  async clear(): Promise<void> {
    this.clears++;
    this.stored = [];
  }
}

export class MemoryLogger implements ILogger {
  readonly entries: LogEntry[] = [];

  init(): void {}

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  async close(): Promise<void> {}

  events(): string[] {
    return this.entries.map((e) => e.event);
  }
}
