import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { ICheckpointRepository } from "../../core/domain/repositories/checkpoint.repository.js";

/**
 * Checkpoint record kept as a sorted JSON array in `<dir>/<key>.json`.
 * Writes go to a sibling temp file which is then renamed over the record, so
 * a crash mid-write leaves the previous record intact.
 */
export class JsonCheckpointRepository implements ICheckpointRepository {
  readonly path: string;

  constructor(dir: string, key: string) {
    this.path = join(dir, `${key}.json`);
  }

  async load(): Promise<Set<string>> {
    if (!existsSync(this.path)) return new Set();
    try {
      const data: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      return toEntitySet(data);
    } catch {
      return new Set(); // corrupt record counts as nothing processed
    }
  }

  async save(entities: ReadonlySet<string>): Promise<void> {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    writeFileSync(tmp, JSON.stringify([...entities].sort()));
    renameSync(tmp, this.path);
  }

  async clear(): Promise<void> {
    if (existsSync(this.path)) unlinkSync(this.path);
  }
}

export function toEntitySet(data: unknown): Set<string> {
  if (!Array.isArray(data)) return new Set();
  return new Set(data.filter((e): e is string => typeof e === "string"));
}
