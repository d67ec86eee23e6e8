import type Database from "better-sqlite3";
import type { ICheckpointRepository } from "../../core/domain/repositories/checkpoint.repository.js";
import { toEntitySet } from "./json-checkpoint.repository.js";

/** Checkpoint record stored as one `checkpoint_sets` row per scope key. */
export class SqliteCheckpointRepository implements ICheckpointRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly scopeKey: string,
  ) {}

  async load(): Promise<Set<string>> {
    const row = this.db
      .prepare("SELECT entities FROM checkpoint_sets WHERE scope_key = ?")
      .get(this.scopeKey) as { entities: string } | undefined;
    if (!row) return new Set();
    try {
      return toEntitySet(JSON.parse(row.entities));
    } catch {
      return new Set(); // corrupt record counts as nothing processed
    }
  }

  async save(entities: ReadonlySet<string>): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO checkpoint_sets (scope_key, entities, updated_at)
         VALUES (?, ?, ?)
         ON CONFLICT(scope_key) DO UPDATE SET
           entities   = excluded.entities,
           updated_at = excluded.updated_at`,
      )
      .run(this.scopeKey, JSON.stringify([...entities].sort()), new Date().toISOString());
  }

  async clear(): Promise<void> {
    this.db.prepare("DELETE FROM checkpoint_sets WHERE scope_key = ?").run(this.scopeKey);
  }
}
