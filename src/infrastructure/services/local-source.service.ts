import { createReadStream } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { Readable } from "node:stream";
import { errorMessage, SourceConnectionError } from "../../core/domain/errors.js";
import {
  found,
  notFound,
  sourceError,
  type IRemoteSession,
  type IRemoteSource,
  type SourceResult,
} from "../../core/domain/services/remote-source.service.js";
import { isNotFoundError } from "../utils/source.utils.js";

/**
 * Reads `<root>/<store>/<yyyyMMdd>/<files>` from disk. Used for backfills
 * from exported folders.
 */
export class LocalSourceService implements IRemoteSource {
  constructor(private readonly root: string) {}

  describe(): string {
    return `local folder ${this.root}`;
  }

  async connect(): Promise<IRemoteSession> {
    return new LocalSession(this.root);
  }
}

class LocalSession implements IRemoteSession {
  constructor(private readonly root: string) {}

  async listEntities(): Promise<string[]> {
    try {
      return await this.listDirs(this.root);
    } catch (e) {
      throw new SourceConnectionError(`Cannot list ${this.root}: ${errorMessage(e)}`, e);
    }
  }

  async listSubfolders(entity: string): Promise<SourceResult<string[]>> {
    return this.attempt(() => this.listDirs(join(this.root, entity)));
  }

  async listFiles(entity: string, folder: string): Promise<SourceResult<string[]>> {
    return this.attempt(async () => {
      const entries = await readdir(join(this.root, entity, folder), { withFileTypes: true });
      return entries.filter((e) => e.isFile()).map((e) => e.name);
    });
  }

  async openFile(entity: string, folder: string, filename: string): Promise<Readable> {
    return createReadStream(join(this.root, entity, folder, filename));
  }

  async close(): Promise<void> {}

  private async listDirs(path: string): Promise<string[]> {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => e.name);
  }

  private async attempt<T>(fn: () => Promise<T>): Promise<SourceResult<T>> {
    try {
      return found(await fn());
    } catch (e) {
      return isNotFoundError(e) ? notFound() : sourceError(e);
    }
  }
}
