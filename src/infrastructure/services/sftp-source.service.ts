import { readFile } from "node:fs/promises";
import type { Readable } from "node:stream";
import SftpClient from "ssh2-sftp-client";
import type { SftpSourceConfig } from "../../core/domain/entities/config.entity.js";
import { errorMessage, SourceConnectionError } from "../../core/domain/errors.js";
import {
  found,
  notFound,
  sourceError,
  type IRemoteSession,
  type IRemoteSource,
  type SourceResult,
} from "../../core/domain/services/remote-source.service.js";
import { isNotFoundError, joinRemote } from "../utils/source.utils.js";

export interface SftpConnectOptions {
  host: string;
  port: number;
  username: string;
  privateKey: Buffer;
  passphrase?: string;
  readyTimeout: number;
}

/** The subset of ssh2-sftp-client used here. */
export interface SftpClientLike {
  connect(options: SftpConnectOptions): Promise<unknown>;
  list(remotePath: string): Promise<Array<{ name: string; type: string }>>;
  createReadStream(remotePath: string): Readable;
  end(): Promise<unknown>;
}

const ROOT = ".";

export class SftpSourceService implements IRemoteSource {
  constructor(
    private readonly config: SftpSourceConfig,
    private readonly createClient: () => SftpClientLike = () => new SftpClient(),
  ) {}

  describe(): string {
    return `sftp://${this.config.username}@${this.config.host}:${this.config.port}`;
  }

  async connect(): Promise<IRemoteSession> {
    let privateKey: Buffer;
    try {
      privateKey = await readFile(this.config.privateKeyPath);
    } catch (e) {
      throw new SourceConnectionError(
        `Cannot read SFTP key ${this.config.privateKeyPath}: ${errorMessage(e)}`,
        e,
      );
    }

    const client = this.createClient();
    try {
      await client.connect({
        host: this.config.host,
        port: this.config.port,
        username: this.config.username,
        privateKey,
        passphrase: this.config.passphrase,
        readyTimeout: this.config.readyTimeoutMs,
      });
    } catch (e) {
      throw new SourceConnectionError(
        `SFTP connection to ${this.config.host} failed: ${errorMessage(e)}`,
        e,
      );
    }
    return new SftpSession(client);
  }
}

class SftpSession implements IRemoteSession {
  constructor(private readonly client: SftpClientLike) {}

  async listEntities(): Promise<string[]> {
    try {
      const entries = await this.client.list(ROOT);
      return entries.filter((e) => e.type !== "-").map((e) => e.name);
    } catch (e) {
      throw new SourceConnectionError(`Cannot list SFTP root: ${errorMessage(e)}`, e);
    }
  }

  async listSubfolders(entity: string): Promise<SourceResult<string[]>> {
    return this.listNames(entity, (type) => type !== "-");
  }

  async listFiles(entity: string, folder: string): Promise<SourceResult<string[]>> {
    return this.listNames(joinRemote(entity, folder), (type) => type !== "d");
  }

  async openFile(entity: string, folder: string, filename: string): Promise<Readable> {
    return this.client.createReadStream(joinRemote(entity, folder, filename));
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private async listNames(
    path: string,
    keep: (type: string) => boolean,
  ): Promise<SourceResult<string[]>> {
    try {
      const entries = await this.client.list(path);
      return found(entries.filter((e) => keep(e.type)).map((e) => e.name));
    } catch (e) {
      return isNotFoundError(e) ? notFound() : sourceError(e);
    }
  }
}
