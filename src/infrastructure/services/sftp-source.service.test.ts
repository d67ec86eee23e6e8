import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { SftpSourceConfig } from "../../core/domain/entities/config.entity.js";
import { SourceConnectionError } from "../../core/domain/errors.js";
import {
  SftpSourceService,
  type SftpClientLike,
  type SftpConnectOptions,
} from "./sftp-source.service.js";

class FakeSftpClient implements SftpClientLike {
  connectedWith: SftpConnectOptions | null = null;
  ended = false;
  connectError: Error | null = null;
  readonly opened: string[] = [];

  constructor(private readonly listings: Record<string, Array<{ name: string; type: string }>>) {}

  async connect(options: SftpConnectOptions): Promise<unknown> {
    if (this.connectError) throw this.connectError;
    this.connectedWith = options;
    return {};
  }

  async list(remotePath: string): Promise<Array<{ name: string; type: string }>> {
    const entries = this.listings[remotePath];
    if (!entries) {
      throw Object.assign(new Error(`list: No such file ${remotePath}`), { code: 2 });
    }
    return entries;
  }

  createReadStream(remotePath: string): Readable {
    this.opened.push(remotePath);
    return Readable.from(["data"]);
  }

  async end(): Promise<unknown> {
    this.ended = true;
    return true;
  }
}

describe("SftpSourceService", () => {
  let dir: string;
  let config: SftpSourceConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sftp-source-"));
    writeFileSync(join(dir, "id_test"), "test-key");
    config = {
      driver: "sftp",
      host: "sftp.test.local",
      port: 2222,
      username: "ingest",
      privateKeyPath: join(dir, "id_test"),
      readyTimeoutMs: 20000,
      excludeEntities: [],
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("connects with the key file and maps listings", async () => {
    const client = new FakeSftpClient({
      ".": [
        { name: "101", type: "d" },
        { name: "readme.txt", type: "-" },
        { name: "102", type: "l" },
      ],
      "101": [{ name: "20250102", type: "d" }],
      "101/20250102": [
        { name: "ItemSelectionDetails.csv", type: "-" },
        { name: "old", type: "d" },
      ],
    });
    const source = new SftpSourceService(config, () => client);

    const session = await source.connect();

    expect(client.connectedWith).toMatchObject({
      host: "sftp.test.local",
      port: 2222,
      username: "ingest",
      readyTimeout: 20000,
    });
    expect(client.connectedWith?.privateKey.toString()).toBe("test-key");
    expect(await session.listEntities()).toEqual(["101", "102"]);
    expect(await session.listSubfolders("101")).toEqual({ kind: "found", value: ["20250102"] });
    expect(await session.listFiles("101", "20250102")).toEqual({
      kind: "found",
      value: ["ItemSelectionDetails.csv"],
    });
    expect(await session.listFiles("101", "20250103")).toEqual({ kind: "not-found" });

    await session.openFile("101", "20250102", "ItemSelectionDetails.csv");
    expect(client.opened).toEqual(["101/20250102/ItemSelectionDetails.csv"]);

    await session.close();
    expect(client.ended).toBe(true);
    expect(source.describe()).toBe("sftp://ingest@sftp.test.local:2222");
  });

  it("returns an error result for listing failures other than not-found", async () => {
    const client = new FakeSftpClient({});
    client.list = async () => {
      throw new Error("Permission denied");
    };
    const session = await new SftpSourceService(config, () => client).connect();

    const result = await session.listSubfolders("101");
    expect(result.kind).toBe("error");
    await expect(session.listEntities()).rejects.toBeInstanceOf(SourceConnectionError);
  });

  it("wraps authentication and key failures as connection errors", async () => {
    const client = new FakeSftpClient({});
    client.connectError = new Error("All configured authentication methods failed");
    await expect(new SftpSourceService(config, () => client).connect()).rejects.toThrow(
      "SFTP connection to sftp.test.local failed: All configured authentication methods failed",
    );

    const missingKey = new SftpSourceService(
      { ...config, privateKeyPath: join(dir, "absent") },
      () => new FakeSftpClient({}),
    );
    await expect(missingKey.connect()).rejects.toBeInstanceOf(SourceConnectionError);
  });
});
