import {
  GetObjectCommand,
  ListObjectsV2Command,
  S3Client,
  type GetObjectCommandInput,
  type ListObjectsV2CommandInput,
  type ListObjectsV2CommandOutput,
} from "@aws-sdk/client-s3";
import { Readable } from "node:stream";
import type { S3SourceConfig } from "../../core/domain/entities/config.entity.js";
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

/** The calls a session makes; `fromS3Client` adapts the SDK client. */
export interface S3ClientLike {
  listObjects(
    input: ListObjectsV2CommandInput,
  ): Promise<Pick<ListObjectsV2CommandOutput, "CommonPrefixes" | "Contents" | "NextContinuationToken">>;
  getObject(input: GetObjectCommandInput): Promise<{ Body?: unknown }>;
  destroy(): void;
}

export function fromS3Client(client: S3Client): S3ClientLike {
  return {
    listObjects: (input) => client.send(new ListObjectsV2Command(input)),
    getObject: (input) => client.send(new GetObjectCommand(input)),
    destroy: () => client.destroy(),
  };
}

interface Listing {
  folders: string[];
  files: string[];
}

/**
 * Treats `<prefix><store>/<yyyyMMdd>/<file>` keys as a folder tree, using
 * `/`-delimited listings.
 */
export class AwsS3SourceService implements IRemoteSource {
  constructor(
    private readonly config: S3SourceConfig,
    private readonly createClient: () => S3ClientLike = () =>
      fromS3Client(new S3Client({ region: config.region })),
  ) {}

  describe(): string {
    return `s3://${this.config.bucket}/${this.config.prefix}`;
  }

  async connect(): Promise<IRemoteSession> {
    return new S3Session(this.createClient(), this.config.bucket, this.config.prefix);
  }
}

class S3Session implements IRemoteSession {
  constructor(
    private readonly s3Client: S3ClientLike,
    private readonly bucket: string,
    private readonly prefix: string,
  ) {}

  async listEntities(): Promise<string[]> {
    try {
      return (await this.list(this.prefix)).folders;
    } catch (e) {
      throw new SourceConnectionError(
        `Cannot list s3://${this.bucket}/${this.prefix}: ${errorMessage(e)}`,
        e,
      );
    }
  }

  async listSubfolders(entity: string): Promise<SourceResult<string[]>> {
    return this.listUnder(`${this.prefix}${entity}/`, (l) => l.folders);
  }

  async listFiles(entity: string, folder: string): Promise<SourceResult<string[]>> {
    return this.listUnder(`${this.prefix}${entity}/${folder}/`, (l) => l.files);
  }

  async openFile(entity: string, folder: string, filename: string): Promise<Readable> {
    const out = await this.s3Client.getObject({
      Bucket: this.bucket,
      Key: `${this.prefix}${entity}/${folder}/${filename}`,
    });
    if (out.Body instanceof Readable) return out.Body;
    throw new Error(`s3://${this.bucket}/${entity}/${folder}/${filename} has no readable body`);
  }

  async close(): Promise<void> {
    this.s3Client.destroy();
  }

  /** A prefix with no objects under it does not exist. */
  private async listUnder(
    prefix: string,
    pick: (listing: Listing) => string[],
  ): Promise<SourceResult<string[]>> {
    try {
      const listing = await this.list(prefix);
      if (listing.folders.length === 0 && listing.files.length === 0) return notFound();
      return found(pick(listing));
    } catch (e) {
      return isNotFoundError(e) ? notFound() : sourceError(e);
    }
  }

  private async list(prefix: string): Promise<Listing> {
    const folders: string[] = [];
    const files: string[] = [];
    let continuationToken: string | undefined;
    do {
      const out = await this.s3Client.listObjects({
        Bucket: this.bucket,
        Prefix: prefix || undefined,
        Delimiter: "/",
        ContinuationToken: continuationToken,
      });
      for (const p of out.CommonPrefixes ?? []) {
        if (p.Prefix) folders.push(p.Prefix.slice(prefix.length).replace(/\/$/, ""));
      }
      for (const obj of out.Contents ?? []) {
        if (obj.Key && obj.Key !== prefix) files.push(obj.Key.slice(prefix.length));
      }
      continuationToken = out.NextContinuationToken;
    } while (continuationToken);
    return { folders, files };
  }
}
