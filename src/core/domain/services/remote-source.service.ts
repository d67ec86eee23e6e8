import type { Readable } from "node:stream";

export type SourceResult<T> =
  | { kind: "found"; value: T }
  | { kind: "not-found" }
  | { kind: "error"; cause: unknown };

export const found = <T>(value: T): SourceResult<T> => ({
  kind: "found",
  value,
});
export const notFound = <T>(): SourceResult<T> => ({ kind: "not-found" });
export const sourceError = <T>(cause: unknown): SourceResult<T> => ({
  kind: "error",
  cause,
});

/**
 * One open connection to the remote store. Sessions are opened at the start
 * of a pass and closed at its end.
 */
export interface IRemoteSession {
  /** Throws SourceConnectionError when the root cannot be listed. */
  listEntities(): Promise<string[]>;
  listSubfolders(entity: string): Promise<SourceResult<string[]>>;
  listFiles(entity: string, folder: string): Promise<SourceResult<string[]>>;
  openFile(entity: string, folder: string, filename: string): Promise<Readable>;
  close(): Promise<void>;
}

export interface IRemoteSource {
  /** Throws SourceConnectionError on connection or authentication failure. */
  connect(): Promise<IRemoteSession>;
  describe(): string;
}

/**
 * Opens both files of a folder and hands them to `fn`, destroying them
 * afterwards. Each stream gets an error listener as soon as it is opened, so a
 * file that vanished after listing rejects here instead of going unhandled.
 */
export async function withFileStreams<T>(
  session: IRemoteSession,
  target: { entity: string; folder: string },
  filenames: [string, string],
  fn: (first: Readable, second: Readable) => Promise<T>,
): Promise<T> {
  const opened: Readable[] = [];
  let streamError: unknown;
  const open = async (filename: string): Promise<Readable> => {
    const stream = await session.openFile(target.entity, target.folder, filename);
    stream.on("error", (e) => {
      streamError ??= e;
    });
    opened.push(stream);
    return stream;
  };

  try {
    const first = await open(filenames[0]);
    const second = await open(filenames[1]);
    const result = await fn(first, second);
    if (streamError !== undefined) throw streamError;
    return result;
  } finally {
    for (const stream of opened) stream.destroy();
  }
}
