const NOT_FOUND_CODES = new Set<unknown>(["ENOENT", "ENOTDIR", "ERR_BAD_PATH", "NoSuchKey", 2]);

/** True for the "no such file or folder" errors fs, SFTP and S3 raise. */
export function isNotFoundError(e: unknown): boolean {
  if (typeof e !== "object" || e === null) return false;
  if ("code" in e && NOT_FOUND_CODES.has(e.code)) return true;
  if ("name" in e && NOT_FOUND_CODES.has(e.name)) return true;
  return e instanceof Error && /no such file/i.test(e.message);
}

export function joinRemote(...parts: string[]): string {
  return parts
    .filter((p) => p !== "")
    .map((p, i) => (i === 0 ? p.replace(/\/+$/, "") : p.replace(/^\/+|\/+$/g, "")))
    .join("/");
}
