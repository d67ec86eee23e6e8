/** Invalid or incomplete configuration. Raised before any pass starts. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The remote store could not be reached, authenticated against or listed.
 * Fails the current pass; the next pass opens a fresh connection.
 */
export class SourceConnectionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SourceConnectionError";
  }
}

/** Source files that cannot be turned into a report (missing columns etc). */
export class MalformedReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedReportError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
