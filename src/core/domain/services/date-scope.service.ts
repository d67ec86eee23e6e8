import { format, isValid, parse, subHours } from "date-fns";
import type { DateFolder, DateScope } from "../entities/date-scope.entity.js";
import { ConfigError } from "../errors.js";
import {
  found,
  type IRemoteSession,
  type SourceResult,
} from "./remote-source.service.js";

const FOLDER_DATE_FORMAT = "yyyyMMdd";
const FOLDER_DATE_PATTERN = /^\d{8}$/;

/**
 * Returns the date a folder name stands for, or null when the name is not a
 * real `yyyyMMdd` calendar date (e.g. `20250230`, `latest`, `2025-12-01`).
 */
export function parseFolderDate(name: string): Date | null {
  if (!FOLDER_DATE_PATTERN.test(name)) return null;
  const parsed = parse(name, FOLDER_DATE_FORMAT, new Date(2000, 0, 1));
  if (!isValid(parsed)) return null;
  return format(parsed, FOLDER_DATE_FORMAT) === name ? parsed : null;
}

/** The business date a scheduled run ingests: the previous UTC day. */
export function yesterdayUtc(now: Date = new Date()): string {
  // 24 hours rather than one calendar day: local DST shifts must not move the UTC date
  return subHours(now, 24).toISOString().slice(0, 10).replace(/-/g, "");
}

export function singleDateScope(date: string): DateScope {
  if (!parseFolderDate(date)) {
    throw new ConfigError(`Invalid date "${date}" (expected yyyyMMdd)`);
  }
  return { kind: "single", date };
}

export function dateRangeScope(start: string, end: string): DateScope {
  for (const d of [start, end]) {
    if (!parseFolderDate(d)) {
      throw new ConfigError(`Invalid date "${d}" (expected yyyyMMdd)`);
    }
  }
  if (start > end) {
    throw new ConfigError(`Date range start ${start} is after end ${end}`);
  }
  return { kind: "range", start, end };
}

/** Single-date runs keep one record per date; ranges share one record. */
export function checkpointKeyForScope(scope: DateScope): string {
  return scope.kind === "single"
    ? `processed_stores_${scope.date}`
    : "processed_stores";
}

/** Whether a folder name is a valid date that falls inside the scope. */
export function folderInScope(name: string, scope: DateScope): boolean {
  if (parseFolderDate(name) === null) return false;
  return scope.kind === "single"
    ? name === scope.date
    : name >= scope.start && name <= scope.end;
}

export function describeScope(scope: DateScope): string {
  return scope.kind === "single"
    ? `date ${scope.date}`
    : `range ${scope.start} → ${scope.end}`;
}

export interface DateScopeResolver {
  readonly scope: DateScope;
  /** Candidate date folders for an entity, in the order they should be tried. */
  resolve(session: IRemoteSession, entity: string): Promise<SourceResult<DateFolder[]>>;
}

/**
 * The target folder is assumed rather than listed; a missing folder surfaces
 * as not-found when its files are listed.
 */
export class SingleDateResolver implements DateScopeResolver {
  readonly scope: DateScope;

  constructor(private readonly date: string) {
    this.scope = { kind: "single", date };
  }

  async resolve(
    _session: IRemoteSession,
    entity: string,
  ): Promise<SourceResult<DateFolder[]>> {
    return found([{ entity, folder: this.date, date: this.date }]);
  }
}

export class DateRangeResolver implements DateScopeResolver {
  readonly scope: DateScope;

  constructor(
    private readonly start: string,
    private readonly end: string,
  ) {
    this.scope = { kind: "range", start, end };
  }

  async resolve(
    session: IRemoteSession,
    entity: string,
  ): Promise<SourceResult<DateFolder[]>> {
    const listing = await session.listSubfolders(entity);
    if (listing.kind !== "found") return listing;

    const folders = listing.value
      .filter((name) => folderInScope(name, this.scope))
      .sort()
      .map((name) => ({ entity, folder: name, date: name }));

    return found(folders);
  }
}

export function createDateScopeResolver(scope: DateScope): DateScopeResolver {
  return scope.kind === "single"
    ? new SingleDateResolver(scope.date)
    : new DateRangeResolver(scope.start, scope.end);
}
