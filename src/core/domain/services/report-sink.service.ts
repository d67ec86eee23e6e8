import type { Report } from "../entities/report.entity.js";

/**
 * Persists a report under its (date, location) key. Implementations must be
 * idempotent: repeating an upsert with the same input leaves the same rows.
 */
export interface IReportSink {
  upsert(date: string, location: string, report: Report): Promise<number>;
}
