import pg from "pg";
import { errorMessage } from "../../core/domain/errors.js";
import type { Report } from "../../core/domain/entities/report.entity.js";
import type { IReportSink } from "../../core/domain/services/report-sink.service.js";

const { Pool } = pg;

export interface SqlQueryResult {
  rowCount: number | null;
  rows: unknown[];
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
  release(): void;
}

/** The slice of `pg.Pool` this repository uses. */
export interface SqlPool {
  connect(): Promise<SqlClient>;
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
  end(): Promise<void>;
}

export const REPORT_TABLE = "interval_reports";

const BUCKET_COLUMNS = [
  "report_date",
  "location",
  "interval_start",
  "interval_minutes",
  "orders",
  "item_quantity",
  "item_net_sales",
  "modifier_quantity",
  "modifier_net_sales",
] as const;

export const CREATE_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS ${REPORT_TABLE} (
    report_date        DATE           NOT NULL,
    location           TEXT           NOT NULL,
    interval_start     TEXT           NOT NULL,
    interval_minutes   INTEGER        NOT NULL,
    orders             INTEGER        NOT NULL,
    item_quantity      NUMERIC(12, 2) NOT NULL,
    item_net_sales     NUMERIC(12, 2) NOT NULL,
    modifier_quantity  NUMERIC(12, 2) NOT NULL,
    modifier_net_sales NUMERIC(12, 2) NOT NULL,
    ingested_at        TIMESTAMPTZ    NOT NULL DEFAULT now(),
    PRIMARY KEY (report_date, location, interval_start)
  );

  CREATE INDEX IF NOT EXISTS idx_${REPORT_TABLE}_location ON ${REPORT_TABLE}(location);
`;

/**
 * Idle clients that lose their connection (e.g. a Postgres restart during a
 * retry sleep) are reported through `onError`; the pool replaces them.
 */
export function createPool(
  databaseUrl: string,
  onError: (e: Error) => void = (e) =>
    console.warn(`Postgres idle client error: ${errorMessage(e)}`),
): pg.Pool {
  const pool = new Pool({ connectionString: databaseUrl });
  pool.on("error", onError);
  return pool;
}

/**
 * Writes interval reports to Postgres. Each upsert replaces the whole
 * (report_date, location) slice inside one transaction, so repeating it
 * leaves the same rows and drops buckets that disappeared upstream.
 */
export class PgReportRepository implements IReportSink {
  constructor(private readonly pool: SqlPool) {}

  async initSchema(): Promise<void> {
    await this.pool.query(CREATE_SCHEMA_SQL);
  }

  async ping(): Promise<unknown> {
    const res = await this.pool.query("SELECT 1 AS ok");
    return res.rows[0];
  }

  async upsert(date: string, location: string, report: Report): Promise<number> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(
        `DELETE FROM ${REPORT_TABLE} WHERE report_date = $1 AND location = $2`,
        [date, location],
      );

      if (report.buckets.length > 0) {
        const { text, values } = buildInsert(date, location, report);
        await client.query(text, values);
      }

      await client.query("COMMIT");
      return report.buckets.length;
    } catch (e) {
      await client.query("ROLLBACK");
      throw e;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export function buildInsert(
  date: string,
  location: string,
  report: Report,
): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const tuples = report.buckets.map((b) => {
    const row = [
      date,
      location,
      b.intervalStart,
      report.intervalMinutes,
      b.orders,
      b.itemQuantity,
      b.itemNetSales,
      b.modifierQuantity,
      b.modifierNetSales,
    ];
    const placeholders = row.map((v) => {
      values.push(v);
      return `$${values.length}`;
    });
    return `(${placeholders.join(", ")})`;
  });

  const updates = BUCKET_COLUMNS.slice(3)
    .map((c) => `${c} = EXCLUDED.${c}`)
    .concat("ingested_at = now()")
    .join(", ");

  const text =
    `INSERT INTO ${REPORT_TABLE} (${BUCKET_COLUMNS.join(", ")}) VALUES ${tuples.join(", ")} ` +
    `ON CONFLICT (report_date, location, interval_start) DO UPDATE SET ${updates}`;

  return { text, values };
}
