import type { Readable } from "node:stream";
import { text } from "node:stream/consumers";
import Papa from "papaparse";
import { format, isValid, parse } from "date-fns";
import type {
  Report,
  ReportBucket,
  TransformResult,
} from "../../core/domain/entities/report.entity.js";
import { MalformedReportError } from "../../core/domain/errors.js";
import type { ITransformPipeline } from "../../core/domain/services/transform.service.js";

type CsvRow = Record<string, string | undefined>;

const COL = {
  location: "Location",
  orderId: "Order Id",
  orderDate: "Order Date",
  qty: "Qty",
  netPrice: "Net Price",
  void: "Void?",
} as const;

/** Export timestamp layouts seen in the wild, most common first. */
const ORDER_DATE_FORMATS = [
  "M/d/yy h:mm a",
  "M/d/yyyy h:mm a",
  "M/d/yy H:mm",
  "M/d/yyyy H:mm",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd HH:mm",
  "yyyy-MM-dd'T'HH:mm:ss",
];

const REFERENCE_DATE = new Date(2000, 0, 1);

export function parseOrderDate(value: string | undefined): Date | null {
  const v = value?.trim();
  if (!v) return null;
  for (const fmt of ORDER_DATE_FORMATS) {
    const d = parse(v, fmt, REFERENCE_DATE);
    if (isValid(d)) return d;
  }
  return null;
}

/** Parses `$1,234.50`, `(3.00)` and plain numbers; blanks and junk are 0. */
export function parseAmount(value: string | undefined): number {
  const v = value?.trim();
  if (!v) return 0;
  const negative = /^\(.*\)$/.test(v) || v.startsWith("-");
  const n = Number.parseFloat(v.replace(/[()$,\s-]/g, ""));
  if (Number.isNaN(n)) return 0;
  return negative ? -n : n;
}

export function isVoid(value: string | undefined): boolean {
  return /^(true|yes|y|1)$/i.test(value?.trim() ?? "");
}

export function bucketStart(d: Date, intervalMinutes: number): string {
  const minutes = d.getHours() * 60 + d.getMinutes();
  const start = minutes - (minutes % intervalMinutes);
  const hh = String(Math.floor(start / 60)).padStart(2, "0");
  const mm = String(start % 60).padStart(2, "0");
  return `${hh}:${mm}`;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

async function readCsv(stream: Readable): Promise<{ rows: CsvRow[]; fields: string[] }> {
  const content = (await text(stream)).replace(/^\uFEFF/, "");
  const result = Papa.parse<CsvRow>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });
  return { rows: result.data, fields: result.meta.fields ?? [] };
}

interface BucketAccumulator extends ReportBucket {
  orderIds: Set<string>;
}

/**
 * Turns an item-selection export and a modifier-selection export into an
 * interval report. Void rows and rows without a readable order date are
 * ignored; the report date and location come from the first usable item row.
 */
export class CsvReportTransformService implements ITransformPipeline {
  constructor(private readonly intervalMinutes: number = 60) {}

  async transform(items: Readable, modifiers: Readable): Promise<TransformResult> {
    const [itemCsv, modifierCsv] = await Promise.all([readCsv(items), readCsv(modifiers)]);

    if (itemCsv.rows.length === 0) return { kind: "empty", reason: "no item rows" };

    for (const col of [COL.location, COL.orderDate]) {
      if (!itemCsv.fields.includes(col)) {
        throw new MalformedReportError(`Item export is missing column "${col}"`);
      }
    }
    if (modifierCsv.rows.length > 0 && !modifierCsv.fields.includes(COL.orderDate)) {
      throw new MalformedReportError(`Modifier export is missing column "${COL.orderDate}"`);
    }

    const buckets = new Map<string, BucketAccumulator>();
    const bucketFor = (d: Date): BucketAccumulator => {
      const key = bucketStart(d, this.intervalMinutes);
      let b = buckets.get(key);
      if (!b) {
        b = {
          intervalStart: key,
          orders: 0,
          itemQuantity: 0,
          itemNetSales: 0,
          modifierQuantity: 0,
          modifierNetSales: 0,
          orderIds: new Set(),
        };
        buckets.set(key, b);
      }
      return b;
    };

    let first: { date: Date; location: string } | null = null;

    for (const row of itemCsv.rows) {
      if (isVoid(row[COL.void])) continue;
      const orderDate = parseOrderDate(row[COL.orderDate]);
      if (!orderDate) continue;

      if (!first) {
        const location = row[COL.location]?.trim() ?? "";
        if (!location) {
          throw new MalformedReportError("First item row has no Location");
        }
        first = { date: orderDate, location };
      }

      const b = bucketFor(orderDate);
      const orderId = row[COL.orderId]?.trim();
      if (orderId) b.orderIds.add(orderId);
      b.itemQuantity += row[COL.qty] === undefined ? 1 : parseAmount(row[COL.qty]);
      b.itemNetSales += parseAmount(row[COL.netPrice]);
    }

    if (!first) return { kind: "empty", reason: "report is empty" };

    for (const row of modifierCsv.rows) {
      if (isVoid(row[COL.void])) continue;
      const orderDate = parseOrderDate(row[COL.orderDate]);
      if (!orderDate) continue;

      const b = bucketFor(orderDate);
      b.modifierQuantity += row[COL.qty] === undefined ? 1 : parseAmount(row[COL.qty]);
      b.modifierNetSales += parseAmount(row[COL.netPrice]);
    }

    const report: Report = {
      date: format(first.date, "yyyy-MM-dd"),
      location: first.location,
      intervalMinutes: this.intervalMinutes,
      buckets: [...buckets.values()]
        .sort((a, b) => a.intervalStart.localeCompare(b.intervalStart))
        .map(({ orderIds, ...b }) => ({
          ...b,
          orders: orderIds.size,
          itemQuantity: round2(b.itemQuantity),
          itemNetSales: round2(b.itemNetSales),
          modifierQuantity: round2(b.modifierQuantity),
          modifierNetSales: round2(b.modifierNetSales),
        })),
    };

    return { kind: "report", report };
  }
}
