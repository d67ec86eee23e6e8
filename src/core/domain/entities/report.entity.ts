export interface ReportBucket {
  /** Wall-clock start of the interval, `HH:mm`. */
  intervalStart: string;
  orders: number;
  itemQuantity: number;
  itemNetSales: number;
  modifierQuantity: number;
  modifierNetSales: number;
}

export interface Report {
  /** Business date, `yyyy-MM-dd`. */
  date: string;
  location: string;
  intervalMinutes: number;
  buckets: ReportBucket[];
}

export type TransformResult =
  | { kind: "report"; report: Report }
  | { kind: "empty"; reason: string };
