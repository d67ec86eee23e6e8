/** Dates are folder-style `yyyyMMdd` strings throughout. */
export type DateScope =
  | { kind: "single"; date: string }
  | { kind: "range"; start: string; end: string };

export interface DateFolder {
  entity: string;
  folder: string;
  date: string;
}
