export enum Weekday {
  MONDAY = "Monday",
  TUESDAY = "Tuesday",
  WEDNESDAY = "Wednesday",
  THURSDAY = "Thursday",
  FRIDAY = "Friday",
  SATURDAY = "Saturday",
  SUNDAY = "Sunday",
}

export const DAY_ORDER: readonly Weekday[] = [
  Weekday.MONDAY,
  Weekday.TUESDAY,
  Weekday.WEDNESDAY,
  Weekday.THURSDAY,
  Weekday.FRIDAY,
  Weekday.SATURDAY,
  Weekday.SUNDAY,
] as const;

export const CATEGORY_PREFIX = "units_";

export const CATEGORY_COLUMNS = [
  "units_carnes",
  "units_verduras",
  "units_frutas",
  "units_lacteos",
  "units_bebidas",
] as const;

export type CategoryColumn = (typeof CATEGORY_COLUMNS)[number];

export const MEASURE_COLUMNS = [
  "total_sales",
  "customer_traffic",
  "conversion_rate",
  ...CATEGORY_COLUMNS,
] as const;

export type MeasureColumn = (typeof MEASURE_COLUMNS)[number];

/** Columns the Filter Engine reads; a source without them cannot be loaded. */
export const FILTER_COLUMNS = ["date", "day_of_week", "season"] as const;

export interface TransactionRecord {
  /** Calendar date, YYYY-MM-DD. */
  date: string;
  /** Month bucket, YYYY-MM. Used for filtering only. */
  month: string;
  dayOfWeek: Weekday | null;
  season: string | null;
  promoType: string | null;
  /** Blank or non-numeric cells are absent. */
  measures: Partial<Record<MeasureColumn, number>>;
}

export interface RecordSet {
  readonly records: readonly TransactionRecord[];
  /** Column names present in the source header. */
  readonly columns: ReadonlySet<string>;
}

export interface FacetDomains {
  days: readonly Weekday[];
  seasons: readonly string[];
  months: readonly string[];
  minDate: string | null;
  maxDate: string | null;
}

export interface SkippedRow {
  line: number;
  reason: string;
}

export interface RecordStore extends RecordSet {
  readonly source: string;
  readonly facets: FacetDomains;
  readonly skipped: readonly SkippedRow[];
}

const WEEKDAY_LOOKUP = new Map<string, Weekday>(
  DAY_ORDER.map((day) => [day.toLowerCase(), day])
);

export function toWeekday(value: string): Weekday | null {
  return WEEKDAY_LOOKUP.get(value.trim().toLowerCase()) ?? null;
}

export function categoryName(column: string): string {
  return column.startsWith(CATEGORY_PREFIX) ? column.slice(CATEGORY_PREFIX.length) : column;
}
