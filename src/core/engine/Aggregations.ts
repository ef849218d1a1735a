import {
  DAY_ORDER,
  MeasureColumn,
  TransactionRecord,
  categoryName,
} from "../entities";
import { monthStart } from "../../utils/time";

export type GroupKey = "day_of_week" | "season" | "promo_type" | "date" | "month";

/** Emission order for keys other than day_of_week, which is always Monday first. */
export type GroupOrder = "first-seen" | "key" | "value-desc";

export interface GroupOptions {
  order?: GroupOrder;
}

export interface GroupedValue {
  key: string;
  value: number;
}

export interface MonthBucket {
  /** YYYY-MM-01 */
  monthStart: string;
  records: readonly TransactionRecord[];
}

export type GrowthEntry =
  | { index: number; kind: "defined"; growthPct: number }
  | { index: number; kind: "undefined"; reason: "zero-previous-period" };

export interface Bin {
  index: number;
  lower: number;
  upper: number;
  label: string;
}

export interface QuantizedBins {
  bins: readonly Bin[];
  /** One label per input value, same order. */
  labels: readonly string[];
  indices: readonly number[];
}

export interface CategoryTotal {
  category: string;
  units: number;
}

interface Accumulator {
  sum: number;
  count: number;
}

export function groupMean(
  records: readonly TransactionRecord[],
  key: GroupKey,
  measure: MeasureColumn,
  options: GroupOptions = {}
): GroupedValue[] {
  return groupBy(records, key, measure, options, (acc) => acc.sum / acc.count);
}

export function groupSum(
  records: readonly TransactionRecord[],
  key: GroupKey,
  measure: MeasureColumn,
  options: GroupOptions = {}
): GroupedValue[] {
  return groupBy(records, key, measure, options, (acc) => acc.sum);
}

function groupBy(
  records: readonly TransactionRecord[],
  key: GroupKey,
  measure: MeasureColumn,
  options: GroupOptions,
  reduce: (acc: Accumulator) => number
): GroupedValue[] {
  const groups = new Map<string, Accumulator>();

  for (const record of records) {
    const groupKey = keyOf(record, key);
    const value = record.measures[measure];
    if (groupKey === null || value === undefined) continue;

    const acc = groups.get(groupKey);
    if (acc) {
      acc.sum += value;
      acc.count += 1;
    } else {
      groups.set(groupKey, { sum: value, count: 1 });
    }
  }

  const result = [...groups].map(([k, acc]) => ({ key: k, value: reduce(acc) }));

  if (key === "day_of_week") {
    const rank = new Map<string, number>(DAY_ORDER.map((day, i) => [day, i]));
    return result.sort((a, b) => (rank.get(a.key) ?? DAY_ORDER.length) - (rank.get(b.key) ?? DAY_ORDER.length));
  }

  switch (options.order ?? "first-seen") {
    case "key":
      return result.sort((a, b) => a.key.localeCompare(b.key));
    case "value-desc":
      return result.sort((a, b) => b.value - a.value);
    default:
      return result;
  }
}

function keyOf(record: TransactionRecord, key: GroupKey): string | null {
  switch (key) {
    case "day_of_week":
      return record.dayOfWeek;
    case "season":
      return record.season;
    case "promo_type":
      return record.promoType;
    case "date":
      return record.date;
    case "month":
      return record.month;
  }
}

/** Sum of a measure over the records that carry it. */
export function sumOf(records: readonly TransactionRecord[], measure: MeasureColumn): number {
  let total = 0;
  for (const record of records) {
    total += record.measures[measure] ?? 0;
  }
  return total;
}

/** Mean of a measure over the records that carry it; null when none do. */
export function meanOf(records: readonly TransactionRecord[], measure: MeasureColumn): number | null {
  let total = 0;
  let count = 0;
  for (const record of records) {
    const value = record.measures[measure];
    if (value === undefined) continue;
    total += value;
    count += 1;
  }
  return count > 0 ? total / count : null;
}

/**
 * Group records by calendar-month start, oldest first.
 *
 * Derived from `date` rather than the record's `month` filter key: this axis
 * has to sort chronologically.
 */
export function monthlyBucket(records: readonly TransactionRecord[]): MonthBucket[] {
  const buckets = new Map<string, TransactionRecord[]>();
  for (const record of records) {
    const start = monthStart(record.date);
    const bucket = buckets.get(start);
    if (bucket) {
      bucket.push(record);
    } else {
      buckets.set(start, [record]);
    }
  }

  return [...buckets]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([start, bucketRecords]) => ({ monthStart: start, records: bucketRecords }));
}

/**
 * Percentage change between consecutive values.
 *
 * Index 0 has no previous period and is never emitted. A previous value of
 * zero yields an "undefined" entry instead of a non-finite number.
 */
export function periodOverPeriodGrowth(values: readonly number[]): GrowthEntry[] {
  const entries: GrowthEntry[] = [];
  for (let i = 1; i < values.length; i++) {
    const previous = values[i - 1];
    if (previous === 0) {
      entries.push({ index: i, kind: "undefined", reason: "zero-previous-period" });
      continue;
    }
    entries.push({ index: i, kind: "defined", growthPct: ((values[i] - previous) / previous) * 100 });
  }
  return entries;
}

/** Equal-width bins over [min, max]; both ends fall inside a bin. */
export function quantizedBins(values: readonly number[], binCount: number): QuantizedBins {
  if (!Number.isInteger(binCount) || binCount < 1) {
    throw new RangeError(`binCount must be a positive integer, got ${binCount}`);
  }
  if (values.length === 0) {
    return { bins: [], labels: [], indices: [] };
  }

  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  if (min === max) {
    const pad = min === 0 ? 0.001 : Math.abs(min) * 0.001;
    min -= pad;
    max += pad;
  }

  const width = (max - min) / binCount;
  const edges: number[] = [];
  for (let i = 0; i < binCount; i++) {
    edges.push(min + i * width);
  }
  edges.push(max);

  const bins: Bin[] = [];
  for (let i = 0; i < binCount; i++) {
    const last = i === binCount - 1;
    const lower = edges[i];
    const upper = edges[i + 1];
    bins.push({ index: i, lower, upper, label: last ? `[${lower}, ${upper}]` : `[${lower}, ${upper})` });
  }

  // The floor estimate can land one bin off an edge; settle against the edges themselves.
  const indices = values.map((value) => {
    let idx = Math.min(Math.max(Math.floor((value - min) / width), 0), binCount - 1);
    while (idx > 0 && value < edges[idx]) idx--;
    while (idx < binCount - 1 && value >= edges[idx + 1]) idx++;
    return idx;
  });
  return { bins, labels: indices.map((i) => bins[i].label), indices };
}

/** Total units per category column, in column order. */
export function categoryShare(
  records: readonly TransactionRecord[],
  categoryColumns: readonly MeasureColumn[]
): CategoryTotal[] {
  return categoryColumns.map((column) => ({
    category: categoryName(column),
    units: sumOf(records, column),
  }));
}
