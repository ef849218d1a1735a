import fs from "fs";
import { parse } from "csv-parse/sync";
import {
  DAY_ORDER,
  FILTER_COLUMNS,
  FacetDomains,
  MEASURE_COLUMNS,
  MeasureColumn,
  RecordStore,
  SkippedRow,
  TransactionRecord,
  toWeekday,
} from "../../core/entities";
import { SchemaInvalidError, SourceNotFoundError } from "../../core/errors";
import { childLogger } from "../../shared/logger";
import { monthKey, parseCalendarDate } from "../../utils/time";

const log = childLogger({ module: "record-store" });

export function loadTransactionsFromCsv(filePath: string): RecordStore {
  if (!fs.existsSync(filePath)) {
    throw new SourceNotFoundError(filePath);
  }

  const content = fs.readFileSync(filePath, "utf-8");
  let header: string[] = [];
  const rows = parse(content, {
    columns: (names: string[]) => {
      header = names.map((name) => name.trim());
      return header;
    },
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
    bom: true,
  }) as Record<string, string>[];

  const columns = new Set(header);
  const missing = FILTER_COLUMNS.filter((col) => !columns.has(col));
  if (missing.length > 0) {
    throw new SchemaInvalidError(missing);
  }

  const measureColumns = MEASURE_COLUMNS.filter((col) => columns.has(col));
  const records: TransactionRecord[] = [];
  const skipped: SkippedRow[] = [];

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    const lineNum = i + 2;

    const date = parseCalendarDate(row.date ?? "");
    if (date === null) {
      skipped.push({ line: lineNum, reason: `Unparseable date: ${row.date ?? ""}` });
      continue;
    }

    records.push(
      Object.freeze({
        date,
        month: monthKey(date),
        dayOfWeek: toWeekday(row.day_of_week ?? ""),
        season: row.season || null,
        promoType: row.promo_type || null,
        measures: Object.freeze(parseMeasures(row, measureColumns)),
      })
    );
  }

  if (skipped.length > 0) {
    log.debug({ skipped: skipped.length, file: filePath }, "Dropped rows with unparseable dates");
  }
  log.info({ file: filePath, records: records.length, columns: header.length }, "Loaded transactions");

  return Object.freeze({
    source: filePath,
    records: Object.freeze(records),
    columns,
    facets: buildFacets(records),
    skipped: Object.freeze(skipped),
  });
}

function parseMeasures(
  row: Record<string, string>,
  measureColumns: readonly MeasureColumn[]
): Partial<Record<MeasureColumn, number>> {
  const measures: Partial<Record<MeasureColumn, number>> = {};
  for (const col of measureColumns) {
    const raw = row[col];
    if (!raw) continue;
    const value = Number(raw);
    if (Number.isFinite(value)) {
      measures[col] = value;
    }
  }
  return measures;
}

/** Option domains for the filter surface. */
export function buildFacets(records: readonly TransactionRecord[]): FacetDomains {
  const days = new Set<string>();
  const seasons = new Set<string>();
  const months = new Set<string>();
  let minDate: string | null = null;
  let maxDate: string | null = null;

  for (const record of records) {
    if (record.dayOfWeek) days.add(record.dayOfWeek);
    if (record.season) seasons.add(record.season);
    months.add(record.month);
    if (minDate === null || record.date < minDate) minDate = record.date;
    if (maxDate === null || record.date > maxDate) maxDate = record.date;
  }

  return Object.freeze({
    days: DAY_ORDER.filter((day) => days.has(day)),
    seasons: [...seasons].sort(),
    months: [...months].sort(),
    minDate,
    maxDate,
  });
}
