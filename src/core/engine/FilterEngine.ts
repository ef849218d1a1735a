import { z } from "zod";
import {
  DAY_ORDER,
  FacetDomains,
  FilterSpec,
  RecordSet,
  ResolvedFilterSpec,
  TransactionRecord,
  Weekday,
  toWeekday,
} from "../entities";
import { InvalidFilterError } from "../errors";
import { isValidDate, isValidMonth } from "../../utils/time";

const weekdayName = z
  .string()
  .transform((value, ctx) => {
    const day = toWeekday(value);
    if (day === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown weekday: ${value}` });
      return z.NEVER;
    }
    return day;
  });

const calendarDate = z.string().refine(isValidDate, (value) => ({ message: `Invalid date: ${value}` }));
const monthBucket = z.string().refine(isValidMonth, (value) => ({ message: `Invalid month: ${value}` }));

export const FilterSpecSchema = z
  .object({
    days: z.array(weekdayName).optional(),
    seasons: z.array(z.string()).optional(),
    months: z.array(monthBucket).optional(),
    dateFrom: calendarDate.optional(),
    dateTo: calendarDate.optional(),
  })
  .strict();

/** Validate untyped filter input (CLI flags, request bodies). */
export function validateFilterSpec(input: unknown): FilterSpec {
  const result = FilterSpecSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidFilterError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/** Fill every omitted option with everything observed in the store. */
export function resolveFilterSpec(facets: FacetDomains, spec: FilterSpec = {}): ResolvedFilterSpec {
  return {
    days: spec.days ? normalizeDays(spec.days) : facets.days,
    seasons: spec.seasons ? [...spec.seasons] : facets.seasons,
    months: spec.months ? [...spec.months] : facets.months,
    dateFrom: spec.dateFrom ?? facets.minDate,
    dateTo: spec.dateTo ?? facets.maxDate,
  };
}

function normalizeDays(days: readonly string[]): Weekday[] {
  const wanted = new Set(days.map(toWeekday));
  return DAY_ORDER.filter((day) => wanted.has(day));
}

/** Keep records satisfying every predicate; order and columns carry over. */
export function applyFilters(recordSet: RecordSet, spec: ResolvedFilterSpec): RecordSet {
  const days = new Set<string>(spec.days);
  const seasons = new Set(spec.seasons);
  const months = new Set(spec.months);

  const kept = recordSet.records.filter(
    (record) =>
      record.dayOfWeek !== null &&
      days.has(record.dayOfWeek) &&
      record.season !== null &&
      seasons.has(record.season) &&
      months.has(record.month) &&
      withinRange(record, spec.dateFrom, spec.dateTo)
  );

  return Object.freeze({ records: Object.freeze(kept), columns: recordSet.columns });
}

function withinRange(record: TransactionRecord, from: string | null, to: string | null): boolean {
  if (from !== null && record.date < from) return false;
  if (to !== null && record.date > to) return false;
  return true;
}
