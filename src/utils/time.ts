import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";

dayjs.extend(customParseFormat);

const SOURCE_DATE_FORMATS = [
  "YYYY-MM-DD",
  "YYYY/MM/DD",
  "YYYY-MM-DD HH:mm:ss",
  "YYYY-MM-DD[T]HH:mm:ss",
];

/** Strict parse of a source date cell to YYYY-MM-DD, or null. */
export function parseCalendarDate(raw: string): string | null {
  const value = raw.trim();
  if (!value) return null;
  const parsed = dayjs(value, SOURCE_DATE_FORMATS, true);
  return parsed.isValid() ? parsed.format("YYYY-MM-DD") : null;
}

export function isValidDate(date: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(date) && dayjs(date, "YYYY-MM-DD", true).isValid();
}

export function isValidMonth(month: string): boolean {
  return /^\d{4}-\d{2}$/.test(month) && dayjs(month, "YYYY-MM", true).isValid();
}

/** YYYY-MM bucket used as a filter key. */
export function monthKey(date: string): string {
  return dayjs(date).format("YYYY-MM");
}

/** First day of the date's calendar month, YYYY-MM-DD. */
export function monthStart(date: string): string {
  return dayjs(date).startOf("month").format("YYYY-MM-DD");
}
