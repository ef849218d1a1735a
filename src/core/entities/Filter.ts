import { Weekday } from "./Transaction";

export interface FilterSpec {
  days?: readonly string[];
  seasons?: readonly string[];
  months?: readonly string[];
  dateFrom?: string;
  dateTo?: string;
}

export interface ResolvedFilterSpec {
  days: readonly Weekday[];
  seasons: readonly string[];
  months: readonly string[];
  dateFrom: string | null;
  dateTo: string | null;
}
