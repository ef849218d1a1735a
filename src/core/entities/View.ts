import { Weekday } from "./Transaction";

export enum ViewName {
  CONVERSION_BY_DAY = "conversion-by-day",
  DAILY_SALES_TOTAL = "daily-sales-total",
  CATEGORY_SHARE = "category-share",
  PROMO_TRAFFIC_RANKING = "promo-traffic-ranking",
  MEAT_BY_DAY = "meat-by-day",
  MONTHLY_GROWTH = "monthly-growth",
  MONTHLY_COMBO = "monthly-combo",
  PROMO_VS_TRAFFIC_DENSITY = "promo-vs-traffic-density",
}

export const ALL_VIEWS: readonly ViewName[] = Object.values(ViewName);

export interface ConversionByDayRow {
  dayOfWeek: Weekday;
  conversionRate: number;
  conversionPct: number;
}

export interface DailySalesRow {
  date: string;
  totalSales: number;
}

export interface CategoryShareRow {
  category: string;
  units: number;
}

export interface PromoTrafficRow {
  promoType: string;
  avgTraffic: number;
}

export interface MeatByDayRow {
  dayOfWeek: Weekday;
  avgUnits: number;
}

export interface MonthlyGrowthRow {
  /** Month start, YYYY-MM-01. */
  month: string;
  totalSales: number;
  growthPct: number;
}

export interface MonthlyComboRow {
  month: string;
  avgTraffic: number;
  avgConversionRate: number;
}

export interface DensityCellRow {
  promoType: string;
  trafficBin: string;
  binIndex: number;
  count: number;
}

export interface ViewRowMap {
  [ViewName.CONVERSION_BY_DAY]: ConversionByDayRow;
  [ViewName.DAILY_SALES_TOTAL]: DailySalesRow;
  [ViewName.CATEGORY_SHARE]: CategoryShareRow;
  [ViewName.PROMO_TRAFFIC_RANKING]: PromoTrafficRow;
  [ViewName.MEAT_BY_DAY]: MeatByDayRow;
  [ViewName.MONTHLY_GROWTH]: MonthlyGrowthRow;
  [ViewName.MONTHLY_COMBO]: MonthlyComboRow;
  [ViewName.PROMO_VS_TRAFFIC_DENSITY]: DensityCellRow;
}

export interface ExcludedEntry {
  key: string;
  reason: string;
}

export interface ViewTable<V extends ViewName = ViewName> {
  view: V;
  title: string;
  columns: readonly string[];
  rows: readonly ViewRowMap[V][];
  /** Keys left out of `rows`, with why. */
  excluded: readonly ExcludedEntry[];
}

export type ViewOutcome =
  | { status: "ok"; table: ViewTable }
  | { status: "schema-invalid"; view: ViewName; missingColumns: readonly string[]; message: string };

export interface ConversionGauge {
  value: number;
  reference: number;
  deltaPp: number;
  max: number;
}

export interface Kpis {
  recordCount: number;
  totalSales: number | null;
  avgConversionPct: number | null;
  gauge: ConversionGauge | null;
}
