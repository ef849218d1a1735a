import {
  CATEGORY_COLUMNS,
  CategoryShareRow,
  ConversionByDayRow,
  DailySalesRow,
  DensityCellRow,
  ExcludedEntry,
  Kpis,
  MeatByDayRow,
  MonthlyComboRow,
  MonthlyGrowthRow,
  PromoTrafficRow,
  RecordSet,
  ViewName,
  ViewOutcome,
  ViewTable,
  toWeekday,
} from "../entities";
import { SchemaInvalidError } from "../errors";
import {
  categoryShare,
  groupMean,
  groupSum,
  meanOf,
  monthlyBucket,
  periodOverPeriodGrowth,
  quantizedBins,
  sumOf,
} from "./Aggregations";

export interface ViewBuilderOptions {
  densityBins: number;
}

export const DEFAULT_VIEW_BUILDER_OPTIONS: ViewBuilderOptions = {
  densityBins: 8,
};

export const GAUGE_REFERENCE_PCT = 30;

interface ViewDefinition {
  title: string;
  requiredColumns: readonly string[];
  columns: readonly string[];
  build(recordSet: RecordSet, options: ViewBuilderOptions): Pick<ViewTable, "rows" | "excluded">;
}

const VIEW_DEFINITIONS: Record<ViewName, ViewDefinition> = {
  [ViewName.CONVERSION_BY_DAY]: {
    title: "Conversion by Day",
    requiredColumns: ["day_of_week", "conversion_rate"],
    columns: ["dayOfWeek", "conversionRate", "conversionPct"],
    build: ({ records }) => ({
      rows: weekdayRows(groupMean(records, "day_of_week", "conversion_rate")).map(
        ({ dayOfWeek, value }): ConversionByDayRow => ({
          dayOfWeek,
          conversionRate: value,
          conversionPct: value * 100,
        })
      ),
      excluded: [],
    }),
  },

  [ViewName.DAILY_SALES_TOTAL]: {
    title: "Daily Sales",
    requiredColumns: ["date", "total_sales"],
    columns: ["date", "totalSales"],
    build: ({ records }) => ({
      rows: groupSum(records, "date", "total_sales", { order: "key" }).map(
        ({ key, value }): DailySalesRow => ({ date: key, totalSales: value })
      ),
      excluded: [],
    }),
  },

  [ViewName.CATEGORY_SHARE]: {
    title: "Share by Category",
    requiredColumns: CATEGORY_COLUMNS,
    columns: ["category", "units"],
    build: ({ records }) => ({
      rows: categoryShare(records, CATEGORY_COLUMNS).map(
        ({ category, units }): CategoryShareRow => ({ category, units })
      ),
      excluded: [],
    }),
  },

  [ViewName.PROMO_TRAFFIC_RANKING]: {
    title: "Average Customers by Promotion",
    requiredColumns: ["promo_type", "customer_traffic"],
    columns: ["promoType", "avgTraffic"],
    build: ({ records }) => ({
      rows: groupMean(records, "promo_type", "customer_traffic", { order: "value-desc" }).map(
        ({ key, value }): PromoTrafficRow => ({ promoType: key, avgTraffic: value })
      ),
      excluded: [],
    }),
  },

  [ViewName.MEAT_BY_DAY]: {
    title: "Average Meat Units by Day",
    requiredColumns: ["day_of_week", "units_carnes"],
    columns: ["dayOfWeek", "avgUnits"],
    build: ({ records }) => ({
      rows: weekdayRows(groupMean(records, "day_of_week", "units_carnes")).map(
        ({ dayOfWeek, value }): MeatByDayRow => ({ dayOfWeek, avgUnits: value })
      ),
      excluded: [],
    }),
  },

  [ViewName.MONTHLY_GROWTH]: {
    title: "Monthly Growth vs Previous Period",
    requiredColumns: ["date", "total_sales"],
    columns: ["month", "totalSales", "growthPct"],
    build: ({ records }) => {
      const months = monthlyBucket(records).map((bucket) => ({
        month: bucket.monthStart,
        totalSales: sumOf(bucket.records, "total_sales"),
      }));
      const rows: MonthlyGrowthRow[] = [];
      const excluded: ExcludedEntry[] = [];

      for (const entry of periodOverPeriodGrowth(months.map((m) => m.totalSales))) {
        const { month, totalSales } = months[entry.index];
        if (entry.kind === "defined") {
          rows.push({ month, totalSales, growthPct: entry.growthPct });
        } else {
          excluded.push({ key: month, reason: entry.reason });
        }
      }
      return { rows, excluded };
    },
  },

  [ViewName.MONTHLY_COMBO]: {
    title: "Monthly Traffic and Conversion",
    requiredColumns: ["date", "customer_traffic", "conversion_rate"],
    columns: ["month", "avgTraffic", "avgConversionRate"],
    build: ({ records }) => {
      const rows: MonthlyComboRow[] = [];
      const excluded: ExcludedEntry[] = [];
      for (const bucket of monthlyBucket(records)) {
        const avgTraffic = meanOf(bucket.records, "customer_traffic");
        const avgConversionRate = meanOf(bucket.records, "conversion_rate");
        if (avgTraffic === null || avgConversionRate === null) {
          excluded.push({ key: bucket.monthStart, reason: "no-measured-records" });
          continue;
        }
        rows.push({ month: bucket.monthStart, avgTraffic, avgConversionRate });
      }
      return { rows, excluded };
    },
  },

  [ViewName.PROMO_VS_TRAFFIC_DENSITY]: {
    title: "Promotion vs Customer Traffic Density",
    requiredColumns: ["promo_type", "customer_traffic"],
    columns: ["promoType", "trafficBin", "binIndex", "count"],
    build: ({ records }, options) => {
      const points: { promoType: string; traffic: number }[] = [];
      for (const record of records) {
        const traffic = record.measures.customer_traffic;
        if (record.promoType === null || traffic === undefined) continue;
        points.push({ promoType: record.promoType, traffic });
      }

      const binned = quantizedBins(
        points.map((p) => p.traffic),
        options.densityBins
      );

      const cells = new Map<string, DensityCellRow>();
      points.forEach((point, i) => {
        const binIndex = binned.indices[i];
        const key = `${point.promoType}|${binIndex}`;
        const cell = cells.get(key);
        if (cell) {
          cell.count += 1;
        } else {
          cells.set(key, { promoType: point.promoType, trafficBin: binned.labels[i], binIndex, count: 1 });
        }
      });

      const promoOrder = [...new Set(points.map((p) => p.promoType))];
      const rows = [...cells.values()].sort(
        (a, b) =>
          promoOrder.indexOf(a.promoType) - promoOrder.indexOf(b.promoType) || a.binIndex - b.binIndex
      );
      return { rows, excluded: [] };
    },
  },
};

function weekdayRows(grouped: { key: string; value: number }[]) {
  return grouped.flatMap(({ key, value }) => {
    const dayOfWeek = toWeekday(key);
    return dayOfWeek ? [{ dayOfWeek, value }] : [];
  });
}

/** Throw SchemaInvalidError naming every required column the set lacks. */
export function requireColumns(recordSet: RecordSet, columns: readonly string[], view?: string): void {
  const missing = columns.filter((col) => !recordSet.columns.has(col));
  if (missing.length > 0) {
    throw new SchemaInvalidError(missing, view);
  }
}

export function buildView(
  view: ViewName,
  recordSet: RecordSet,
  options?: Partial<ViewBuilderOptions>
): ViewTable {
  const cfg = { ...DEFAULT_VIEW_BUILDER_OPTIONS, ...options };
  const definition = VIEW_DEFINITIONS[view];
  requireColumns(recordSet, definition.requiredColumns, view);

  const { rows, excluded } = definition.build(recordSet, cfg);
  return { view, title: definition.title, columns: definition.columns, rows, excluded };
}

/** Build each view on its own; a schema failure only affects its view. */
export function buildViews(
  views: readonly ViewName[],
  recordSet: RecordSet,
  options?: Partial<ViewBuilderOptions>
): ViewOutcome[] {
  return views.map((view): ViewOutcome => {
    try {
      return { status: "ok", table: buildView(view, recordSet, options) };
    } catch (err) {
      if (err instanceof SchemaInvalidError) {
        return { status: "schema-invalid", view, missingColumns: err.missingColumns, message: err.message };
      }
      throw err;
    }
  });
}

/** Headline numbers and the conversion gauge. */
export function computeKpis(recordSet: RecordSet): Kpis {
  const { records, columns } = recordSet;
  const totalSales = columns.has("total_sales") ? sumOf(records, "total_sales") : null;
  const meanConversion = columns.has("conversion_rate") ? meanOf(records, "conversion_rate") : null;
  const avgConversionPct = meanConversion === null ? null : meanConversion * 100;

  return {
    recordCount: records.length,
    totalSales,
    avgConversionPct,
    gauge:
      avgConversionPct === null
        ? null
        : {
            value: avgConversionPct,
            reference: GAUGE_REFERENCE_PCT,
            deltaPp: avgConversionPct - GAUGE_REFERENCE_PCT,
            max: Math.max(40, Math.round(Math.max(avgConversionPct * 1.35, 32))),
          },
  };
}
