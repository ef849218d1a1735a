export * from "./core/entities";
export * from "./core/errors";
export { applyFilters, resolveFilterSpec, validateFilterSpec } from "./core/engine/FilterEngine";
export {
  categoryShare,
  groupMean,
  groupSum,
  meanOf,
  monthlyBucket,
  periodOverPeriodGrowth,
  quantizedBins,
  sumOf,
} from "./core/engine/Aggregations";
export { buildView, buildViews, computeKpis, requireColumns } from "./core/engine/ViewBuilder";
export type { ViewBuilderOptions } from "./core/engine/ViewBuilder";
export { buildFacets, loadTransactionsFromCsv } from "./data/csv/CsvTransactionLoader";
export type { DashboardResult, DashboardServiceConfig } from "./services/DashboardService";
export {
  loadDashboard,
  NO_DATA_MESSAGE,
  recompute,
  runDashboard,
} from "./services/DashboardService";
export { loadEnv } from "./config/env";
export type { DashboardConfig } from "./config/env";
