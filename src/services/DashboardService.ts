import { ALL_VIEWS, Kpis, RecordStore, ResolvedFilterSpec, ViewName, ViewOutcome } from "../core/entities";
import { applyFilters, resolveFilterSpec, validateFilterSpec } from "../core/engine/FilterEngine";
import { buildViews, computeKpis, ViewBuilderOptions } from "../core/engine/ViewBuilder";
import { loadTransactionsFromCsv } from "../data/csv/CsvTransactionLoader";
import { childLogger } from "../shared/logger";

const log = childLogger({ module: "dashboard" });

export const NO_DATA_MESSAGE = "No data for current filters";

export interface RecomputeOptions extends Partial<ViewBuilderOptions> {
  views?: readonly ViewName[];
}

export interface DashboardServiceConfig extends RecomputeOptions {
  sourcePath: string;
  /** Untyped filter input, validated before use. */
  filters?: unknown;
}

export interface DashboardMetadata {
  recordsLoaded: number;
  recordsFiltered: number;
  rowsSkipped: number;
  viewsFailed: number;
  executionTimeMs: number;
}

export type DashboardResult =
  | {
      status: "empty";
      message: string;
      filters: ResolvedFilterSpec;
      metadata: DashboardMetadata;
    }
  | {
      status: "ok";
      filters: ResolvedFilterSpec;
      kpis: Kpis;
      views: ViewOutcome[];
      metadata: DashboardMetadata;
    };

export function loadDashboard(config: { sourcePath: string }): RecordStore {
  return loadTransactionsFromCsv(config.sourcePath);
}

/**
 * Filter the store and derive every requested view.
 *
 * Holds no state between calls: each call starts from the store and the
 * filter input alone.
 */
export function recompute(
  store: RecordStore,
  filterInput: unknown = {},
  options: RecomputeOptions = {}
): DashboardResult {
  const startTime = Date.now();

  const filters = resolveFilterSpec(store.facets, validateFilterSpec(filterInput));
  const filtered = applyFilters(store, filters);

  const metadata = (viewsFailed: number): DashboardMetadata => ({
    recordsLoaded: store.records.length,
    recordsFiltered: filtered.records.length,
    rowsSkipped: store.skipped.length,
    viewsFailed,
    executionTimeMs: Date.now() - startTime,
  });

  if (filtered.records.length === 0) {
    log.info({ filters }, NO_DATA_MESSAGE);
    return { status: "empty", message: NO_DATA_MESSAGE, filters, metadata: metadata(0) };
  }

  const requested = [...new Set(options.views ?? ALL_VIEWS)];
  const views = buildViews(
    requested,
    filtered,
    options.densityBins === undefined ? {} : { densityBins: options.densityBins }
  );
  const failed = views.filter((outcome) => outcome.status === "schema-invalid");
  for (const outcome of failed) {
    log.warn({ outcome }, "View skipped: schema invalid");
  }

  return {
    status: "ok",
    filters,
    kpis: computeKpis(filtered),
    views,
    metadata: metadata(failed.length),
  };
}

export function runDashboard(config: DashboardServiceConfig): DashboardResult {
  const store = loadDashboard(config);
  return recompute(store, config.filters, { views: config.views, densityBins: config.densityBins });
}
