#!/usr/bin/env node
import path from "path";
import { binCountSchema, config } from "../../config/env";
import { ALL_VIEWS, FilterSpec, Kpis, ViewName, ViewOutcome, ViewTable } from "../../core/entities";
import { DashboardResult, runDashboard } from "../../services/DashboardService";

interface CliArgs {
  source: string;
  format: "table" | "json";
  filters: FilterSpec;
  views: readonly ViewName[];
  bins: number;
}

class UsageError extends Error {}

const VIEW_NAMES = new Set<string>(ALL_VIEWS);

function isViewName(value: string): value is ViewName {
  return VIEW_NAMES.has(value);
}

function splitList(value: string): string[] {
  return value.split(",").map((v) => v.trim()).filter(Boolean);
}

export function parseArgs(argv: string[]): CliArgs | "help" {
  const args: CliArgs = {
    source: config.sourcePath,
    format: "table",
    filters: {},
    views: config.views,
    bins: config.densityBins,
  };

  for (let i = 2; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--help") return "help";

    const value = argv[++i];
    if (value === undefined) {
      throw new UsageError(`Missing value for ${flag}`);
    }

    switch (flag) {
      case "--source":
        args.source = value;
        break;
      case "--format":
        if (value !== "table" && value !== "json") {
          throw new UsageError(`Unknown format: ${value}`);
        }
        args.format = value;
        break;
      case "--days":
        args.filters = { ...args.filters, days: splitList(value) };
        break;
      case "--seasons":
        args.filters = { ...args.filters, seasons: splitList(value) };
        break;
      case "--months":
        args.filters = { ...args.filters, months: splitList(value) };
        break;
      case "--from":
        args.filters = { ...args.filters, dateFrom: value };
        break;
      case "--to":
        args.filters = { ...args.filters, dateTo: value };
        break;
      case "--views": {
        const names = splitList(value);
        const unknown = names.filter((name) => !isViewName(name));
        if (unknown.length > 0) {
          throw new UsageError(`Unknown view(s): ${unknown.join(", ")}`);
        }
        args.views = names.filter(isViewName);
        break;
      }
      case "--bins": {
        const parsed = binCountSchema.safeParse(value);
        if (!parsed.success) {
          throw new UsageError(`Invalid bin count: ${value}`);
        }
        args.bins = parsed.data;
        break;
      }
      default:
        throw new UsageError(`Unknown argument: ${flag}`);
    }
  }

  return args;
}

function printUsage(): void {
  console.log(`
Usage: retail-dashboard [options]

Options:
  --source <path>        Transactions CSV (default: ${config.sourcePath})
  --days <list>          Weekdays to keep, comma separated (default: all present)
  --seasons <list>       Seasons to keep (default: all present)
  --months <list>        Month buckets to keep, YYYY-MM (default: all present)
  --from <YYYY-MM-DD>    First date, inclusive (default: earliest date)
  --to <YYYY-MM-DD>      Last date, inclusive (default: latest date)
  --views <list>         Views to build (default: all)
                         ${ALL_VIEWS.join(", ")}
  --bins <n>             Traffic bins for the density view (default: ${config.densityBins})
  --format <table|json>  Output format (default: table)
  --help                 Show this help message
`);
}

function formatCell(value: unknown): string {
  if (typeof value === "number") {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  return String(value);
}

export function renderTable(table: ViewTable): string[] {
  const header = table.columns;
  const body = table.rows.map((row) => {
    const cells: Record<string, unknown> = { ...row };
    return header.map((col) => formatCell(cells[col]));
  });
  const widths = header.map((col, c) => Math.max(col.length, ...body.map((cells) => cells[c].length)));
  const line = (cells: readonly string[]) => "  " + cells.map((cell, c) => cell.padEnd(widths[c])).join("  ");

  const lines = [line(header), "  " + widths.map((w) => "-".repeat(w)).join("  "), ...body.map(line)];
  for (const entry of table.excluded) {
    lines.push(`  (excluded ${entry.key}: ${entry.reason})`);
  }
  return lines;
}

function renderKpis(kpis: Kpis): string[] {
  const sales = kpis.totalSales === null ? "n/a" : `$${kpis.totalSales.toLocaleString("en-US", { maximumFractionDigits: 0 })}`;
  const conversion = kpis.avgConversionPct === null ? "n/a" : `${kpis.avgConversionPct.toFixed(2)}%`;
  const lines = [
    `  Records:             ${kpis.recordCount.toLocaleString("en-US")}`,
    `  Total sales:         ${sales}`,
    `  Avg conversion rate: ${conversion}`,
  ];
  if (kpis.gauge) {
    const sign = kpis.gauge.deltaPp >= 0 ? "+" : "";
    lines.push(`  vs ${kpis.gauge.reference}% target:       ${sign}${kpis.gauge.deltaPp.toFixed(2)} pp (gauge max ${kpis.gauge.max}%)`);
  }
  return lines;
}

function renderOutcome(outcome: ViewOutcome): string[] {
  if (outcome.status === "schema-invalid") {
    return [`\n${outcome.view.toUpperCase()}`, `  ${outcome.message}`];
  }
  return [`\n${outcome.table.title.toUpperCase()} (${outcome.table.view})`, ...renderTable(outcome.table)];
}

function formatTableOutput(result: DashboardResult): void {
  const line = "=".repeat(56);

  console.log(`\n${line}`);
  console.log(" RETAIL DASHBOARD");
  console.log(` Generated: ${new Date().toISOString()}`);
  console.log(line);

  console.log(`\nDATA SUMMARY`);
  console.log(`  Records loaded:   ${result.metadata.recordsLoaded}`);
  console.log(`  Records filtered: ${result.metadata.recordsFiltered}`);
  console.log(`  Rows skipped:     ${result.metadata.rowsSkipped}`);
  console.log(`  Execution time:   ${result.metadata.executionTimeMs}ms`);

  if (result.status === "empty") {
    console.log(`\n  ${result.message}.`);
    console.log(`${line}\n`);
    return;
  }

  console.log(`\nKPIS`);
  for (const kpiLine of renderKpis(result.kpis)) console.log(kpiLine);

  for (const outcome of result.views) {
    for (const outputLine of renderOutcome(outcome)) console.log(outputLine);
  }

  console.log(`\n${line}\n`);
}

/** Run the CLI against `argv` and return the process exit code. */
export function run(argv: string[]): number {
  try {
    const args = parseArgs(argv);
    if (args === "help") {
      printUsage();
      return 0;
    }

    const result = runDashboard({
      sourcePath: path.resolve(args.source),
      filters: args.filters,
      views: args.views,
      densityBins: args.bins,
    });

    if (args.format === "json") {
      console.log(JSON.stringify(result, null, 2));
    } else {
      formatTableOutput(result);
    }

    // 1 if any requested view could not be built
    return result.metadata.viewsFailed > 0 ? 1 : 0;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      printUsage();
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 2;
  }
}

if (require.main === module) {
  process.exit(run(process.argv));
}
