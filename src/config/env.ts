/**
 * Zod-validated environment configuration.
 * Every value has a default, so an empty environment is valid.
 */
import { z } from "zod";
import { ALL_VIEWS, ViewName } from "../core/entities";

const viewList = z
  .string()
  .transform((raw) => raw.split(",").map((v) => v.trim()).filter(Boolean))
  .pipe(z.array(z.nativeEnum(ViewName)).min(1));

export const binCountSchema = z.coerce.number().int().min(1).max(100);

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  // ── Dashboard ──
  DASHBOARD_SOURCE: z.string().min(1).default("data/retail_store_sales.csv"),
  DASHBOARD_VIEWS: viewList.optional(),
  DENSITY_BIN_COUNT: binCountSchema.default(8),
});

export type Env = z.infer<typeof envSchema>;

export interface DashboardConfig {
  nodeEnv: Env["NODE_ENV"];
  logLevel: NonNullable<Env["LOG_LEVEL"]>;
  sourcePath: string;
  views: readonly ViewName[];
  densityBins: number;
}

export function loadEnv(raw: Record<string, string | undefined>): DashboardConfig {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Environment validation failed: ${issues.join("; ")}`);
  }

  const env = result.data;
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
    sourcePath: env.DASHBOARD_SOURCE,
    views: env.DASHBOARD_VIEWS ?? ALL_VIEWS,
    densityBins: env.DENSITY_BIN_COUNT,
  };
}

function defaultLogLevel(nodeEnv: Env["NODE_ENV"]): NonNullable<Env["LOG_LEVEL"]> {
  if (nodeEnv === "test") return "silent";
  return nodeEnv === "production" ? "info" : "debug";
}

export const config = loadEnv(process.env);
