import { loadEnv } from "../env";
import { ALL_VIEWS, ViewName } from "../../core/entities";

describe("loadEnv", () => {
  it("should apply defaults to an empty environment", () => {
    expect(loadEnv({})).toEqual({
      nodeEnv: "development",
      logLevel: "debug",
      sourcePath: "data/retail_store_sales.csv",
      views: ALL_VIEWS,
      densityBins: 8,
    });
  });

  it("should pick the log level from NODE_ENV unless set", () => {
    expect(loadEnv({ NODE_ENV: "production" }).logLevel).toBe("info");
    expect(loadEnv({ NODE_ENV: "test" }).logLevel).toBe("silent");
    expect(loadEnv({ NODE_ENV: "test", LOG_LEVEL: "warn" }).logLevel).toBe("warn");
  });

  it("should parse the view list and bin count", () => {
    const config = loadEnv({
      DASHBOARD_VIEWS: "monthly-growth, category-share",
      DENSITY_BIN_COUNT: "12",
      DASHBOARD_SOURCE: "/srv/data/sales.csv",
    });

    expect(config.views).toEqual([ViewName.MONTHLY_GROWTH, ViewName.CATEGORY_SHARE]);
    expect(config.densityBins).toBe(12);
    expect(config.sourcePath).toBe("/srv/data/sales.csv");
  });

  it("should throw on invalid values", () => {
    expect(() => loadEnv({ DASHBOARD_VIEWS: "pie-chart" })).toThrow("Environment validation failed");
    expect(() => loadEnv({ DENSITY_BIN_COUNT: "0" })).toThrow("DENSITY_BIN_COUNT");
  });
});
