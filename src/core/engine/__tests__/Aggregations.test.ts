import {
  categoryShare,
  groupMean,
  groupSum,
  meanOf,
  monthlyBucket,
  periodOverPeriodGrowth,
  quantizedBins,
  sumOf,
} from "../Aggregations";
import { CATEGORY_COLUMNS, TransactionRecord, Weekday } from "../../entities";

function makeRecord(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  return {
    date: "2025-01-06",
    month: "2025-01",
    dayOfWeek: Weekday.MONDAY,
    season: "winter",
    promoType: "none",
    measures: { total_sales: 100, customer_traffic: 200, conversion_rate: 0.25 },
    ...overrides,
  };
}

describe("Aggregations", () => {
  describe("groupMean / groupSum", () => {
    it("should emit weekdays Monday to Sunday regardless of input order", () => {
      const records = [
        makeRecord({ dayOfWeek: Weekday.SUNDAY, measures: { conversion_rate: 0.4 } }),
        makeRecord({ dayOfWeek: Weekday.WEDNESDAY, measures: { conversion_rate: 0.2 } }),
        makeRecord({ dayOfWeek: Weekday.MONDAY, measures: { conversion_rate: 0.1 } }),
        makeRecord({ dayOfWeek: Weekday.SUNDAY, measures: { conversion_rate: 0.2 } }),
      ];

      const result = groupMean(records, "day_of_week", "conversion_rate");

      expect(result.map((r) => r.key)).toEqual([Weekday.MONDAY, Weekday.WEDNESDAY, Weekday.SUNDAY]);
      expect(result[2].value).toBeCloseTo(0.3);
    });

    it("should keep canonical weekday order even when value ordering is requested", () => {
      const records = [
        makeRecord({ dayOfWeek: Weekday.FRIDAY, measures: { total_sales: 500 } }),
        makeRecord({ dayOfWeek: Weekday.TUESDAY, measures: { total_sales: 100 } }),
      ];

      const result = groupSum(records, "day_of_week", "total_sales", { order: "value-desc" });
      expect(result.map((r) => r.key)).toEqual([Weekday.TUESDAY, Weekday.FRIDAY]);
    });

    it("should emit other keys in first-seen order by default", () => {
      const records = [
        makeRecord({ season: "summer", measures: { total_sales: 10 } }),
        makeRecord({ season: "autumn", measures: { total_sales: 20 } }),
        makeRecord({ season: "summer", measures: { total_sales: 30 } }),
      ];

      expect(groupSum(records, "season", "total_sales")).toEqual([
        { key: "summer", value: 40 },
        { key: "autumn", value: 20 },
      ]);
    });

    it("should sort by value descending when requested", () => {
      const records = [
        makeRecord({ promoType: "none", measures: { customer_traffic: 100 } }),
        makeRecord({ promoType: "2x1", measures: { customer_traffic: 300 } }),
        makeRecord({ promoType: "loyalty", measures: { customer_traffic: 200 } }),
        makeRecord({ promoType: "none", measures: { customer_traffic: 200 } }),
      ];

      expect(groupMean(records, "promo_type", "customer_traffic", { order: "value-desc" })).toEqual([
        { key: "2x1", value: 300 },
        { key: "loyalty", value: 200 },
        { key: "none", value: 150 },
      ]);
    });

    it("should sort by key when requested", () => {
      const records = [
        makeRecord({ date: "2025-01-03", measures: { total_sales: 1 } }),
        makeRecord({ date: "2025-01-01", measures: { total_sales: 2 } }),
        makeRecord({ date: "2025-01-03", measures: { total_sales: 4 } }),
      ];

      expect(groupSum(records, "date", "total_sales", { order: "key" })).toEqual([
        { key: "2025-01-01", value: 2 },
        { key: "2025-01-03", value: 5 },
      ]);
    });

    it("should skip null keys and records without the measure", () => {
      const records = [
        makeRecord({ season: null, measures: { total_sales: 999 } }),
        makeRecord({ season: "winter", measures: {} }),
        makeRecord({ season: "spring", measures: {} }),
        makeRecord({ season: "winter", measures: { total_sales: 50 } }),
      ];

      expect(groupSum(records, "season", "total_sales")).toEqual([{ key: "winter", value: 50 }]);
    });

    it("should return empty array for empty input", () => {
      expect(groupMean([], "day_of_week", "conversion_rate")).toEqual([]);
    });
  });

  describe("sumOf / meanOf", () => {
    it("should ignore records missing the measure", () => {
      const records = [
        makeRecord({ measures: { total_sales: 10 } }),
        makeRecord({ measures: {} }),
        makeRecord({ measures: { total_sales: 30 } }),
      ];

      expect(sumOf(records, "total_sales")).toBe(40);
      expect(meanOf(records, "total_sales")).toBe(20);
    });

    it("should return null mean when no record carries the measure", () => {
      expect(meanOf([makeRecord({ measures: {} })], "total_sales")).toBeNull();
    });
  });

  describe("monthlyBucket", () => {
    it("should bucket by month start in chronological order", () => {
      const records = [
        makeRecord({ date: "2025-03-15" }),
        makeRecord({ date: "2024-12-31" }),
        makeRecord({ date: "2025-03-01" }),
        makeRecord({ date: "2025-01-20" }),
      ];

      const buckets = monthlyBucket(records);

      expect(buckets.map((b) => b.monthStart)).toEqual(["2024-12-01", "2025-01-01", "2025-03-01"]);
      expect(buckets[2].records.map((r) => r.date)).toEqual(["2025-03-15", "2025-03-01"]);
    });

    it("should derive buckets from date, not the month filter key", () => {
      const buckets = monthlyBucket([makeRecord({ date: "2025-02-10", month: "stale" })]);
      expect(buckets[0].monthStart).toBe("2025-02-01");
    });
  });

  describe("periodOverPeriodGrowth", () => {
    it("should drop the first period and compute percentage growth", () => {
      expect(periodOverPeriodGrowth([100, 150, 120])).toEqual([
        { index: 1, kind: "defined", growthPct: 50 },
        { index: 2, kind: "defined", growthPct: -20 },
      ]);
    });

    it("should report a zero previous period as undefined growth", () => {
      expect(periodOverPeriodGrowth([0, 10, 20])).toEqual([
        { index: 1, kind: "undefined", reason: "zero-previous-period" },
        { index: 2, kind: "defined", growthPct: 100 },
      ]);
    });

    it("should return nothing for fewer than two periods", () => {
      expect(periodOverPeriodGrowth([])).toEqual([]);
      expect(periodOverPeriodGrowth([42])).toEqual([]);
    });
  });

  describe("quantizedBins", () => {
    it("should create equal-width bins including both range ends", () => {
      const result = quantizedBins([0, 10], 8);

      expect(result.bins).toHaveLength(8);
      for (const bin of result.bins) {
        expect(bin.upper - bin.lower).toBeCloseTo(1.25);
      }
      expect(result.indices).toEqual([0, 7]);
      expect(result.labels).toEqual(["[0, 1.25)", "[8.75, 10]"]);
    });

    it("should align labels one-to-one with input values", () => {
      const result = quantizedBins([5, 0, 10, 2.5], 4);

      expect(result.indices).toEqual([2, 0, 3, 1]);
      expect(result.labels).toEqual(["[5, 7.5)", "[0, 2.5)", "[7.5, 10]", "[2.5, 5)"]);
    });

    it("should widen a zero-width range so identical values share one bin", () => {
      const result = quantizedBins([5, 5, 5], 8);
      const [first] = result.indices;

      expect(result.indices).toEqual([first, first, first]);
      expect(result.bins[first].lower).toBeLessThanOrEqual(5);
      expect(result.bins[first].upper).toBeGreaterThan(5);
    });

    it("should place values on a rounded edge inside the bin whose bounds contain them", () => {
      const result = quantizedBins([0, 0.975, 1.3], 4);

      expect(result.indices).toEqual([0, 2, 3]);
      expect(result.bins[2].lower).toBeLessThanOrEqual(0.975);
      expect(result.bins[2].upper).toBeGreaterThan(0.975);
      expect(result.labels[1]).toBe(result.bins[2].label);
    });

    it("should keep every value within its own bin bounds", () => {
      for (let binCount = 2; binCount <= 12; binCount++) {
        const values = Array.from({ length: 61 }, (_, k) => (k * 1.3) / 60);
        const { bins, indices } = quantizedBins(values, binCount);

        values.forEach((value, i) => {
          const bin = bins[indices[i]];
          const last = bin.index === binCount - 1;
          expect(bin.lower).toBeLessThanOrEqual(value);
          expect(last ? value <= bin.upper : value < bin.upper).toBe(true);
        });
      }
    });

    it("should share edges between neighbouring bins", () => {
      const { bins } = quantizedBins([0, 1.3], 7);
      for (let i = 1; i < bins.length; i++) {
        expect(bins[i].lower).toBe(bins[i - 1].upper);
      }
      expect(bins[bins.length - 1].upper).toBe(1.3);
    });

    it("should return empty output for empty input", () => {
      expect(quantizedBins([], 8)).toEqual({ bins: [], labels: [], indices: [] });
    });

    it("should reject a non-positive or fractional bin count", () => {
      expect(() => quantizedBins([1, 2], 0)).toThrow(RangeError);
      expect(() => quantizedBins([1, 2], 2.5)).toThrow(RangeError);
    });
  });

  describe("categoryShare", () => {
    it("should total each category column and strip the prefix", () => {
      const records = [
        makeRecord({
          measures: { units_carnes: 4, units_verduras: 5, units_frutas: 10, units_lacteos: 15, units_bebidas: 25 },
        }),
        makeRecord({
          measures: { units_carnes: 6, units_verduras: 15, units_frutas: 20, units_lacteos: 25, units_bebidas: 25 },
        }),
      ];

      const shares = categoryShare(records, CATEGORY_COLUMNS);

      expect(shares).toEqual([
        { category: "carnes", units: 10 },
        { category: "verduras", units: 20 },
        { category: "frutas", units: 30 },
        { category: "lacteos", units: 40 },
        { category: "bebidas", units: 50 },
      ]);
      expect(shares.reduce((sum, s) => sum + s.units, 0)).toBe(150);
    });
  });
});
