import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  AnalyticsEngine,
  ConfigError,
  InsufficientDataError,
  createAnalyticsEngine,
  runAnalyzer,
  type RawTable,
} from "@/lib/analytics";
import { orders, row, table } from "./fixtures";

function twoYears(): RawTable[] {
  return [
    table([
      ...orders("A", 6, "2023-01-01"),
      ...orders("B", 1, "2023-02-01"),
      ...orders("C", 2, "2023-03-01"),
      ...orders("A", 6, "2024-01-01"),
      ...orders("B", 1, "2024-02-01"),
      ...orders("D", 3, "2024-03-01"),
    ]),
  ];
}

describe("AnalyticsEngine", () => {
  let engine: AnalyticsEngine;

  beforeEach(() => {
    engine = createAnalyticsEngine();
  });

  describe("construction", () => {
    it("should reject an invalid configuration", () => {
      expect(() => new AnalyticsEngine({ granularity: "day" })).toThrow(ConfigError);
    });
  });

  describe("without a dataset", () => {
    it("should fail every analyzer", () => {
      expect(engine.frequency()).toEqual({
        ok: false,
        error: { kind: "EmptyDatasetError", message: "No dataset loaded" },
      });
      expect(engine.report().datasetId).toBeNull();
      expect(engine.report().rfm.ok).toBe(false);
    });
  });

  describe("ingest", () => {
    it("should return the ingestion diagnostics", () => {
      const result = engine.ingest(twoYears());

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.data.rowCount).toBe(19);
      }
      expect(engine.current?.periods).toEqual(["2023", "2024"]);
    });

    it("should report a schema failure and drop the previous dataset", () => {
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
      engine.ingest(twoYears());

      const result = engine.ingest([{ name: "broken", rows: [{ order_id: "O1" }] }]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("SchemaError");
        expect(result.error.details).toEqual({
          table: "broken",
          missing: ["timestamp", "customer_id", "product", "amount"],
        });
      }
      expect(errorSpy).toHaveBeenCalledWith(
        "[Analytics] Ingestion failed (SchemaError): " +
          'Table "broken" is missing required columns: timestamp, customer_id, product, amount',
      );
      expect(engine.current).toBeNull();
      expect(engine.frequency().ok).toBe(false);
      errorSpy.mockRestore();
    });
  });

  describe("period defaults", () => {
    beforeEach(() => {
      engine.ingest(twoYears());
    });

    it("should analyze the latest period by default", () => {
      const result = engine.frequency();

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.data.period).toBe("2024");
        expect(result.data.buckets.map((b) => b.customerCount)).toEqual([1, 0, 1, 0, 0, 1]);
      }
    });

    it("should use the period before the latest as the flow base", () => {
      const result = engine.cohortFlow();

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.data.basePeriod).toBe("2023");
        expect(result.data.vipCount).toBe(1);
        expect(result.data.retained).toBe(1);
      }
    });

    it("should prefer the configured period", () => {
      const configured = createAnalyticsEngine({ period: "2023" });
      configured.ingest(twoYears());
      const result = configured.frequency();

      expect(result.ok && result.data.period).toBe("2023");
    });

    it("should reject a period of the wrong granularity", () => {
      const result = engine.frequency("2024-01");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("ConfigError");
      }
    });
  });

  describe("report", () => {
    it("should isolate analyzers that lack data", () => {
      engine.ingest([table(orders("A", 3, "2024-01-01"))]);
      const report = engine.report();

      expect(report.cohortFlow).toEqual({
        ok: false,
        error: {
          kind: "InsufficientPeriodsError",
          message: "No transactions in 2025, the period after 2024",
          details: { basePeriod: "2024", nextPeriod: "2025" },
        },
      });
      expect(report.repurchase.ok).toBe(false);
      expect(report.frequency.ok).toBe(true);
      expect(report.survival.ok).toBe(true);
      expect(report.rfm.ok).toBe(true);
      expect(report.attribution.ok).toBe(true);
      expect(report.bcg.ok).toBe(true);
      expect(report.cohortMatrix.ok).toBe(true);
    });

    it("should flag degraded RFM without failing it", () => {
      engine.ingest([table(orders("A", 3, "2024-01-01"))]);
      const { rfm } = engine.report();

      expect(rfm.ok && rfm.data.rfmDegraded).toBe(true);
    });

    it("should use an explicit period as the flow base", () => {
      engine.ingest([
        table([
          ...orders("A", 6, "2022-01-01"),
          ...orders("A", 6, "2023-01-01"),
          ...orders("B", 1, "2023-02-01"),
          ...orders("A", 2, "2024-01-01"),
          ...orders("B", 1, "2024-02-01"),
          ...orders("A", 1, "2025-01-01"),
        ]),
      ]);
      const report = engine.report("2023");

      expect(report.frequency.ok && report.frequency.data.period).toBe("2023");
      expect(report.cohortFlow.ok).toBe(true);
      if (report.cohortFlow.ok) {
        expect(report.cohortFlow.data.basePeriod).toBe("2023");
        expect(report.cohortFlow.data.nextPeriod).toBe("2024");
        expect(report.cohortFlow.data.downgraded).toBe(1);
      }
      expect(report.repurchase.ok).toBe(true);
      if (report.repurchase.ok) {
        expect(report.repurchase.data.basePeriod).toBe("2023");
        expect(report.repurchase.data.points.map((p) => p.repurchaseRate)).toEqual([1, 1]);
      }
    });

    it("should carry the dataset id", () => {
      engine.ingest(twoYears());
      expect(engine.report().datasetId).toBe(engine.current?.id);
    });
  });

  describe("caching", () => {
    beforeEach(() => {
      engine.ingest(twoYears());
    });

    it("should return the memoized result for the same parameters", () => {
      const first = engine.rfm();
      const second = engine.rfm();

      expect(second).toBe(first);
      expect(engine.cacheStats().rfm).toEqual({ size: 1, hits: 1 });
    });

    it("should not let callers change a cached result", () => {
      const first = engine.rfm();
      expect(first.ok).toBe(true);
      if (!first.ok) return;

      const record = first.data.records[0];
      const score = record.rScore;
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(first.data.records)).toBe(true);
      expect(() => {
        record.rScore = 99;
      }).toThrow(TypeError);

      const again = engine.rfm();
      expect(again.ok && again.data.records[0].rScore).toBe(score);
    });

    it("should cache each parameter set separately", () => {
      engine.frequency("2023");
      engine.frequency("2024");
      engine.bcg("2024", 1);
      engine.bcg("2024", 2);

      expect(engine.cacheStats().frequency.size).toBe(2);
      expect(engine.cacheStats().bcg.size).toBe(2);
    });

    it("should key dates by value", () => {
      engine.rfm(new Date("2024-06-01T00:00:00Z"));
      engine.rfm(new Date("2024-06-01T00:00:00Z"));

      expect(engine.cacheStats().rfm).toEqual({ size: 1, hits: 1 });
    });

    it("should drop every cached result on ingest", () => {
      engine.report();
      expect(engine.cacheStats().cohortMatrix.size).toBe(1);

      engine.ingest(twoYears());

      const stats = engine.cacheStats();
      expect(Object.values(stats).every((entry) => entry.size === 0)).toBe(true);
    });

    it("should cache failures too", () => {
      engine.ingest([table(orders("A", 3, "2024-01-01"))]);
      const first = engine.cohortFlow();

      expect(engine.cohortFlow()).toBe(first);
    });
  });
});

describe("runAnalyzer", () => {
  it("should wrap analytics errors", () => {
    const result = runAnalyzer("test", () => {
      throw new InsufficientDataError("not enough rows", { rows: 0 });
    });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "InsufficientDataError",
        message: "not enough rows",
        details: { rows: 0 },
      },
    });
    expect(console.warn).toHaveBeenCalledWith(
      "[Analytics] test unavailable (InsufficientDataError): not enough rows",
    );
  });

  it("should rethrow anything else", () => {
    expect(() =>
      runAnalyzer("test", () => {
        throw new TypeError("boom");
      }),
    ).toThrow(TypeError);
  });

  it("should pass results through", () => {
    expect(runAnalyzer("test", () => 42)).toEqual({ ok: true, data: 42 });
  });
});

describe("ingestion from raw exports", () => {
  it("should accept numeric cells and currency strings", () => {
    const engine = createAnalyticsEngine({ granularity: "month" });
    const result = engine.ingest([
      table([
        { order_id: 1001, customer_id: 7, timestamp: "2024-04-02 09:30", product: "Facial", amount: "$1,200" },
        { order_id: 1002, customer_id: 7, timestamp: "2024-05-02 09:30", product: "Facial", amount: "300" },
        row("1003", "8", "2024-05-03 09:30", "Nails", 80),
      ]),
    ]);

    expect(result.ok).toBe(true);
    expect(engine.current?.periods).toEqual(["2024-04", "2024-05"]);
    expect(engine.current?.rows.map((r) => [r.customerId, r.visitIndex, r.amount])).toEqual([
      ["7", 1, 1200],
      ["7", 2, 300],
      ["8", 1, 80],
    ]);
  });
});
