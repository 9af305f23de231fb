/**
 * Analytics Engine
 *
 * Owns the current normalized dataset and serves every analyzer from it.
 * Results are memoized per (dataset, parameters); loading a new set of
 * tables replaces the dataset and drops every cached result.
 */

import { MemoTable, deepFreeze } from "./cache";
import {
  cohortFlow,
  findMagicNumber,
  repurchaseCurve,
  visitSurvival,
  type CohortFlow,
  type MagicNumberResult,
  type RepurchaseCurve,
  type SurvivalPoint,
} from "./retention";
import {
  attributeProducts,
  classifyBcg,
  type BcgResult,
  type ProductAttributionResult,
} from "./attribution";
import { buildCohortMatrix, type RetentionMatrix } from "./cohorts";
import {
  isPeriodLabel,
  resolveEngineConfig,
  type EngineConfig,
} from "./config";
import {
  ConfigError,
  InsufficientDataError,
  isAnalyticsError,
  runAnalyzer,
  toFailure,
  type AnalyzerResult,
} from "./errors";
import {
  segmentByFrequency,
  summarizeFrequency,
  type FrequencyBucket,
  type FrequencySummary,
} from "./frequency";
import { normalize } from "./normalize";
import { scoreRfm, type RfmResult } from "./rfm";
import type { IngestDiagnostics, NormalizedDataset, RawTable } from "./types";

export interface FrequencyReport {
  period: string;
  buckets: FrequencyBucket[];
  summary: FrequencySummary;
}

export interface SurvivalReport {
  period: string;
  points: SurvivalPoint[];
  magicNumber: MagicNumberResult;
}

export interface AnalyticsReport {
  datasetId: string | null;
  frequency: AnalyzerResult<FrequencyReport>;
  survival: AnalyzerResult<SurvivalReport>;
  cohortFlow: AnalyzerResult<CohortFlow>;
  repurchase: AnalyzerResult<RepurchaseCurve>;
  rfm: AnalyzerResult<RfmResult>;
  attribution: AnalyzerResult<ProductAttributionResult>;
  bcg: AnalyzerResult<BcgResult>;
  cohortMatrix: AnalyzerResult<RetentionMatrix>;
}

export type AnalyzerName = Exclude<keyof AnalyticsReport, "datasetId">;

const NO_DATASET = deepFreeze<AnalyzerResult<never>>({
  ok: false,
  error: { kind: "EmptyDatasetError", message: "No dataset loaded" },
});

export class AnalyticsEngine {
  readonly config: EngineConfig;
  private dataset: NormalizedDataset | null = null;

  private readonly memo: { [K in AnalyzerName]: MemoTable<AnalyticsReport[K]> } = {
    frequency: new MemoTable<AnalyzerResult<FrequencyReport>>(),
    survival: new MemoTable<AnalyzerResult<SurvivalReport>>(),
    cohortFlow: new MemoTable<AnalyzerResult<CohortFlow>>(),
    repurchase: new MemoTable<AnalyzerResult<RepurchaseCurve>>(),
    rfm: new MemoTable<AnalyzerResult<RfmResult>>(),
    attribution: new MemoTable<AnalyzerResult<ProductAttributionResult>>(),
    bcg: new MemoTable<AnalyzerResult<BcgResult>>(),
    cohortMatrix: new MemoTable<AnalyzerResult<RetentionMatrix>>(),
  };

  /**
   * @throws ConfigError when the configuration does not validate
   */
  constructor(config: unknown = {}) {
    this.config = resolveEngineConfig(config);
  }

  get current(): NormalizedDataset | null {
    return this.dataset;
  }

  /**
   * Replace the dataset with the normalization of `tables`. A failed load
   * leaves no dataset behind, so later analyzer calls fail instead of
   * reporting on stale data.
   */
  ingest(tables: readonly RawTable[]): AnalyzerResult<IngestDiagnostics> {
    this.invalidate();
    this.dataset = null;

    let dataset: NormalizedDataset;
    try {
      dataset = normalize(tables, this.config);
    } catch (error) {
      if (!isAnalyticsError(error)) {
        throw error;
      }
      console.error(`[Analytics] Ingestion failed (${error.kind}): ${error.message}`);
      return { ok: false, error: toFailure(error) };
    }

    this.dataset = dataset;
    return { ok: true, data: dataset.diagnostics };
  }

  invalidate(): void {
    for (const table of Object.values(this.memo)) {
      table.clear();
    }
  }

  cacheStats(): Record<AnalyzerName, { size: number; hits: number }> {
    const stats = (table: { size: number; hits: number }) => ({
      size: table.size,
      hits: table.hits,
    });
    return {
      frequency: stats(this.memo.frequency),
      survival: stats(this.memo.survival),
      cohortFlow: stats(this.memo.cohortFlow),
      repurchase: stats(this.memo.repurchase),
      rfm: stats(this.memo.rfm),
      attribution: stats(this.memo.attribution),
      bcg: stats(this.memo.bcg),
      cohortMatrix: stats(this.memo.cohortMatrix),
    };
  }

  frequency(period?: string): AnalyzerResult<FrequencyReport> {
    return this.analyze(this.memo.frequency, "frequency", { period }, (dataset) => {
      const resolved = this.resolvePeriod(dataset, period);
      const buckets = segmentByFrequency(dataset, resolved, this.config.frequencyCap);
      return {
        period: resolved,
        buckets,
        summary: summarizeFrequency(buckets, {
          highFrequencyFrom: this.config.highFrequencyFrom,
        }),
      };
    });
  }

  visitSurvival(period?: string): AnalyzerResult<SurvivalReport> {
    return this.analyze(this.memo.survival, "visitSurvival", { period }, (dataset) => {
      const resolved = this.resolvePeriod(dataset, period);
      const points = visitSurvival(dataset, resolved, this.config.maxVisits);
      return {
        period: resolved,
        points,
        magicNumber: findMagicNumber(points, {
          flatteningThreshold: this.config.flatteningThreshold,
        }),
      };
    });
  }

  cohortFlow(basePeriod?: string): AnalyzerResult<CohortFlow> {
    return this.analyze(this.memo.cohortFlow, "cohortFlow", { basePeriod }, (dataset) =>
      cohortFlow(
        dataset,
        this.resolveBasePeriod(dataset, basePeriod),
        this.config.vipThreshold,
      ),
    );
  }

  repurchaseCurve(basePeriod?: string): AnalyzerResult<RepurchaseCurve> {
    return this.analyze(this.memo.repurchase, "repurchaseCurve", { basePeriod }, (dataset) =>
      repurchaseCurve(dataset, this.resolveBasePeriod(dataset, basePeriod), {
        maxFrequency: this.config.frequencyCap,
        threshold: this.config.repurchaseThreshold,
      }),
    );
  }

  rfm(referenceDate?: Date): AnalyzerResult<RfmResult> {
    const reference = referenceDate ?? this.config.referenceDate;
    return this.analyze(this.memo.rfm, "rfm", { reference }, (dataset) =>
      scoreRfm(dataset, { referenceDate: reference }),
    );
  }

  productAttribution(minSample?: number): AnalyzerResult<ProductAttributionResult> {
    const sample = minSample ?? this.config.minSample;
    return this.analyze(this.memo.attribution, "productAttribution", { sample }, (dataset) =>
      attributeProducts(dataset, sample),
    );
  }

  bcg(period?: string, minOrders?: number): AnalyzerResult<BcgResult> {
    const threshold = minOrders ?? this.config.minOrders;
    return this.analyze(this.memo.bcg, "bcg", { period, threshold }, (dataset) =>
      classifyBcg(dataset, this.resolvePeriod(dataset, period), threshold),
    );
  }

  cohortMatrix(): AnalyzerResult<RetentionMatrix> {
    return this.analyze(this.memo.cohortMatrix, "cohortMatrix", {}, (dataset) =>
      buildCohortMatrix(dataset),
    );
  }

  /**
   * Run every analyzer. Each result stands alone: one analyzer lacking data
   * does not affect the others. An explicit `period` is also the base of the
   * cross-period analyses, which then follow it into the next period.
   */
  report(period?: string): AnalyticsReport {
    return {
      datasetId: this.dataset?.id ?? null,
      frequency: this.frequency(period),
      survival: this.visitSurvival(period),
      cohortFlow: this.cohortFlow(period),
      repurchase: this.repurchaseCurve(period),
      rfm: this.rfm(),
      attribution: this.productAttribution(),
      bcg: this.bcg(period),
      cohortMatrix: this.cohortMatrix(),
    };
  }

  private analyze<T>(
    table: MemoTable<AnalyzerResult<T>>,
    name: string,
    params: Record<string, unknown>,
    fn: (dataset: NormalizedDataset) => T,
  ): AnalyzerResult<T> {
    const dataset = this.dataset;
    if (!dataset) {
      return NO_DATASET;
    }
    return table.get(dataset.id, params, () => runAnalyzer(name, () => fn(dataset)));
  }

  /**
   * Explicit period, else the configured one, else the latest period with
   * data.
   */
  private resolvePeriod(dataset: NormalizedDataset, period?: string): string {
    const resolved = period ?? this.config.period ?? dataset.periods.at(-1);
    if (resolved === undefined) {
      throw new InsufficientDataError("Dataset has no transactions with a known date");
    }
    if (!isPeriodLabel(resolved, dataset.granularity)) {
      throw new ConfigError(
        `Period "${resolved}" does not match ${dataset.granularity} granularity`,
        { period: resolved, granularity: dataset.granularity },
      );
    }
    return resolved;
  }

  /**
   * Cross-period analyses default to the period before the latest one.
   */
  private resolveBasePeriod(dataset: NormalizedDataset, basePeriod?: string): string {
    if (basePeriod !== undefined) {
      return this.resolvePeriod(dataset, basePeriod);
    }
    const latest = this.resolvePeriod(dataset, undefined);
    const index = dataset.periods.indexOf(latest);
    return index > 0 ? dataset.periods[index - 1] : latest;
  }
}

export function createAnalyticsEngine(config: unknown = {}): AnalyticsEngine {
  return new AnalyticsEngine(config);
}
