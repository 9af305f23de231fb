/**
 * Cohort Analysis
 *
 * Group customers by the period of their first purchase and track how many
 * of them are active, and how much they spend, in each later period.
 */

import type { Granularity } from "./config";
import { buildCustomerProfiles } from "./snapshots";
import { UNKNOWN_PERIOD, comparePeriods, periodOffset } from "./periods";
import type { NormalizedDataset } from "./types";

export interface CohortRow {
  cohortPeriod: string; // YYYY or YYYY-MM
  cohortSize: number;
  /** Indexed by period offset; 0 = acquisition period */
  activeCustomers: number[];
  retention: number[]; // activeCustomers / cohortSize, 0-1
  revenue: number[];
  cumulativeRevenuePerCustomer: number[];
}

export interface RetentionMatrix {
  granularity: Granularity;
  maxOffset: number;
  cohorts: CohortRow[];
}

/**
 * Build the retention matrix. Cohorts are always lifetime-first periods;
 * customers whose purchase dates are all unknown belong to no cohort.
 * Offsets run up to the dataset's last known period, so a cohort's trailing
 * cells are 0 when its customers went quiet.
 */
export function buildCohortMatrix(dataset: NormalizedDataset): RetentionMatrix {
  const lastPeriod = dataset.periods[dataset.periods.length - 1];

  const cohortOf = new Map<string, string>();
  const members = new Map<string, number>();
  for (const profile of buildCustomerProfiles(dataset).values()) {
    if (profile.firstPeriod === null) continue;
    cohortOf.set(profile.customerId, profile.firstPeriod);
    members.set(profile.firstPeriod, (members.get(profile.firstPeriod) ?? 0) + 1);
  }

  const active = new Map<string, Map<number, Set<string>>>();
  const revenue = new Map<string, Map<number, number>>();

  for (const row of dataset.rows) {
    if (row.period === UNKNOWN_PERIOD) continue;
    const cohort = cohortOf.get(row.customerId);
    if (cohort === undefined) continue;
    const offset = periodOffset(cohort, row.period);

    const activeByOffset = active.get(cohort) ?? new Map<number, Set<string>>();
    const set = activeByOffset.get(offset) ?? new Set<string>();
    set.add(row.customerId);
    activeByOffset.set(offset, set);
    active.set(cohort, activeByOffset);

    const revenueByOffset = revenue.get(cohort) ?? new Map<number, number>();
    revenueByOffset.set(offset, (revenueByOffset.get(offset) ?? 0) + row.amount);
    revenue.set(cohort, revenueByOffset);
  }

  const cohorts: CohortRow[] = [...members.entries()]
    .filter(([, size]) => size > 0)
    .sort(([a], [b]) => comparePeriods(a, b))
    .map(([cohortPeriod, cohortSize]) => {
      const span = lastPeriod ? periodOffset(cohortPeriod, lastPeriod) : 0;
      const row: CohortRow = {
        cohortPeriod,
        cohortSize,
        activeCustomers: [],
        retention: [],
        revenue: [],
        cumulativeRevenuePerCustomer: [],
      };

      let cumulative = 0;
      for (let offset = 0; offset <= span; offset++) {
        const activeCount = active.get(cohortPeriod)?.get(offset)?.size ?? 0;
        const periodRevenue = revenue.get(cohortPeriod)?.get(offset) ?? 0;
        cumulative += periodRevenue;

        row.activeCustomers.push(activeCount);
        row.retention.push(activeCount / cohortSize);
        row.revenue.push(periodRevenue);
        row.cumulativeRevenuePerCustomer.push(cumulative / cohortSize);
      }
      return row;
    });

  return {
    granularity: dataset.granularity,
    maxOffset: cohorts.reduce(
      (max, cohort) => Math.max(max, cohort.retention.length - 1),
      0,
    ),
    cohorts,
  };
}

/**
 * Calculate average retention curve across all cohorts
 */
export function getAverageRetentionCurve(
  matrix: RetentionMatrix,
): { offset: number; avgRetention: number; cohorts: number }[] {
  const result: { offset: number; avgRetention: number; cohorts: number }[] = [];

  for (let offset = 0; offset <= matrix.maxOffset; offset++) {
    const rates = matrix.cohorts
      .filter((cohort) => cohort.retention[offset] !== undefined)
      .map((cohort) => cohort.retention[offset]);

    if (rates.length > 0) {
      const avg = rates.reduce((sum, rate) => sum + rate, 0) / rates.length;
      result.push({ offset, avgRetention: avg, cohorts: rates.length });
    }
  }

  return result;
}
