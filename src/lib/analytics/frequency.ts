/**
 * Frequency Segmentation
 *
 * Buckets the customers active in a period by how many distinct orders they
 * placed in it, to show who carries the revenue and who visits once.
 */

import { buildCustomerSnapshots } from "./snapshots";
import type { NormalizedDataset } from "./types";
import { formatNumber, formatPercentage, percentOf } from "../utils";

export interface FrequencyBucket {
  label: string; // "=3" or ">10"
  kind: "exact" | "overflow";
  orderCount: number; // exact count, or cap + 1 for the overflow bucket
  customerCount: number;
  revenueSum: number;
  orderSum: number;
  customerShare: number; // % of period customers
  revenueShare: number; // % of period revenue
  orderShare: number; // % of period orders
  avgRevenuePerCustomer: number;
  avgOrderValue: number;
}

export interface FrequencySummary {
  totalCustomers: number;
  totalRevenue: number;
  totalOrders: number;
  oneTimeCustomers: number;
  oneTimeCustomerShare: number;
  oneTimeRevenueShare: number;
  highFrequencyCustomers: number;
  highFrequencyRevenueShare: number;
  insights: string[];
}

export interface FrequencySummaryOptions {
  /** Order count from which a customer counts as high-frequency */
  highFrequencyFrom?: number;
}

interface BucketTotals {
  customerCount: number;
  revenueSum: number;
  orderSum: number;
}

/**
 * Segment the period's customers by order count. Buckets `=1` up to
 * `=min(cap, highest count)` are always present; `>cap` only when someone
 * exceeds the cap. Revenue is revenue inside the period.
 */
export function segmentByFrequency(
  dataset: NormalizedDataset,
  period: string,
  cap = 10,
): FrequencyBucket[] {
  const snapshots = buildCustomerSnapshots(dataset, period);
  if (snapshots.length === 0) {
    return [];
  }

  const exact = new Map<number, BucketTotals>();
  const overflow: BucketTotals = { customerCount: 0, revenueSum: 0, orderSum: 0 };
  let maxCount = 0;

  for (const snapshot of snapshots) {
    maxCount = Math.max(maxCount, snapshot.orderCount);
    const totals =
      snapshot.orderCount > cap
        ? overflow
        : exact.get(snapshot.orderCount) ?? { customerCount: 0, revenueSum: 0, orderSum: 0 };
    totals.customerCount++;
    totals.revenueSum += snapshot.totalRevenue;
    totals.orderSum += snapshot.orderCount;
    if (snapshot.orderCount <= cap) {
      exact.set(snapshot.orderCount, totals);
    }
  }

  const totalCustomers = snapshots.length;
  const totalRevenue = snapshots.reduce((sum, s) => sum + s.totalRevenue, 0);
  const totalOrders = snapshots.reduce((sum, s) => sum + s.orderCount, 0);

  const toBucket = (
    label: string,
    kind: FrequencyBucket["kind"],
    orderCount: number,
    totals: BucketTotals,
  ): FrequencyBucket => ({
    label,
    kind,
    orderCount,
    ...totals,
    customerShare: percentOf(totals.customerCount, totalCustomers),
    revenueShare: percentOf(totals.revenueSum, totalRevenue),
    orderShare: percentOf(totals.orderSum, totalOrders),
    avgRevenuePerCustomer:
      totals.customerCount > 0 ? totals.revenueSum / totals.customerCount : 0,
    avgOrderValue: totals.orderSum > 0 ? totals.revenueSum / totals.orderSum : 0,
  });

  const buckets: FrequencyBucket[] = [];
  for (let count = 1; count <= Math.min(cap, maxCount); count++) {
    buckets.push(
      toBucket(
        `=${count}`,
        "exact",
        count,
        exact.get(count) ?? { customerCount: 0, revenueSum: 0, orderSum: 0 },
      ),
    );
  }

  if (overflow.customerCount > 0) {
    buckets.push(toBucket(`>${cap}`, "overflow", cap + 1, overflow));
  }

  return buckets;
}

/**
 * Headline figures for the one-time-buyer trap and the high-frequency core.
 */
export function summarizeFrequency(
  buckets: readonly FrequencyBucket[],
  options: FrequencySummaryOptions = {},
): FrequencySummary {
  const { highFrequencyFrom = 8 } = options;

  const totalCustomers = buckets.reduce((sum, b) => sum + b.customerCount, 0);
  const totalRevenue = buckets.reduce((sum, b) => sum + b.revenueSum, 0);
  const totalOrders = buckets.reduce((sum, b) => sum + b.orderSum, 0);

  const oneTime = buckets.find((b) => b.kind === "exact" && b.orderCount === 1);
  const highFrequency = buckets.filter((b) => b.orderCount >= highFrequencyFrom);
  const highFrequencyCustomers = highFrequency.reduce(
    (sum, b) => sum + b.customerCount,
    0,
  );
  const highFrequencyRevenue = highFrequency.reduce(
    (sum, b) => sum + b.revenueSum,
    0,
  );

  const summary: FrequencySummary = {
    totalCustomers,
    totalRevenue,
    totalOrders,
    oneTimeCustomers: oneTime?.customerCount ?? 0,
    oneTimeCustomerShare: oneTime?.customerShare ?? 0,
    oneTimeRevenueShare: oneTime?.revenueShare ?? 0,
    highFrequencyCustomers,
    highFrequencyRevenueShare: percentOf(highFrequencyRevenue, totalRevenue),
    insights: [],
  };

  if (totalCustomers === 0) {
    return summary;
  }

  summary.insights.push(
    `One-time customers: ${formatNumber(summary.oneTimeCustomers)} ` +
      `(${formatPercentage(summary.oneTimeCustomerShare)} of customers) ` +
      `bring ${formatPercentage(summary.oneTimeRevenueShare)} of revenue`,
  );
  summary.insights.push(
    `Customers with ${highFrequencyFrom}+ orders: ` +
      `${formatNumber(highFrequencyCustomers)} bring ` +
      `${formatPercentage(summary.highFrequencyRevenueShare)} of revenue`,
  );

  return summary;
}
