/**
 * Retention & Magic Number
 *
 * - Visit survival: how many customers reach their k-th visit
 * - Magic number: the visit at which the survival curve flattens
 * - Cohort flow: where a period's VIPs end up in the following period
 * - Repurchase curve: next-period repurchase rate by this period's order count
 *
 * Survival works on visit ordinals rather than elapsed time, so it describes
 * purchase progression regardless of how long customers take between orders.
 */

import { InsufficientDataError, InsufficientPeriodsError } from "./errors";
import { nextPeriod } from "./periods";
import type { NormalizedDataset } from "./types";

export interface SurvivalPoint {
  visitIndex: number;
  customers: number;
  survivalRate: number; // customers(k) / customers(1)
}

export type MagicNumberRule =
  | "insufficient-points"
  | "flattest-step"
  | "steep-throughout"
  | "repurchase-threshold";

export type MagicNumberResult =
  | {
      found: true;
      visitIndex: number;
      rule: "flattest-step";
      decline: number;
    }
  | {
      found: false;
      reason: "insufficient-points" | "steep-throughout";
    };

export interface MagicNumberOptions {
  /** Largest survival decline still counted as flat */
  flatteningThreshold?: number;
}

export interface CohortFlow {
  basePeriod: string;
  nextPeriod: string;
  vipThreshold: number;
  vipCount: number;
  lost: number; // 0 orders next period
  downgraded: number; // 1-2
  maintained: number; // 3..vipThreshold
  retained: number; // > vipThreshold
  rates: {
    lost: number;
    downgraded: number;
    maintained: number;
    retained: number;
  };
}

export interface RepurchasePoint {
  orderCount: number;
  customers: number;
  repurchased: number;
  repurchaseRate: number; // 0-1
}

export interface RepurchaseCurve {
  basePeriod: string;
  nextPeriod: string;
  threshold: number;
  points: RepurchasePoint[];
  magicNumber:
    | { found: true; orderCount: number; rate: number; rule: "repurchase-threshold" }
    | { found: false };
}

export interface RepurchaseOptions {
  maxFrequency?: number;
  /** Repurchase rate (0-1) that must be exceeded */
  threshold?: number;
}

const MIN_MAGIC_POINTS = 3;

/**
 * Distinct customers whose k-th visit falls in `period`, for k = 1..maxVisits.
 * The curve stops after the last visit index anyone reached.
 *
 * @throws InsufficientDataError when nobody made a first visit in the period
 */
export function visitSurvival(
  dataset: NormalizedDataset,
  period: string,
  maxVisits = 10,
): SurvivalPoint[] {
  const customersByVisit = new Map<number, Set<string>>();

  for (const row of dataset.rows) {
    if (row.period !== period || row.visitIndex > maxVisits) continue;
    const set = customersByVisit.get(row.visitIndex) ?? new Set<string>();
    set.add(row.customerId);
    customersByVisit.set(row.visitIndex, set);
  }

  const baseline = customersByVisit.get(1)?.size ?? 0;
  if (baseline === 0) {
    throw new InsufficientDataError(
      `No customers made their first visit in ${period}`,
      { period },
    );
  }

  let lastReached = 1;
  for (const [visitIndex, set] of customersByVisit.entries()) {
    if (set.size > 0) lastReached = Math.max(lastReached, visitIndex);
  }

  const points: SurvivalPoint[] = [];
  for (let k = 1; k <= lastReached; k++) {
    const customers = customersByVisit.get(k)?.size ?? 0;
    points.push({ visitIndex: k, customers, survivalRate: customers / baseline });
  }
  return points;
}

/**
 * Find where the survival curve flattens. Rules, in order:
 * 1. insufficient-points: fewer than 3 points, nothing to compare
 * 2. flattest-step: smallest |rate(k-1) - rate(k)| for k >= 3, lowest k on
 *    ties, accepted when it does not exceed the flattening threshold
 * 3. steep-throughout: every step declines more than the threshold
 */
export function findMagicNumber(
  points: readonly SurvivalPoint[],
  options: MagicNumberOptions = {},
): MagicNumberResult {
  const { flatteningThreshold = 0.05 } = options;

  if (points.length < MIN_MAGIC_POINTS) {
    return { found: false, reason: "insufficient-points" };
  }

  let best: { visitIndex: number; decline: number } | null = null;
  for (let i = 1; i < points.length; i++) {
    const point = points[i];
    if (point.visitIndex < MIN_MAGIC_POINTS) continue;
    const decline = Math.abs(points[i - 1].survivalRate - point.survivalRate);
    if (!best || decline < best.decline) {
      best = { visitIndex: point.visitIndex, decline };
    }
  }

  if (!best || best.decline > flatteningThreshold) {
    return { found: false, reason: "steep-throughout" };
  }

  return {
    found: true,
    visitIndex: best.visitIndex,
    rule: "flattest-step",
    decline: best.decline,
  };
}

function ordersByCustomer(
  dataset: NormalizedDataset,
  period: string,
): Map<string, Set<string>> {
  const orders = new Map<string, Set<string>>();
  for (const row of dataset.rows) {
    if (row.period !== period) continue;
    const set = orders.get(row.customerId) ?? new Set<string>();
    set.add(row.orderId);
    orders.set(row.customerId, set);
  }
  return orders;
}

/**
 * Order counts in the base period and the one after it.
 *
 * @throws InsufficientDataError when the base period has no transactions
 * @throws InsufficientPeriodsError when the following period has none
 */
function periodPair(dataset: NormalizedDataset, basePeriod: string) {
  const following = nextPeriod(basePeriod);
  const base = ordersByCustomer(dataset, basePeriod);
  if (base.size === 0) {
    throw new InsufficientDataError(`No transactions in ${basePeriod}`, {
      period: basePeriod,
    });
  }
  const next = ordersByCustomer(dataset, following);
  if (next.size === 0) {
    throw new InsufficientPeriodsError(
      `No transactions in ${following}, the period after ${basePeriod}`,
      { basePeriod, nextPeriod: following },
    );
  }
  return { following, base, next };
}

/**
 * Track customers with more than `vipThreshold` orders in `basePeriod` into
 * the next period. No VIPs at all is a valid, all-zero outcome.
 */
export function cohortFlow(
  dataset: NormalizedDataset,
  basePeriod: string,
  vipThreshold = 5,
): CohortFlow {
  const { following, base, next } = periodPair(dataset, basePeriod);

  const counts = { lost: 0, downgraded: 0, maintained: 0, retained: 0 };
  let vipCount = 0;

  for (const [customerId, orders] of base.entries()) {
    if (orders.size <= vipThreshold) continue;
    vipCount++;

    const nextOrders = next.get(customerId)?.size ?? 0;
    if (nextOrders === 0) counts.lost++;
    else if (nextOrders <= 2) counts.downgraded++;
    else if (nextOrders <= vipThreshold) counts.maintained++;
    else counts.retained++;
  }

  const rate = (n: number) => (vipCount > 0 ? n / vipCount : 0);

  return {
    basePeriod,
    nextPeriod: following,
    vipThreshold,
    vipCount,
    ...counts,
    rates: {
      lost: rate(counts.lost),
      downgraded: rate(counts.downgraded),
      maintained: rate(counts.maintained),
      retained: rate(counts.retained),
    },
  };
}

/**
 * For every base-period order count, the share of those customers who order
 * again in the next period. The magic number is the smallest order count
 * whose repurchase rate exceeds the threshold.
 */
export function repurchaseCurve(
  dataset: NormalizedDataset,
  basePeriod: string,
  options: RepurchaseOptions = {},
): RepurchaseCurve {
  const { maxFrequency = 10, threshold = 0.6 } = options;
  const { following, base, next } = periodPair(dataset, basePeriod);

  const groups = new Map<number, { customers: number; repurchased: number }>();
  for (const [customerId, orders] of base.entries()) {
    const count = orders.size;
    if (count > maxFrequency) continue;
    const group = groups.get(count) ?? { customers: 0, repurchased: 0 };
    group.customers++;
    if (next.has(customerId)) group.repurchased++;
    groups.set(count, group);
  }

  const points: RepurchasePoint[] = [];
  for (let count = 1; count <= maxFrequency; count++) {
    const group = groups.get(count);
    if (!group) continue;
    points.push({
      orderCount: count,
      customers: group.customers,
      repurchased: group.repurchased,
      repurchaseRate: group.repurchased / group.customers,
    });
  }

  const magic = points.find((point) => point.repurchaseRate > threshold);

  return {
    basePeriod,
    nextPeriod: following,
    threshold,
    points,
    magicNumber: magic
      ? {
          found: true,
          orderCount: magic.orderCount,
          rate: magic.repurchaseRate,
          rule: "repurchase-threshold",
        }
      : { found: false },
  };
}
