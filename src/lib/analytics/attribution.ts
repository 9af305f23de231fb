/**
 * Product Attribution
 *
 * Two views of product performance:
 * - First-purchase attribution: which entry products bring customers who
 *   keep coming back
 * - BCG quadrants: volume and revenue of each product inside a period,
 *   relative to the medians of the products that pass the volume filter
 */

import { buildCustomerProfiles } from "./snapshots";
import { mean, median, quantile } from "./stats";
import type { NormalizedDataset } from "./types";

export type RetentionClass = "high-retention" | "low-retention" | "neutral";

export interface ProductAttribution {
  product: string;
  firstPurchaseCustomerCount: number;
  meanLifetimeOrders: number;
  medianLifetimeOrders: number;
  classification: RetentionClass;
}

export interface ProductAttributionResult {
  minSample: number;
  /** Products dropped for having too few first-time buyers */
  excludedProducts: number;
  /** 25th / 75th percentile of mean lifetime orders, null with no survivors */
  thresholds: { low: number; high: number } | null;
  products: ProductAttribution[];
}

export type BcgQuadrant =
  | "star"
  | "traffic-driver"
  | "high-value-niche"
  | "low-performer";

export interface BcgProduct {
  product: string;
  orderCount: number;
  revenue: number;
  customerCount: number;
  quadrant: BcgQuadrant;
}

export interface BcgResult {
  period: string;
  minOrders: number;
  excludedProducts: number;
  medianOrders: number | null;
  medianRevenue: number | null;
  products: BcgProduct[];
}

type Thresholds = { low: number; high: number };
type Medians = { orders: number; revenue: number };

/**
 * Retention classes, first match wins: a product at both thresholds (a
 * single survivor, or identical means) is high-retention.
 */
export const RETENTION_RULES: ReadonlyArray<{
  classification: RetentionClass;
  matches: (meanOrders: number, thresholds: Thresholds) => boolean;
}> = [
  { classification: "high-retention", matches: (value, t) => value >= t.high },
  { classification: "low-retention", matches: (value, t) => value <= t.low },
];

/**
 * Quadrants, first match wins. Sitting on a median counts as above it.
 */
export const BCG_RULES: ReadonlyArray<{
  quadrant: BcgQuadrant;
  matches: (product: { orderCount: number; revenue: number }, medians: Medians) => boolean;
}> = [
  {
    quadrant: "star",
    matches: (p, m) => p.orderCount >= m.orders && p.revenue >= m.revenue,
  },
  { quadrant: "traffic-driver", matches: (p, m) => p.orderCount >= m.orders },
  { quadrant: "high-value-niche", matches: (p, m) => p.revenue >= m.revenue },
];

// Code-unit order, independent of the host locale
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function classifyRetention(
  meanOrders: number,
  thresholds: Thresholds,
): RetentionClass {
  return (
    RETENTION_RULES.find((rule) => rule.matches(meanOrders, thresholds))
      ?.classification ?? "neutral"
  );
}

export function classifyQuadrant(
  product: { orderCount: number; revenue: number },
  medians: Medians,
): BcgQuadrant {
  return (
    BCG_RULES.find((rule) => rule.matches(product, medians))?.quadrant ??
    "low-performer"
  );
}

/**
 * Link each customer's first purchased product to their lifetime order
 * count and classify products with at least `minSample` first-time buyers.
 */
export function attributeProducts(
  dataset: NormalizedDataset,
  minSample = 5,
): ProductAttributionResult {
  const lifetimeByProduct = new Map<string, number[]>();
  for (const profile of buildCustomerProfiles(dataset).values()) {
    const product = profile.firstRow.product;
    const list = lifetimeByProduct.get(product) ?? [];
    list.push(profile.orderIds.size);
    lifetimeByProduct.set(product, list);
  }

  const survivors = [...lifetimeByProduct.entries()]
    .filter(([, lifetimes]) => lifetimes.length >= minSample)
    .map(([product, lifetimes]) => ({
      product,
      firstPurchaseCustomerCount: lifetimes.length,
      meanLifetimeOrders: mean(lifetimes),
      medianLifetimeOrders: median(lifetimes),
    }));

  const excludedProducts = lifetimeByProduct.size - survivors.length;

  if (survivors.length === 0) {
    return { minSample, excludedProducts, thresholds: null, products: [] };
  }

  const means = survivors.map((s) => s.meanLifetimeOrders);
  const thresholds = {
    low: quantile(means, 0.25),
    high: quantile(means, 0.75),
  };

  const products = survivors
    .map((survivor) => ({
      ...survivor,
      classification: classifyRetention(survivor.meanLifetimeOrders, thresholds),
    }))
    .sort(
      (a, b) =>
        b.meanLifetimeOrders - a.meanLifetimeOrders ||
        compareNames(a.product, b.product),
    );

  return { minSample, excludedProducts, thresholds, products };
}

/**
 * Place the period's products into BCG quadrants. Medians are taken over
 * the products with at least `minOrders` orders, after filtering.
 */
export function classifyBcg(
  dataset: NormalizedDataset,
  period: string,
  minOrders = 3,
): BcgResult {
  const stats = new Map<
    string,
    { orders: Set<string>; customers: Set<string>; revenue: number }
  >();

  for (const row of dataset.rows) {
    if (row.period !== period) continue;
    const entry = stats.get(row.product) ?? {
      orders: new Set<string>(),
      customers: new Set<string>(),
      revenue: 0,
    };
    entry.orders.add(row.orderId);
    entry.customers.add(row.customerId);
    entry.revenue += row.amount;
    stats.set(row.product, entry);
  }

  const kept = [...stats.entries()]
    .map(([product, entry]) => ({
      product,
      orderCount: entry.orders.size,
      revenue: entry.revenue,
      customerCount: entry.customers.size,
    }))
    .filter((product) => product.orderCount >= minOrders);

  const excludedProducts = stats.size - kept.length;

  if (kept.length === 0) {
    return {
      period,
      minOrders,
      excludedProducts,
      medianOrders: null,
      medianRevenue: null,
      products: [],
    };
  }

  const medians = {
    orders: median(kept.map((p) => p.orderCount)),
    revenue: median(kept.map((p) => p.revenue)),
  };

  const products = kept
    .map((product) => ({ ...product, quadrant: classifyQuadrant(product, medians) }))
    .sort((a, b) => b.revenue - a.revenue || compareNames(a.product, b.product));

  return {
    period,
    minOrders,
    excludedProducts,
    medianOrders: medians.orders,
    medianRevenue: medians.revenue,
    products,
  };
}
