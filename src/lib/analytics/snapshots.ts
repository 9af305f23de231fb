/**
 * Customer Snapshots
 *
 * Per-customer aggregates derived from the normalized table. Snapshots are
 * never stored; every query rebuilds them for its own period filter.
 */

import { UNKNOWN_PERIOD, comparePeriods } from "./periods";
import type { CustomerSnapshot, NormalizedDataset, NormalizedRow } from "./types";

export interface CustomerProfile {
  customerId: string;
  /** First line item of the customer's first order */
  firstRow: NormalizedRow;
  orderIds: Set<string>;
  revenue: number;
  firstPurchaseDate: Date | null;
  lastPurchaseDate: Date | null;
  /** Earliest known period, null when every timestamp is unknown */
  firstPeriod: string | null;
}

function precedes(a: NormalizedRow, b: NormalizedRow): boolean {
  if (a.visitIndex !== b.visitIndex) return a.visitIndex < b.visitIndex;
  const at = a.timestamp ? a.timestamp.getTime() : Infinity;
  const bt = b.timestamp ? b.timestamp.getTime() : Infinity;
  if (at !== bt) return at < bt;
  return a.sourceIndex < b.sourceIndex;
}

/**
 * Lifetime profile of every customer, in first-appearance order.
 */
export function buildCustomerProfiles(
  dataset: NormalizedDataset,
): Map<string, CustomerProfile> {
  const profiles = new Map<string, CustomerProfile>();

  for (const row of dataset.rows) {
    let profile = profiles.get(row.customerId);
    if (!profile) {
      profile = {
        customerId: row.customerId,
        firstRow: row,
        orderIds: new Set(),
        revenue: 0,
        firstPurchaseDate: null,
        lastPurchaseDate: null,
        firstPeriod: null,
      };
      profiles.set(row.customerId, profile);
    }

    profile.orderIds.add(row.orderId);
    profile.revenue += row.amount;
    if (precedes(row, profile.firstRow)) {
      profile.firstRow = row;
    }

    if (row.timestamp) {
      if (!profile.firstPurchaseDate || row.timestamp < profile.firstPurchaseDate) {
        profile.firstPurchaseDate = row.timestamp;
      }
      if (!profile.lastPurchaseDate || row.timestamp > profile.lastPurchaseDate) {
        profile.lastPurchaseDate = row.timestamp;
      }
    }

    if (
      row.period !== UNKNOWN_PERIOD &&
      (profile.firstPeriod === null ||
        comparePeriods(row.period, profile.firstPeriod) < 0)
    ) {
      profile.firstPeriod = row.period;
    }
  }

  return profiles;
}

/**
 * One snapshot per customer active in the scope. Without a period every row
 * counts, including rows whose timestamp could not be parsed.
 */
export function buildCustomerSnapshots(
  dataset: NormalizedDataset,
  period?: string,
): CustomerSnapshot[] {
  const profiles = buildCustomerProfiles(dataset);
  const scoped = new Map<string, { orders: Set<string>; revenue: number }>();

  for (const row of dataset.rows) {
    if (period !== undefined && row.period !== period) continue;
    const entry = scoped.get(row.customerId) ?? { orders: new Set<string>(), revenue: 0 };
    entry.orders.add(row.orderId);
    entry.revenue += row.amount;
    scoped.set(row.customerId, entry);
  }

  const snapshots: CustomerSnapshot[] = [];
  for (const [customerId, entry] of scoped.entries()) {
    const profile = profiles.get(customerId);
    if (!profile) continue;
    const orderCount = entry.orders.size;

    snapshots.push({
      customerId,
      orderCount,
      totalRevenue: entry.revenue,
      avgOrderValue: orderCount > 0 ? entry.revenue / orderCount : 0,
      firstPurchaseProduct: profile.firstRow.product,
      firstPurchaseDate: profile.firstPurchaseDate,
      lastPurchaseDate: profile.lastPurchaseDate,
      lifetimeOrderCount: profile.orderIds.size,
    });
  }

  return snapshots;
}
