import {
  normalize,
  resolveEngineConfig,
  type Granularity,
  type NormalizedDataset,
  type RawRecord,
  type RawTable,
} from "@/lib/analytics";

const DAY_MS = 24 * 60 * 60 * 1000;

export function row(
  orderId: string,
  customerId: string,
  timestamp: unknown,
  product = "Facial",
  amount: unknown = 100,
): RawRecord {
  return {
    order_id: orderId,
    customer_id: customerId,
    timestamp,
    product,
    amount,
  };
}

export function table(rows: RawRecord[], name?: string): RawTable {
  return name ? { name, rows } : { rows };
}

export function build(
  rows: RawRecord[],
  granularity: Granularity = "year",
): NormalizedDataset {
  return normalize([table(rows)], resolveEngineConfig({ granularity }));
}

/**
 * `count` single-line orders for one customer on consecutive days from
 * `start` (an ISO date), ids `${customer}@${start}#${n}`.
 */
export function orders(
  customerId: string,
  count: number,
  start: string,
  options: { product?: string; amount?: number } = {},
): RawRecord[] {
  const { product = "Facial", amount = 100 } = options;
  const startMs = new Date(`${start}T10:00:00Z`).getTime();
  return Array.from({ length: count }, (_, n) =>
    row(
      `${customerId}@${start}#${n + 1}`,
      customerId,
      new Date(startMs + n * DAY_MS).toISOString(),
      product,
      amount,
    ),
  );
}
