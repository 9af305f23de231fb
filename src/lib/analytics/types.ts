import type { Granularity } from "./config";

export type RawRecord = Readonly<Record<string, unknown>>;

export interface RawTable {
  name?: string;
  /** Declared columns; defaults to the union of the rows' keys */
  columns?: readonly string[];
  rows: readonly RawRecord[];
}

export interface TransactionRow {
  orderId: string;
  customerId: string;
  timestamp: Date | null;
  product: string;
  amount: number;
}

export interface NormalizedRow extends TransactionRow {
  period: string; // YYYY, YYYY-MM or "unknown"
  visitIndex: number; // 1-based order ordinal in the customer's history
  orderCountInPeriod: number;
  sourceIndex: number;
  sourceTable: string;
}

export interface IngestDiagnostics {
  tableCount: number;
  rawRowCount: number;
  rowCount: number;
  skippedBlankRows: number;
  coercedAmounts: number;
  negativeAmounts: number;
  unknownTimestamps: number;
  blankIdentifiers: number;
  duplicatesDropped: number;
}

export interface NormalizedDataset {
  /** Content fingerprint; equal inputs produce equal ids */
  id: string;
  granularity: Granularity;
  rows: readonly NormalizedRow[];
  /** Known periods, ascending */
  periods: readonly string[];
  minTimestamp: Date | null;
  maxTimestamp: Date | null;
  diagnostics: IngestDiagnostics;
}

export interface CustomerSnapshot {
  customerId: string;
  orderCount: number;
  totalRevenue: number;
  avgOrderValue: number;
  firstPurchaseProduct: string;
  firstPurchaseDate: Date | null;
  lastPurchaseDate: Date | null;
  lifetimeOrderCount: number;
}
