/**
 * Ingestion & Normalization
 *
 * Merges raw tables into the canonical working table:
 * - Maps configured source columns onto canonical fields
 * - Coerces malformed values to safe defaults and counts them
 * - Derives period labels, per-customer visit ordinals and per-period
 *   order counts
 *
 * Tables are concatenated as-is. The same export uploaded twice is counted
 * twice unless a dedup key is configured.
 */

import { createHash } from "crypto";
import type { CanonicalField, ColumnMapping, EngineConfig } from "./config";
import { CANONICAL_FIELDS } from "./config";
import { EmptyDatasetError, SchemaError } from "./errors";
import { UNKNOWN_PERIOD, comparePeriods, periodLabel } from "./periods";
import type {
  IngestDiagnostics,
  NormalizedDataset,
  NormalizedRow,
  RawRecord,
  RawTable,
  TransactionRow,
} from "./types";
import { parseAmount, parseTimestamp, toIdentifier } from "../utils";

export type NormalizeOptions = Pick<EngineConfig, "granularity" | "columns"> &
  Partial<Pick<EngineConfig, "dedupKey">>;

interface StagedRow extends TransactionRow {
  sourceIndex: number;
  sourceTable: string;
}

function tableColumns(table: RawTable): Set<string> {
  if (table.columns) {
    return new Set(table.columns);
  }
  const columns = new Set<string>();
  for (const row of table.rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return columns;
}

function assertSchema(
  table: RawTable,
  tableName: string,
  mapping: ColumnMapping,
): void {
  if (!table.columns && table.rows.length === 0) {
    return;
  }
  const columns = tableColumns(table);
  const missing = CANONICAL_FIELDS.map((field) => mapping[field]).filter(
    (column) => !columns.has(column),
  );
  if (missing.length > 0) {
    throw new SchemaError(
      `Table "${tableName}" is missing required columns: ${missing.join(", ")}`,
      { table: tableName, missing },
    );
  }
}

function isBlank(value: unknown): boolean {
  return (
    value == null || (typeof value === "string" && value.trim() === "")
  );
}

function dedupValue(row: TransactionRow, field: CanonicalField): string {
  if (field === "timestamp") {
    return row.timestamp ? String(row.timestamp.getTime()) : "";
  }
  return String(row[field]);
}

/**
 * Assign 1-based order ordinals per customer. Orders are placed by their
 * earliest known timestamp, then by the position of their first line item;
 * orders without any known timestamp come last.
 */
function assignVisitIndexes(rows: readonly StagedRow[]): Map<string, number> {
  const orders = new Map<
    string,
    { customerId: string; orderId: string; firstSeen: number; time: number }
  >();

  for (const row of rows) {
    const key = `${row.customerId}\u0000${row.orderId}`;
    const time = row.timestamp ? row.timestamp.getTime() : Infinity;
    const existing = orders.get(key);
    if (!existing) {
      orders.set(key, {
        customerId: row.customerId,
        orderId: row.orderId,
        firstSeen: row.sourceIndex,
        time,
      });
    } else if (time < existing.time) {
      existing.time = time;
    }
  }

  const byCustomer = new Map<string, Array<{ key: string; firstSeen: number; time: number }>>();
  for (const [key, order] of orders.entries()) {
    const list = byCustomer.get(order.customerId) ?? [];
    list.push({ key, firstSeen: order.firstSeen, time: order.time });
    byCustomer.set(order.customerId, list);
  }

  const visitIndexes = new Map<string, number>();
  for (const list of byCustomer.values()) {
    list
      .sort((a, b) => {
        if (a.time !== b.time) {
          // Infinity - Infinity is NaN, so compare explicitly
          return a.time < b.time ? -1 : 1;
        }
        return a.firstSeen - b.firstSeen;
      })
      .forEach((order, position) => {
        visitIndexes.set(order.key, position + 1);
      });
  }

  return visitIndexes;
}

function fingerprint(
  rows: readonly TransactionRow[],
  granularity: string,
): string {
  const hash = createHash("sha256");
  hash.update(`granularity=${granularity}\n`);
  for (const row of rows) {
    hash.update(
      [
        row.orderId,
        row.customerId,
        row.timestamp ? row.timestamp.getTime() : "",
        row.product,
        row.amount,
      ].join("\u001f") + "\n",
    );
  }
  return hash.digest("hex");
}

function readRow(
  row: RawRecord,
  mapping: ColumnMapping,
  diagnostics: IngestDiagnostics,
): TransactionRow | null {
  const raw = {
    orderId: row[mapping.orderId],
    timestamp: row[mapping.timestamp],
    customerId: row[mapping.customerId],
    product: row[mapping.product],
    amount: row[mapping.amount],
  };

  if (Object.values(raw).every(isBlank)) {
    diagnostics.skippedBlankRows++;
    return null;
  }

  const orderId = toIdentifier(raw.orderId);
  const customerId = toIdentifier(raw.customerId);
  if (!orderId || !customerId) {
    diagnostics.blankIdentifiers++;
  }

  let amount = parseAmount(raw.amount);
  if (amount === null) {
    diagnostics.coercedAmounts++;
    amount = 0;
  } else if (amount < 0) {
    diagnostics.negativeAmounts++;
    amount = 0;
  }

  const ms = parseTimestamp(raw.timestamp);
  if (ms === null) {
    diagnostics.unknownTimestamps++;
  }

  return {
    orderId,
    customerId,
    timestamp: ms === null ? null : new Date(ms),
    product: toIdentifier(raw.product),
    amount,
  };
}

/**
 * Build the canonical dataset from one or more raw tables.
 *
 * @throws SchemaError when a table lacks a mapped required column
 * @throws EmptyDatasetError when no rows survive parsing
 */
export function normalize(
  tables: readonly RawTable[],
  options: NormalizeOptions,
): NormalizedDataset {
  const { granularity, columns: mapping, dedupKey } = options;

  const diagnostics: IngestDiagnostics = {
    tableCount: tables.length,
    rawRowCount: 0,
    rowCount: 0,
    skippedBlankRows: 0,
    coercedAmounts: 0,
    negativeAmounts: 0,
    unknownTimestamps: 0,
    blankIdentifiers: 0,
    duplicatesDropped: 0,
  };

  tables.forEach((table, index) => {
    assertSchema(table, table.name ?? `table-${index + 1}`, mapping);
  });

  const staged: StagedRow[] = [];
  const seen = new Set<string>();

  tables.forEach((table, tableIndex) => {
    const sourceTable = table.name ?? `table-${tableIndex + 1}`;

    for (const raw of table.rows) {
      const sourceIndex = diagnostics.rawRowCount++;
      const row = readRow(raw, mapping, diagnostics);
      if (!row) continue;

      if (dedupKey) {
        const key = dedupKey.map((field) => dedupValue(row, field)).join("\u001f");
        if (seen.has(key)) {
          diagnostics.duplicatesDropped++;
          continue;
        }
        seen.add(key);
      }

      staged.push({ ...row, sourceIndex, sourceTable });
    }
  });

  if (staged.length === 0) {
    throw new EmptyDatasetError();
  }
  diagnostics.rowCount = staged.length;

  const visitIndexes = assignVisitIndexes(staged);

  const periodsOfRows = staged.map((row) =>
    row.timestamp ? periodLabel(row.timestamp, granularity) : UNKNOWN_PERIOD,
  );

  const ordersInPeriod = new Map<string, Set<string>>();
  staged.forEach((row, i) => {
    const key = `${row.customerId}\u0000${periodsOfRows[i]}`;
    const set = ordersInPeriod.get(key) ?? new Set<string>();
    set.add(row.orderId);
    ordersInPeriod.set(key, set);
  });

  let minTime = Infinity;
  let maxTime = -Infinity;
  const knownPeriods = new Set<string>();

  const rows: NormalizedRow[] = staged.map((row, i) => {
    const period = periodsOfRows[i];
    if (row.timestamp) {
      const time = row.timestamp.getTime();
      minTime = Math.min(minTime, time);
      maxTime = Math.max(maxTime, time);
      knownPeriods.add(period);
    }

    return Object.freeze({
      ...row,
      period,
      visitIndex:
        visitIndexes.get(`${row.customerId}\u0000${row.orderId}`) ?? 1,
      orderCountInPeriod:
        ordersInPeriod.get(`${row.customerId}\u0000${period}`)?.size ?? 1,
    });
  });

  const coerced =
    diagnostics.coercedAmounts +
    diagnostics.negativeAmounts +
    diagnostics.unknownTimestamps +
    diagnostics.blankIdentifiers;
  if (coerced > 0) {
    console.warn(
      `[Normalize] Coerced values in ${diagnostics.rowCount} rows: ` +
        `${diagnostics.coercedAmounts} unparsable amounts, ` +
        `${diagnostics.negativeAmounts} negative amounts, ` +
        `${diagnostics.unknownTimestamps} unknown timestamps, ` +
        `${diagnostics.blankIdentifiers} blank identifiers`,
    );
  }

  return Object.freeze({
    id: fingerprint(rows, granularity),
    granularity,
    rows: Object.freeze(rows),
    periods: Object.freeze([...knownPeriods].sort(comparePeriods)),
    minTimestamp: Number.isFinite(minTime) ? new Date(minTime) : null,
    maxTimestamp: Number.isFinite(maxTime) ? new Date(maxTime) : null,
    diagnostics,
  });
}
