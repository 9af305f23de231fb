import { z } from "zod";
import { ConfigError } from "./errors";

export const CANONICAL_FIELDS = [
  "orderId",
  "timestamp",
  "customerId",
  "product",
  "amount",
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

const YEAR_PERIOD = /^\d{4}$/;
const MONTH_PERIOD = /^\d{4}-(0[1-9]|1[0-2])$/;

const columnMappingSchema = z
  .object({
    orderId: z.string().min(1).default("order_id"),
    timestamp: z.string().min(1).default("timestamp"),
    customerId: z.string().min(1).default("customer_id"),
    product: z.string().min(1).default("product"),
    amount: z.string().min(1).default("amount"),
  })
  .default({});

const count = (fallback: number) =>
  z.coerce.number().int().min(1).default(fallback);

const ratio = (fallback: number) =>
  z.coerce.number().min(0).max(1).default(fallback);

export const engineConfigSchema = z
  .object({
    granularity: z.enum(["year", "month"]).default("year"),
    period: z.string().optional(),
    frequencyCap: count(10),
    vipThreshold: z.coerce.number().int().min(0).default(5),
    maxVisits: count(10),
    minSample: count(5),
    minOrders: count(3),
    referenceDate: z.coerce.date().optional(),
    columns: columnMappingSchema,
    dedupKey: z.array(z.enum(CANONICAL_FIELDS)).min(1).optional(),
    flatteningThreshold: ratio(0.05),
    repurchaseThreshold: ratio(0.6),
    highFrequencyFrom: count(8),
  })
  .superRefine((config, ctx) => {
    if (config.period === undefined) return;
    const pattern = config.granularity === "year" ? YEAR_PERIOD : MONTH_PERIOD;
    if (!pattern.test(config.period)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `period must look like ${
          config.granularity === "year" ? "YYYY" : "YYYY-MM"
        } for ${config.granularity} granularity`,
        path: ["period"],
      });
    }
  });

export type Granularity = "year" | "month";
export type ColumnMapping = z.output<typeof columnMappingSchema>;
export type EngineConfig = z.output<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Validate and fill defaults. Throws ConfigError with the zod issues.
 */
export function resolveEngineConfig(input: unknown = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("Invalid analytics configuration", {
      issues: parsed.error.errors.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}

const ENV_KEYS = {
  granularity: "ANALYTICS_GRANULARITY",
  period: "ANALYTICS_PERIOD",
  frequencyCap: "ANALYTICS_FREQUENCY_CAP",
  vipThreshold: "ANALYTICS_VIP_THRESHOLD",
  maxVisits: "ANALYTICS_MAX_VISITS",
  minSample: "ANALYTICS_MIN_SAMPLE",
  minOrders: "ANALYTICS_MIN_ORDERS",
  referenceDate: "ANALYTICS_REFERENCE_DATE",
  flatteningThreshold: "ANALYTICS_FLATTENING_THRESHOLD",
  repurchaseThreshold: "ANALYTICS_REPURCHASE_THRESHOLD",
  highFrequencyFrom: "ANALYTICS_HIGH_FREQUENCY_FROM",
} as const;

const COLUMN_ENV_KEYS: Record<CanonicalField, string> = {
  orderId: "ANALYTICS_COLUMN_ORDER_ID",
  timestamp: "ANALYTICS_COLUMN_TIMESTAMP",
  customerId: "ANALYTICS_COLUMN_CUSTOMER_ID",
  product: "ANALYTICS_COLUMN_PRODUCT",
  amount: "ANALYTICS_COLUMN_AMOUNT",
};

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build a configuration from ANALYTICS_* environment variables.
 * Explicit overrides win over the environment.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Record<string, unknown> = {},
): EngineConfig {
  const fromEnv: Record<string, unknown> = {};

  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = readEnv(env, key);
    if (value !== undefined) fromEnv[field] = value;
  }

  const columns: Record<string, string> = {};
  for (const field of CANONICAL_FIELDS) {
    const value = readEnv(env, COLUMN_ENV_KEYS[field]);
    if (value !== undefined) columns[field] = value;
  }
  if (Object.keys(columns).length > 0) fromEnv.columns = columns;

  const dedupKey = readEnv(env, "ANALYTICS_DEDUP_KEY");
  if (dedupKey !== undefined) {
    fromEnv.dedupKey = dedupKey.split(",").map((part) => part.trim());
  }

  return resolveEngineConfig({ ...fromEnv, ...overrides });
}

export function isPeriodLabel(value: string, granularity: Granularity): boolean {
  return (granularity === "year" ? YEAR_PERIOD : MONTH_PERIOD).test(value);
}
