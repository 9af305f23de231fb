/**
 * Memo table for analyzer results, keyed by dataset identity and the
 * analyzer's parameters. Entries are only ever dropped all at once.
 * Stored values are deep-frozen: every caller shares the same object.
 */

function stringify(value: unknown): string {
  if (value instanceof Date) {
    return `date:${value.toISOString()}`;
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => stringify(entry)).join(",")}]`;
  }
  if (value && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${stringify(entry)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "undefined";
}

export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const entry of Object.values(value)) {
    deepFreeze(entry);
  }
  return value;
}

export class MemoTable<T> {
  private readonly entries = new Map<string, { value: T }>();
  private hitCount = 0;

  get(datasetId: string, params: unknown, compute: () => T): T {
    const key = `${datasetId}:${stringify(params)}`;
    const cached = this.entries.get(key);
    if (cached) {
      this.hitCount++;
      return cached.value;
    }
    const value = deepFreeze(compute());
    this.entries.set(key, { value });
    return value;
  }

  clear(): void {
    this.entries.clear();
    this.hitCount = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get hits(): number {
    return this.hitCount;
  }
}
