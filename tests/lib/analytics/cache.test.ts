import { describe, it, expect, vi } from "vitest";
import { MemoTable } from "@/lib/analytics/cache";

describe("MemoTable", () => {
  it("should compute once per dataset and parameters", () => {
    const table = new MemoTable<number>();
    const compute = vi.fn(() => 7);

    expect(table.get("ds-1", { period: "2024" }, compute)).toBe(7);
    expect(table.get("ds-1", { period: "2024" }, compute)).toBe(7);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(table.hits).toBe(1);
  });

  it("should ignore key order and undefined parameters", () => {
    const table = new MemoTable<string>();
    table.get("ds-1", { a: 1, b: 2 }, () => "first");

    expect(table.get("ds-1", { b: 2, a: 1, c: undefined }, () => "second")).toBe("first");
  });

  it("should separate datasets", () => {
    const table = new MemoTable<string>();
    table.get("ds-1", {}, () => "one");

    expect(table.get("ds-2", {}, () => "two")).toBe("two");
    expect(table.size).toBe(2);
  });

  it("should tell dates apart by value", () => {
    const table = new MemoTable<string>();
    table.get("ds-1", { at: new Date("2024-01-01T00:00:00Z") }, () => "jan");

    expect(table.get("ds-1", { at: new Date("2024-02-01T00:00:00Z") }, () => "feb")).toBe("feb");
    expect(table.get("ds-1", { at: new Date("2024-01-01T00:00:00Z") }, () => "other")).toBe("jan");
  });

  it("should keep falsy results", () => {
    const table = new MemoTable<number>();
    const compute = vi.fn(() => 0);

    table.get("ds-1", {}, compute);
    table.get("ds-1", {}, compute);

    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("should freeze stored values deeply", () => {
    const table = new MemoTable<{ rows: { score: number }[] }>();
    const value = table.get("ds-1", {}, () => ({ rows: [{ score: 1 }] }));

    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.rows)).toBe(true);
    expect(Object.isFrozen(value.rows[0])).toBe(true);
    expect(() => value.rows.push({ score: 2 })).toThrow(TypeError);
  });

  it("should drop everything on clear", () => {
    const table = new MemoTable<number>();
    table.get("ds-1", {}, () => 1);
    table.get("ds-1", {}, () => 1);
    table.clear();

    expect(table.size).toBe(0);
    expect(table.hits).toBe(0);
  });
});
