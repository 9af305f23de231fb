import { describe, it, expect } from "vitest";
import {
  attributeProducts,
  classifyBcg,
  classifyQuadrant,
  classifyRetention,
} from "@/lib/analytics";
import { build, orders } from "./fixtures";

describe("Product Attribution", () => {
  describe("classifyRetention", () => {
    const thresholds = { low: 1.5, high: 2.5 };

    it("should classify against the quartile thresholds", () => {
      expect(classifyRetention(3, thresholds)).toBe("high-retention");
      expect(classifyRetention(2.5, thresholds)).toBe("high-retention");
      expect(classifyRetention(1.5, thresholds)).toBe("low-retention");
      expect(classifyRetention(2, thresholds)).toBe("neutral");
    });

    it("should prefer high-retention when both thresholds match", () => {
      expect(classifyRetention(2, { low: 2, high: 2 })).toBe("high-retention");
    });
  });

  describe("attributeProducts", () => {
    const dataset = build([
      // Facial buyers: 4 and 2 lifetime orders
      ...orders("F1", 4, "2024-01-01", { product: "Facial" }),
      ...orders("F2", 1, "2024-01-01", { product: "Facial" }),
      ...orders("F2", 1, "2024-02-01", { product: "Massage" }),
      // Massage buyers: 1 order each
      ...orders("M1", 1, "2024-01-01", { product: "Massage" }),
      ...orders("M2", 1, "2024-01-01", { product: "Massage" }),
      // Nails buyers: 2 orders each
      ...orders("N1", 2, "2024-01-01", { product: "Nails" }),
      ...orders("N2", 2, "2024-01-01", { product: "Nails" }),
      // A single Wax buyer
      ...orders("W1", 3, "2024-01-01", { product: "Wax" }),
    ]);

    it("should attribute lifetime orders to the first product", () => {
      const result = attributeProducts(dataset, 2);

      expect(result.excludedProducts).toBe(1);
      expect(result.thresholds).toEqual({ low: 1.5, high: 2.5 });
      expect(result.products).toEqual([
        {
          product: "Facial",
          firstPurchaseCustomerCount: 2,
          meanLifetimeOrders: 3,
          medianLifetimeOrders: 3,
          classification: "high-retention",
        },
        {
          product: "Nails",
          firstPurchaseCustomerCount: 2,
          meanLifetimeOrders: 2,
          medianLifetimeOrders: 2,
          classification: "neutral",
        },
        {
          product: "Massage",
          firstPurchaseCustomerCount: 2,
          meanLifetimeOrders: 1,
          medianLifetimeOrders: 1,
          classification: "low-retention",
        },
      ]);
    });

    it("should order tied products by code unit", () => {
      const tied = build([
        ...orders("X1", 1, "2024-01-01", { product: "apple" }),
        ...orders("X2", 1, "2024-01-01", { product: "Banana" }),
      ]);

      expect(attributeProducts(tied, 1).products.map((p) => p.product)).toEqual([
        "Banana",
        "apple",
      ]);
    });

    it("should exclude everything below the default sample size", () => {
      expect(attributeProducts(dataset)).toEqual({
        minSample: 5,
        excludedProducts: 4,
        thresholds: null,
        products: [],
      });
    });

    it("should return the same result on repeated calls", () => {
      expect(attributeProducts(dataset, 2)).toEqual(attributeProducts(dataset, 2));
    });
  });

  describe("classifyQuadrant", () => {
    const medians = { orders: 4, revenue: 400 };

    it("should place products by both medians", () => {
      expect(classifyQuadrant({ orderCount: 5, revenue: 500 }, medians)).toBe("star");
      expect(classifyQuadrant({ orderCount: 5, revenue: 100 }, medians)).toBe("traffic-driver");
      expect(classifyQuadrant({ orderCount: 1, revenue: 500 }, medians)).toBe("high-value-niche");
      expect(classifyQuadrant({ orderCount: 1, revenue: 100 }, medians)).toBe("low-performer");
    });

    it("should treat the median itself as above", () => {
      expect(classifyQuadrant({ orderCount: 4, revenue: 400 }, medians)).toBe("star");
    });
  });

  describe("classifyBcg", () => {
    const dataset = build([
      ...orders("c-facial", 4, "2024-01-01", { product: "Facial", amount: 100 }),
      ...orders("c-massage", 3, "2024-01-01", { product: "Massage", amount: 300 }),
      ...orders("c-nails", 5, "2024-01-01", { product: "Nails", amount: 30 }),
      ...orders("c-wax", 3, "2024-01-01", { product: "Wax", amount: 30 }),
      ...orders("c-brow", 1, "2024-01-01", { product: "Brow", amount: 1000 }),
      ...orders("c-old", 10, "2023-01-01", { product: "Wax", amount: 30 }),
    ]);

    it("should classify products against post-filter medians", () => {
      const result = classifyBcg(dataset, "2024");

      expect(result.excludedProducts).toBe(1);
      expect(result.medianOrders).toBe(3.5);
      expect(result.medianRevenue).toBe(275);
      expect(result.products.map((p) => [p.product, p.quadrant])).toEqual([
        ["Massage", "high-value-niche"],
        ["Facial", "star"],
        ["Nails", "traffic-driver"],
        ["Wax", "low-performer"],
      ]);
    });

    it("should only count the requested period", () => {
      const wax = classifyBcg(dataset, "2024").products.find((p) => p.product === "Wax");

      expect(wax).toEqual({
        product: "Wax",
        orderCount: 3,
        revenue: 90,
        customerCount: 1,
        quadrant: "low-performer",
      });
    });

    it("should order products with equal revenue by code unit", () => {
      const tied = build([
        ...orders("c-apple", 3, "2024-01-01", { product: "apple" }),
        ...orders("c-banana", 3, "2024-01-01", { product: "Banana" }),
      ]);

      expect(classifyBcg(tied, "2024").products.map((p) => p.product)).toEqual([
        "Banana",
        "apple",
      ]);
    });

    it("should report no medians when every product is filtered out", () => {
      expect(classifyBcg(dataset, "2024", 50)).toEqual({
        period: "2024",
        minOrders: 50,
        excludedProducts: 5,
        medianOrders: null,
        medianRevenue: null,
        products: [],
      });
    });

    it("should return the same result on repeated calls", () => {
      expect(classifyBcg(dataset, "2024")).toEqual(classifyBcg(dataset, "2024"));
    });
  });
});
