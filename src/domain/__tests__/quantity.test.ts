import {
  formatQuantity,
  normalizeMetric,
  normalizeQuantity,
  parseQuantity,
  resolveUnit,
} from "../quantity";

describe("parseQuantity", () => {
  it("reads plain unit quantities", () => {
    expect(parseQuantity("450 GW")).toEqual({ value: 450, unit: "GW" });
    expect(parseQuantity("146,000 km (2024)")).toEqual({
      value: 146000,
      unit: "km",
    });
  });

  it("folds scale words and currency symbols", () => {
    expect(parseQuantity("$5 Trillion")).toEqual({ value: 5e12, unit: "USD" });
    expect(parseQuantity("₹ 10 lakh crore")).toEqual({
      value: 1e13,
      unit: "INR",
    });
    expect(parseQuantity("2 lakh crore")).toEqual({ value: 2e12, unit: "" });
  });

  it("collapses ranges to their midpoint", () => {
    expect(parseQuantity("6.5-7.0%")).toEqual({ value: 6.75, unit: "%" });
  });

  it("recognises spelled-out percentages", () => {
    expect(parseQuantity("70 per cent")).toEqual({ value: 70, unit: "%" });
  });

  it("converts megawatts to gigawatts", () => {
    const parsed = parseQuantity("120,900 MW");
    expect(parsed?.unit).toBe("GW");
    expect(parsed?.value).toBeCloseTo(120.9, 9);
  });

  it("returns null without a number", () => {
    expect(parseQuantity("no figure given")).toBeNull();
  });
});

describe("units and metrics", () => {
  it("resolves known and unknown units", () => {
    expect(resolveUnit("MW")).toEqual({ unit: "GW", factor: 1e-3 });
    expect(resolveUnit("Widgets")).toEqual({ unit: "widgets", factor: 1 });
    expect(normalizeQuantity({ value: 500, unit: "MW" })).toEqual({
      value: 0.5,
      unit: "GW",
    });
  });

  it("normalises metric names through aliases", () => {
    expect(normalizeMetric("GDP Growth")).toBe("gdp growth rate");
    expect(normalizeMetric("Real GDP growth!")).toBe("gdp growth rate");
    expect(normalizeMetric("Renewable Energy Capacity")).toBe(
      "renewable energy capacity"
    );
  });

  it("formats quantities for display", () => {
    expect(formatQuantity({ value: 6.5, unit: "%" })).toBe("6.5%");
    expect(formatQuantity({ value: 118.4567, unit: "GW" })).toBe("118.46 GW");
    expect(formatQuantity({ value: 2.5, unit: "" })).toBe("2.5");
    expect(formatQuantity({ value: 5, unit: "USD" })).toBe("$5");
  });
});
