import { describe, it, expect } from "vitest";
import { loadSampleInventory } from "../src/sample.js";

describe("sample inventory", () => {
  it("loads through the standardizer with all twenty rows accepted", () => {
    const items = loadSampleInventory();

    expect(items).toHaveLength(20);
    expect(items[0]).toEqual({
      material: "PX1001-BRK",
      description: "BRACKET MOUNTING PLATE",
      qty: 14,
      norm_qty: 10,
      stock_value: 1240,
      vendor: "Northwind Metals",
    });
  });

  it("strips thousands separators from quantities", () => {
    const nut = loadSampleInventory().find((i) => i.material === "PX1015-NUT");
    expect(nut).toMatchObject({ qty: 3100, norm_qty: 2000, stock_value: 310 });
  });

  it("covers five vendors", () => {
    const vendors = new Set(loadSampleInventory().map((i) => i.vendor));
    expect([...vendors]).toEqual([
      "Northwind Metals",
      "Keystone Castings",
      "Harbor Seals",
      "Orbit Bearings",
      "Pioneer Valves",
    ]);
  });
});
