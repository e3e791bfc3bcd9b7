import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_OPTIONS } from "../engineOptions";
import { kg, type MaterialEntry } from "../lifeCycleModel";
import { loadDefaultReferenceCatalog } from "../referenceData";
import {
  burdenMultiplier,
  calculateMaterialPhase,
  computeAllocationFactors,
} from "./materialPhase";
import { resolveMaterialInventory } from "./materialInventory";

const catalog = loadDefaultReferenceCatalog();
const options = { recycledDiscount: DEFAULT_ENGINE_OPTIONS.recycledDiscount };

const pp = (massKg: number, recycledContent = 0): MaterialEntry => ({
  materialId: "PP",
  massKg: kg(massKg),
  recycledContent,
});

describe("burdenMultiplier", () => {
  it("blends virgin and discounted recycled burden", () => {
    expect(burdenMultiplier(0, 0.3)).toBe(1);
    expect(burdenMultiplier(1, 0.3)).toBe(0.3);
    expect(burdenMultiplier(0.5, 0.3)).toBeCloseTo(0.65, 12);
  });
});

describe("calculateMaterialPhase", () => {
  it("multiplies mass by the virgin factors", () => {
    const result = calculateMaterialPhase([pp(0.15)], catalog, options);

    expect(result.phase).toBe("material");
    expect(result.carbonKgCO2e).toBeCloseTo(0.315, 9);
    expect(result.energyMJ).toBeCloseTo(12.84, 9);
    expect(result.waterL).toBeCloseTo(11.25, 9);
    expect(result.costUsd).toBeCloseTo(0.27, 9);
    expect(result.massKg).toBeCloseTo(0.15, 12);
    expect(result.warnings).toEqual([]);
  });

  it("applies a different recycled discount per metric", () => {
    const result = calculateMaterialPhase([pp(0.15, 1)], catalog, options);

    expect(result.carbonKgCO2e).toBeCloseTo(0.0945, 9);
    expect(result.energyMJ).toBeCloseTo(5.136, 9);
    expect(result.waterL).toBeCloseTo(2.25, 9);
    expect(result.costUsd).toBeCloseTo(0.216, 9);
  });

  it("keeps fully recycled feedstock strictly below virgin feedstock", () => {
    const virgin = calculateMaterialPhase([pp(0.15, 0)], catalog, options);
    const recycled = calculateMaterialPhase([pp(0.15, 1)], catalog, options);
    expect(recycled.carbonKgCO2e).toBeLessThan(virgin.carbonKgCO2e);
  });

  it("skips unknown materials with a warning", () => {
    const result = calculateMaterialPhase(
      [pp(0.15), { materialId: "UNOBTAINIUM", massKg: kg(5), recycledContent: 0 }],
      catalog,
      options,
    );

    expect(result.carbonKgCO2e).toBeCloseTo(0.315, 9);
    expect(result.massKg).toBeCloseTo(0.15, 12);
    expect(result.details).toHaveLength(1);
    expect(result.warnings).toEqual([
      {
        code: "REFERENCE_NOT_FOUND",
        message: 'Unknown material "UNOBTAINIUM" was skipped and contributes nothing to the totals',
        subject: "UNOBTAINIUM",
      },
    ]);
  });

  it("reports mass allocation factors and the carbon they allocate", () => {
    const result = calculateMaterialPhase(
      [pp(0.3), { materialId: "PET", massKg: kg(0.1), recycledContent: 0 }],
      catalog,
      options,
    );

    // 0.3 * 2.1 + 0.1 * 3.2
    expect(result.carbonKgCO2e).toBeCloseTo(0.95, 9);
    expect(result.allocationMethod).toBe("mass");
    expect(result.details[0]?.allocationFactor).toBeCloseTo(0.75, 12);
    expect(result.details[1]?.allocationFactor).toBeCloseTo(0.25, 12);
    expect(result.details[0]?.allocatedCarbonKgCO2e).toBeCloseTo(0.7125, 9);
    expect(result.details[1]?.allocatedCarbonKgCO2e).toBeCloseTo(0.2375, 9);
  });

  it("weights economic allocation by mass times price", () => {
    const result = calculateMaterialPhase(
      [pp(0.3), { materialId: "PET", massKg: kg(0.1), recycledContent: 0 }],
      catalog,
      { ...options, allocationMethod: "economic" },
    );

    const [first, second] = result.details.map((item) => item.allocationFactor);
    expect(first).toBeCloseTo(0.72, 12);
    expect(second).toBeCloseTo(0.28, 12);
  });

  it("returns an empty phase when no material resolves", () => {
    const result = calculateMaterialPhase([], catalog, options);
    expect(result.carbonKgCO2e).toBe(0);
    expect(result.costUsd).toBe(0);
    expect(result.details).toEqual([]);
  });
});

describe("computeAllocationFactors", () => {
  it("splits evenly when every weight is zero", () => {
    const { resolved } = resolveMaterialInventory([pp(0), pp(0), pp(0), pp(0)], catalog);
    expect(computeAllocationFactors(resolved, "mass")).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it("sums to one for mixed inventories", () => {
    const { resolved } = resolveMaterialInventory(
      [
        pp(0.37),
        { materialId: "AL6061", massKg: kg(1.13), recycledContent: 0.2 },
        { materialId: "GLASS", massKg: kg(0.71), recycledContent: 0.5 },
      ],
      catalog,
    );
    for (const method of ["mass", "economic"] as const) {
      const total = computeAllocationFactors(resolved, method).reduce((sum, f) => sum + f, 0);
      expect(Math.abs(total - 1)).toBeLessThanOrEqual(1e-9);
    }
  });
});
