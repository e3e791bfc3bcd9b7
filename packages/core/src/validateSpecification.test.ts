import { describe, expect, it } from "vitest";
import { InvariantViolationError } from "./errors";
import { kg, km, type ProductSpecification } from "./lifeCycleModel";
import { resolveEndOfLife, validateSpecification } from "./validateSpecification";

const spec: ProductSpecification = {
  productId: "tray",
  productName: "Tray",
  materials: [{ materialId: "PP", massKg: kg(0.2), recycledContent: 0.1 }],
  processes: [{ processId: "Thermoforming", efficiency: 0.9 }],
  manufacturingRegion: "Europe",
  transportLegs: [{ modeId: "Rail", distanceKm: km(300), loadFactor: 0.7 }],
  useScenarios: [],
  lifetimeYears: 1,
  endOfLife: { recyclingRate: 0.4, incinerationRate: 0.4 },
};

describe("resolveEndOfLife", () => {
  it("derives landfill as the remainder", () => {
    expect(resolveEndOfLife({ recyclingRate: 0.5, incinerationRate: 0.5 }, 0.8)).toEqual({
      recyclingRate: 0.5,
      incinerationRate: 0.5,
      landfillRate: 0,
      energyRecoveryEfficiency: 0.8,
    });
  });

  it("keeps an explicit recovery efficiency", () => {
    expect(
      resolveEndOfLife({ recyclingRate: 0, incinerationRate: 1, energyRecoveryEfficiency: 0.3 }, 0.8)
        .energyRecoveryEfficiency,
    ).toBe(0.3);
  });

  it("rejects rates that sum past 1", () => {
    expect(() =>
      resolveEndOfLife({ recyclingRate: 0.5, incinerationRate: 0.3, landfillRate: 0.3 }, 0.8),
    ).toThrow("endOfLife rates must sum to 1");
    expect(() => resolveEndOfLife({ recyclingRate: 0.7, incinerationRate: 0.4 }, 0.8)).toThrow(
      "recyclingRate + incinerationRate must not exceed 1",
    );
  });

  it("rejects rates outside [0, 1]", () => {
    expect(() => resolveEndOfLife({ recyclingRate: -0.1, incinerationRate: 0 }, 0.8)).toThrow(
      "endOfLife.recyclingRate must be between 0 and 1",
    );
  });
});

describe("validateSpecification", () => {
  it("returns the resolved end-of-life split for a valid specification", () => {
    expect(validateSpecification(spec, 0.8).landfillRate).toBeCloseTo(0.2, 12);
  });

  const invalidCases: Array<[Partial<ProductSpecification>, string]> = [
    [{ productId: " " }, "productId must not be empty"],
    [{ lifetimeYears: 0.5 }, "lifetimeYears must be >= 1"],
    [{ lifetimeYears: Number.NaN }, "lifetimeYears must be a finite number"],
    [
      { materials: [{ materialId: "PP", massKg: kg(1), recycledContent: 1.2 }] },
      "materials[0].recycledContent must be between 0 and 1",
    ],
    [
      { processes: [{ processId: "Extrusion", efficiency: 0 }] },
      "processes[0].efficiency must be > 0 and <= 1",
    ],
    [
      { transportLegs: [{ modeId: "Rail", distanceKm: km(10), loadFactor: 1.5 }] },
      "transportLegs[0].loadFactor must be > 0 and <= 1",
    ],
    [
      { useScenarios: [{ type: "wash", frequencyPerYear: -1, energyKWhPerUse: 1, waterLPerUse: 1 }] },
      "useScenarios[0].frequencyPerYear must be >= 0",
    ],
  ];

  it.each(invalidCases)("rejects %o", (overrides, message) => {
    expect(() => validateSpecification({ ...spec, ...overrides }, 0.8)).toThrow(message);
  });

  it("names the offending field on the error", () => {
    try {
      validateSpecification({ ...spec, lifetimeYears: 0 }, 0.8);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvariantViolationError);
      expect(error).toMatchObject({ name: "InvariantViolation", field: "lifetimeYears" });
    }
  });
});
