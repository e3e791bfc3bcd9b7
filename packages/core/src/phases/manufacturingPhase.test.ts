import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_OPTIONS } from "../engineOptions";
import { kg } from "../lifeCycleModel";
import { loadDefaultReferenceCatalog } from "../referenceData";
import { calculateManufacturingPhase, type ManufacturingInput } from "./manufacturingPhase";

const catalog = loadDefaultReferenceCatalog();
const options = { technologyMultipliers: DEFAULT_ENGINE_OPTIONS.technologyMultipliers };

const bottle: ManufacturingInput = {
  materials: [{ materialId: "PP", massKg: kg(0.15), recycledContent: 0 }],
  processes: [{ processId: "Injection Molding", efficiency: 0.85 }],
  manufacturingRegion: "Global Average",
};

describe("calculateManufacturingPhase", () => {
  it("adds direct process carbon to grid carbon of the energy drawn", () => {
    const result = calculateManufacturingPhase(bottle, catalog, options);
    const [molding] = result.details;

    // 0.15 kg * 1.2 kWh/kg / 0.85
    expect(molding?.energyKWh).toBeCloseTo(0.211765, 6);
    expect(molding?.gridCarbonKgCO2e).toBeCloseTo(0.100588, 6);
    expect(molding?.directCarbonKgCO2e).toBeCloseTo(0.026471, 6);
    expect(result.carbonKgCO2e).toBeCloseTo(0.127059, 6);
    expect(result.energyMJ).toBeCloseTo(0.762353, 6);
    expect(result.waterL).toBeCloseTo(1.5, 9);
    expect(result.scrapKg).toBeCloseTo(0.0075, 9);
    expect(result.costUsd).toBeNull();
    expect(result.efficiencyScore).toBe(0.85);
    expect(result.warnings).toEqual([]);
  });

  it("scales the energy draw by technology level", () => {
    const basic = calculateManufacturingPhase(
      { ...bottle, processes: [{ processId: "Injection Molding", efficiency: 1, technologyLevel: "basic" }] },
      catalog,
      options,
    );
    const advanced = calculateManufacturingPhase(
      { ...bottle, processes: [{ processId: "Injection Molding", efficiency: 1, technologyLevel: "advanced" }] },
      catalog,
      options,
    );

    expect(basic.details[0]?.energyKWh).toBeCloseTo(0.216, 9);
    expect(advanced.details[0]?.energyKWh).toBeCloseTo(0.144, 9);
    expect(basic.details[0]?.directCarbonKgCO2e).toBeCloseTo(
      advanced.details[0]?.directCarbonKgCO2e ?? Number.NaN,
      12,
    );
  });

  it("uses the regional grid intensity", () => {
    const europe = calculateManufacturingPhase(
      { ...bottle, manufacturingRegion: "Europe" },
      catalog,
      options,
    );
    expect(europe.region).toBe("Europe");
    expect(europe.details[0]?.gridCarbonKgCO2e).toBeCloseTo((0.18 / 0.85) * 0.275, 9);
  });

  it("falls back to the global average for unknown regions", () => {
    const result = calculateManufacturingPhase(
      { ...bottle, manufacturingRegion: "Atlantis" },
      catalog,
      options,
    );

    expect(result.region).toBe("Global Average");
    expect(result.carbonKgCO2e).toBeCloseTo(0.127059, 6);
    expect(result.warnings.map((warning) => warning.code)).toEqual(["REGION_FALLBACK"]);
  });

  it("skips unknown processes but still scores every declared efficiency", () => {
    const result = calculateManufacturingPhase(
      {
        ...bottle,
        processes: [
          { processId: "Injection Molding", efficiency: 0.85 },
          { processId: "Teleportation", efficiency: 0.65 },
        ],
      },
      catalog,
      options,
    );

    expect(result.details).toHaveLength(1);
    expect(result.carbonKgCO2e).toBeCloseTo(0.127059, 6);
    expect(result.efficiencyScore).toBeCloseTo(0.75, 12);
    expect(result.warnings).toEqual([
      {
        code: "REFERENCE_NOT_FOUND",
        message: 'Unknown process "Teleportation" was skipped and contributes nothing to the totals',
        subject: "Teleportation",
      },
    ]);
  });

  it("reports zero efficiency score without processes", () => {
    const result = calculateManufacturingPhase({ ...bottle, processes: [] }, catalog, options);
    expect(result.efficiencyScore).toBe(0);
    expect(result.carbonKgCO2e).toBe(0);
  });
});
