import { describe, expect, it } from "vitest";
import {
  DEFAULT_ENGINE_OPTIONS,
  resolveEngineOptions,
  traceAssumptions,
  type EngineOptionOverrides,
} from "./engineOptions";

describe("resolveEngineOptions", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveEngineOptions()).toEqual(DEFAULT_ENGINE_OPTIONS);
  });

  it("merges nested overrides field by field", () => {
    const options = resolveEngineOptions({
      recycledDiscount: { water: 0.5 },
      technologyMultipliers: { basic: 1.5 },
      monteCarloTrials: 250,
    });

    expect(options.recycledDiscount).toEqual({ carbon: 0.3, energy: 0.4, water: 0.5, cost: 0.8 });
    expect(options.technologyMultipliers.basic).toBe(1.5);
    expect(options.technologyMultipliers.advanced).toBe(0.8);
    expect(options.monteCarloTrials).toBe(250);
  });

  const invalidOverrides: Array<[EngineOptionOverrides, string]> = [
    [{ recycledDiscount: { cost: 1.2 } }, "recycledDiscount.cost must be between 0 and 1"],
    [{ technologyMultipliers: { advanced: 0 } }, "technologyMultipliers.advanced must be > 0"],
    [{ gridDecarbonizationRate: 1 }, "gridDecarbonizationRate must be >= 0 and < 1"],
    [{ monteCarloTrials: 10.5 }, "monteCarloTrials must be a positive integer"],
    [{ monteCarloSeed: 0.5 }, "monteCarloSeed must be an integer"],
    [{ hotspotThresholdPercent: 120 }, "hotspotThresholdPercent must be between 0 and 100"],
    [{ maxHotspots: 0 }, "maxHotspots must be an integer between 1 and 5"],
    [{ landfillCarbonKgCO2ePerKg: -0.1 }, "landfillCarbonKgCO2ePerKg must be >= 0"],
  ];

  it.each(invalidOverrides)("rejects %o", (overrides, message) => {
    expect(() => resolveEngineOptions(overrides)).toThrow(message);
  });
});

describe("traceAssumptions", () => {
  it("lists every resolved option with its source", () => {
    const overrides = { gridDecarbonizationRate: 0.05, technologyMultipliers: { basic: 1.3 } };
    const trace = traceAssumptions(resolveEngineOptions(overrides), overrides);
    const byName = new Map(trace.map((item) => [item.name, item]));

    expect(byName.get("gridDecarbonizationRate")).toEqual({
      name: "gridDecarbonizationRate",
      category: "use",
      unit: "ratio/year",
      value: 0.05,
      source: "override",
    });
    expect(byName.get("technologyMultipliers.basic")?.source).toBe("override");
    expect(byName.get("technologyMultipliers.average")?.source).toBe("core-default");
    expect(byName.get("perturbTransport")?.value).toBe(true);
    expect(trace.every((item) => item.unit.length > 0)).toBe(true);
  });
});
