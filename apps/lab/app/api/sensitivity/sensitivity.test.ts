import { describe, expect, it } from "vitest";
import { LcaEngine, createLogger, loadDefaultReferenceCatalog } from "@lcia/core";
import { bottleSpecification } from "../assess/fixtures";
import { buildSensitivityResponse, sensitivityRequestSchema } from "./sensitivity";

const engine = new LcaEngine(loadDefaultReferenceCatalog(), {
  logger: createLogger({ level: "error" }),
});

describe("sensitivityRequestSchema", () => {
  it("rejects unknown parameter names", () => {
    const result = sensitivityRequestSchema.safeParse({
      specification: bottleSpecification,
      parameters: ["materialMass", "colour"],
    });

    expect(result.success).toBe(false);
  });

  it("rejects variations that would remove the whole parameter", () => {
    const result = sensitivityRequestSchema.safeParse({
      specification: bottleSpecification,
      variations: [-1],
    });

    expect(result.success).toBe(false);
  });
});

describe("buildSensitivityResponse", () => {
  it("ranks every parameter when none are named", () => {
    const payload = sensitivityRequestSchema.parse({ specification: bottleSpecification });
    const response = buildSensitivityResponse(payload, engine);

    expect(response.traceId.length).toBeGreaterThan(0);
    expect(response.report.ranking).toEqual([
      "materialMass",
      "processEfficiency",
      "recyclingRate",
      "transportDistance",
      "lifetimeYears",
      "useFrequency",
    ]);
  });

  it("limits the report to the requested parameters and variations", () => {
    const payload = sensitivityRequestSchema.parse({
      specification: bottleSpecification,
      parameters: ["materialMass"],
      variations: [0.1],
    });
    const response = buildSensitivityResponse(payload, engine);

    expect(response.report.parameters).toHaveLength(1);
    expect(response.report.parameters[0]?.parameter).toBe("materialMass");
    expect(response.report.parameters[0]?.variations).toHaveLength(1);
    expect(response.report.parameters[0]?.variations[0]?.variationPercent).toBeCloseTo(10, 9);
    expect(response.report.parameters[0]?.sensitivityIndex).toBeCloseTo(10, 9);
  });
});
