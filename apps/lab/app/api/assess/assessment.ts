import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  kg,
  km,
  type LCAResult,
  type LcaEngine,
  type ProductSpecification,
} from "@lcia/core";
import { getEngine } from "../../../lib/engine";

const unitInterval = z.number().min(0).max(1);

export const materialEntrySchema = z
  .object({
    materialId: z.string().min(1),
    massKg: z.number().nonnegative(),
    recycledContent: unitInterval.default(0),
  })
  .strict();

export const processEntrySchema = z
  .object({
    processId: z.string().min(1),
    efficiency: z.number().gt(0).max(1),
    technologyLevel: z.enum(["basic", "average", "advanced", "state_of_art"]).optional(),
  })
  .strict();

export const transportLegSchema = z
  .object({
    modeId: z.string().min(1),
    distanceKm: z.number().nonnegative(),
    loadFactor: z.number().gt(0).max(1).default(1),
  })
  .strict();

export const useScenarioSchema = z
  .object({
    type: z.string().min(1),
    frequencyPerYear: z.number().nonnegative(),
    energyKWhPerUse: z.number().nonnegative(),
    waterLPerUse: z.number().nonnegative().default(0),
    considerGridDecarbonization: z.boolean().optional(),
  })
  .strict();

export const endOfLifeSchema = z
  .object({
    recyclingRate: unitInterval,
    incinerationRate: unitInterval,
    landfillRate: unitInterval.optional(),
    energyRecoveryEfficiency: unitInterval.optional(),
  })
  .strict();

export const productSpecificationSchema = z
  .object({
    productId: z.string().min(1),
    productName: z.string().default(""),
    materials: z.array(materialEntrySchema).min(1),
    processes: z.array(processEntrySchema).default([]),
    manufacturingRegion: z.string().min(1).default("Global Average"),
    transportLegs: z.array(transportLegSchema).default([]),
    useScenarios: z.array(useScenarioSchema).default([]),
    useRegion: z.string().min(1).optional(),
    lifetimeYears: z.number().min(1),
    endOfLife: endOfLifeSchema,
    allocationMethod: z.enum(["mass", "economic"]).optional(),
  })
  .strict();

export type ProductSpecificationPayload = z.infer<typeof productSpecificationSchema>;

export const assessRequestSchema = z
  .object({
    specification: productSpecificationSchema,
    uncertainty: z
      .object({
        trials: z.number().int().min(1).max(100000),
        seed: z.number().int(),
        includeSamples: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type AssessRequestPayload = z.infer<typeof assessRequestSchema>;

export interface AssessResponse {
  result: LCAResult;
  traceId: string;
}

export const toCoreSpecification = (
  input: ProductSpecificationPayload,
): ProductSpecification => ({
  ...input,
  materials: input.materials.map((entry) => ({ ...entry, massKg: kg(entry.massKg) })),
  transportLegs: input.transportLegs.map((leg) => ({ ...leg, distanceKm: km(leg.distanceKm) })),
});

export const buildAssessResponse = (
  payload: AssessRequestPayload,
  engine: LcaEngine = getEngine(),
): AssessResponse => {
  const specification = toCoreSpecification(payload.specification);
  const result = payload.uncertainty
    ? engine.calculateWithUncertainty(
        specification,
        payload.uncertainty.trials,
        payload.uncertainty.seed,
        payload.uncertainty.includeSamples ?? false,
      ).result
    : engine.calculate(specification);

  return { result, traceId: randomUUID() };
};
