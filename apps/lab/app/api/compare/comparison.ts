import { randomUUID } from "node:crypto";
import { z } from "zod";
import { type LcaEngine, type ScenarioComparison } from "@lcia/core";
import { getEngine } from "../../../lib/engine";
import { productSpecificationSchema, toCoreSpecification } from "../assess/assessment";

const MAX_SCENARIOS = 20;

export const compareRequestSchema = z
  .object({
    scenarios: z.array(productSpecificationSchema).min(1).max(MAX_SCENARIOS),
  })
  .strict();

export type CompareRequestPayload = z.infer<typeof compareRequestSchema>;

export interface CompareResponse {
  comparison: ScenarioComparison;
  traceId: string;
}

export const buildCompareResponse = (
  payload: CompareRequestPayload,
  engine: LcaEngine = getEngine(),
): CompareResponse => ({
  comparison: engine.compareScenarios(payload.scenarios.map(toCoreSpecification)),
  traceId: randomUUID(),
});
