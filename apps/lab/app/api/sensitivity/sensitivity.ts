import { randomUUID } from "node:crypto";
import { z } from "zod";
import { isSensitivityParameter, type LcaEngine, type SensitivityReport } from "@lcia/core";
import { getEngine } from "../../../lib/engine";
import { productSpecificationSchema, toCoreSpecification } from "../assess/assessment";

export const sensitivityRequestSchema = z
  .object({
    specification: productSpecificationSchema,
    parameters: z
      .array(
        z.string().refine(isSensitivityParameter, {
          message: "Unknown sensitivity parameter",
        }),
      )
      .min(1)
      .optional(),
    variations: z
      .array(z.number().gt(-1).max(1))
      .min(1)
      .max(20)
      .optional(),
  })
  .strict();

export type SensitivityRequestPayload = z.infer<typeof sensitivityRequestSchema>;

export interface SensitivityResponse {
  report: SensitivityReport;
  traceId: string;
}

export const buildSensitivityResponse = (
  payload: SensitivityRequestPayload,
  engine: LcaEngine = getEngine(),
): SensitivityResponse => ({
  report: engine.sensitivityAnalysis(
    toCoreSpecification(payload.specification),
    payload.parameters,
    payload.variations,
  ),
  traceId: randomUUID(),
});
