import { InvariantViolationError } from "./errors";
import { kg, km, type ProductSpecification } from "./lifeCycleModel";

export type SensitivityParameter =
  | "materialMass"
  | "transportDistance"
  | "processEfficiency"
  | "lifetimeYears"
  | "useFrequency"
  | "recyclingRate";

export const SENSITIVITY_PARAMETERS: readonly SensitivityParameter[] = [
  "materialMass",
  "transportDistance",
  "processEfficiency",
  "lifetimeYears",
  "useFrequency",
  "recyclingRate",
];

export const DEFAULT_VARIATIONS: readonly number[] = [-0.2, -0.1, 0.1, 0.2];

export interface SensitivityVariation {
  /** Relative change applied to the parameter, e.g. -20. */
  variationPercent: number;
  carbonKgCO2e: number;
  changeKgCO2e: number;
  changePercent: number;
}

export interface ParameterSensitivity {
  parameter: SensitivityParameter;
  variations: SensitivityVariation[];
  /** Mean absolute percent change in total carbon across the variations. */
  sensitivityIndex: number;
}

export interface SensitivityReport {
  baselineCarbonKgCO2e: number;
  parameters: ParameterSensitivity[];
  /** Parameters ordered from most to least influential. */
  ranking: SensitivityParameter[];
}

export const isSensitivityParameter = (value: string): value is SensitivityParameter =>
  SENSITIVITY_PARAMETERS.some((parameter) => parameter === value);

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Scales one parameter by (1 + variation). Values are clamped back into
 * their valid range: efficiencies to at most 1, lifetimes to at least one
 * year, and the recycling rate to what incineration leaves. The landfill
 * share absorbs any change in recycling.
 */
export const applyVariation = (
  spec: ProductSpecification,
  parameter: SensitivityParameter,
  variation: number,
): ProductSpecification => {
  const factor = 1 + variation;
  switch (parameter) {
    case "materialMass":
      return {
        ...spec,
        materials: spec.materials.map((entry) => ({ ...entry, massKg: kg(entry.massKg * factor) })),
      };
    case "transportDistance":
      return {
        ...spec,
        transportLegs: spec.transportLegs.map((leg) => ({
          ...leg,
          distanceKm: km(leg.distanceKm * factor),
        })),
      };
    case "processEfficiency":
      return {
        ...spec,
        processes: spec.processes.map((entry) => ({
          ...entry,
          efficiency: clamp(entry.efficiency * factor, Number.MIN_VALUE, 1),
        })),
      };
    case "lifetimeYears":
      return { ...spec, lifetimeYears: Math.max(1, spec.lifetimeYears * factor) };
    case "useFrequency":
      return {
        ...spec,
        useScenarios: spec.useScenarios.map((scenario) => ({
          ...scenario,
          frequencyPerYear: scenario.frequencyPerYear * factor,
        })),
      };
    case "recyclingRate": {
      const { endOfLife } = spec;
      const recyclingRate = clamp(
        endOfLife.recyclingRate * factor,
        0,
        1 - endOfLife.incinerationRate,
      );
      return {
        ...spec,
        endOfLife: {
          ...endOfLife,
          recyclingRate,
          landfillRate:
            endOfLife.landfillRate === undefined
              ? undefined
              : Math.max(0, 1 - recyclingRate - endOfLife.incinerationRate),
        },
      };
    }
  }
};

/**
 * One-at-a-time sensitivity: each parameter is varied alone while the rest
 * of the specification stays at its baseline.
 */
export const analyzeSensitivity = (
  spec: ProductSpecification,
  parameters: readonly SensitivityParameter[],
  evaluateCarbon: (variant: ProductSpecification) => number,
  variations: readonly number[] = DEFAULT_VARIATIONS,
): SensitivityReport => {
  if (variations.length === 0) {
    throw new InvariantViolationError("variations", "must not be empty");
  }
  const baseline = evaluateCarbon(spec);

  const results = [...new Set(parameters)].map((parameter): ParameterSensitivity => {
    const rows = variations.map((variation): SensitivityVariation => {
      const carbon = evaluateCarbon(applyVariation(spec, parameter, variation));
      const change = carbon - baseline;
      return {
        variationPercent: variation * 100,
        carbonKgCO2e: carbon,
        changeKgCO2e: change,
        changePercent: baseline === 0 ? 0 : (change / Math.abs(baseline)) * 100,
      };
    });
    return {
      parameter,
      variations: rows,
      sensitivityIndex:
        rows.reduce((total, row) => total + Math.abs(row.changePercent), 0) / rows.length,
    };
  });

  return {
    baselineCarbonKgCO2e: baseline,
    parameters: results,
    ranking: [...results]
      .sort((a, b) => b.sensitivityIndex - a.sensitivityIndex)
      .map((result) => result.parameter),
  };
};
