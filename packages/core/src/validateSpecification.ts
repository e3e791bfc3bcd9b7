import { InvariantViolationError } from "./errors";
import { type EndOfLifeSplit, type ProductSpecification } from "./lifeCycleModel";

export const RATE_SUM_TOLERANCE = 1e-9;

export interface ResolvedEndOfLife {
  recyclingRate: number;
  incinerationRate: number;
  landfillRate: number;
  energyRecoveryEfficiency: number;
}

const validateFinite = (value: number, field: string): void => {
  if (!Number.isFinite(value)) {
    throw new InvariantViolationError(field, "must be a finite number");
  }
};

const validateNonNegative = (value: number, field: string): void => {
  validateFinite(value, field);
  if (value < 0) {
    throw new InvariantViolationError(field, "must be >= 0");
  }
};

const validateRate = (value: number, field: string): void => {
  validateFinite(value, field);
  if (value < 0 || value > 1) {
    throw new InvariantViolationError(field, "must be between 0 and 1");
  }
};

const validateOpenUnitRate = (value: number, field: string): void => {
  validateFinite(value, field);
  if (value <= 0 || value > 1) {
    throw new InvariantViolationError(field, "must be > 0 and <= 1");
  }
};

/**
 * Resolves the landfill remainder and checks that the three disposal routes
 * partition the product mass.
 */
export const resolveEndOfLife = (
  split: EndOfLifeSplit,
  defaultEnergyRecoveryEfficiency: number,
): ResolvedEndOfLife => {
  validateRate(split.recyclingRate, "endOfLife.recyclingRate");
  validateRate(split.incinerationRate, "endOfLife.incinerationRate");

  const energyRecoveryEfficiency =
    split.energyRecoveryEfficiency ?? defaultEnergyRecoveryEfficiency;
  validateRate(energyRecoveryEfficiency, "endOfLife.energyRecoveryEfficiency");

  if (split.landfillRate === undefined) {
    const remainder = 1 - split.recyclingRate - split.incinerationRate;
    if (remainder < -RATE_SUM_TOLERANCE) {
      throw new InvariantViolationError(
        "endOfLife",
        `recyclingRate + incinerationRate must not exceed 1 (got ${split.recyclingRate + split.incinerationRate})`,
      );
    }
    return {
      recyclingRate: split.recyclingRate,
      incinerationRate: split.incinerationRate,
      landfillRate: Math.max(0, remainder),
      energyRecoveryEfficiency,
    };
  }

  validateRate(split.landfillRate, "endOfLife.landfillRate");
  const total = split.recyclingRate + split.incinerationRate + split.landfillRate;
  if (Math.abs(total - 1) > RATE_SUM_TOLERANCE) {
    throw new InvariantViolationError("endOfLife", `rates must sum to 1 (got ${total})`);
  }

  return {
    recyclingRate: split.recyclingRate,
    incinerationRate: split.incinerationRate,
    landfillRate: split.landfillRate,
    energyRecoveryEfficiency,
  };
};

export const validateSpecification = (
  spec: ProductSpecification,
  defaultEnergyRecoveryEfficiency: number,
): ResolvedEndOfLife => {
  if (spec.productId.trim() === "") {
    throw new InvariantViolationError("productId", "must not be empty");
  }

  validateFinite(spec.lifetimeYears, "lifetimeYears");
  if (spec.lifetimeYears < 1) {
    throw new InvariantViolationError("lifetimeYears", "must be >= 1");
  }

  spec.materials.forEach((entry, index) => {
    validateNonNegative(entry.massKg, `materials[${index}].massKg`);
    validateRate(entry.recycledContent, `materials[${index}].recycledContent`);
  });

  spec.processes.forEach((entry, index) => {
    validateOpenUnitRate(entry.efficiency, `processes[${index}].efficiency`);
  });

  spec.transportLegs.forEach((leg, index) => {
    validateNonNegative(leg.distanceKm, `transportLegs[${index}].distanceKm`);
    validateOpenUnitRate(leg.loadFactor, `transportLegs[${index}].loadFactor`);
  });

  spec.useScenarios.forEach((scenario, index) => {
    validateNonNegative(scenario.frequencyPerYear, `useScenarios[${index}].frequencyPerYear`);
    validateNonNegative(scenario.energyKWhPerUse, `useScenarios[${index}].energyKWhPerUse`);
    validateNonNegative(scenario.waterLPerUse, `useScenarios[${index}].waterLPerUse`);
  });

  return resolveEndOfLife(spec.endOfLife, defaultEnergyRecoveryEfficiency);
};
