import { InvariantViolationError } from "./errors";
import { type MaterialEntry, type ProductSpecification } from "./lifeCycleModel";
import { mean, standardDeviation } from "./statistics";

/** Weight given to a scenario that does not state its own probability. */
export const DEFAULT_SCENARIO_PROBABILITY = 0.25;

/** Improved processes never exceed this efficiency. */
export const IMPROVED_EFFICIENCY_CEILING = 0.95;

export interface UncertaintyScenario {
  name: string;
  description?: string;
  probability?: number;
  /** Replaces the product's bill of materials. */
  materials?: readonly MaterialEntry[];
  /** Relative efficiency gain applied to every process, e.g. 0.1 for +10%. */
  efficiencyImprovement?: number;
}

export interface ScenarioOutcome {
  name: string;
  description: string;
  probability: number;
  carbonKgCO2e: number;
}

export interface ScenarioRobustness {
  range: number;
  /** std / mean; 0 unless the mean is positive. */
  coefficientOfVariation: number;
  worstCaseKgCO2e: number;
  bestCaseKgCO2e: number;
  /** Carbon given up by ending in the worst scenario instead of the best. */
  maximumRegretKgCO2e: number;
}

export interface ScenarioUncertaintyReport {
  scenarios: ScenarioOutcome[];
  expectedCarbonKgCO2e: number;
  variance: number;
  standardDeviation: number;
  robustness: ScenarioRobustness;
}

export const applyUncertaintyScenario = (
  spec: ProductSpecification,
  scenario: UncertaintyScenario,
): ProductSpecification => {
  const improvement = scenario.efficiencyImprovement;
  return {
    ...spec,
    materials: scenario.materials ?? spec.materials,
    processes:
      improvement === undefined
        ? spec.processes
        : spec.processes.map((entry) => ({
            ...entry,
            efficiency: Math.min(entry.efficiency * (1 + improvement), IMPROVED_EFFICIENCY_CEILING),
          })),
  };
};

const assessRobustness = (values: readonly number[]): ScenarioRobustness => {
  const worst = Math.max(...values);
  const best = Math.min(...values);
  const average = mean(values);
  return {
    range: worst - best,
    coefficientOfVariation: average > 0 ? standardDeviation(values) / average : 0,
    worstCaseKgCO2e: worst,
    bestCaseKgCO2e: best,
    maximumRegretKgCO2e: worst - best,
  };
};

/**
 * Probability-weighted expectation over discrete scenarios. Weights are
 * normalized by their sum, so they need not add up to 1.
 */
export const analyzeScenarioUncertainty = (
  outcomes: readonly ScenarioOutcome[],
): ScenarioUncertaintyReport => {
  if (outcomes.length === 0) {
    throw new InvariantViolationError("scenarios", "must not be empty");
  }
  outcomes.forEach((outcome, index) => {
    if (!(outcome.probability >= 0)) {
      throw new InvariantViolationError(`scenarios[${index}].probability`, "must be >= 0");
    }
  });
  const totalWeight = outcomes.reduce((total, outcome) => total + outcome.probability, 0);
  if (totalWeight <= 0) {
    throw new InvariantViolationError("scenarios", "probabilities must not all be 0");
  }

  const weightedMean = (values: readonly number[]): number =>
    values.reduce((total, value, index) => total + value * (outcomes[index]?.probability ?? 0), 0) /
    totalWeight;

  const values = outcomes.map((outcome) => outcome.carbonKgCO2e);
  const expected = weightedMean(values);
  const variance = weightedMean(values.map((value) => (value - expected) ** 2));

  return {
    scenarios: [...outcomes],
    expectedCarbonKgCO2e: expected,
    variance,
    standardDeviation: Math.sqrt(variance),
    robustness: assessRobustness(values),
  };
};
