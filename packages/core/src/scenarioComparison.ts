import { InvariantViolationError } from "./errors";
import { type LCAResult } from "./lifeCycleAssessment";
import { mean, standardDeviation } from "./statistics";

export interface ScenarioSummary {
  productId: string;
  productName: string;
  carbonKgCO2e: number;
  energyMJ: number;
  costUsd: number;
  mci: number;
  reductionPotentialPercent: number;
}

export interface MetricSpread {
  mean: number;
  std: number;
  min: number;
  max: number;
  range: number;
}

export interface ScenarioComparison {
  scenarios: ScenarioSummary[];
  carbon: MetricSpread;
  energy: MetricSpread;
  /** productId of the lowest-carbon scenario. */
  bestScenario: string;
  worstScenario: string;
}

const spreadOf = (values: readonly number[]): MetricSpread => {
  const min = Math.min(...values);
  const max = Math.max(...values);
  return { mean: mean(values), std: standardDeviation(values), min, max, range: max - min };
};

export const summarizeScenario = (result: LCAResult): ScenarioSummary => ({
  productId: result.productId,
  productName: result.productName,
  carbonKgCO2e: result.totals.carbonKgCO2e,
  energyMJ: result.totals.energyMJ,
  costUsd: result.totals.costUsd,
  mci: result.circularity.mci,
  reductionPotentialPercent: result.improvementPotential.reductionPotentialPercent,
});

export const compareScenarioResults = (results: readonly LCAResult[]): ScenarioComparison => {
  const scenarios = results.map(summarizeScenario);
  const [first, ...rest] = scenarios;
  if (first === undefined) {
    throw new InvariantViolationError("scenarios", "must not be empty");
  }

  // first index wins ties
  const best = rest.reduce((lowest, item) => (item.carbonKgCO2e < lowest.carbonKgCO2e ? item : lowest), first);
  const worst = rest.reduce((highest, item) => (item.carbonKgCO2e > highest.carbonKgCO2e ? item : highest), first);

  return {
    scenarios,
    carbon: spreadOf(scenarios.map((item) => item.carbonKgCO2e)),
    energy: spreadOf(scenarios.map((item) => item.energyMJ)),
    bestScenario: best.productId,
    worstScenario: worst.productId,
  };
};
