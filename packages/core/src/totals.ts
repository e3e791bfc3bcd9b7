import {
  kgCO2e,
  liters,
  mj,
  sumImpacts,
  usd,
  type DataQualityWarning,
  type KgCO2e,
  type Kilograms,
  type Liters,
  type Megajoules,
  type PhaseImpact,
  type USD,
} from "./lifeCycleModel";

export interface LifeCycleTotals {
  carbonKgCO2e: KgCO2e;
  energyMJ: Megajoules;
  waterL: Liters;
  costUsd: USD;
  massKg: Kilograms;
  carbonPerKg: number;
  energyPerKg: number;
  /** Totals as a share of one person's annual footprint. */
  normalized: NormalizedImpacts;
}

export interface NormalizedImpacts {
  carbon: number;
  energy: number;
  water: number;
}

export const PER_CAPITA_ANNUAL_REFERENCE = {
  carbonKgCO2e: 5000,
  energyMJ: 80000,
  waterL: 1500000,
} as const;

export interface TotalsAggregation {
  totals: LifeCycleTotals;
  warnings: DataQualityWarning[];
}

/**
 * Sums the phases and derives per-kg intensities. A product without mass
 * divides by 1 instead and reports DEGENERATE_INPUT.
 */
export const aggregateTotals = (
  phases: readonly PhaseImpact[],
  massKg: Kilograms,
): TotalsAggregation => {
  const sum = sumImpacts(phases);
  const degenerate = massKg <= 0;
  const denominator = degenerate ? 1 : massKg;
  const warnings: DataQualityWarning[] = degenerate
    ? [
        {
          code: "DEGENERATE_INPUT",
          message: "Total material mass is zero; per-kg intensities use a denominator of 1 kg",
          subject: "massKg",
        },
      ]
    : [];

  return {
    totals: {
      carbonKgCO2e: kgCO2e(sum.carbonKgCO2e),
      energyMJ: mj(sum.energyMJ),
      waterL: liters(sum.waterL),
      costUsd: usd(sum.costUsd ?? 0),
      massKg,
      carbonPerKg: sum.carbonKgCO2e / denominator,
      energyPerKg: sum.energyMJ / denominator,
      normalized: {
        carbon: sum.carbonKgCO2e / PER_CAPITA_ANNUAL_REFERENCE.carbonKgCO2e,
        energy: sum.energyMJ / PER_CAPITA_ANNUAL_REFERENCE.energyMJ,
        water: sum.waterL / PER_CAPITA_ANNUAL_REFERENCE.waterL,
      },
    },
    warnings,
  };
};
