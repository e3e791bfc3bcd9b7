import { type EngineOptions } from "./engineOptions";
import { InvariantViolationError } from "./errors";
import { type DataQualityWarning, type MaterialEntry, type PhaseImpact } from "./lifeCycleModel";
import { burdenMultiplier } from "./phases/materialPhase";
import { resolveMaterialInventory } from "./phases/materialInventory";
import { createTrialRandom, type SeededRandom } from "./random";
import { type ReferenceDataProvider } from "./referenceData";
import {
  median,
  percentile,
  shareAtOrBelow,
  summarizeDistribution,
  type DistributionSummary,
} from "./statistics";

export interface MassSensitivity {
  parameter: string;
  materialId: string;
  /** Share of known product mass carried by this entry. */
  index: number;
}

export type CarbonTarget = "carbonNeutral" | "scienceBased" | "industryAverage" | "regulatoryLimit";

export interface TargetProbability {
  targetKgCO2e: number;
  /** Share of trials at or below the target, in percent. */
  probabilityPercent: number;
  meetsTarget: boolean;
}

export interface UncertaintyReport {
  trials: number;
  seed: number;
  carbon: DistributionSummary;
  energy: DistributionSummary;
  water: DistributionSummary;
  targets: Record<CarbonTarget, TargetProbability>;
  /** Number of factor or multiplier draws that came out negative and were set to 0. */
  clampedSamples: number;
  sensitivity: MassSensitivity[];
  samples?: {
    carbonKgCO2e: number[];
    energyMJ: number[];
    waterL: number[];
  };
  warnings: DataQualityWarning[];
}

/** Deterministic phase impacts the trials add to or perturb. */
export interface FixedPhaseImpacts {
  manufacturing: PhaseImpact;
  transport: PhaseImpact;
  use: PhaseImpact;
  endOfLife: PhaseImpact;
}

export type UncertaintyOptions = Pick<
  EngineOptions,
  | "recycledDiscount"
  | "perturbManufacturing"
  | "perturbTransport"
  | "manufacturingRelativeStd"
  | "transportRelativeStd"
> & {
  trials: number;
  seed: number;
  includeSamples?: boolean;
};

export const validateTrialSettings = (trials: number, seed: number): void => {
  if (!Number.isInteger(trials) || trials < 1) {
    throw new InvariantViolationError("trials", "must be a positive integer");
  }
  if (!Number.isInteger(seed)) {
    throw new InvariantViolationError("seed", "must be an integer");
  }
};

const probabilityAtOrBelow = (samples: readonly number[], target: number): TargetProbability => {
  const probabilityPercent = shareAtOrBelow(samples, target) * 100;
  return { targetKgCO2e: target, probabilityPercent, meetsTarget: probabilityPercent >= 50 };
};

/**
 * Likelihood of staying within reference targets. All but carbon neutrality
 * are read off the sampled distribution itself: the science-based target is
 * its 20th percentile, the industry average its median and the regulatory
 * limit its 90th percentile.
 */
export const targetProbabilities = (
  carbonSamples: readonly number[],
): Record<CarbonTarget, TargetProbability> => ({
  carbonNeutral: probabilityAtOrBelow(carbonSamples, 0),
  scienceBased: probabilityAtOrBelow(carbonSamples, percentile(carbonSamples, 20)),
  industryAverage: probabilityAtOrBelow(carbonSamples, median(carbonSamples)),
  regulatoryLimit: probabilityAtOrBelow(carbonSamples, percentile(carbonSamples, 90)),
});

class ClampingSampler {
  clamped = 0;

  constructor(private readonly rng: SeededRandom) {}

  draw(mean: number, std: number): number {
    const value = this.rng.normal(mean, std);
    if (value < 0) {
      this.clamped += 1;
      return 0;
    }
    return value;
  }
}

export const analyzeUncertainty = (
  materials: readonly MaterialEntry[],
  fixed: FixedPhaseImpacts,
  provider: ReferenceDataProvider,
  options: UncertaintyOptions,
): UncertaintyReport => {
  validateTrialSettings(options.trials, options.seed);
  const { resolved, massKg } = resolveMaterialInventory(materials, provider);
  const discount = options.recycledDiscount;
  const carbonSamples: number[] = [];
  const energySamples: number[] = [];
  const waterSamples: number[] = [];
  let clampedSamples = 0;

  for (let trial = 0; trial < options.trials; trial += 1) {
    const sampler = new ClampingSampler(createTrialRandom(options.seed, trial));
    let carbon = 0;
    let energy = 0;
    let water = 0;

    for (const { entry, record } of resolved) {
      const carbonFactor = sampler.draw(record.carbonKgCO2ePerKg.mean, record.carbonKgCO2ePerKg.std);
      const energyFactor = sampler.draw(
        record.embodiedEnergyMJPerKg.mean,
        record.embodiedEnergyMJPerKg.std,
      );
      carbon += entry.massKg * carbonFactor * burdenMultiplier(entry.recycledContent, discount.carbon);
      energy += entry.massKg * energyFactor * burdenMultiplier(entry.recycledContent, discount.energy);
      water += entry.massKg * record.waterLPerKg * burdenMultiplier(entry.recycledContent, discount.water);
    }

    const manufacturing = options.perturbManufacturing
      ? sampler.draw(1, options.manufacturingRelativeStd)
      : 1;
    const transport = options.perturbTransport ? sampler.draw(1, options.transportRelativeStd) : 1;

    carbon +=
      fixed.manufacturing.carbonKgCO2e * manufacturing +
      fixed.transport.carbonKgCO2e * transport +
      fixed.use.carbonKgCO2e +
      fixed.endOfLife.carbonKgCO2e;
    energy +=
      fixed.manufacturing.energyMJ * manufacturing +
      fixed.transport.energyMJ * transport +
      fixed.use.energyMJ +
      fixed.endOfLife.energyMJ;
    water +=
      fixed.manufacturing.waterL * manufacturing +
      fixed.transport.waterL * transport +
      fixed.use.waterL +
      fixed.endOfLife.waterL;

    carbonSamples.push(carbon);
    energySamples.push(energy);
    waterSamples.push(water);
    clampedSamples += sampler.clamped;
  }

  const sensitivity = resolved
    .map(({ entry, index }) => ({
      parameter: `materials[${index}].massKg`,
      materialId: entry.materialId,
      index: massKg > 0 ? entry.massKg / massKg : 0,
    }))
    .sort((a, b) => b.index - a.index);

  const warnings: DataQualityWarning[] =
    clampedSamples > 0
      ? [
          {
            code: "NEGATIVE_SAMPLE_CLAMPED",
            message: `${clampedSamples} negative samples were clamped to 0`,
            subject: "monteCarlo",
          },
        ]
      : [];

  return {
    trials: options.trials,
    seed: options.seed,
    carbon: summarizeDistribution(carbonSamples),
    energy: summarizeDistribution(energySamples),
    water: summarizeDistribution(waterSamples),
    targets: targetProbabilities(carbonSamples),
    clampedSamples,
    sensitivity,
    ...(options.includeSamples
      ? { samples: { carbonKgCO2e: carbonSamples, energyMJ: energySamples, waterL: waterSamples } }
      : {}),
    warnings,
  };
};
