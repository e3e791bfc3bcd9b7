import { type EngineOptions } from "./engineOptions";
import {
  kgCO2e,
  usd,
  type KgCO2e,
  type Kilograms,
  type MaterialRecord,
  type ProductSpecification,
  type USD,
} from "./lifeCycleModel";
import { resolveMaterialInventory } from "./phases/materialInventory";
import { type ReferenceDataProvider } from "./referenceData";

export interface MaterialSubstitution {
  materialId: string;
  massKg: Kilograms;
  /** null when no feasible substitute beats the current material. */
  substituteId: string | null;
  substituteName: string | null;
  currentCarbonKgCO2e: KgCO2e;
  bestCarbonKgCO2e: KgCO2e;
  reductionPercent: number;
  costChangeUsd: USD;
  strengthRatio: number;
}

export interface ImprovementPotential {
  currentCarbonKgCO2e: KgCO2e;
  bestCarbonKgCO2e: KgCO2e;
  reductionPotentialPercent: number;
  /** Avoided emissions priced at the configured carbon price. */
  carbonCostSavingsUsd: USD;
  substitutions: MaterialSubstitution[];
  recommendations: string[];
}

export type OptimizerOptions = Pick<
  EngineOptions,
  | "substitutionStrengthFloor"
  | "carbonPriceUsdPerTonne"
  | "recycledContentTarget"
  | "highCarbonGridThresholdGPerKWh"
  | "highCarbonTransportThresholdGPerTonneKm"
  | "shortLifetimeYears"
  | "maxRecommendations"
>;

const byCarbonThenId = (a: MaterialRecord, b: MaterialRecord): number =>
  a.carbonKgCO2ePerKg.mean - b.carbonKgCO2ePerKg.mean || a.id.localeCompare(b.id);

/**
 * Lowest-carbon catalog material that keeps at least `strengthFloor` of the
 * original's strength, or undefined when none emits less than the original.
 */
export const findBestSubstitute = (
  original: MaterialRecord,
  catalog: readonly MaterialRecord[],
  strengthFloor: number,
): MaterialRecord | undefined => {
  const minimumStrength = original.mechanicalStrengthMPa * strengthFloor;
  const [best] = catalog
    .filter((candidate) => candidate.id !== original.id)
    .filter((candidate) => candidate.mechanicalStrengthMPa >= minimumStrength)
    .sort(byCarbonThenId);

  if (best === undefined || best.carbonKgCO2ePerKg.mean >= original.carbonKgCO2ePerKg.mean) {
    return undefined;
  }
  return best;
};

const formatPercent = (ratio: number): string => `${Math.round(ratio * 100)}%`;

export const generateRecommendations = (
  spec: Pick<
    ProductSpecification,
    "materials" | "manufacturingRegion" | "transportLegs" | "lifetimeYears"
  >,
  substitutions: readonly MaterialSubstitution[],
  provider: ReferenceDataProvider,
  options: OptimizerOptions,
): string[] => {
  const recommendations = new Set<string>();

  for (const { entry } of resolveMaterialInventory(spec.materials, provider).resolved) {
    if (entry.recycledContent < options.recycledContentTarget) {
      recommendations.add(
        `Increase recycled content in ${entry.materialId} to at least ${formatPercent(options.recycledContentTarget)}`,
      );
    }
  }

  const grid = provider.getRegionalFactor(spec.manufacturingRegion);
  if (grid.record.carbonGCO2ePerKWh > options.highCarbonGridThresholdGPerKWh) {
    recommendations.add("Consider manufacturing in regions with cleaner electricity grid");
  }

  for (const leg of spec.transportLegs) {
    const mode = provider.getTransportMode(leg.modeId);
    if (mode && mode.carbonGCO2ePerTonneKm >= options.highCarbonTransportThresholdGPerTonneKm) {
      recommendations.add(`Avoid ${mode.name} for high-volume products`);
    }
  }

  if (spec.lifetimeYears < options.shortLifetimeYears) {
    recommendations.add("Increase product lifetime through better design and materials");
  }

  for (const substitution of substitutions) {
    if (substitution.substituteName !== null) {
      recommendations.add(
        `Substitute ${substitution.materialId} with ${substitution.substituteName} to cut its carbon by ${substitution.reductionPercent.toFixed(1)}%`,
      );
    }
  }

  return [...recommendations].slice(0, options.maxRecommendations);
};

export const optimizeImprovements = (
  spec: Pick<
    ProductSpecification,
    "materials" | "manufacturingRegion" | "transportLegs" | "lifetimeYears"
  >,
  provider: ReferenceDataProvider,
  options: OptimizerOptions,
): ImprovementPotential => {
  const catalog = provider.listMaterials();
  const { resolved } = resolveMaterialInventory(spec.materials, provider);

  const substitutions = resolved.map(({ entry, record }): MaterialSubstitution => {
    const substitute = findBestSubstitute(record, catalog, options.substitutionStrengthFloor);
    const chosen = substitute ?? record;
    const current = entry.massKg * record.carbonKgCO2ePerKg.mean;
    const best = entry.massKg * chosen.carbonKgCO2ePerKg.mean;

    return {
      materialId: record.id,
      massKg: entry.massKg,
      substituteId: substitute?.id ?? null,
      substituteName: substitute?.name ?? null,
      currentCarbonKgCO2e: kgCO2e(current),
      bestCarbonKgCO2e: kgCO2e(best),
      reductionPercent: current > 0 ? ((current - best) / current) * 100 : 0,
      costChangeUsd: usd(entry.massKg * (chosen.priceUsdPerKg - record.priceUsdPerKg)),
      strengthRatio:
        record.mechanicalStrengthMPa > 0
          ? chosen.mechanicalStrengthMPa / record.mechanicalStrengthMPa
          : 1,
    };
  });

  const current = substitutions.reduce((total, item) => total + item.currentCarbonKgCO2e, 0);
  const best = substitutions.reduce((total, item) => total + item.bestCarbonKgCO2e, 0);

  return {
    currentCarbonKgCO2e: kgCO2e(current),
    bestCarbonKgCO2e: kgCO2e(best),
    reductionPotentialPercent: current > 0 ? ((current - best) / current) * 100 : 0,
    carbonCostSavingsUsd: usd(((current - best) * options.carbonPriceUsdPerTonne) / 1000),
    substitutions,
    recommendations: generateRecommendations(spec, substitutions, provider, options),
  };
};
