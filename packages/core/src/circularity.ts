import { type EngineOptions } from "./engineOptions";
import { type MaterialEntry } from "./lifeCycleModel";
import { resolveMaterialInventory } from "./phases/materialInventory";
import { type ReferenceDataProvider } from "./referenceData";

export type CircularityClass =
  | "Highly Circular"
  | "Moderately Circular"
  | "Transitional"
  | "Linear";

export interface CircularityReport {
  recycledContentWeighted: number;
  recyclabilityWeighted: number;
  lifetimeScore: number;
  /** Material Circularity Indicator in [0, 1]. */
  mci: number;
  classification: CircularityClass;
}

export const MCI_WEIGHTS = {
  recycledContent: 0.4,
  recyclability: 0.3,
  lifetime: 0.3,
} as const;

export const classifyCircularity = (mci: number): CircularityClass => {
  if (mci >= 0.8) return "Highly Circular";
  if (mci >= 0.6) return "Moderately Circular";
  if (mci >= 0.4) return "Transitional";
  return "Linear";
};

export const analyzeCircularity = (
  materials: readonly MaterialEntry[],
  lifetimeYears: number,
  provider: ReferenceDataProvider,
  options: Pick<EngineOptions, "lifetimeCeilingYears">,
): CircularityReport => {
  const { resolved, massKg } = resolveMaterialInventory(materials, provider);
  const lifetimeScore = Math.min(lifetimeYears / options.lifetimeCeilingYears, 1);

  if (massKg <= 0) {
    return {
      recycledContentWeighted: 0,
      recyclabilityWeighted: 0,
      lifetimeScore,
      mci: 0,
      classification: "Linear",
    };
  }

  const recycledContentWeighted =
    resolved.reduce((total, { entry }) => total + entry.massKg * entry.recycledContent, 0) / massKg;
  const recyclabilityWeighted =
    resolved.reduce((total, { entry, record }) => total + entry.massKg * record.recyclabilityRate, 0) /
    massKg;

  const mci = Math.min(
    1,
    Math.max(
      0,
      recycledContentWeighted * MCI_WEIGHTS.recycledContent +
        recyclabilityWeighted * MCI_WEIGHTS.recyclability +
        lifetimeScore * MCI_WEIGHTS.lifetime,
    ),
  );

  return {
    recycledContentWeighted,
    recyclabilityWeighted,
    lifetimeScore,
    mci,
    classification: classifyCircularity(mci),
  };
};
