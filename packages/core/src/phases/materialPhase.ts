import { type ImpactDiscounts } from "../engineOptions";
import {
  kgCO2e,
  liters,
  mj,
  usd,
  type AllocationMethod,
  type KgCO2e,
  type Kilograms,
  type Liters,
  type MaterialEntry,
  type Megajoules,
  type PhaseResult,
  type USD,
} from "../lifeCycleModel";
import { type ReferenceDataProvider } from "../referenceData";
import { resolveMaterialInventory, type ResolvedMaterial } from "./materialInventory";

export interface MaterialContribution {
  materialId: string;
  materialName: string;
  massKg: Kilograms;
  recycledContent: number;
  allocationFactor: number;
  carbonKgCO2e: KgCO2e;
  energyMJ: Megajoules;
  waterL: Liters;
  costUsd: USD;
  /** Share of the phase carbon attributed to this material by its allocation factor. */
  allocatedCarbonKgCO2e: KgCO2e;
}

export interface MaterialPhaseResult extends PhaseResult<MaterialContribution> {
  phase: "material";
  massKg: Kilograms;
  allocationMethod: AllocationMethod;
}

export interface MaterialPhaseOptions {
  recycledDiscount: ImpactDiscounts;
  allocationMethod?: AllocationMethod;
}

/**
 * Burden retained by a blend of virgin and recycled feedstock:
 * (1 - r) + r * discount.
 */
export const burdenMultiplier = (recycledContent: number, discount: number): number =>
  1 - recycledContent + recycledContent * discount;

const allocationWeight = (item: ResolvedMaterial, method: AllocationMethod): number =>
  method === "economic"
    ? item.entry.massKg * item.record.priceUsdPerKg
    : item.entry.massKg;

/**
 * Allocation factors in input order. They sum to 1 whenever at least one
 * material resolved; an all-zero weight splits the unit evenly.
 */
export const computeAllocationFactors = (
  resolved: readonly ResolvedMaterial[],
  method: AllocationMethod,
): number[] => {
  if (resolved.length === 0) {
    return [];
  }
  const weights = resolved.map((item) => allocationWeight(item, method));
  const totalWeight = weights.reduce((total, weight) => total + weight, 0);
  if (totalWeight <= 0) {
    return resolved.map(() => 1 / resolved.length);
  }
  return weights.map((weight) => weight / totalWeight);
};

export const calculateMaterialPhase = (
  materials: readonly MaterialEntry[],
  provider: ReferenceDataProvider,
  options: MaterialPhaseOptions,
): MaterialPhaseResult => {
  const allocationMethod = options.allocationMethod ?? "mass";
  const discount = options.recycledDiscount;
  const inventory = resolveMaterialInventory(materials, provider);
  const factors = computeAllocationFactors(inventory.resolved, allocationMethod);

  const contributions = inventory.resolved.map(({ entry, record }, position) => {
    const mass = entry.massKg;
    const recycled = entry.recycledContent;
    return {
      materialId: record.id,
      materialName: record.name,
      massKg: mass,
      recycledContent: recycled,
      allocationFactor: factors[position] ?? 0,
      carbonKgCO2e: kgCO2e(
        mass * record.carbonKgCO2ePerKg.mean * burdenMultiplier(recycled, discount.carbon),
      ),
      energyMJ: mj(
        mass * record.embodiedEnergyMJPerKg.mean * burdenMultiplier(recycled, discount.energy),
      ),
      waterL: liters(mass * record.waterLPerKg * burdenMultiplier(recycled, discount.water)),
      costUsd: usd(mass * record.priceUsdPerKg * burdenMultiplier(recycled, discount.cost)),
    };
  });

  const carbon = contributions.reduce((total, item) => total + item.carbonKgCO2e, 0);
  const energy = contributions.reduce((total, item) => total + item.energyMJ, 0);
  const water = contributions.reduce((total, item) => total + item.waterL, 0);
  const cost = contributions.reduce((total, item) => total + item.costUsd, 0);

  return {
    phase: "material",
    carbonKgCO2e: kgCO2e(carbon),
    energyMJ: mj(energy),
    waterL: liters(water),
    costUsd: usd(cost),
    massKg: inventory.massKg,
    allocationMethod,
    details: contributions.map((item) => ({
      ...item,
      allocatedCarbonKgCO2e: kgCO2e(carbon * item.allocationFactor),
    })),
    warnings: inventory.warnings,
  };
};
