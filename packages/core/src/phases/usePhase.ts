import { type EngineOptions } from "../engineOptions";
import {
  MJ_PER_KWH,
  kgCO2e,
  liters,
  mj,
  type DataQualityWarning,
  type KgCO2e,
  type Liters,
  type Megajoules,
  type PhaseResult,
  type ProductSpecification,
} from "../lifeCycleModel";
import { GLOBAL_AVERAGE_REGION, type ReferenceDataProvider } from "../referenceData";
import { regionFallbackWarning } from "./manufacturingPhase";

export type GridModel = "flat" | "dynamic";

export interface UseScenarioContribution {
  type: string;
  totalUses: number;
  energyKWh: number;
  gridModel: GridModel;
  carbonKgCO2e: KgCO2e;
  energyMJ: Megajoules;
  waterL: Liters;
}

export interface UsePhaseResult extends PhaseResult<UseScenarioContribution> {
  phase: "use";
  region: string;
  /** kgCO2e per kWh in the first year of use. */
  gridCarbonKgCO2ePerKWh: number;
  lifetimeYears: number;
}

/**
 * Carbon of a constant annual draw on a grid whose intensity falls
 * geometrically each year. A fractional final year counts pro rata.
 */
export const integrateDecarbonizingGrid = (
  annualKWh: number,
  lifetimeYears: number,
  initialKgCO2ePerKWh: number,
  annualDecline: number,
): number => {
  const fullYears = Math.floor(lifetimeYears);
  let total = 0;
  for (let year = 0; year < fullYears; year += 1) {
    total += annualKWh * initialKgCO2ePerKWh * (1 - annualDecline) ** year;
  }
  const partialYear = lifetimeYears - fullYears;
  if (partialYear > 0) {
    total += partialYear * annualKWh * initialKgCO2ePerKWh * (1 - annualDecline) ** fullYears;
  }
  return total;
};

export const calculateUsePhase = (
  input: Pick<ProductSpecification, "useScenarios" | "useRegion" | "lifetimeYears">,
  provider: ReferenceDataProvider,
  options: Pick<EngineOptions, "gridDecarbonizationRate">,
): UsePhaseResult => {
  const warnings: DataQualityWarning[] = [];
  const region = input.useRegion ?? GLOBAL_AVERAGE_REGION;
  const grid = provider.getRegionalFactor(region);
  if (!grid.matched) {
    warnings.push(regionFallbackWarning(region, grid.record.region));
  }
  const kgPerKWh = grid.record.carbonGCO2ePerKWh / 1000;

  const details = input.useScenarios.map((scenario): UseScenarioContribution => {
    const totalUses = scenario.frequencyPerYear * input.lifetimeYears;
    const energyKWh = totalUses * scenario.energyKWhPerUse;
    const dynamic = scenario.considerGridDecarbonization === true;
    const carbon = dynamic
      ? integrateDecarbonizingGrid(
          scenario.frequencyPerYear * scenario.energyKWhPerUse,
          input.lifetimeYears,
          kgPerKWh,
          options.gridDecarbonizationRate,
        )
      : energyKWh * kgPerKWh;

    return {
      type: scenario.type,
      totalUses,
      energyKWh,
      gridModel: dynamic ? "dynamic" : "flat",
      carbonKgCO2e: kgCO2e(carbon),
      energyMJ: mj(energyKWh * MJ_PER_KWH),
      waterL: liters(totalUses * scenario.waterLPerUse),
    };
  });

  return {
    phase: "use",
    carbonKgCO2e: kgCO2e(details.reduce((total, item) => total + item.carbonKgCO2e, 0)),
    energyMJ: mj(details.reduce((total, item) => total + item.energyMJ, 0)),
    waterL: liters(details.reduce((total, item) => total + item.waterL, 0)),
    costUsd: null,
    region: grid.record.region,
    gridCarbonKgCO2ePerKWh: kgPerKWh,
    lifetimeYears: input.lifetimeYears,
    details,
    warnings,
  };
};
