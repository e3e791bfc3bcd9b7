import { type EngineOptions } from "../engineOptions";
import {
  kg,
  kgCO2e,
  liters,
  mj,
  type KgCO2e,
  type Kilograms,
  type MaterialEntry,
  type Megajoules,
  type PhaseResult,
} from "../lifeCycleModel";
import { type ReferenceDataProvider } from "../referenceData";
import { type ResolvedEndOfLife } from "../validateSpecification";
import { knownMaterialMass } from "./materialInventory";

export type EndOfLifeRoute = "recycling" | "incineration" | "landfill";

export interface EndOfLifeRouteContribution {
  route: EndOfLifeRoute;
  rate: number;
  massKg: Kilograms;
  carbonKgCO2e: KgCO2e;
  energyMJ: Megajoules;
}

export interface EndOfLifePhaseResult extends PhaseResult<EndOfLifeRouteContribution> {
  phase: "endOfLife";
  massKg: Kilograms;
  rates: ResolvedEndOfLife;
  recoveredMaterialKg: Kilograms;
  avoidedVirginMaterialKg: Kilograms;
  /** Energy recovered by incineration; reported as a positive quantity. */
  energyRecoveredMJ: Megajoules;
}

export type EndOfLifeFactors = Pick<
  EngineOptions,
  | "recyclingCreditKgCO2ePerKg"
  | "recyclingEnergyCreditMJPerKg"
  | "recycledMaterialYield"
  | "incinerationCarbonKgCO2ePerKg"
  | "incinerationEnergyMJPerKg"
  | "landfillCarbonKgCO2ePerKg"
>;

/**
 * Recycling and energy recovery enter as negative credits, so the net
 * phase carbon can fall below zero. It is left unclamped.
 */
export const calculateEndOfLifePhase = (
  materials: readonly MaterialEntry[],
  rates: ResolvedEndOfLife,
  provider: ReferenceDataProvider,
  factors: EndOfLifeFactors,
): EndOfLifePhaseResult => {
  const massKg = knownMaterialMass(materials, provider);
  const recycledKg = massKg * rates.recyclingRate;
  const incineratedKg = massKg * rates.incinerationRate;
  const landfilledKg = massKg * rates.landfillRate;
  const energyRecovered =
    incineratedKg * factors.incinerationEnergyMJPerKg * rates.energyRecoveryEfficiency;

  const details: EndOfLifeRouteContribution[] = [
    {
      route: "recycling",
      rate: rates.recyclingRate,
      massKg: kg(recycledKg),
      carbonKgCO2e: kgCO2e(-recycledKg * factors.recyclingCreditKgCO2ePerKg),
      energyMJ: mj(-recycledKg * factors.recyclingEnergyCreditMJPerKg),
    },
    {
      route: "incineration",
      rate: rates.incinerationRate,
      massKg: kg(incineratedKg),
      carbonKgCO2e: kgCO2e(incineratedKg * factors.incinerationCarbonKgCO2ePerKg),
      energyMJ: mj(-energyRecovered),
    },
    {
      route: "landfill",
      rate: rates.landfillRate,
      massKg: kg(landfilledKg),
      carbonKgCO2e: kgCO2e(landfilledKg * factors.landfillCarbonKgCO2ePerKg),
      energyMJ: mj(0),
    },
  ];

  return {
    phase: "endOfLife",
    carbonKgCO2e: kgCO2e(details.reduce((total, item) => total + item.carbonKgCO2e, 0)),
    energyMJ: mj(details.reduce((total, item) => total + item.energyMJ, 0)),
    waterL: liters(0),
    costUsd: null,
    massKg,
    rates,
    recoveredMaterialKg: kg(recycledKg),
    avoidedVirginMaterialKg: kg(recycledKg * factors.recycledMaterialYield),
    energyRecoveredMJ: mj(energyRecovered),
    details,
    warnings: [],
  };
};
