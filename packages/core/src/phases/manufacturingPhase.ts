import { type EngineOptions } from "../engineOptions";
import {
  MJ_PER_KWH,
  kg,
  kgCO2e,
  liters,
  mj,
  type DataQualityWarning,
  type KgCO2e,
  type Kilograms,
  type Liters,
  type Megajoules,
  type PhaseResult,
  type ProductSpecification,
  type TechnologyLevel,
} from "../lifeCycleModel";
import { type ReferenceDataProvider } from "../referenceData";
import { knownMaterialMass, missingReferenceWarning } from "./materialInventory";

export interface ProcessContribution {
  processId: string;
  processName: string;
  efficiency: number;
  technologyLevel: TechnologyLevel;
  energyKWh: number;
  energyMJ: Megajoules;
  /** Combustion, solvents and other on-site emissions. */
  directCarbonKgCO2e: KgCO2e;
  /** Emissions of the electricity drawn, at the regional grid intensity. */
  gridCarbonKgCO2e: KgCO2e;
  carbonKgCO2e: KgCO2e;
  waterL: Liters;
  scrapKg: Kilograms;
}

export interface ManufacturingPhaseResult extends PhaseResult<ProcessContribution> {
  phase: "manufacturing";
  region: string;
  gridCarbonGCO2ePerKWh: number;
  /** Mean declared process efficiency; 0 without processes. */
  efficiencyScore: number;
  scrapKg: Kilograms;
}

export type ManufacturingInput = Pick<
  ProductSpecification,
  "materials" | "processes" | "manufacturingRegion"
>;

export const regionFallbackWarning = (region: string, substitute: string): DataQualityWarning => ({
  code: "REGION_FALLBACK",
  message: `Unknown grid region "${region}"; using "${substitute}" intensity`,
  subject: region,
});

export const calculateManufacturingPhase = (
  input: ManufacturingInput,
  provider: ReferenceDataProvider,
  options: Pick<EngineOptions, "technologyMultipliers">,
): ManufacturingPhaseResult => {
  const warnings: DataQualityWarning[] = [];
  const massKg = knownMaterialMass(input.materials, provider);
  const grid = provider.getRegionalFactor(input.manufacturingRegion);
  if (!grid.matched) {
    warnings.push(regionFallbackWarning(input.manufacturingRegion, grid.record.region));
  }

  const details: ProcessContribution[] = [];
  for (const entry of input.processes) {
    const record = provider.getProcess(entry.processId);
    if (record === undefined) {
      warnings.push(missingReferenceWarning("process", entry.processId));
      continue;
    }
    const technologyLevel = entry.technologyLevel ?? "average";
    const energyKWh =
      ((massKg * record.energyKWhPerKg) / entry.efficiency) *
      options.technologyMultipliers[technologyLevel];
    const gridCarbon = (energyKWh * grid.record.carbonGCO2ePerKWh) / 1000;
    const directCarbon = (massKg * record.carbonKgCO2ePerKg) / entry.efficiency;

    details.push({
      processId: record.id,
      processName: record.name,
      efficiency: entry.efficiency,
      technologyLevel,
      energyKWh,
      energyMJ: mj(energyKWh * MJ_PER_KWH),
      directCarbonKgCO2e: kgCO2e(directCarbon),
      gridCarbonKgCO2e: kgCO2e(gridCarbon),
      carbonKgCO2e: kgCO2e(directCarbon + gridCarbon),
      waterL: liters(massKg * record.waterLPerKg),
      scrapKg: kg(massKg * record.scrapRate),
    });
  }

  const efficiencyScore =
    input.processes.length === 0
      ? 0
      : input.processes.reduce((total, entry) => total + entry.efficiency, 0) /
        input.processes.length;

  return {
    phase: "manufacturing",
    carbonKgCO2e: kgCO2e(details.reduce((total, item) => total + item.carbonKgCO2e, 0)),
    energyMJ: mj(details.reduce((total, item) => total + item.energyMJ, 0)),
    waterL: liters(details.reduce((total, item) => total + item.waterL, 0)),
    costUsd: null,
    region: grid.record.region,
    gridCarbonGCO2ePerKWh: grid.record.carbonGCO2ePerKWh,
    efficiencyScore,
    scrapKg: kg(details.reduce((total, item) => total + item.scrapKg, 0)),
    details,
    warnings,
  };
};
