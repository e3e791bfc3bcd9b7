export type Brand<T, B extends string> = T & { readonly __brand: B };

export type Kilograms = Brand<number, "Kilograms">;
export type Kilometers = Brand<number, "Kilometers">;
export type KgCO2e = Brand<number, "KgCO2e">;
export type Megajoules = Brand<number, "Megajoules">;
export type Liters = Brand<number, "Liters">;
export type USD = Brand<number, "USD">;

export const kg = (value: number): Kilograms => value as Kilograms;
export const km = (value: number): Kilometers => value as Kilometers;
export const kgCO2e = (value: number): KgCO2e => value as KgCO2e;
export const mj = (value: number): Megajoules => value as Megajoules;
export const liters = (value: number): Liters => value as Liters;
export const usd = (value: number): USD => value as USD;

export const MJ_PER_KWH = 3.6;

export interface UncertainValue {
  mean: number;
  std: number;
}

export interface MaterialRecord {
  id: string;
  name: string;
  category: string;
  densityKgPerM3: number;
  embodiedEnergyMJPerKg: UncertainValue;
  carbonKgCO2ePerKg: UncertainValue;
  waterLPerKg: number;
  recyclabilityRate: number;
  recycledContentPotential: number;
  priceUsdPerKg: number;
  mechanicalStrengthMPa: number;
}

export interface ProcessRecord {
  id: string;
  name: string;
  energyKWhPerKg: number;
  carbonKgCO2ePerKg: number;
  scrapRate: number;
  waterLPerKg: number;
}

export interface TransportModeRecord {
  id: string;
  name: string;
  /** Grams, not kilograms, per tonne-km. */
  carbonGCO2ePerTonneKm: number;
  energyMJPerTonneKm: number;
  costUsdPerTonneKm: number;
}

export interface RegionalGridRecord {
  region: string;
  carbonGCO2ePerKWh: number;
  renewableShare: number;
}

export type AllocationMethod = "mass" | "economic";

export type TechnologyLevel = "basic" | "average" | "advanced" | "state_of_art";

export interface MaterialEntry {
  materialId: string;
  massKg: Kilograms;
  recycledContent: number;
}

export interface ProcessEntry {
  processId: string;
  efficiency: number;
  technologyLevel?: TechnologyLevel;
}

export interface TransportLeg {
  modeId: string;
  distanceKm: Kilometers;
  loadFactor: number;
}

export interface UseScenario {
  type: string;
  frequencyPerYear: number;
  energyKWhPerUse: number;
  waterLPerUse: number;
  considerGridDecarbonization?: boolean;
}

export interface EndOfLifeSplit {
  recyclingRate: number;
  incinerationRate: number;
  /** Derived as the remainder when omitted. */
  landfillRate?: number;
  energyRecoveryEfficiency?: number;
}

export interface ProductSpecification {
  productId: string;
  productName: string;
  materials: readonly MaterialEntry[];
  processes: readonly ProcessEntry[];
  manufacturingRegion: string;
  transportLegs: readonly TransportLeg[];
  useScenarios: readonly UseScenario[];
  /** Grid used for the use phase; the global average grid when omitted. */
  useRegion?: string;
  lifetimeYears: number;
  endOfLife: EndOfLifeSplit;
  allocationMethod?: AllocationMethod;
}

export type PhaseName = "material" | "manufacturing" | "transport" | "use" | "endOfLife";

export const PHASE_NAMES: readonly PhaseName[] = [
  "material",
  "manufacturing",
  "transport",
  "use",
  "endOfLife",
];

export interface PhaseImpact {
  carbonKgCO2e: KgCO2e;
  energyMJ: Megajoules;
  waterL: Liters;
  costUsd: USD | null;
}

export interface PhaseResult<TDetail> extends PhaseImpact {
  phase: PhaseName;
  details: TDetail[];
  warnings: DataQualityWarning[];
}

export type DataQualityWarningCode =
  | "REFERENCE_NOT_FOUND"
  | "REGION_FALLBACK"
  | "DEGENERATE_INPUT"
  | "NEGATIVE_SAMPLE_CLAMPED";

export interface DataQualityWarning {
  code: DataQualityWarningCode;
  message: string;
  subject: string;
}

const sum = <T>(items: readonly T[], selector: (item: T) => number): number =>
  items.reduce((total, item) => total + selector(item), 0);

export const totalDeclaredMass = (materials: readonly MaterialEntry[]): Kilograms =>
  kg(sum(materials, (entry) => entry.massKg));

export const totalDeclaredDistance = (legs: readonly TransportLeg[]): Kilometers =>
  km(sum(legs, (leg) => leg.distanceKm));

export const sumImpacts = (phases: readonly PhaseImpact[]): PhaseImpact => ({
  carbonKgCO2e: kgCO2e(sum(phases, (phase) => phase.carbonKgCO2e)),
  energyMJ: mj(sum(phases, (phase) => phase.energyMJ)),
  waterL: liters(sum(phases, (phase) => phase.waterL)),
  costUsd: usd(sum(phases, (phase) => phase.costUsd ?? 0)),
});
