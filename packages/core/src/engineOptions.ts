import { type TechnologyLevel } from "./lifeCycleModel";

export interface ImpactDiscounts {
  carbon: number;
  energy: number;
  water: number;
  cost: number;
}

export interface EngineOptions {
  /**
   * Share of the virgin burden retained by recycled feedstock, per metric.
   * Recycled material keeps most of its cost but little of its footprint.
   */
  recycledDiscount: ImpactDiscounts;
  technologyMultipliers: Record<TechnologyLevel, number>;
  recyclingCreditKgCO2ePerKg: number;
  recyclingEnergyCreditMJPerKg: number;
  /** Share of recycled mass that displaces virgin material. */
  recycledMaterialYield: number;
  incinerationCarbonKgCO2ePerKg: number;
  incinerationEnergyMJPerKg: number;
  /** Methane-equivalent emissions of landfilled mass. */
  landfillCarbonKgCO2ePerKg: number;
  defaultEnergyRecoveryEfficiency: number;
  /** Annual geometric decline of grid intensity for the dynamic use-phase model. */
  gridDecarbonizationRate: number;
  monteCarloTrials: number;
  monteCarloSeed: number;
  perturbManufacturing: boolean;
  perturbTransport: boolean;
  manufacturingRelativeStd: number;
  transportRelativeStd: number;
  hotspotThresholdPercent: number;
  maxHotspots: number;
  /** Minimum strength ratio a substitute must keep relative to the original. */
  substitutionStrengthFloor: number;
  carbonPriceUsdPerTonne: number;
  lifetimeCeilingYears: number;
  recycledContentTarget: number;
  highCarbonGridThresholdGPerKWh: number;
  highCarbonTransportThresholdGPerTonneKm: number;
  shortLifetimeYears: number;
  maxRecommendations: number;
}

export type EngineOptionOverrides = Partial<
  Omit<EngineOptions, "recycledDiscount" | "technologyMultipliers">
> & {
  recycledDiscount?: Partial<ImpactDiscounts>;
  technologyMultipliers?: Partial<Record<TechnologyLevel, number>>;
};

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  recycledDiscount: { carbon: 0.3, energy: 0.4, water: 0.2, cost: 0.8 },
  technologyMultipliers: { basic: 1.2, average: 1.0, advanced: 0.8, state_of_art: 0.6 },
  recyclingCreditKgCO2ePerKg: 1.0,
  recyclingEnergyCreditMJPerKg: 5,
  recycledMaterialYield: 0.8,
  incinerationCarbonKgCO2ePerKg: 0.5,
  incinerationEnergyMJPerKg: 10,
  landfillCarbonKgCO2ePerKg: 0.1,
  defaultEnergyRecoveryEfficiency: 0.8,
  gridDecarbonizationRate: 0.02,
  monteCarloTrials: 1000,
  monteCarloSeed: 42,
  perturbManufacturing: true,
  perturbTransport: true,
  manufacturingRelativeStd: 0.1,
  transportRelativeStd: 0.1,
  hotspotThresholdPercent: 10,
  maxHotspots: 5,
  substitutionStrengthFloor: 0.8,
  carbonPriceUsdPerTonne: 50,
  lifetimeCeilingYears: 10,
  recycledContentTarget: 0.3,
  highCarbonGridThresholdGPerKWh: 600,
  highCarbonTransportThresholdGPerTonneKm: 200,
  shortLifetimeYears: 3,
  maxRecommendations: 5,
};

const validateRate = (rate: number, name: string): void => {
  if (!(rate >= 0 && rate <= 1)) {
    throw new Error(`${name} must be between 0 and 1`);
  }
};

const validatePositive = (value: number, name: string): void => {
  if (!(value > 0)) {
    throw new Error(`${name} must be > 0`);
  }
};

const validateNonNegative = (value: number, name: string): void => {
  if (!(value >= 0)) {
    throw new Error(`${name} must be >= 0`);
  }
};

const validatePositiveInteger = (value: number, name: string): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer`);
  }
};

export const validateEngineOptions = (options: EngineOptions): void => {
  validateRate(options.recycledDiscount.carbon, "recycledDiscount.carbon");
  validateRate(options.recycledDiscount.energy, "recycledDiscount.energy");
  validateRate(options.recycledDiscount.water, "recycledDiscount.water");
  validateRate(options.recycledDiscount.cost, "recycledDiscount.cost");
  for (const [level, multiplier] of Object.entries(options.technologyMultipliers)) {
    validatePositive(multiplier, `technologyMultipliers.${level}`);
  }
  validateNonNegative(options.recyclingCreditKgCO2ePerKg, "recyclingCreditKgCO2ePerKg");
  validateNonNegative(options.recyclingEnergyCreditMJPerKg, "recyclingEnergyCreditMJPerKg");
  validateRate(options.recycledMaterialYield, "recycledMaterialYield");
  validateNonNegative(options.incinerationCarbonKgCO2ePerKg, "incinerationCarbonKgCO2ePerKg");
  validateNonNegative(options.incinerationEnergyMJPerKg, "incinerationEnergyMJPerKg");
  validateNonNegative(options.landfillCarbonKgCO2ePerKg, "landfillCarbonKgCO2ePerKg");
  validateRate(options.defaultEnergyRecoveryEfficiency, "defaultEnergyRecoveryEfficiency");
  if (!(options.gridDecarbonizationRate >= 0 && options.gridDecarbonizationRate < 1)) {
    throw new Error("gridDecarbonizationRate must be >= 0 and < 1");
  }
  validatePositiveInteger(options.monteCarloTrials, "monteCarloTrials");
  if (!Number.isInteger(options.monteCarloSeed)) {
    throw new Error("monteCarloSeed must be an integer");
  }
  validateNonNegative(options.manufacturingRelativeStd, "manufacturingRelativeStd");
  validateNonNegative(options.transportRelativeStd, "transportRelativeStd");
  if (!(options.hotspotThresholdPercent >= 0 && options.hotspotThresholdPercent <= 100)) {
    throw new Error("hotspotThresholdPercent must be between 0 and 100");
  }
  if (!Number.isInteger(options.maxHotspots) || options.maxHotspots < 1 || options.maxHotspots > 5) {
    throw new Error("maxHotspots must be an integer between 1 and 5");
  }
  validateRate(options.substitutionStrengthFloor, "substitutionStrengthFloor");
  validateNonNegative(options.carbonPriceUsdPerTonne, "carbonPriceUsdPerTonne");
  validatePositive(options.lifetimeCeilingYears, "lifetimeCeilingYears");
  validateRate(options.recycledContentTarget, "recycledContentTarget");
  validateNonNegative(options.highCarbonGridThresholdGPerKWh, "highCarbonGridThresholdGPerKWh");
  validateNonNegative(
    options.highCarbonTransportThresholdGPerTonneKm,
    "highCarbonTransportThresholdGPerTonneKm",
  );
  validateNonNegative(options.shortLifetimeYears, "shortLifetimeYears");
  validatePositiveInteger(options.maxRecommendations, "maxRecommendations");
};

export const resolveEngineOptions = (overrides: EngineOptionOverrides = {}): EngineOptions => {
  const options: EngineOptions = {
    ...DEFAULT_ENGINE_OPTIONS,
    ...overrides,
    recycledDiscount: {
      ...DEFAULT_ENGINE_OPTIONS.recycledDiscount,
      ...overrides.recycledDiscount,
    },
    technologyMultipliers: {
      ...DEFAULT_ENGINE_OPTIONS.technologyMultipliers,
      ...overrides.technologyMultipliers,
    },
  };
  validateEngineOptions(options);
  return options;
};

export type AssumptionCategory = "material" | "process" | "endOfLife" | "use" | "uncertainty" | "optimizer";

export interface AssumptionTraceItem {
  name: string;
  category: AssumptionCategory;
  unit: string;
  value: number | boolean;
  source: "core-default" | "override";
}

type FlatOption = Exclude<keyof EngineOptions, "recycledDiscount" | "technologyMultipliers">;

const DISCOUNT_METRICS: readonly (keyof ImpactDiscounts)[] = ["carbon", "energy", "water", "cost"];

const TECHNOLOGY_LEVELS: readonly TechnologyLevel[] = ["basic", "average", "advanced", "state_of_art"];

const OPTION_TRACE: Record<FlatOption, { category: AssumptionCategory; unit: string }> = {
  recyclingCreditKgCO2ePerKg: { category: "endOfLife", unit: "kgCO2e/kg" },
  recyclingEnergyCreditMJPerKg: { category: "endOfLife", unit: "MJ/kg" },
  recycledMaterialYield: { category: "endOfLife", unit: "ratio" },
  incinerationCarbonKgCO2ePerKg: { category: "endOfLife", unit: "kgCO2e/kg" },
  incinerationEnergyMJPerKg: { category: "endOfLife", unit: "MJ/kg" },
  landfillCarbonKgCO2ePerKg: { category: "endOfLife", unit: "kgCO2e/kg" },
  defaultEnergyRecoveryEfficiency: { category: "endOfLife", unit: "ratio" },
  gridDecarbonizationRate: { category: "use", unit: "ratio/year" },
  monteCarloTrials: { category: "uncertainty", unit: "trials" },
  monteCarloSeed: { category: "uncertainty", unit: "seed" },
  perturbManufacturing: { category: "uncertainty", unit: "flag" },
  perturbTransport: { category: "uncertainty", unit: "flag" },
  manufacturingRelativeStd: { category: "uncertainty", unit: "ratio" },
  transportRelativeStd: { category: "uncertainty", unit: "ratio" },
  hotspotThresholdPercent: { category: "optimizer", unit: "%" },
  maxHotspots: { category: "optimizer", unit: "phases" },
  substitutionStrengthFloor: { category: "optimizer", unit: "ratio" },
  carbonPriceUsdPerTonne: { category: "optimizer", unit: "USD/tCO2e" },
  lifetimeCeilingYears: { category: "optimizer", unit: "years" },
  recycledContentTarget: { category: "optimizer", unit: "ratio" },
  highCarbonGridThresholdGPerKWh: { category: "optimizer", unit: "gCO2e/kWh" },
  highCarbonTransportThresholdGPerTonneKm: { category: "optimizer", unit: "gCO2e/t-km" },
  shortLifetimeYears: { category: "optimizer", unit: "years" },
  maxRecommendations: { category: "optimizer", unit: "items" },
};

const FLAT_OPTIONS: readonly FlatOption[] = [
  "recyclingCreditKgCO2ePerKg",
  "recyclingEnergyCreditMJPerKg",
  "recycledMaterialYield",
  "incinerationCarbonKgCO2ePerKg",
  "incinerationEnergyMJPerKg",
  "landfillCarbonKgCO2ePerKg",
  "defaultEnergyRecoveryEfficiency",
  "gridDecarbonizationRate",
  "monteCarloTrials",
  "monteCarloSeed",
  "perturbManufacturing",
  "perturbTransport",
  "manufacturingRelativeStd",
  "transportRelativeStd",
  "hotspotThresholdPercent",
  "maxHotspots",
  "substitutionStrengthFloor",
  "carbonPriceUsdPerTonne",
  "lifetimeCeilingYears",
  "recycledContentTarget",
  "highCarbonGridThresholdGPerKWh",
  "highCarbonTransportThresholdGPerTonneKm",
  "shortLifetimeYears",
  "maxRecommendations",
];

const sourceOf = (overridden: boolean): AssumptionTraceItem["source"] =>
  overridden ? "override" : "core-default";

export const traceAssumptions = (
  options: EngineOptions,
  overrides: EngineOptionOverrides = {},
): AssumptionTraceItem[] => {
  const discounts = DISCOUNT_METRICS.map(
    (metric): AssumptionTraceItem => ({
      name: `recycledDiscount.${metric}`,
      category: "material",
      unit: "ratio",
      value: options.recycledDiscount[metric],
      source: sourceOf(overrides.recycledDiscount?.[metric] !== undefined),
    }),
  );

  const multipliers = TECHNOLOGY_LEVELS.map(
    (level): AssumptionTraceItem => ({
      name: `technologyMultipliers.${level}`,
      category: "process",
      unit: "multiplier",
      value: options.technologyMultipliers[level],
      source: sourceOf(overrides.technologyMultipliers?.[level] !== undefined),
    }),
  );

  const flat = FLAT_OPTIONS.map(
    (name): AssumptionTraceItem => ({
      name,
      category: OPTION_TRACE[name].category,
      unit: OPTION_TRACE[name].unit,
      value: options[name],
      source: sourceOf(overrides[name] !== undefined),
    }),
  );

  return [...discounts, ...multipliers, ...flat];
};
