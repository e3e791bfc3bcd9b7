import { z } from "zod";
import referenceCatalogJson from "../data/referenceCatalog.json";
import {
  type MaterialRecord,
  type ProcessRecord,
  type RegionalGridRecord,
  type TransportModeRecord,
} from "./lifeCycleModel";

export const GLOBAL_AVERAGE_REGION = "Global Average";

export const GLOBAL_AVERAGE_GRID: RegionalGridRecord = {
  region: GLOBAL_AVERAGE_REGION,
  carbonGCO2ePerKWh: 475,
  renewableShare: 0.25,
};

export interface RegionalFactorLookup {
  record: RegionalGridRecord;
  /** False when the region was unknown and the global average was substituted. */
  matched: boolean;
}

/**
 * Read-only view over material, process, transport and grid reference data.
 * Lookups are synchronous; `undefined` means the id has no catalog entry.
 */
export interface ReferenceDataProvider {
  getMaterial(id: string): MaterialRecord | undefined;
  getProcess(id: string): ProcessRecord | undefined;
  getTransportMode(id: string): TransportModeRecord | undefined;
  getRegionalFactor(region: string): RegionalFactorLookup;
  listMaterials(): readonly MaterialRecord[];
  /** Returns a view that later catalog updates cannot reach. */
  snapshot?(): ReferenceDataProvider;
}

/** Every given criterion must hold; omitted criteria match anything. */
export interface MaterialSearchCriteria {
  category?: string;
  maxCarbonKgCO2ePerKg?: number;
  minRecyclabilityRate?: number;
  maxPriceUsdPerKg?: number;
}

const matchesCriteria = (record: MaterialRecord, criteria: MaterialSearchCriteria): boolean =>
  (criteria.category === undefined || record.category === criteria.category) &&
  (criteria.maxCarbonKgCO2ePerKg === undefined ||
    record.carbonKgCO2ePerKg.mean <= criteria.maxCarbonKgCO2ePerKg) &&
  (criteria.minRecyclabilityRate === undefined ||
    record.recyclabilityRate >= criteria.minRecyclabilityRate) &&
  (criteria.maxPriceUsdPerKg === undefined || record.priceUsdPerKg <= criteria.maxPriceUsdPerKg);

const uncertainValueSchema = z
  .object({
    mean: z.number().nonnegative(),
    std: z.number().nonnegative(),
  })
  .strict();

const unitInterval = z.number().min(0).max(1);

export const materialRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    category: z.string(),
    densityKgPerM3: z.number().nonnegative(),
    embodiedEnergyMJPerKg: uncertainValueSchema,
    carbonKgCO2ePerKg: uncertainValueSchema,
    waterLPerKg: z.number().nonnegative(),
    recyclabilityRate: unitInterval,
    recycledContentPotential: unitInterval,
    priceUsdPerKg: z.number().nonnegative(),
    mechanicalStrengthMPa: z.number().nonnegative(),
  })
  .strict();

export const processRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    energyKWhPerKg: z.number().nonnegative(),
    carbonKgCO2ePerKg: z.number().nonnegative(),
    scrapRate: unitInterval,
    waterLPerKg: z.number().nonnegative(),
  })
  .strict();

export const transportModeRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    carbonGCO2ePerTonneKm: z.number().nonnegative(),
    energyMJPerTonneKm: z.number().nonnegative(),
    costUsdPerTonneKm: z.number().nonnegative(),
  })
  .strict();

export const regionalGridRecordSchema = z
  .object({
    region: z.string().min(1),
    carbonGCO2ePerKWh: z.number().nonnegative(),
    renewableShare: unitInterval,
  })
  .strict();

export const referenceCatalogSchema = z
  .object({
    materials: z.array(materialRecordSchema),
    processes: z.array(processRecordSchema),
    transportModes: z.array(transportModeRecordSchema),
    regions: z.array(regionalGridRecordSchema),
  })
  .strict();

export type ReferenceCatalogData = z.infer<typeof referenceCatalogSchema>;

const freezeRecord = <T extends object>(record: T): Readonly<T> => Object.freeze({ ...record });

const freezeMaterial = (record: MaterialRecord): MaterialRecord =>
  Object.freeze({
    ...record,
    embodiedEnergyMJPerKg: freezeRecord(record.embodiedEnergyMJPerKg),
    carbonKgCO2ePerKg: freezeRecord(record.carbonKgCO2ePerKg),
  });

/**
 * Catalog held in memory. Mutable through the `upsert*` methods so it can be
 * hot-reloaded; `snapshot()` hands out an independent copy for one calculation.
 */
export class InMemoryReferenceCatalog implements ReferenceDataProvider {
  private readonly materials = new Map<string, MaterialRecord>();
  private readonly processes = new Map<string, ProcessRecord>();
  private readonly transportModes = new Map<string, TransportModeRecord>();
  private readonly regions = new Map<string, RegionalGridRecord>();

  constructor(data: Partial<ReferenceCatalogData> = {}) {
    data.materials?.forEach((record) => this.upsertMaterial(record));
    data.processes?.forEach((record) => this.upsertProcess(record));
    data.transportModes?.forEach((record) => this.upsertTransportMode(record));
    data.regions?.forEach((record) => this.upsertRegion(record));
  }

  upsertMaterial(record: MaterialRecord): void {
    this.materials.set(record.id, freezeMaterial(record));
  }

  upsertProcess(record: ProcessRecord): void {
    this.processes.set(record.id, freezeRecord(record));
  }

  upsertTransportMode(record: TransportModeRecord): void {
    this.transportModes.set(record.id, freezeRecord(record));
  }

  upsertRegion(record: RegionalGridRecord): void {
    this.regions.set(record.region, freezeRecord(record));
  }

  removeMaterial(id: string): boolean {
    return this.materials.delete(id);
  }

  getMaterial(id: string): MaterialRecord | undefined {
    return this.materials.get(id);
  }

  getProcess(id: string): ProcessRecord | undefined {
    return this.processes.get(id);
  }

  getTransportMode(id: string): TransportModeRecord | undefined {
    return this.transportModes.get(id);
  }

  getRegionalFactor(region: string): RegionalFactorLookup {
    const record = this.regions.get(region);
    if (record) {
      return { record, matched: true };
    }
    return {
      record: this.regions.get(GLOBAL_AVERAGE_REGION) ?? GLOBAL_AVERAGE_GRID,
      matched: false,
    };
  }

  listMaterials(): readonly MaterialRecord[] {
    return [...this.materials.values()];
  }

  /** Materials in insertion order; carbon is compared on the mean factor. */
  searchMaterials(criteria: MaterialSearchCriteria = {}): MaterialRecord[] {
    return [...this.materials.values()].filter((record) => matchesCriteria(record, criteria));
  }

  snapshot(): InMemoryReferenceCatalog {
    return new InMemoryReferenceCatalog({
      materials: [...this.materials.values()],
      processes: [...this.processes.values()],
      transportModes: [...this.transportModes.values()],
      regions: [...this.regions.values()],
    });
  }
}

/** Parses and validates raw catalog data, e.g. a JSON file loaded at run time. */
export const parseReferenceCatalog = (raw: unknown): InMemoryReferenceCatalog =>
  new InMemoryReferenceCatalog(referenceCatalogSchema.parse(raw));

/** The bundled catalog of materials, processes, transport modes and grid regions. */
export const loadDefaultReferenceCatalog = (): InMemoryReferenceCatalog =>
  parseReferenceCatalog(referenceCatalogJson);

export const snapshotReferenceData = (
  provider: ReferenceDataProvider,
): ReferenceDataProvider => provider.snapshot?.() ?? provider;
