import {
  kg,
  type DataQualityWarning,
  type Kilograms,
  type MaterialEntry,
  type MaterialRecord,
} from "../lifeCycleModel";
import { type ReferenceDataProvider } from "../referenceData";

export interface ResolvedMaterial {
  index: number;
  entry: MaterialEntry;
  record: MaterialRecord;
}

export interface MaterialInventory {
  resolved: ResolvedMaterial[];
  /** Mass of the entries that resolved; unknown materials carry no mass. */
  massKg: Kilograms;
  warnings: DataQualityWarning[];
}

export const missingReferenceWarning = (
  kind: "material" | "process" | "transport mode",
  id: string,
): DataQualityWarning => ({
  code: "REFERENCE_NOT_FOUND",
  message: `Unknown ${kind} "${id}" was skipped and contributes nothing to the totals`,
  subject: id,
});

export const resolveMaterialInventory = (
  materials: readonly MaterialEntry[],
  provider: ReferenceDataProvider,
): MaterialInventory => {
  const resolved: ResolvedMaterial[] = [];
  const warnings: DataQualityWarning[] = [];

  materials.forEach((entry, index) => {
    const record = provider.getMaterial(entry.materialId);
    if (record === undefined) {
      warnings.push(missingReferenceWarning("material", entry.materialId));
      return;
    }
    resolved.push({ index, entry, record });
  });

  const massKg = kg(resolved.reduce((total, item) => total + item.entry.massKg, 0));
  return { resolved, massKg, warnings };
};

export const knownMaterialMass = (
  materials: readonly MaterialEntry[],
  provider: ReferenceDataProvider,
): Kilograms => resolveMaterialInventory(materials, provider).massKg;
