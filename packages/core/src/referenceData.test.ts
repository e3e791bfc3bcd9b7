import { describe, expect, it } from "vitest";
import { type MaterialRecord } from "./lifeCycleModel";
import {
  GLOBAL_AVERAGE_GRID,
  InMemoryReferenceCatalog,
  loadDefaultReferenceCatalog,
  parseReferenceCatalog,
  snapshotReferenceData,
} from "./referenceData";

const steel: MaterialRecord = {
  id: "STEEL",
  name: "Steel",
  category: "Metal",
  densityKgPerM3: 7850,
  embodiedEnergyMJPerKg: { mean: 20, std: 1 },
  carbonKgCO2ePerKg: { mean: 1.9, std: 0.1 },
  waterLPerKg: 40,
  recyclabilityRate: 0.9,
  recycledContentPotential: 0.8,
  priceUsdPerKg: 0.8,
  mechanicalStrengthMPa: 250,
};

describe("loadDefaultReferenceCatalog", () => {
  const catalog = loadDefaultReferenceCatalog();

  it("loads the bundled catalog", () => {
    expect(catalog.listMaterials()).toHaveLength(15);
    expect(catalog.getMaterial("PP")?.carbonKgCO2ePerKg).toEqual({ mean: 2.1, std: 0.1 });
    expect(catalog.getProcess("Injection Molding")?.energyKWhPerKg).toBe(1.2);
    expect(catalog.getTransportMode("Truck")?.carbonGCO2ePerTonneKm).toBe(62);
  });

  it("returns undefined for unknown ids", () => {
    expect(catalog.getMaterial("NOPE")).toBeUndefined();
    expect(catalog.getProcess("NOPE")).toBeUndefined();
    expect(catalog.getTransportMode("NOPE")).toBeUndefined();
  });

  it("always returns a grid factor", () => {
    expect(catalog.getRegionalFactor("China")).toEqual({
      record: { region: "China", carbonGCO2ePerKWh: 680, renewableShare: 0.12 },
      matched: true,
    });
    expect(catalog.getRegionalFactor("Narnia")).toEqual({
      record: { region: "Global Average", carbonGCO2ePerKWh: 475, renewableShare: 0.25 },
      matched: false,
    });
  });
});

describe("InMemoryReferenceCatalog", () => {
  it("falls back to the built-in global average without a catalog entry", () => {
    expect(new InMemoryReferenceCatalog().getRegionalFactor("Anywhere")).toEqual({
      record: GLOBAL_AVERAGE_GRID,
      matched: false,
    });
  });

  it("freezes stored records", () => {
    const catalog = new InMemoryReferenceCatalog({ materials: [steel] });
    const stored = catalog.getMaterial("STEEL");
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored?.carbonKgCO2ePerKg)).toBe(true);
  });

  it("isolates snapshots from later updates", () => {
    const catalog = new InMemoryReferenceCatalog({ materials: [steel] });
    const snapshot = snapshotReferenceData(catalog);

    catalog.upsertMaterial({ ...steel, carbonKgCO2ePerKg: { mean: 3, std: 0.1 } });
    catalog.upsertMaterial({ ...steel, id: "STEEL2" });
    catalog.removeMaterial("STEEL");

    expect(snapshot.getMaterial("STEEL")?.carbonKgCO2ePerKg.mean).toBe(1.9);
    expect(snapshot.getMaterial("STEEL2")).toBeUndefined();
    expect(catalog.getMaterial("STEEL")).toBeUndefined();
  });

  it("uses providers without snapshot support as they are", () => {
    const provider = {
      getMaterial: () => undefined,
      getProcess: () => undefined,
      getTransportMode: () => undefined,
      getRegionalFactor: () => ({ record: GLOBAL_AVERAGE_GRID, matched: true }),
      listMaterials: () => [],
    };
    expect(snapshotReferenceData(provider)).toBe(provider);
  });
});

describe("InMemoryReferenceCatalog.searchMaterials", () => {
  const catalog = new InMemoryReferenceCatalog({
    materials: [
      steel,
      { ...steel, id: "ALU", name: "Aluminium", carbonKgCO2ePerKg: { mean: 8.2, std: 0.5 }, priceUsdPerKg: 2.5 },
      { ...steel, id: "PLA", name: "PLA", category: "Polymer", recyclabilityRate: 0.2, priceUsdPerKg: 3 },
    ],
  });
  const idsOf = (records: readonly MaterialRecord[]) => records.map((record) => record.id);

  it("returns every material without criteria", () => {
    expect(idsOf(catalog.searchMaterials())).toEqual(["STEEL", "ALU", "PLA"]);
  });

  it("combines all given criteria", () => {
    expect(idsOf(catalog.searchMaterials({ category: "Metal" }))).toEqual(["STEEL", "ALU"]);
    expect(idsOf(catalog.searchMaterials({ category: "Metal", maxCarbonKgCO2ePerKg: 1.9 }))).toEqual([
      "STEEL",
    ]);
    expect(idsOf(catalog.searchMaterials({ minRecyclabilityRate: 0.5, maxPriceUsdPerKg: 2.5 }))).toEqual([
      "STEEL",
      "ALU",
    ]);
  });

  it("treats a zero limit as a real bound", () => {
    expect(catalog.searchMaterials({ maxPriceUsdPerKg: 0 })).toEqual([]);
  });
});

describe("parseReferenceCatalog", () => {
  it("rejects malformed records", () => {
    expect(() =>
      parseReferenceCatalog({
        materials: [{ ...steel, recyclabilityRate: 1.5 }],
        processes: [],
        transportModes: [],
        regions: [],
      }),
    ).toThrow();
  });

  it("rejects unknown keys", () => {
    expect(() =>
      parseReferenceCatalog({ materials: [], processes: [], transportModes: [], regions: [], extra: 1 }),
    ).toThrow();
  });
});
