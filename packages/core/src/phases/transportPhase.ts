import {
  kgCO2e,
  liters,
  mj,
  totalDeclaredDistance,
  usd,
  type DataQualityWarning,
  type KgCO2e,
  type Kilometers,
  type Megajoules,
  type PhaseResult,
  type ProductSpecification,
  type USD,
} from "../lifeCycleModel";
import { type ReferenceDataProvider } from "../referenceData";
import { knownMaterialMass, missingReferenceWarning } from "./materialInventory";

export interface TransportLegContribution {
  modeId: string;
  modeName: string;
  distanceKm: Kilometers;
  loadFactor: number;
  /** Declared distance / load factor: empty capacity is charged as extra distance. */
  effectiveDistanceKm: number;
  tonneKm: number;
  carbonKgCO2e: KgCO2e;
  energyMJ: Megajoules;
  costUsd: USD;
}

export interface TransportPhaseResult extends PhaseResult<TransportLegContribution> {
  phase: "transport";
  distanceKm: Kilometers;
  /** Declared distance per mode id. */
  modalMix: Record<string, number>;
}

export const calculateTransportPhase = (
  input: Pick<ProductSpecification, "materials" | "transportLegs">,
  provider: ReferenceDataProvider,
): TransportPhaseResult => {
  const warnings: DataQualityWarning[] = [];
  const tonnes = knownMaterialMass(input.materials, provider) / 1000;
  const details: TransportLegContribution[] = [];
  const modalMix: Record<string, number> = {};

  for (const leg of input.transportLegs) {
    const mode = provider.getTransportMode(leg.modeId);
    if (mode === undefined) {
      warnings.push(missingReferenceWarning("transport mode", leg.modeId));
      continue;
    }
    const effectiveDistanceKm = leg.distanceKm / leg.loadFactor;
    const tonneKm = tonnes * effectiveDistanceKm;
    modalMix[mode.id] = (modalMix[mode.id] ?? 0) + leg.distanceKm;
    details.push({
      modeId: mode.id,
      modeName: mode.name,
      distanceKm: leg.distanceKm,
      loadFactor: leg.loadFactor,
      effectiveDistanceKm,
      tonneKm,
      carbonKgCO2e: kgCO2e((tonneKm * mode.carbonGCO2ePerTonneKm) / 1000),
      energyMJ: mj(tonneKm * mode.energyMJPerTonneKm),
      costUsd: usd(tonneKm * mode.costUsdPerTonneKm),
    });
  }

  return {
    phase: "transport",
    carbonKgCO2e: kgCO2e(details.reduce((total, item) => total + item.carbonKgCO2e, 0)),
    energyMJ: mj(details.reduce((total, item) => total + item.energyMJ, 0)),
    waterL: liters(0),
    costUsd: usd(details.reduce((total, item) => total + item.costUsd, 0)),
    distanceKm: totalDeclaredDistance(input.transportLegs),
    modalMix,
    details,
    warnings,
  };
};
