import { type EngineOptions } from "./engineOptions";
import { type KgCO2e, type PhaseImpact, type PhaseName } from "./lifeCycleModel";

export type HotspotSignificance = "Critical" | "High" | "Medium" | "Low";

export interface Hotspot {
  phase: PhaseName;
  carbonKgCO2e: KgCO2e;
  sharePercent: number;
  significance: HotspotSignificance;
  improvementLevers: readonly string[];
}

const IMPROVEMENT_LEVERS: Partial<Record<PhaseName, readonly string[]>> = {
  material: [
    "Switch to lower-impact materials",
    "Increase recycled content",
    "Reduce material mass",
  ],
  manufacturing: [
    "Improve process efficiency",
    "Switch to renewable energy",
    "Optimize production planning",
  ],
  transport: [
    "Optimize logistics",
    "Switch to low-carbon transport",
    "Reduce transportation distance",
  ],
};

const GENERAL_LEVERS: readonly string[] = ["General efficiency improvements"];

export const improvementLeversFor = (phase: PhaseName): readonly string[] =>
  IMPROVEMENT_LEVERS[phase] ?? GENERAL_LEVERS;

export const assessSignificance = (sharePercent: number): HotspotSignificance => {
  if (sharePercent > 50) return "Critical";
  if (sharePercent > 30) return "High";
  if (sharePercent > 15) return "Medium";
  return "Low";
};

export type PhaseCarbon = Pick<PhaseImpact, "carbonKgCO2e"> & { phase: PhaseName };

/**
 * Shares are taken of the summed positive (burden) carbon, so end-of-life
 * credits cannot push a phase above 100%. Phases at or below the threshold
 * are dropped; the rest are ranked by share and capped.
 */
export const identifyHotspots = (
  phases: readonly PhaseCarbon[],
  options: Pick<EngineOptions, "hotspotThresholdPercent" | "maxHotspots">,
): Hotspot[] => {
  const burden = phases.reduce((total, phase) => total + Math.max(phase.carbonKgCO2e, 0), 0);
  if (burden <= 0) {
    return [];
  }

  return phases
    .map((phase) => ({ phase, sharePercent: (phase.carbonKgCO2e / burden) * 100 }))
    .filter(({ sharePercent }) => sharePercent > options.hotspotThresholdPercent)
    .sort((a, b) => b.sharePercent - a.sharePercent)
    .slice(0, Math.min(options.maxHotspots, 5))
    .map(({ phase, sharePercent }) => ({
      phase: phase.phase,
      carbonKgCO2e: phase.carbonKgCO2e,
      sharePercent,
      significance: assessSignificance(sharePercent),
      improvementLevers: improvementLeversFor(phase.phase),
    }));
};
