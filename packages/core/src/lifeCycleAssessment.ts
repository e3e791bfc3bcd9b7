import { analyzeCircularity, type CircularityReport } from "./circularity";
import { assessDataQuality, type DataQualityAssessment } from "./dataQuality";
import { type AssumptionTraceItem, type EngineOptions } from "./engineOptions";
import { identifyHotspots, type Hotspot } from "./hotspots";
import { optimizeImprovements, type ImprovementPotential } from "./improvementOptimizer";
import { type DataQualityWarning, type ProductSpecification } from "./lifeCycleModel";
import { calculateEndOfLifePhase, type EndOfLifePhaseResult } from "./phases/endOfLifePhase";
import {
  calculateManufacturingPhase,
  type ManufacturingPhaseResult,
} from "./phases/manufacturingPhase";
import { calculateMaterialPhase, type MaterialPhaseResult } from "./phases/materialPhase";
import { calculateTransportPhase, type TransportPhaseResult } from "./phases/transportPhase";
import { calculateUsePhase, type UsePhaseResult } from "./phases/usePhase";
import { type ReferenceDataProvider } from "./referenceData";
import { aggregateTotals, type LifeCycleTotals } from "./totals";
import { analyzeUncertainty, type UncertaintyReport } from "./uncertaintyAnalyzer";
import { type ResolvedEndOfLife } from "./validateSpecification";

export const CALCULATION_METHOD = "ISO 14040/14044 attributional LCA with Monte Carlo uncertainty";

export interface LifeCyclePhases {
  material: MaterialPhaseResult;
  manufacturing: ManufacturingPhaseResult;
  transport: TransportPhaseResult;
  use: UsePhaseResult;
  endOfLife: EndOfLifePhaseResult;
}

export interface LCAResultMetadata {
  calculationMethod: string;
  assumptions: AssumptionTraceItem[];
  warnings: DataQualityWarning[];
  dataQuality: DataQualityAssessment;
}

export interface LCAResult {
  productId: string;
  productName: string;
  /** ISO 8601 time the assessment was produced. */
  timestamp: string;
  phases: LifeCyclePhases;
  totals: LifeCycleTotals;
  circularity: CircularityReport;
  hotspots: Hotspot[];
  improvementPotential: ImprovementPotential;
  /** null when the assessment ran without Monte Carlo sampling. */
  uncertainty: UncertaintyReport | null;
  metadata: LCAResultMetadata;
}

export interface MonteCarloSettings {
  trials: number;
  seed: number;
  includeSamples?: boolean;
}

export interface AssessmentContext {
  /** Already snapshot-read for this invocation. */
  provider: ReferenceDataProvider;
  options: EngineOptions;
  assumptions: AssumptionTraceItem[];
  now: () => Date;
}

export const calculatePhases = (
  spec: ProductSpecification,
  endOfLife: ResolvedEndOfLife,
  { provider, options }: Pick<AssessmentContext, "provider" | "options">,
): LifeCyclePhases => ({
  material: calculateMaterialPhase(spec.materials, provider, {
    recycledDiscount: options.recycledDiscount,
    allocationMethod: spec.allocationMethod,
  }),
  manufacturing: calculateManufacturingPhase(spec, provider, options),
  transport: calculateTransportPhase(spec, provider),
  use: calculateUsePhase(spec, provider, options),
  endOfLife: calculateEndOfLifePhase(spec.materials, endOfLife, provider, options),
});

/**
 * Runs every calculator against an already validated specification. The
 * phases share no state, so their order here is not significant.
 */
export const assessLifeCycle = (
  spec: ProductSpecification,
  endOfLife: ResolvedEndOfLife,
  context: AssessmentContext,
  monteCarlo: MonteCarloSettings | null,
): LCAResult => {
  const { provider, options } = context;
  const phases = calculatePhases(spec, endOfLife, context);
  const phaseList = [
    phases.material,
    phases.manufacturing,
    phases.transport,
    phases.use,
    phases.endOfLife,
  ];

  const { totals, warnings: totalsWarnings } = aggregateTotals(phaseList, phases.material.massKg);
  const uncertainty =
    monteCarlo === null
      ? null
      : analyzeUncertainty(
          spec.materials,
          {
            manufacturing: phases.manufacturing,
            transport: phases.transport,
            use: phases.use,
            endOfLife: phases.endOfLife,
          },
          provider,
          { ...options, ...monteCarlo },
        );

  const warnings = [
    ...phaseList.flatMap((phase) => phase.warnings),
    ...totalsWarnings,
    ...(uncertainty?.warnings ?? []),
  ];

  return {
    productId: spec.productId,
    productName: spec.productName,
    timestamp: context.now().toISOString(),
    phases,
    totals,
    circularity: analyzeCircularity(spec.materials, spec.lifetimeYears, provider, options),
    hotspots: identifyHotspots(phaseList, options),
    improvementPotential: optimizeImprovements(spec, provider, options),
    uncertainty,
    metadata: {
      calculationMethod: CALCULATION_METHOD,
      assumptions: context.assumptions,
      warnings,
      dataQuality: assessDataQuality(spec, warnings),
    },
  };
};
