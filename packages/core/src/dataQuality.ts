import { type DataQualityWarning, type ProductSpecification } from "./lifeCycleModel";
import { GLOBAL_AVERAGE_REGION } from "./referenceData";

/** Pedigree matrix indicator: 1 = poor, 2 = fair, 3 = good. */
export type PedigreeScore = 1 | 2 | 3;

export interface PedigreeScores {
  reliability: PedigreeScore;
  completeness: PedigreeScore;
  temporalCorrelation: PedigreeScore;
  geographicalCorrelation: PedigreeScore;
  technologicalCorrelation: PedigreeScore;
}

export interface DataQualityAssessment {
  pedigree: PedigreeScores;
  overallPercent: number;
  /** Multiplicative spread implied by the overall score. */
  uncertaintyFactor: number;
}

export const uncertaintyFactorFor = (overallPercent: number): number => {
  if (overallPercent > 80) return 1.1;
  if (overallPercent > 60) return 1.3;
  return 1.5;
};

const completenessOf = (
  spec: Pick<ProductSpecification, "materials">,
  warnings: readonly DataQualityWarning[],
): PedigreeScore => {
  const missing = warnings.filter((warning) => warning.code === "REFERENCE_NOT_FOUND");
  if (missing.length === 0) return 3;
  const missingIds = new Set(missing.map((warning) => warning.subject));
  return spec.materials.some((entry) => !missingIds.has(entry.materialId)) ? 2 : 1;
};

const geographyOf = (
  spec: Pick<ProductSpecification, "manufacturingRegion">,
  warnings: readonly DataQualityWarning[],
): PedigreeScore => {
  if (warnings.some((warning) => warning.code === "REGION_FALLBACK")) return 1;
  return spec.manufacturingRegion === GLOBAL_AVERAGE_REGION ? 2 : 3;
};

const technologyOf = (spec: Pick<ProductSpecification, "processes">): PedigreeScore =>
  spec.processes.length > 0 && spec.processes.every((entry) => entry.technologyLevel !== undefined)
    ? 3
    : 2;

/**
 * Scores the inputs of one assessment. Catalog factors are literature
 * averages, so reliability and temporal correlation stay at 2.
 */
export const assessDataQuality = (
  spec: Pick<ProductSpecification, "materials" | "processes" | "manufacturingRegion">,
  warnings: readonly DataQualityWarning[],
): DataQualityAssessment => {
  const pedigree: PedigreeScores = {
    reliability: 2,
    completeness: completenessOf(spec, warnings),
    temporalCorrelation: 2,
    geographicalCorrelation: geographyOf(spec, warnings),
    technologicalCorrelation: technologyOf(spec),
  };
  const scores = Object.values(pedigree);
  const overallPercent =
    (scores.reduce((total, score) => total + score, 0) / (scores.length * 3)) * 100;

  return {
    pedigree,
    overallPercent,
    uncertaintyFactor: uncertaintyFactorFor(overallPercent),
  };
};
