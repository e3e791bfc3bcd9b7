import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import {
  resolveEngineOptions,
  traceAssumptions,
  type AssumptionTraceItem,
  type EngineOptionOverrides,
  type EngineOptions,
} from "./engineOptions";
import { InvariantViolationError } from "./errors";
import {
  assessLifeCycle,
  calculatePhases,
  type AssessmentContext,
  type LCAResult,
  type MonteCarloSettings,
} from "./lifeCycleAssessment";
import { sumImpacts, type ProductSpecification } from "./lifeCycleModel";
import defaultLogger, { type Logger } from "./logger";
import { snapshotReferenceData, type ReferenceDataProvider } from "./referenceData";
import { compareScenarioResults, type ScenarioComparison } from "./scenarioComparison";
import {
  DEFAULT_SCENARIO_PROBABILITY,
  analyzeScenarioUncertainty,
  applyUncertaintyScenario,
  type ScenarioUncertaintyReport,
  type UncertaintyScenario,
} from "./scenarioUncertainty";
import {
  SENSITIVITY_PARAMETERS,
  analyzeSensitivity,
  isSensitivityParameter,
  type SensitivityReport,
} from "./sensitivityAnalysis";
import { validateTrialSettings, type UncertaintyReport } from "./uncertaintyAnalyzer";
import { validateSpecification } from "./validateSpecification";

export interface LcaEngineConfig {
  options?: EngineOptionOverrides;
  logger?: Logger;
  /** Source of result timestamps; the system clock when omitted. */
  clock?: () => Date;
}

export interface UncertainAssessment {
  result: LCAResult;
  uncertainty: UncertaintyReport;
}

export interface BatchOptions {
  signal?: AbortSignal;
}

export interface BatchOutcome {
  results: LCAResult[];
  /** productIds not assessed because the batch was cancelled. */
  skipped: string[];
  cancelled: boolean;
}

/**
 * Stateless LCIA pipeline over an injected reference data provider. Every
 * call validates its specification first, then works on one snapshot of
 * the provider.
 */
export class LcaEngine {
  readonly options: EngineOptions;
  private readonly assumptions: AssumptionTraceItem[];
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly provider: ReferenceDataProvider,
    config: LcaEngineConfig = {},
  ) {
    this.options = resolveEngineOptions(config.options);
    this.assumptions = traceAssumptions(this.options, config.options);
    this.logger = config.logger ?? defaultLogger;
    this.clock = config.clock ?? (() => new Date());
  }

  calculate(spec: ProductSpecification): LCAResult {
    return this.run(spec, {
      trials: this.options.monteCarloTrials,
      seed: this.options.monteCarloSeed,
    });
  }

  calculateWithUncertainty(
    spec: ProductSpecification,
    trials: number,
    seed: number,
    includeSamples = false,
  ): UncertainAssessment {
    validateTrialSettings(trials, seed);
    const result = this.run(spec, { trials, seed, includeSamples });
    if (result.uncertainty === null) {
      throw new Error("Monte Carlo analysis did not run");
    }
    return { result, uncertainty: result.uncertainty };
  }

  sensitivityAnalysis(
    spec: ProductSpecification,
    parameters: readonly string[] = SENSITIVITY_PARAMETERS,
    variations?: readonly number[],
  ): SensitivityReport {
    const endOfLife = validateSpecification(spec, this.options.defaultEnergyRecoveryEfficiency);
    const known = parameters.filter(isSensitivityParameter);
    const unknown = parameters.filter((parameter) => !isSensitivityParameter(parameter));
    if (unknown.length > 0) {
      throw new InvariantViolationError(
        "parameters",
        `contains unknown entries: ${unknown.join(", ")}`,
      );
    }

    const context = this.context();
    this.logger.debug("Running sensitivity analysis", {
      productId: spec.productId,
      parameters: known,
    });

    const evaluateCarbon = (variant: ProductSpecification): number => {
      const variantEndOfLife =
        variant === spec
          ? endOfLife
          : validateSpecification(variant, this.options.defaultEnergyRecoveryEfficiency);
      return sumImpacts(Object.values(calculatePhases(variant, variantEndOfLife, context)))
        .carbonKgCO2e;
    };

    return analyzeSensitivity(spec, known, evaluateCarbon, variations);
  }

  /** Deterministic carbon of each scenario variant, weighted by its probability. */
  scenarioUncertainty(
    spec: ProductSpecification,
    scenarios: readonly UncertaintyScenario[],
  ): ScenarioUncertaintyReport {
    const variants = scenarios.map((scenario) => {
      const variant = applyUncertaintyScenario(spec, scenario);
      return {
        scenario,
        variant,
        endOfLife: validateSpecification(variant, this.options.defaultEnergyRecoveryEfficiency),
      };
    });
    const context = this.context();
    this.logger.debug("Running scenario uncertainty", {
      productId: spec.productId,
      scenarios: scenarios.length,
    });

    return analyzeScenarioUncertainty(
      variants.map(({ scenario, variant, endOfLife }) => ({
        name: scenario.name,
        description: scenario.description ?? "",
        probability: scenario.probability ?? DEFAULT_SCENARIO_PROBABILITY,
        carbonKgCO2e: sumImpacts(Object.values(calculatePhases(variant, endOfLife, context)))
          .carbonKgCO2e,
      })),
    );
  }

  compareScenarios(specs: readonly ProductSpecification[]): ScenarioComparison {
    const validated = specs.map((spec) => ({
      spec,
      endOfLife: validateSpecification(spec, this.options.defaultEnergyRecoveryEfficiency),
    }));
    const context = this.context();
    return compareScenarioResults(
      validated.map(({ spec, endOfLife }) =>
        this.log(assessLifeCycle(spec, endOfLife, context, null)),
      ),
    );
  }

  /** Cancellation is honoured between products, never inside one. */
  async calculateBatch(
    specs: readonly ProductSpecification[],
    { signal }: BatchOptions = {},
  ): Promise<BatchOutcome> {
    const results: LCAResult[] = [];
    for (const [index, spec] of specs.entries()) {
      if (signal?.aborted) {
        const skipped = specs.slice(index).map((item) => item.productId);
        this.logger.info("Batch cancelled", { completed: results.length, skipped: skipped.length });
        return { results, skipped, cancelled: true };
      }
      results.push(this.calculate(spec));
      await yieldToEventLoop();
    }
    return { results, skipped: [], cancelled: false };
  }

  private run(spec: ProductSpecification, monteCarlo: MonteCarloSettings | null): LCAResult {
    const endOfLife = validateSpecification(spec, this.options.defaultEnergyRecoveryEfficiency);
    this.logger.debug("Calculating life cycle impacts", {
      productId: spec.productId,
      trials: monteCarlo?.trials ?? 0,
    });
    return this.log(assessLifeCycle(spec, endOfLife, this.context(), monteCarlo));
  }

  private context(): AssessmentContext {
    return {
      provider: snapshotReferenceData(this.provider),
      options: this.options,
      assumptions: this.assumptions,
      now: this.clock,
    };
  }

  private log(result: LCAResult): LCAResult {
    for (const warning of result.metadata.warnings) {
      this.logger.warn(warning.message, { productId: result.productId, code: warning.code });
    }
    return result;
  }
}
