export * from "./lifeCycleModel";
export * from "./errors";
export * from "./engineOptions";
export * from "./referenceData";
export * from "./validateSpecification";
export * from "./statistics";
export * from "./random";
export * from "./phases/materialInventory";
export * from "./phases/materialPhase";
export * from "./phases/manufacturingPhase";
export * from "./phases/transportPhase";
export * from "./phases/usePhase";
export * from "./phases/endOfLifePhase";
export * from "./totals";
export * from "./circularity";
export * from "./hotspots";
export * from "./improvementOptimizer";
export * from "./dataQuality";
export * from "./uncertaintyAnalyzer";
export * from "./sensitivityAnalysis";
export * from "./scenarioComparison";
export * from "./scenarioUncertainty";
export * from "./lifeCycleAssessment";
export * from "./lcaEngine";
export { Logger, createLogger, type LogLevel, type LoggerConfig } from "./logger";
