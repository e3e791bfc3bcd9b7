import { LcaEngine, createLogger, loadDefaultReferenceCatalog } from "@lcia/core";
import { loadLabConfig } from "./config";

let engine: LcaEngine | undefined;

/** Engine shared by the route handlers, built from the environment on first use. */
export const getEngine = (): LcaEngine => {
  if (engine === undefined) {
    const config = loadLabConfig();
    engine = new LcaEngine(loadDefaultReferenceCatalog(), {
      options: {
        monteCarloTrials: config.monteCarloTrials,
        monteCarloSeed: config.monteCarloSeed,
      },
      logger: createLogger({ level: config.logLevel, prefix: "[LCIA lab]" }),
    });
  }
  return engine;
};
