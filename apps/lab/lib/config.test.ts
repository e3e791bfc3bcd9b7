import { describe, expect, it } from "vitest";
import { loadLabConfig } from "./config";

describe("loadLabConfig", () => {
  it("applies defaults for unset variables", () => {
    expect(loadLabConfig({})).toEqual({
      monteCarloTrials: 1000,
      monteCarloSeed: 42,
      logLevel: "info",
    });
  });

  it("coerces numeric strings and normalizes the log level", () => {
    expect(
      loadLabConfig({ LCA_MONTE_CARLO_TRIALS: "250", LCA_MONTE_CARLO_SEED: "7", LOG_LEVEL: "WARN" }),
    ).toEqual({ monteCarloTrials: 250, monteCarloSeed: 7, logLevel: "warn" });
  });

  it("rejects invalid values", () => {
    expect(() => loadLabConfig({ LCA_MONTE_CARLO_TRIALS: "0" })).toThrow();
    expect(() => loadLabConfig({ LCA_MONTE_CARLO_SEED: "1.5" })).toThrow();
    expect(() => loadLabConfig({ LOG_LEVEL: "chatty" })).toThrow();
  });
});
