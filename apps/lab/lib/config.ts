import { z } from "zod";

const labConfigSchema = z.object({
  LCA_MONTE_CARLO_TRIALS: z.coerce.number().int().min(1).max(100000).default(1000),
  LCA_MONTE_CARLO_SEED: z.coerce.number().int().default(42),
  LOG_LEVEL: z
    .string()
    .toLowerCase()
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .default("info"),
});

export interface LabConfig {
  monteCarloTrials: number;
  monteCarloSeed: number;
  logLevel: "debug" | "info" | "warn" | "error";
}

export const loadLabConfig = (env: NodeJS.ProcessEnv = process.env): LabConfig => {
  const parsed = labConfigSchema.parse({
    LCA_MONTE_CARLO_TRIALS: env.LCA_MONTE_CARLO_TRIALS,
    LCA_MONTE_CARLO_SEED: env.LCA_MONTE_CARLO_SEED,
    LOG_LEVEL: env.LOG_LEVEL,
  });
  return {
    monteCarloTrials: parsed.LCA_MONTE_CARLO_TRIALS,
    monteCarloSeed: parsed.LCA_MONTE_CARLO_SEED,
    logLevel: parsed.LOG_LEVEL,
  };
};
