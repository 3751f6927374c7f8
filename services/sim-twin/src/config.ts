import { z } from "zod";
import { loadPidGainsFromEnv, type PidGains } from "@roastlab/control";

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const SimTwinEnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default("info"),
  SIM_TOTAL_MINUTES: z.coerce.number().positive().finite().optional(),
  SIM_STEPS: z.coerce.number().int().positive().optional()
});

export interface SimTwinConfig {
  logLevel: z.infer<typeof LogLevelSchema>;
  gains: Readonly<PidGains>;
  simulation: {
    totalMinutes?: number;
    steps?: number;
  };
}

type Env = Record<string, string | undefined>;

function blankToUndefined(env: Env): Env {
  return Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value?.trim() ? value.trim() : undefined])
  );
}

export function loadSimTwinConfig(env: Env = process.env): SimTwinConfig {
  const parsed = SimTwinEnvSchema.parse(blankToUndefined(env));
  return {
    logLevel: parsed.LOG_LEVEL,
    gains: loadPidGainsFromEnv(env),
    simulation: {
      totalMinutes: parsed.SIM_TOTAL_MINUTES,
      steps: parsed.SIM_STEPS
    }
  };
}
