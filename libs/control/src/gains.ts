import { z } from "zod";
import { InvalidGainsError } from "./errors";
import { PidController } from "./pid-controller";

// Every gain starts at zero; tuning is left to the caller.
export const PidGainsSchema = z.object({
  kp: z.number().finite().default(0),
  ki: z.number().finite().default(0),
  kd: z.number().finite().default(0)
});

export type PidGains = z.infer<typeof PidGainsSchema>;
export type PidGainsInput = z.input<typeof PidGainsSchema>;

export function parsePidGains(input: unknown): Readonly<PidGains> {
  const parsed = PidGainsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidGainsError(parsed.error.issues);
  }
  return Object.freeze(parsed.data);
}

export function createPidController(input: PidGainsInput = {}): PidController {
  return new PidController(parsePidGains(input));
}

type Env = Record<string, string | undefined>;

function readGain(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidGainsError(
      [{ code: z.ZodIssueCode.custom, path: [key], message: `Expected a number, received "${raw}"` }],
      `Invalid PID gain in ${key}`
    );
  }
  return value;
}

/**
 * Reads `${prefix}_KP`, `${prefix}_KI` and `${prefix}_KD`. Unset or blank
 * variables fall back to a zero gain.
 */
export function loadPidGainsFromEnv(env: Env = process.env, prefix = "PID"): Readonly<PidGains> {
  return parsePidGains({
    kp: readGain(env, `${prefix}_KP`),
    ki: readGain(env, `${prefix}_KI`),
    kd: readGain(env, `${prefix}_KD`)
  });
}
