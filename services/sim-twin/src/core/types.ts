import { z } from "zod";
import { InvalidSimulationInputError } from "./errors";
import { DEFAULT_TARGET_PROFILE } from "./target-profile";

const FiniteNumberSchema = z.number().finite();

const TargetProfilePointSchema = z.object({
  elapsedSeconds: FiniteNumberSchema,
  tempC: FiniteNumberSchema
});

const TargetProfileSchema = TargetProfilePointSchema.array()
  .min(1)
  .refine(
    (points) => points.every((point, idx) => idx === 0 || point.elapsedSeconds >= (points[idx - 1]?.elapsedSeconds ?? 0)),
    { message: "Target profile must be sorted by elapsedSeconds" }
  );

export const ControlledRoastInputSchema = z.object({
  batchGrams: FiniteNumberSchema.positive().default(300),
  moistureFraction: z.number().min(0).max(1).default(0.1),
  burnerMJPerHour: FiniteNumberSchema.nonnegative().default(4),
  inletTempC: FiniteNumberSchema.default(240),
  beanStartTempC: FiniteNumberSchema.default(20),
  firstCrackTempC: FiniteNumberSchema.default(193),
  chargeTempC: FiniteNumberSchema.default(215),
  yellowTempC: FiniteNumberSchema.default(160),
  postFirstCrackFactor: FiniteNumberSchema.nonnegative().default(2),
  totalMinutes: FiniteNumberSchema.positive().default(12),
  speed: FiniteNumberSchema.default(3),
  response: FiniteNumberSchema.default(3),
  initialPowerPercent: FiniteNumberSchema.positive().max(100).default(90),
  powerSettings: z
    .array(z.string())
    .default(["140,4:50,80", "160,6:00,70", "170,6:45,60", "180,7:45,40", "190,9:30,20"]),
  beanDiameterMm: FiniteNumberSchema.positive().default(6),
  beanDensityKgM3: FiniteNumberSchema.positive().default(1000),
  specificHeatKJPerKgK: FiniteNumberSchema.positive().default(1.2),
  drumRpm: FiniteNumberSchema.nonnegative().default(50),
  drumDiameterMm: FiniteNumberSchema.positive().default(150),
  drumLengthMm: FiniteNumberSchema.positive().default(150),
  drumEmissivity: FiniteNumberSchema.positive().max(1).default(0.25),
  beanEmissivity: FiniteNumberSchema.positive().max(1).default(0.95),
  steps: z.number().int().positive().default(500),
  targetProfile: TargetProfileSchema.default(DEFAULT_TARGET_PROFILE.map((point) => ({ ...point })))
});

export type ControlledRoastInput = z.infer<typeof ControlledRoastInputSchema>;
export type TargetProfilePoint = z.infer<typeof TargetProfilePointSchema>;

export function parseControlledRoastInput(input: unknown): ControlledRoastInput {
  const parsed = ControlledRoastInputSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidSimulationInputError(parsed.error.issues);
  }
  return parsed.data;
}

export interface SeriesPoint {
  x: number;
  y: number;
}

export interface RoastSeries {
  beanProbe: SeriesPoint[];
  beanTrue: SeriesPoint[];
  rateOfRise: SeriesPoint[];
  target: SeriesPoint[];
  power: SeriesPoint[];
  weightPercent: SeriesPoint[];
  waterPercent: SeriesPoint[];
  inletEquilibrium: SeriesPoint[];
  oven: SeriesPoint[];
}

/** Minutes from charge; `null` when the roast never got there. */
export interface RoastMilestones {
  turningPointMinutes: number | null;
  yellowMinutes: number | null;
  firstCrackMinutes: number | null;
  dropMinutes: number;
}

export interface RoastEnergy {
  beans: string;
  burner: string;
  radiative: string;
}

export interface TrackingStats {
  rmsErrorC: number;
  maxAbsErrorC: number;
}

export interface ControlledRoastResult {
  series: RoastSeries;
  milestones: RoastMilestones;
  dropTempC: number;
  beanCount: number;
  surfaceAreaM2: number;
  froude: number;
  energy: RoastEnergy;
  tracking: TrackingStats;
  info: string;
}
