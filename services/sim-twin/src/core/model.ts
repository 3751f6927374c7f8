import type { Logger } from "pino";
import type { PidController } from "@roastlab/control";
import { parsePowerSchedule } from "./power-schedule";
import { buildInfo, summarizeEnergy } from "./summary";
import { sampleTargetProfile } from "./target-profile";
import type {
  ControlledRoastInput,
  ControlledRoastResult,
  RoastMilestones,
  RoastSeries,
  SeriesPoint
} from "./types";

export type RoastController = Pick<PidController, "update">;

export interface SimulateOptions {
  logger?: Logger;
}

const MAX_TEMPERATURE_C = 1000;
const MIN_TEMPERATURE_C = -50;
const MAX_POWER_PERCENT = 100;
const MIN_POWER_PERCENT = 0;
const MAX_ROR = 50;
const MAX_RADIATIVE = 1e12;

const ROR_CORRECTION = 0.5;
const WATER_EVAPORATION_KJ = 750;
const POST_FC_LOSS_FACTOR = 600;
const POST_FC_ENERGY_FACTOR = 50;
const STEFAN_BOLTZMANN = 5.6703e-8;
const GRAVITY = 9.8;

/**
 * Drum roast thermal model with the burner driven by `controller`. Each tick
 * the controller sees the true bean temperature against the interpolated
 * target; its output is clamped to a 0-100% burner setting.
 *
 * Times in the result are minutes from charge.
 */
export function simulateControlledRoast(
  input: ControlledRoastInput,
  controller: RoastController,
  options: SimulateOptions = {}
): ControlledRoastResult {
  const log = options.logger;
  const { steps, totalMinutes } = input;

  const kg = input.batchGrams / 1000;
  const speed = input.speed <= 3 ? input.speed : 6 - input.speed;
  const waterFactor = (0.0012 * kg) / 10;
  const responseLag = 10 + (3 - input.response) * 3;
  const tstep = totalMinutes / steps;

  let kgCoffee = kg * (1 - input.moistureFraction);
  let water = input.moistureFraction * kgCoffee;
  let oven = input.chargeTempC;
  let burnerMJ = input.burnerMJPerHour;
  let beanProbe = oven;
  let bean = input.beanStartTempC;
  let lagEquilibrium = 0;

  const schedule = parsePowerSchedule(input.powerSettings);
  const chargePower = schedule[0]?.powerPercent ?? input.initialPowerPercent;

  const series: RoastSeries = {
    beanProbe: [{ x: 0, y: beanProbe }],
    beanTrue: [{ x: 0, y: bean }],
    rateOfRise: [],
    target: [],
    power: [{ x: 0, y: chargePower }],
    weightPercent: [],
    waterPercent: [],
    inletEquilibrium: [{ x: 0, y: input.inletTempC }],
    oven: [{ x: 0, y: oven }]
  };

  const drumDiameterM = input.drumDiameterMm / 1000;
  const drumLengthM = input.drumLengthMm / 1000;
  const drumArea = Math.PI * drumDiameterM * drumLengthM;
  const beanArea = 2 * Math.PI * Math.sqrt((2 * kg) / 1000 / (Math.PI * drumLengthM)) * drumLengthM;
  const froude = (((input.drumRpm / 60) * 2 * Math.PI) ** 2 * drumDiameterM) / (2 * GRAVITY);

  const targets = sampleTargetProfile(input.targetProfile, totalMinutes * 60, steps);
  series.target = targets.map((sample) => ({ x: sample.seconds / 60, y: sample.tempC }));

  let pastFirstCrack = false;
  let firstCrackAt = 0;
  let yellowAt = 0;
  let turningAt = 0;
  let previousProbe = 999;
  let burnerTotal = 0;
  let radiative = 0;
  let squaredErrorSum = 0;
  let maxAbsError = 0;
  let now = 0;

  for (let step = 0; step <= steps; step += 1) {
    now += tstep;

    const setpoint = targets[step]?.tempC ?? bean;
    const error = setpoint - bean;
    squaredErrorSum += error * error;
    maxAbsError = Math.max(maxAbsError, Math.abs(error));

    const power = clamp(controller.update(bean, setpoint, tstep), MIN_POWER_PERCENT, MAX_POWER_PERCENT);
    series.power.push({ x: now, y: power });

    const inletEquilibrium = clampTemp(
      input.inletTempC * (1 - (1 - power / input.initialPowerPercent) * 0.2)
    );
    if (lagEquilibrium === 0) {
      lagEquilibrium = inletEquilibrium;
    }

    oven = clampTemp(oven + (bean - (oven - 40 + (input.inletTempC - inletEquilibrium))) / (responseLag * 5));
    series.inletEquilibrium.push({ x: now, y: inletEquilibrium });
    series.oven.push({ x: now, y: oven });

    const burnerEquilibrium = (input.burnerMJPerHour * power) / 100;
    burnerMJ += (burnerEquilibrium - burnerMJ) / responseLag;
    burnerTotal += burnerMJ;

    let waterLoss = Math.max(0, (bean - 100) * waterFactor * tstep);

    if (bean >= input.firstCrackTempC) {
      if (firstCrackAt === 0) {
        firstCrackAt = now;
        log?.debug({ minutes: now, beanTempC: bean }, "first crack");
      }
      pastFirstCrack = true;
    }

    if (bean >= input.yellowTempC && yellowAt === 0) {
      yellowAt = now;
      log?.debug({ minutes: now, beanTempC: bean }, "yellow");
    }

    let waterEnergy = 0;
    if (pastFirstCrack) {
      waterLoss = (water - 0.01 * kgCoffee) / 10;
      water = Math.max(water - waterLoss, 0);
      waterEnergy = WATER_EVAPORATION_KJ * waterLoss;
    } else if (water > 0 && waterLoss > 0) {
      waterLoss = Math.min(waterLoss, water - 0.01 * kgCoffee);
      water -= waterLoss;
      waterEnergy = WATER_EVAPORATION_KJ * waterLoss;
    }
    series.waterPercent.push({ x: now, y: kgCoffee > 0 ? (water * 100) / kgCoffee : 0 });

    let postCrackEnergy = 0;
    if (input.postFirstCrackFactor > 0 && pastFirstCrack) {
      const massLoss = (kgCoffee * input.postFirstCrackFactor) / POST_FC_LOSS_FACTOR;
      kgCoffee = Math.max(kgCoffee - massLoss, 0);
      postCrackEnergy = (bean + 1 - input.firstCrackTempC) ** 2 * massLoss * POST_FC_ENERGY_FACTOR;
    }

    const kgNow = kgCoffee + water;
    series.weightPercent.push({ x: now, y: kg > 0 ? (100 * kgNow) / kg : 0 });

    const deltaBean =
      kgNow > 0
        ? clamp(
            (((lagEquilibrium - bean) * (burnerMJ - waterEnergy + postCrackEnergy)) / kgNow) *
              (0.019 + (speed - 3) * 0.0005) *
              tstep,
            -MAX_TEMPERATURE_C,
            MAX_TEMPERATURE_C
          )
        : 0;

    lagEquilibrium += (inletEquilibrium - lagEquilibrium) / 100;
    bean = clampTemp(bean + deltaBean);

    const deltaProbe = (bean - beanProbe) / responseLag;
    beanProbe += deltaProbe;
    if (!Number.isFinite(beanProbe)) {
      beanProbe = bean;
    }

    series.beanProbe.push({ x: now, y: beanProbe });
    series.beanTrue.push({ x: now, y: bean });

    if (beanProbe > previousProbe && turningAt === 0) {
      turningAt = now;
      log?.debug({ minutes: now, probeTempC: beanProbe }, "turning point");
    }
    previousProbe = beanProbe;

    series.rateOfRise.push({ x: now, y: clamp((deltaProbe / tstep) * ROR_CORRECTION, -MAX_ROR, MAX_ROR) });

    const radiativeLoss = STEFAN_BOLTZMANN * ((inletEquilibrium + 273) ** 4 - (bean + 273) ** 4);
    radiative = clamp(radiative + (Number.isFinite(radiativeLoss) ? radiativeLoss : 0), -MAX_RADIATIVE, MAX_RADIATIVE);
  }

  radiative *=
    (beanArea / (1 / input.beanEmissivity + (beanArea / drumArea) * (1 / input.drumEmissivity - 1))) * tstep * 60;
  burnerTotal *= totalMinutes / 60 / steps;

  const beanRadiusM = input.beanDiameterMm / 2000;
  const beanMassKg = (4 / 3) * Math.PI * beanRadiusM ** 3 * input.beanDensityKgM3;
  const beanCount = beanMassKg > 0 ? Math.floor(kg / beanMassKg) : 0;
  const surfaceAreaM2 = beanCount * 4 * Math.PI * beanRadiusM ** 2;
  const beansKJ = kg * input.specificHeatKJPerKgK * (beanProbe - input.beanStartTempC);

  const milestones: RoastMilestones = {
    turningPointMinutes: turningAt > 0 ? turningAt : null,
    yellowMinutes: yellowAt > 0 ? yellowAt : null,
    firstCrackMinutes: firstCrackAt > 0 ? firstCrackAt : null,
    dropMinutes: totalMinutes
  };

  const tracking = {
    rmsErrorC: Math.sqrt(squaredErrorSum / (steps + 1)),
    maxAbsErrorC: maxAbsError
  };

  const result: ControlledRoastResult = {
    series,
    milestones,
    dropTempC: beanProbe,
    beanCount,
    surfaceAreaM2,
    froude,
    energy: summarizeEnergy(beansKJ, burnerTotal, radiative),
    tracking,
    info: buildInfo({ milestones, dropTempC: beanProbe, burnerMJPerHour: input.burnerMJPerHour })
  };

  log?.info(
    { dropTempC: Number(beanProbe.toFixed(2)), rmsErrorC: Number(tracking.rmsErrorC.toFixed(2)), milestones },
    "roast simulated"
  );
  return result;
}

/** Last point of a series, for callers that only want the final reading. */
export function lastPoint(points: readonly SeriesPoint[]): SeriesPoint | undefined {
  return points[points.length - 1];
}

function clampTemp(value: number): number {
  return clamp(value, MIN_TEMPERATURE_C, MAX_TEMPERATURE_C);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
