import type { RoastEnergy, RoastMilestones } from "./types";

const STEP_MATCH_NOTE = "2-Step match not implemented in this version.";

/** `"{m}m:{s}s"` with both parts truncated. */
export function formatMinutes(minutes: number): string {
  const whole = minutes > 0 ? Math.floor(minutes) : 0;
  return `${String(whole)}m:${String(Math.trunc((minutes - whole) * 60))}s`;
}

export function formatBeanEnergy(kJ: number): string {
  return kJ <= 1000 ? `${String(Math.trunc(kJ))} kJ` : `${(kJ / 1000).toFixed(3)} MJ`;
}

export function formatBurnerEnergy(mj: number): string {
  return mj >= 1 ? `${mj.toFixed(3)} MJ` : `${(mj * 1000).toFixed(3)} kJ`;
}

export function formatRadiativeEnergy(joules: number): string {
  return Number.isFinite(joules) ? `${String(Math.trunc(joules / 1000))} kJ` : "Radiative: NaN kJ";
}

export function formatPhaseRatios(milestones: RoastMilestones): string {
  const { yellowMinutes, firstCrackMinutes } = milestones;
  if (yellowMinutes === null || firstCrackMinutes === null) {
    return "-";
  }
  const drop = Math.floor(milestones.dropMinutes);
  const brown = firstCrackMinutes - yellowMinutes;
  const dev = drop - firstCrackMinutes;
  const pct = (value: number): string => ((value * 100) / drop).toFixed(1);
  return `Yellow: ${pct(yellowMinutes)}%, Brown: ${pct(brown)}%, Dev: ${pct(dev)}%`;
}

export function formatBurnerPower(burnerMJPerHour: number): string {
  const kbtu = (burnerMJPerHour * 948) / 1000;
  const kw = (burnerMJPerHour * 1e3) / 3600;
  return `Power: ${kbtu.toFixed(1)} kBTU, ${kw.toFixed(1)} kW`;
}

export interface InfoInput {
  milestones: RoastMilestones;
  dropTempC: number;
  burnerMJPerHour: number;
}

/** One-line roast summary followed by the step-match note. */
export function buildInfo({ milestones, dropTempC, burnerMJPerHour }: InfoInput): string {
  const turn = `t_Turn: ${formatMinutes(milestones.turningPointMinutes ?? 0)}`;

  let phases =
    milestones.yellowMinutes !== null ? ` t_Yellow: ${formatMinutes(milestones.yellowMinutes)}` : " t_Yellow: -";
  if (milestones.firstCrackMinutes !== null) {
    phases += `, t_FC: ${formatMinutes(milestones.firstCrackMinutes)}`;
  }
  phases += ` , t_Drop: ${formatMinutes(milestones.dropMinutes)}`;

  const drop = Number.isFinite(dropTempC) ? `T_Drop: ${String(Math.trunc(dropTempC))}°C` : "T_Drop: NaN°C";

  return [turn, phases, drop, formatPhaseRatios(milestones), formatBurnerPower(burnerMJPerHour)].join(", ") +
    `\n${STEP_MATCH_NOTE}`;
}

export function summarizeEnergy(beansKJ: number, burnerMJ: number, radiativeJ: number): RoastEnergy {
  return {
    beans: formatBeanEnergy(beansKJ),
    burner: formatBurnerEnergy(burnerMJ),
    radiative: formatRadiativeEnergy(radiativeJ)
  };
}
