import type { TargetProfilePoint } from "./types";

export const DEFAULT_TARGET_PROFILE: readonly TargetProfilePoint[] = [
  { elapsedSeconds: 0, tempC: 20 },
  // drying
  { elapsedSeconds: 300, tempC: 149 },
  // maillard
  { elapsedSeconds: 600, tempC: 204 },
  // first crack
  { elapsedSeconds: 900, tempC: 210 },
  // development
  { elapsedSeconds: 1200, tempC: 227 }
];

/**
 * Piecewise-linear lookup. Times before the first point or after the last
 * hold the end values.
 */
export function interpolateTarget(profile: readonly TargetProfilePoint[], seconds: number): number {
  const first = profile[0];
  const last = profile[profile.length - 1];
  if (!first || !last) {
    throw new Error("Target profile is empty");
  }
  if (seconds <= first.elapsedSeconds) return first.tempC;
  if (seconds >= last.elapsedSeconds) return last.tempC;

  for (let idx = 1; idx < profile.length; idx += 1) {
    const left = profile[idx - 1];
    const right = profile[idx];
    if (!left || !right || seconds > right.elapsedSeconds) continue;
    const span = right.elapsedSeconds - left.elapsedSeconds;
    if (span <= 0) return right.tempC;
    const ratio = (seconds - left.elapsedSeconds) / span;
    return left.tempC + (right.tempC - left.tempC) * ratio;
  }
  return last.tempC;
}

/** `steps + 1` evenly spaced samples over `[0, totalSeconds]`. */
export function sampleTargetProfile(
  profile: readonly TargetProfilePoint[],
  totalSeconds: number,
  steps: number
): Array<{ seconds: number; tempC: number }> {
  const samples: Array<{ seconds: number; tempC: number }> = [];
  for (let idx = 0; idx <= steps; idx += 1) {
    const seconds = (totalSeconds * idx) / steps;
    samples.push({ seconds, tempC: interpolateTarget(profile, seconds) });
  }
  return samples;
}
