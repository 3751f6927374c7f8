export interface PowerSetting {
  tempC: number;
  /** Minutes from charge. */
  atMinutes: number;
  powerPercent: number;
}

function toNumber(text: string | undefined): number | undefined {
  if (text === undefined || text === "") return undefined;
  const value = Number(text);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Parses one `"temp, m:ss, power"` entry. Returns `undefined` for malformed
 * entries and for entries with neither a temperature nor a time.
 */
export function parsePowerSetting(text: string): PowerSetting | undefined {
  const fields = text.replace(/\s+/g, "").replace(/;/g, ",").split(",");
  if (fields.length < 3) return undefined;

  const [minutesText, secondsText] = (fields[1] ?? "").split(":");
  const minutes = toNumber(minutesText);
  const tempC = toNumber(fields[0]);
  const powerPercent = toNumber(fields[2]);
  if (minutes === undefined || tempC === undefined || powerPercent === undefined) {
    return undefined;
  }

  let atMinutes = minutes;
  if (secondsText !== undefined) {
    const seconds = toNumber(secondsText);
    if (seconds === undefined) return undefined;
    atMinutes += seconds / 60;
  }

  if (tempC <= 0 && atMinutes <= 0) return undefined;
  return { tempC, atMinutes, powerPercent };
}

/** Valid entries ordered by temperature. */
export function parsePowerSchedule(entries: readonly string[]): PowerSetting[] {
  return entries
    .map((entry) => parsePowerSetting(entry))
    .filter((setting): setting is PowerSetting => setting !== undefined)
    .sort((a, b) => a.tempC - b.tempC);
}
