import { describe, expect, it } from "vitest";
import { InvalidGainsError } from "@roastlab/control";
import { loadSimTwinConfig } from "../src/config";

describe("loadSimTwinConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadSimTwinConfig({});
    expect(config.logLevel).toBe("info");
    expect(config.gains).toEqual({ kp: 0, ki: 0, kd: 0 });
    expect(config.simulation.totalMinutes).toBeUndefined();
    expect(config.simulation.steps).toBeUndefined();
  });

  it("reads log level, gains and simulation settings", () => {
    const config = loadSimTwinConfig({
      LOG_LEVEL: "debug",
      PID_KP: "2",
      PID_KI: "0.1",
      SIM_TOTAL_MINUTES: "10",
      SIM_STEPS: "250"
    });
    expect(config).toEqual({
      logLevel: "debug",
      gains: { kp: 2, ki: 0.1, kd: 0 },
      simulation: { totalMinutes: 10, steps: 250 }
    });
  });

  it("treats blank values as unset", () => {
    expect(loadSimTwinConfig({ LOG_LEVEL: " ", SIM_STEPS: "" }).logLevel).toBe("info");
  });

  it("rejects fractional step counts", () => {
    expect(() => loadSimTwinConfig({ SIM_STEPS: "1.5" })).toThrow();
  });

  it("rejects an infinite roast length", () => {
    expect(() => loadSimTwinConfig({ SIM_TOTAL_MINUTES: "Infinity" })).toThrow();
  });

  it("rejects unknown log levels", () => {
    expect(() => loadSimTwinConfig({ LOG_LEVEL: "loud" })).toThrow();
  });

  it("surfaces invalid gains", () => {
    expect(() => loadSimTwinConfig({ PID_KD: "steep" })).toThrow(InvalidGainsError);
  });
});
