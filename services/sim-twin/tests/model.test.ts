import { PidController } from "@roastlab/control";
import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { simulateControlledRoast } from "../src/core/model";
import { InvalidSimulationInputError } from "../src/core/errors";
import { ControlledRoastInputSchema, parseControlledRoastInput } from "../src/core/types";

function baseInput(overrides: Record<string, unknown> = {}) {
  return ControlledRoastInputSchema.parse(overrides);
}

function pid(kp: number, ki = 0, kd = 0): PidController {
  return new PidController({ kp, ki, kd });
}

describe("simulateControlledRoast", () => {
  it("calls the controller once per tick with the bean temperature and target", () => {
    const update = vi.fn((_measurement: number, _target: number, _dt: number) => 0);
    simulateControlledRoast(baseInput(), { update });

    expect(update).toHaveBeenCalledTimes(501);
    expect(update.mock.calls[0]).toEqual([20, 20, 0.024]);
    const second = update.mock.calls[1];
    expect(second?.[1]).toBeCloseTo(20.6192, 4);
    expect(second?.[2]).toBe(0.024);
  });

  it("keeps the burner off with zero gains", () => {
    const result = simulateControlledRoast(baseInput(), pid(0));

    expect(result.series.power).toHaveLength(502);
    expect(result.series.power[0]).toEqual({ x: 0, y: 80 });
    expect(result.series.power.slice(1).every((point) => point.y === 0)).toBe(true);
    expect(result.milestones.firstCrackMinutes).toBeNull();
    expect(result.milestones.yellowMinutes).toBeNull();
    expect(result.milestones.dropMinutes).toBe(12);
    expect(result.info).toContain(" t_Yellow: - , t_Drop: 12m:0s");
  });

  it("shapes the series to the step count", () => {
    const result = simulateControlledRoast(baseInput({ steps: 50 }), pid(0));

    expect(result.series.beanTrue).toHaveLength(52);
    expect(result.series.beanProbe).toHaveLength(52);
    expect(result.series.target).toHaveLength(51);
    expect(result.series.rateOfRise).toHaveLength(51);
    expect(result.series.weightPercent).toHaveLength(51);
    expect(result.series.target[50]?.x).toBe(12);
    expect(result.series.target[50]?.y).toBeCloseTo(206.4, 10);
  });

  it("clamps controller output to the burner range", () => {
    const result = simulateControlledRoast(baseInput(), pid(1000));
    const powers = result.series.power.slice(1).map((point) => point.y);

    expect(powers.every((power) => power >= 0 && power <= 100)).toBe(true);
    expect(powers).toContain(100);
    expect(powers).toContain(0);
  });

  it("roasts hotter with a proportional controller than with the burner off", () => {
    const idle = simulateControlledRoast(baseInput(), pid(0));
    const driven = simulateControlledRoast(baseInput(), pid(5));

    expect(driven.dropTempC).toBeGreaterThan(idle.dropTempC);
    expect(driven.tracking.rmsErrorC).toBeLessThan(idle.tracking.rmsErrorC);
  });

  it("reports tracking error against the target", () => {
    const { tracking } = simulateControlledRoast(baseInput(), pid(0));

    expect(tracking.rmsErrorC).toBeGreaterThan(0);
    expect(tracking.maxAbsErrorC).toBeGreaterThanOrEqual(tracking.rmsErrorC);
  });

  it("computes drum and bean geometry", () => {
    const result = simulateControlledRoast(baseInput(), pid(0));

    expect(result.froude).toBeCloseTo(0.2098, 4);
    expect(result.beanCount).toBe(2652);
    expect(result.surfaceAreaM2).toBeCloseTo(0.2999, 4);
  });

  it("falls back to the initial power when no power setting parses", () => {
    const result = simulateControlledRoast(baseInput({ powerSettings: ["bad"] }), pid(0));
    expect(result.series.power[0]).toEqual({ x: 0, y: 90 });
  });

  it("is deterministic for the same input and gains", () => {
    const input = baseInput();
    const first = simulateControlledRoast(input, pid(3, 0.5, 0.1));
    const second = simulateControlledRoast(input, pid(3, 0.5, 0.1));

    expect(second).toEqual(first);
  });

  it("logs a summary when given a logger", () => {
    const lines: string[] = [];
    const logger = pino({ level: "info" }, { write: (line: string) => lines.push(line) });

    simulateControlledRoast(baseInput({ steps: 20 }), pid(0), { logger });

    const messages = lines.map((line) => (JSON.parse(line) as { msg?: string }).msg);
    expect(messages).toEqual(["roast simulated"]);
  });
});

describe("parseControlledRoastInput", () => {
  it("applies defaults", () => {
    const input = parseControlledRoastInput({});
    expect(input.batchGrams).toBe(300);
    expect(input.totalMinutes).toBe(12);
    expect(input.steps).toBe(500);
    expect(input.targetProfile).toHaveLength(5);
  });

  it("rejects invalid parameters", () => {
    try {
      parseControlledRoastInput({ totalMinutes: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSimulationInputError);
      expect((error as InvalidSimulationInputError).issues[0]?.path).toEqual(["totalMinutes"]);
    }
  });

  it("rejects non-finite physical parameters", () => {
    expect(() => parseControlledRoastInput({ totalMinutes: Number.POSITIVE_INFINITY })).toThrow(
      InvalidSimulationInputError
    );
    expect(() => parseControlledRoastInput({ batchGrams: Number.POSITIVE_INFINITY })).toThrow(
      InvalidSimulationInputError
    );
    expect(() => parseControlledRoastInput({ drumRpm: Number.POSITIVE_INFINITY })).toThrow(
      InvalidSimulationInputError
    );
  });

  it("rejects an unsorted target profile", () => {
    expect(() =>
      parseControlledRoastInput({
        targetProfile: [
          { elapsedSeconds: 300, tempC: 150 },
          { elapsedSeconds: 0, tempC: 20 }
        ]
      })
    ).toThrow(InvalidSimulationInputError);
  });
});
