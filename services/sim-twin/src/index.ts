import { fileURLToPath } from "node:url";
import { PidController } from "@roastlab/control";
import { loadSimTwinConfig } from "./config";
import { lastPoint, simulateControlledRoast } from "./core/model";
import { parseControlledRoastInput } from "./core/types";
import { createLogger } from "./logger";

export { simulateControlledRoast, lastPoint, type RoastController, type SimulateOptions } from "./core/model";
export {
  ControlledRoastInputSchema,
  parseControlledRoastInput,
  type ControlledRoastInput,
  type ControlledRoastResult,
  type RoastMilestones,
  type RoastSeries,
  type SeriesPoint,
  type TargetProfilePoint,
  type TrackingStats
} from "./core/types";
export { DEFAULT_TARGET_PROFILE, interpolateTarget, sampleTargetProfile } from "./core/target-profile";
export { parsePowerSchedule, parsePowerSetting, type PowerSetting } from "./core/power-schedule";
export { buildInfo, formatMinutes } from "./core/summary";
export { InvalidSimulationInputError } from "./core/errors";
export { loadSimTwinConfig, type SimTwinConfig } from "./config";
export { createLogger } from "./logger";

function main(): void {
  try {
    const config = loadSimTwinConfig();
    const logger = createLogger({ level: config.logLevel });
    const input = parseControlledRoastInput(config.simulation);
    const controller = new PidController(config.gains);

    logger.info({ gains: config.gains, steps: input.steps, totalMinutes: input.totalMinutes }, "starting roast");
    const result = simulateControlledRoast(input, controller, { logger });

    const finalBean = lastPoint(result.series.beanTrue);
    logger.info(
      {
        finalBeanTempC: finalBean ? Number(finalBean.y.toFixed(2)) : null,
        tracking: result.tracking,
        energy: result.energy,
        beanCount: result.beanCount,
        froude: Number(result.froude.toFixed(4))
      },
      result.info
    );
  } catch (error) {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`Failed to run sim-twin roast: ${message}\n`);
    process.exitCode = 1;
  }
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  main();
}
