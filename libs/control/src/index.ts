export { PidController } from "./pid-controller";
export {
  PidGainsSchema,
  createPidController,
  loadPidGainsFromEnv,
  parsePidGains,
  type PidGains,
  type PidGainsInput
} from "./gains";
export { InvalidGainsError } from "./errors";
