import type { PidGains } from "./gains";

/**
 * Discrete PID controller. One instance per control run: the integral and the
 * last error accumulate across calls to {@link PidController.update}.
 *
 * There is no output saturation, anti-windup or reset. Callers clamp the
 * output themselves and build a fresh controller to start over.
 */
export class PidController {
  private integralSum = 0;
  private lastError = 0;

  readonly gains: Readonly<PidGains>;

  constructor(gains: Readonly<PidGains>) {
    this.gains = Object.freeze({ kp: gains.kp, ki: gains.ki, kd: gains.kd });
  }

  get integral(): number {
    return this.integralSum;
  }

  get previousError(): number {
    return this.lastError;
  }

  /**
   * @param measurement - current process value
   * @param target - setpoint for this tick, in the measurement's units
   * @param dt - time since the previous tick; a zero-length tick contributes no derivative
   */
  update(measurement: number, target: number, dt: number): number {
    const error = target - measurement;
    this.integralSum += error * dt;
    const derivative = dt > 0 ? (error - this.lastError) / dt : 0;

    const { kp, ki, kd } = this.gains;
    const output = kp * error + ki * this.integralSum + kd * derivative;

    this.lastError = error;
    return output;
  }
}
