/**
 * Discrete PID controller.
 *
 * error = setpoint - measurement. Each term is clamped to its own symmetric
 * limit; the integral is accumulated already multiplied by ki and clamped
 * after every step (anti-windup). The derivative acts on the measurement,
 * not the error, and is 0 for the first sample.
 */

/**
 * Gains, limits and setpoint.
 */
export interface PidGains {
  kp: number;
  ki: number;
  kd: number;
  pLimit: number;
  iLimit: number;
  dLimit: number;
  setpoint: number;
}

/**
 * Signed contribution of each term for one step.
 */
export interface ControlOutput {
  p: number;
  i: number;
  d: number;
  output: number;
}

function applyLimit(limit: number, value: number): number {
  const bound = Math.abs(limit);
  return Math.min(Math.max(value, -bound), bound);
}

export class PidController {
  private integralTerm = 0;
  private previousMeasurement: number | null = null;
  private lastOutput: ControlOutput = { p: 0, i: 0, d: 0, output: 0 };

  constructor(private readonly gains: PidGains) {}

  nextControlOutput(measurement: number): ControlOutput {
    const { kp, ki, kd, pLimit, iLimit, dLimit, setpoint } = this.gains;
    const error = setpoint - measurement;

    const p = applyLimit(pLimit, error * kp);

    this.integralTerm = applyLimit(iLimit, this.integralTerm + error * ki);

    const delta = this.previousMeasurement === null ? 0 : measurement - this.previousMeasurement;
    const d = applyLimit(dLimit, -delta * kd);
    this.previousMeasurement = measurement;

    this.lastOutput = { p, i: this.integralTerm, d, output: p + this.integralTerm + d };
    return this.lastOutput;
  }

  /**
   * Terms of the most recent step.
   */
  getLastOutput(): ControlOutput {
    return this.lastOutput;
  }

  getIntegral(): number {
    return this.integralTerm;
  }

  getPreviousMeasurement(): number | null {
    return this.previousMeasurement;
  }
}
