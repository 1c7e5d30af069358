import type { Sample, StageSnapshot, Upstream } from '../../types/index.js';
import type { MonitorHandle } from '../../monitor/index.js';
import type { PidSpec } from '../../config/config-schema.js';
import { BaseStage } from '../stage.js';
import { PidController } from '../pid-controller.js';

/**
 * Keep the magnitude of a negative term, zero a non-negative one.
 */
export function rectify(term: number): number {
  return term < 0 ? -term : 0;
}

/**
 * PID control stage.
 *
 * Only the negative side of each term contributes: with error = setpoint -
 * measurement, that is the "above setpoint" direction. The rectified terms
 * are summed, truncated, clamped to [0, 100] and shifted by `offset`, so the
 * output always lies in [offset, offset + 100].
 */
export class PidStage extends BaseStage {
  readonly kind = 'pid' as const;
  readonly tag = 'PID';

  private readonly controller: PidController;
  private readonly offset: number;

  constructor(spec: PidSpec, index: number, monitor?: MonitorHandle) {
    super(index, monitor);
    this.controller = new PidController(spec);
    this.offset = spec.offset;
  }

  snapshot(): StageSnapshot {
    const { p, i, d } = this.controller.getLastOutput();
    return {
      P: p,
      I: i,
      D: d,
      integral: this.controller.getIntegral(),
      previousMeasurement: this.controller.getPreviousMeasurement(),
      offset: this.offset,
    };
  }

  protected async produce(pull: Upstream): Promise<Sample | null> {
    const value = await pull();
    if (value === null) return null;

    const control = this.controller.nextControlOutput(value);
    const sum = rectify(control.p) + rectify(control.i) + rectify(control.d);
    return this.offset + Math.min(100, Math.max(0, Math.trunc(sum)));
  }
}
