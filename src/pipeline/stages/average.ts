import type { Sample, StageSnapshot, Upstream } from '../../types/index.js';
import type { MonitorHandle } from '../../monitor/index.js';
import type { AverageSpec } from '../../config/config-schema.js';
import { BaseStage } from '../stage.js';

/**
 * Moving average over the last n samples.
 *
 * While the window is filling, returns the mean of everything seen so far.
 * Once full, each sample overwrites the oldest slot and the mean of the
 * whole window is returned. The sum is recomputed every call.
 */
export class AverageStage extends BaseStage {
  readonly kind = 'average' as const;
  readonly tag = 'Average';

  private readonly n: number;
  private readonly window: number[] = [];
  /** Next slot to overwrite once the window is full */
  private cursor = 0;

  constructor(spec: AverageSpec, index: number, monitor?: MonitorHandle) {
    super(index, monitor);
    this.n = spec.n;
  }

  snapshot(): StageSnapshot {
    return { n: this.n, index: this.cursor, window: [...this.window] };
  }

  protected async produce(pull: Upstream): Promise<Sample | null> {
    const value = await pull();
    if (value === null) return null;

    if (this.window.length < this.n) {
      this.window.push(value);
    } else {
      this.window[this.cursor] = value;
      this.cursor = (this.cursor + 1) % this.n;
    }

    let sum = 0;
    for (const sample of this.window) {
      sum += sample;
    }
    return sum / this.window.length;
  }
}
