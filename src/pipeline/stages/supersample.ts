import type { Sample, StageSnapshot, Upstream } from '../../types/index.js';
import type { MonitorHandle } from '../../monitor/index.js';
import type { SupersampleSpec } from '../../config/config-schema.js';
import { BaseStage } from '../stage.js';

/**
 * Emit every upstream value n times before pulling the next one.
 */
export class SupersampleStage extends BaseStage {
  readonly kind = 'supersample' as const;
  readonly tag = 'Supersample';

  private readonly n: number;
  private count = 1;
  private last: Sample | null = null;

  constructor(spec: SupersampleSpec, index: number, monitor?: MonitorHandle) {
    super(index, monitor);
    this.n = spec.n;
  }

  snapshot(): StageSnapshot {
    return { n: this.n, count: this.count, last: this.last };
  }

  protected async produce(pull: Upstream): Promise<Sample | null> {
    if (this.last !== null && this.count < this.n) {
      this.count++;
      return this.last;
    }

    const value = await pull();
    if (value === null) return null;

    this.last = value;
    this.count = 1;
    return value;
  }
}
