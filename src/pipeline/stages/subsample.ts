import type { Sample, StageSnapshot, Upstream } from '../../types/index.js';
import type { MonitorHandle } from '../../monitor/index.js';
import type { SubsampleSpec } from '../../config/config-schema.js';
import { BaseStage } from '../stage.js';

/**
 * Discard n upstream values, then emit the one after.
 * Decimates the upstream rate by n + 1.
 */
export class SubsampleStage extends BaseStage {
  readonly kind = 'subsample' as const;
  readonly tag = 'Subsample';

  private readonly n: number;

  constructor(spec: SubsampleSpec, index: number, monitor?: MonitorHandle) {
    super(index, monitor);
    this.n = spec.n;
  }

  snapshot(): StageSnapshot {
    return { n: this.n };
  }

  protected async produce(pull: Upstream): Promise<Sample | null> {
    for (let i = 0; i < this.n; i++) {
      await pull();
    }
    return pull();
  }
}
