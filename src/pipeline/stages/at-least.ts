import type { Sample, StageSnapshot, Upstream } from '../../types/index.js';
import type { MonitorHandle } from '../../monitor/index.js';
import type { AtLeastSpec } from '../../config/config-schema.js';
import { BaseStage, toFixedPoint } from '../stage.js';

/**
 * Force values below the threshold (in thousandths) to exactly 0.
 * Values at or above it pass through unchanged.
 */
export class AtLeastStage extends BaseStage {
  readonly kind = 'atLeast' as const;
  readonly tag = 'AtLeast';

  private readonly threshold: number;

  constructor(spec: AtLeastSpec, index: number, monitor?: MonitorHandle) {
    super(index, monitor);
    this.threshold = toFixedPoint(spec.threshold);
  }

  snapshot(): StageSnapshot {
    return { threshold: this.threshold };
  }

  protected async produce(pull: Upstream): Promise<Sample | null> {
    const value = await pull();
    if (value === null) return null;

    return toFixedPoint(value) < this.threshold ? 0 : value;
  }
}
