import type { Sample, StageSnapshot, Upstream } from '../../types/index.js';
import type { MonitorHandle } from '../../monitor/index.js';
import type { ClipSpec } from '../../config/config-schema.js';
import { BaseStage, fromFixedPoint, toFixedPoint } from '../stage.js';

/**
 * Clamp to [min, max], compared in thousandths.
 */
export class ClipStage extends BaseStage {
  readonly kind = 'clip' as const;
  readonly tag = 'Clip';

  private readonly min: number;
  private readonly max: number;

  constructor(spec: ClipSpec, index: number, monitor?: MonitorHandle) {
    super(index, monitor);
    this.min = toFixedPoint(spec.min);
    this.max = toFixedPoint(spec.max);
  }

  snapshot(): StageSnapshot {
    return { min: this.min, max: this.max };
  }

  protected async produce(pull: Upstream): Promise<Sample | null> {
    const value = await pull();
    if (value === null) return null;

    let scaled = toFixedPoint(value);
    if (scaled > this.max) {
      scaled = this.max;
    }
    if (scaled < this.min) {
      scaled = this.min;
    }
    return fromFixedPoint(scaled);
  }
}
