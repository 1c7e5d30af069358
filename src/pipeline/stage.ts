/**
 * Stage - one stream transform in the pipeline.
 *
 * A stage holds only its own state. The pipeline's evaluation loop hands it
 * a pull function for its upstream on every call, so stages never own each
 * other.
 */

import type { Sample, StageSnapshot, Upstream } from '../types/index.js';
import type { StageKind } from '../config/index.js';
import type { MonitorHandle } from '../monitor/index.js';

/**
 * Stage interface - what the evaluation loop drives.
 */
export interface Stage {
  /** Stage kind */
  readonly kind: StageKind;

  /** Position in the pipeline (0-based), also the monitor wire id */
  readonly index: number;

  /** Tag used on monitor state lines */
  readonly tag: string;

  /**
   * Produce the next output, pulling from upstream as needed.
   * Resolves to null once the upstream is exhausted, and forever after.
   */
  next(upstream: Upstream): Promise<Sample | null>;

  /**
   * JSON-serializable view of the internal state.
   */
  snapshot(): StageSnapshot;
}

/**
 * Base class for stages with common functionality.
 *
 * Fuses the upstream (no pull after the first null) and, when a monitor
 * handle is attached, emits the state snapshot followed by the output for
 * every produced value.
 */
export abstract class BaseStage implements Stage {
  abstract readonly kind: StageKind;
  abstract readonly tag: string;

  private upstreamDone = false;

  constructor(
    readonly index: number,
    protected readonly monitor: MonitorHandle | undefined
  ) {}

  async next(upstream: Upstream): Promise<Sample | null> {
    if (this.upstreamDone) {
      return null;
    }

    const value = await this.produce(() => this.pull(upstream));
    if (value !== null && this.monitor) {
      this.monitor.emitState(this.tag, this.snapshot());
      this.monitor.emitOutput(value);
    }
    return value;
  }

  abstract snapshot(): StageSnapshot;

  /**
   * Compute one output. `pull` is the fused upstream.
   */
  protected abstract produce(pull: Upstream): Promise<Sample | null>;

  private async pull(upstream: Upstream): Promise<Sample | null> {
    if (this.upstreamDone) {
      return null;
    }
    const value = await upstream();
    if (value === null) {
      this.upstreamDone = true;
    }
    return value;
  }
}

/**
 * Scale used by the fixed-point stages (thousandths).
 */
export const FIXED_POINT_SCALE = 1000;

/**
 * Convert to the fixed-point integer domain by truncation.
 */
export function toFixedPoint(value: number): number {
  return Math.trunc(value * FIXED_POINT_SCALE);
}

/**
 * Convert back from the fixed-point domain.
 */
export function fromFixedPoint(value: number): number {
  return value / FIXED_POINT_SCALE;
}
