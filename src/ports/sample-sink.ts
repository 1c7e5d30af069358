/**
 * Sample Sink Port
 *
 * The actuator side of the pipeline.
 */

import type { Sample } from '../types/index.js';

/**
 * ISampleSink - accepts the values the scheduler forwards.
 */
export interface ISampleSink {
  /** Sink name for logging (e.g., "pwm") */
  readonly name: string;

  /**
   * Acquire the underlying device.
   * Optional - sinks without setup skip it. Rejects with AcquisitionError.
   */
  open?(): Promise<void>;

  /**
   * Accept the next value. Rejects with SinkError.
   */
  push(value: Sample): Promise<void>;

  /**
   * Release the device.
   * Optional - called on shutdown.
   */
  close?(): Promise<void>;
}
