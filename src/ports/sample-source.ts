/**
 * Sample Source Port
 *
 * The sensor side of the pipeline. Adapters read a file, run a process,
 * or replay a fixed list.
 */

import type { Sample } from '../types/index.js';

/**
 * ISampleSource - produces the next raw reading.
 */
export interface ISampleSource {
  /** Source name for logging (e.g., "cpu-temperature") */
  readonly name: string;

  /**
   * Produce the next sample.
   * Resolves to null when no value can be produced; the pipeline treats
   * that as exhaustion.
   */
  next(): Promise<Sample | null>;
}
