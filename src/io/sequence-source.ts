import type { Sample } from '../types/index.js';
import type { ISampleSource } from '../ports/index.js';

/**
 * Replays a fixed list of values, then reports exhaustion.
 */
export class SequenceSource implements ISampleSource {
  readonly name = 'sequence';
  private cursor = 0;

  constructor(private readonly values: readonly Sample[]) {}

  next(): Promise<Sample | null> {
    const value = this.values[this.cursor];
    if (value === undefined) {
      return Promise.resolve(null);
    }
    this.cursor++;
    return Promise.resolve(value);
  }

  /** Values not yet replayed */
  remaining(): number {
    return this.values.length - this.cursor;
  }
}
