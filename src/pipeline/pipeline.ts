import type { Sample } from '../types/index.js';
import type { ISampleSource } from '../ports/index.js';
import type { Stage } from './stage.js';

/**
 * Pipeline - the assembled chain, evaluated by an explicit loop.
 *
 * Stages sit in a flat array in configured order. Pulling position k asks stage k
 * for a value and hands it a pull function for position k - 1; position -1
 * is the sensor. Supersample and subsample decide for themselves how often
 * they pull, so one output may cost zero or several upstream reads.
 */
export class Pipeline {
  private sourceDone = false;

  constructor(
    private readonly source: ISampleSource,
    readonly stages: readonly Stage[]
  ) {}

  /**
   * Pull one value from the end of the chain.
   * Resolves to null once the chain is exhausted.
   */
  next(): Promise<Sample | null> {
    return this.pullFrom(this.stages.length - 1);
  }

  get length(): number {
    return this.stages.length;
  }

  private pullFrom(position: number): Promise<Sample | null> {
    if (position < 0) {
      return this.pullSource();
    }
    const stage = this.stages[position];
    if (!stage) {
      return Promise.resolve(null);
    }
    return stage.next(() => this.pullFrom(position - 1));
  }

  private async pullSource(): Promise<Sample | null> {
    if (this.sourceDone) {
      return null;
    }
    const value = await this.source.next();
    if (value === null) {
      this.sourceDone = true;
    }
    return value;
  }
}
