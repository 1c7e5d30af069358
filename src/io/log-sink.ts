import type { Logger, Sample } from '../types/index.js';
import type { ISampleSink } from '../ports/index.js';

/**
 * Dry-run sink: writes each value to the application log.
 */
export class LogSink implements ISampleSink {
  readonly name = 'log';
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'sink', sink: this.name });
  }

  push(value: Sample): Promise<void> {
    this.logger.info({ value }, 'Output');
    return Promise.resolve();
  }
}
