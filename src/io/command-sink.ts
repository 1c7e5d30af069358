import type { Logger, Sample } from '../types/index.js';
import type { ISampleSink } from '../ports/index.js';
import { SinkError, errorMessage } from '../core/errors.js';
import { runCommand, type CommandRunner } from './command-runner.js';

/**
 * Command sink - runs a process per value, with the value as the last
 * argument.
 */
export class CommandSink implements ISampleSink {
  readonly name: string;
  private readonly logger: Logger;

  constructor(
    private readonly command: string,
    private readonly args: readonly string[],
    logger: Logger,
    private readonly run: CommandRunner = runCommand
  ) {
    this.name = `command:${command}`;
    this.logger = logger.child({ component: 'sink', sink: this.name });
  }

  async push(value: Sample): Promise<void> {
    try {
      await this.run(this.command, [...this.args, String(value)]);
    } catch (error) {
      throw new SinkError(value, errorMessage(error), { cause: error });
    }
    this.logger.debug({ value }, 'Actuator command ran');
  }
}
