import type { Logger, Sample } from '../types/index.js';
import type { ISampleSource } from '../ports/index.js';
import { errorMessage } from '../core/errors.js';
import { runCommand, type CommandRunner } from './command-runner.js';
import { parseReading } from './parse-reading.js';

/**
 * Command source - runs a process per pull and parses its stdout.
 */
export class CommandSource implements ISampleSource {
  readonly name: string;
  private readonly logger: Logger;

  constructor(
    private readonly command: string,
    private readonly args: readonly string[],
    logger: Logger,
    private readonly run: CommandRunner = runCommand
  ) {
    this.name = `command:${command}`;
    this.logger = logger.child({ component: 'source', source: this.name });
  }

  async next(): Promise<Sample | null> {
    let stdout: string;
    try {
      stdout = await this.run(this.command, this.args);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Sensor command failed');
      return null;
    }

    const value = parseReading(stdout);
    if (value === null) {
      this.logger.warn({ stdout: stdout.trim() }, 'Sensor command output is not a number');
      return null;
    }
    this.logger.debug({ value }, 'Sensor read');
    return value;
  }
}
