/**
 * Build sources and sinks from their config descriptors.
 */

import type { Logger } from '../types/index.js';
import type { ISampleSink, ISampleSource } from '../ports/index.js';
import type { InputSpec, OutputSpec } from '../config/index.js';
import { runCommand, type CommandRunner } from './command-runner.js';
import { CommandSink } from './command-sink.js';
import { CommandSource } from './command-source.js';
import { FileSource, createCpuTemperatureSource } from './file-source.js';
import { LogSink } from './log-sink.js';
import { PwmSink } from './pwm-sink.js';
import { SequenceSource } from './sequence-source.js';

export interface IoFactoryOptions {
  logger: Logger;
  /** Process runner for command inputs/outputs */
  runner?: CommandRunner | undefined;
  /** sysfs PWM mount point */
  sysfsPwmRoot?: string | undefined;
}

export function createSource(spec: InputSpec, options: IoFactoryOptions): ISampleSource {
  const { logger } = options;
  switch (spec.kind) {
    case 'cpuTemperature':
      return createCpuTemperatureSource(logger, spec.path);
    case 'file':
      return new FileSource({ name: `file:${spec.path}`, path: spec.path, scale: spec.scale }, logger);
    case 'command':
      return new CommandSource(spec.command, spec.args ?? [], logger, options.runner ?? runCommand);
    case 'sequence':
      return new SequenceSource(spec.values);
  }
}

export function createSink(spec: OutputSpec, options: IoFactoryOptions): ISampleSink {
  const { logger } = options;
  switch (spec.kind) {
    case 'pwm':
      return new PwmSink(
        {
          chip: spec.chip,
          channel: spec.channel,
          frequencyHz: spec.frequencyHz,
          sysfsRoot: options.sysfsPwmRoot,
        },
        logger
      );
    case 'command':
      return new CommandSink(spec.command, spec.args ?? [], logger, options.runner ?? runCommand);
    case 'log':
      return new LogSink(logger);
  }
}
