/**
 * Pipeline assembler - turns an ordered list of stage specs into a Pipeline.
 *
 * Folds left over the specs in the given order: stage k is built from
 * spec k and reads from stage k - 1 (or the sensor). Nothing is reordered
 * or skipped. Monitoring is an explicit option: with a channel, every stage
 * gets a handle tagged with its index; without one, stages emit nothing.
 */

import type { Logger } from '../types/index.js';
import type { ISampleSource } from '../ports/index.js';
import type { MonitorChannel, MonitorHandle } from '../monitor/index.js';
import { stageSpecSchema, formatIssues, type StageSpec } from '../config/index.js';
import { ConfigurationError } from '../core/errors.js';
import type { Stage } from './stage.js';
import { Pipeline } from './pipeline.js';
import {
  AtLeastStage,
  AverageStage,
  ClipStage,
  DampenedOscillatorStage,
  IdentityStage,
  PidStage,
  SubsampleStage,
  SupersampleStage,
} from './stages/index.js';

/**
 * Assembly options.
 */
export interface AssembleOptions {
  /** Channel for stage trace messages; omit to run unmonitored */
  monitor?: MonitorChannel | undefined;
  logger: Logger;
}

/**
 * Build one stage from its spec.
 */
export function createStage(spec: StageSpec, index: number, monitor?: MonitorHandle): Stage {
  switch (spec.kind) {
    case 'identity':
      return new IdentityStage(index, monitor);
    case 'average':
      return new AverageStage(spec, index, monitor);
    case 'pid':
      return new PidStage(spec, index, monitor);
    case 'dampenedOscillator':
      return new DampenedOscillatorStage(spec, index, monitor);
    case 'clip':
      return new ClipStage(spec, index, monitor);
    case 'atLeast':
      return new AtLeastStage(spec, index, monitor);
    case 'supersample':
      return new SupersampleStage(spec, index, monitor);
    case 'subsample':
      return new SubsampleStage(spec, index, monitor);
    default: {
      const exhaustive: never = spec;
      throw new ConfigurationError(`Unknown stage kind: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Validate a stage list. Throws ConfigurationError listing every problem.
 */
export function validateStageSpecs(specs: readonly unknown[]): StageSpec[] {
  const valid: StageSpec[] = [];
  const issues: string[] = [];

  specs.forEach((raw, index) => {
    const parsed = stageSpecSchema.safeParse(raw);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      issues.push(...formatIssues(parsed.error.issues).map((issue) => `stages.${String(index)}.${issue}`));
    }
  });

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid pipeline stages', issues);
  }
  return valid;
}

/**
 * Assemble the chain on top of a source.
 */
export function assemblePipeline(
  source: ISampleSource,
  specs: readonly unknown[],
  options: AssembleOptions
): Pipeline {
  const logger = options.logger.child({ component: 'assembler' });
  const validated = validateStageSpecs(specs);

  const stages = validated.map((spec, index) => {
    if (spec.kind === 'dampenedOscillator' && spec.damping !== undefined) {
      logger.warn(
        { stageIndex: index, damping: spec.damping },
        'Ignoring damping parameter; oscillator is always critically damped'
      );
    }
    return createStage(spec, index, options.monitor?.handle(index));
  });

  logger.info(
    {
      source: source.name,
      stages: stages.map((stage) => stage.tag),
      monitored: options.monitor !== undefined,
    },
    'Pipeline assembled'
  );

  return new Pipeline(source, stages);
}
