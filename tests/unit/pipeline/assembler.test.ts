import { describe, it, expect } from 'vitest';
import { createMockLogger, loggedMessages } from '../../helpers/factories.js';
import { assemblePipeline, createStage, validateStageSpecs } from '../../../src/pipeline/assembler.js';
import { SequenceSource } from '../../../src/io/sequence-source.js';
import { ConfigurationError } from '../../../src/core/errors.js';
import { DEFAULT_PIPELINE } from '../../../src/config/index.js';

describe('validateStageSpecs', () => {
  it('accepts every stage kind', () => {
    const specs = validateStageSpecs(DEFAULT_PIPELINE.stages);
    expect(specs.map((s) => s.kind)).toEqual([
      'average',
      'pid',
      'clip',
      'supersample',
      'dampenedOscillator',
      'dampenedOscillator',
      'clip',
      'subsample',
    ]);
  });

  it('rejects a non-positive window', () => {
    expect(() => validateStageSpecs([{ kind: 'average', n: 0 }])).toThrow(ConfigurationError);
  });

  it('lists every issue with its stage position', () => {
    try {
      validateStageSpecs([{ kind: 'identity' }, { kind: 'clip', min: 50, max: 10 }, { kind: 'warp' }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toBe('stages.1.min: clip.min must not exceed clip.max');
      expect(error.issues[1]).toMatch(/^stages\.2\.kind: /);
    }
  });

  it('rejects unknown parameters', () => {
    expect(() => validateStageSpecs([{ kind: 'identity', n: 3 }])).toThrow(ConfigurationError);
  });

  it('rejects an oscillator without mass', () => {
    expect(() =>
      validateStageSpecs([{ kind: 'dampenedOscillator', mass: 0, springConstant: 1, dt: 0.1 }])
    ).toThrow(/stages\.0\.mass/);
  });
});

describe('createStage', () => {
  it('builds the stage for each kind with its index', () => {
    const stage = createStage({ kind: 'supersample', n: 4 }, 3);
    expect(stage.kind).toBe('supersample');
    expect(stage.tag).toBe('Supersample');
    expect(stage.index).toBe(3);
  });
});

describe('assemblePipeline', () => {
  it('keeps the configured order', () => {
    const pipeline = assemblePipeline(
      new SequenceSource([]),
      [{ kind: 'clip', min: 0, max: 1 }, { kind: 'identity' }, { kind: 'atLeast', threshold: 2 }],
      { logger: createMockLogger() }
    );
    expect(pipeline.stages.map((s) => [s.index, s.tag])).toEqual([
      [0, 'Clip'],
      [1, 'Identity'],
      [2, 'AtLeast'],
    ]);
  });

  it('warns that a damping value is ignored', () => {
    const logger = createMockLogger();
    assemblePipeline(
      new SequenceSource([]),
      [{ kind: 'dampenedOscillator', mass: 1, springConstant: 1, dt: 0.1, damping: 0.3 }],
      { logger }
    );
    expect(loggedMessages(logger, 'warn')).toEqual([
      'Ignoring damping parameter; oscillator is always critically damped',
    ]);
  });
});
