import { z } from 'zod';

const finite = z.number().finite();

/**
 * Stage specification schemas.
 *
 * One entry per stage kind; the `kind` tag selects the constructor at
 * assembly time.
 */
export const identityStageSchema = z.object({ kind: z.literal('identity') }).strict();

export const averageStageSchema = z
  .object({
    kind: z.literal('average'),
    /** Window size */
    n: z.number().int().min(1),
  })
  .strict();

export const pidStageSchema = z
  .object({
    kind: z.literal('pid'),
    kp: finite,
    ki: finite,
    kd: finite,
    /** Symmetric limit on the proportional term */
    pLimit: finite,
    /** Symmetric limit on the integral accumulator */
    iLimit: finite,
    /** Symmetric limit on the derivative term */
    dLimit: finite,
    setpoint: finite,
    /** Added to the clamped [0, 100] control magnitude */
    offset: z.number().int().min(0),
  })
  .strict();

export const dampenedOscillatorStageSchema = z
  .object({
    kind: z.literal('dampenedOscillator'),
    mass: finite.positive(),
    springConstant: finite.min(0),
    /** Integration step */
    dt: finite.positive(),
    /** Accepted for compatibility; the stage is always critically damped */
    damping: finite.optional(),
    /** Accepted for compatibility; the target follows the upstream value */
    target: finite.optional(),
  })
  .strict();

export const clipStageSchema = z
  .object({
    kind: z.literal('clip'),
    min: finite,
    max: finite,
  })
  .strict();

export const atLeastStageSchema = z
  .object({
    kind: z.literal('atLeast'),
    threshold: finite,
  })
  .strict();

export const supersampleStageSchema = z
  .object({
    kind: z.literal('supersample'),
    /** Times each upstream value is repeated */
    n: z.number().int().min(1),
  })
  .strict();

export const subsampleStageSchema = z
  .object({
    kind: z.literal('subsample'),
    /** Upstream values discarded before each emitted one */
    n: z.number().int().min(0),
  })
  .strict();

/**
 * Any stage specification.
 */
export const stageSpecSchema = z
  .discriminatedUnion('kind', [
    identityStageSchema,
    averageStageSchema,
    pidStageSchema,
    dampenedOscillatorStageSchema,
    clipStageSchema,
    atLeastStageSchema,
    supersampleStageSchema,
    subsampleStageSchema,
  ])
  .superRefine((spec, ctx) => {
    if (spec.kind === 'clip' && spec.min > spec.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'clip.min must not exceed clip.max',
        path: ['min'],
      });
    }
  });

export type StageSpec = z.infer<typeof stageSpecSchema>;
export type StageKind = StageSpec['kind'];
export type AverageSpec = z.infer<typeof averageStageSchema>;
export type PidSpec = z.infer<typeof pidStageSchema>;
export type DampenedOscillatorSpec = z.infer<typeof dampenedOscillatorStageSchema>;
export type ClipSpec = z.infer<typeof clipStageSchema>;
export type AtLeastSpec = z.infer<typeof atLeastStageSchema>;
export type SupersampleSpec = z.infer<typeof supersampleStageSchema>;
export type SubsampleSpec = z.infer<typeof subsampleStageSchema>;

/**
 * Input (sensor) descriptors.
 */
export const inputSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('cpuTemperature'), path: z.string().min(1).optional() }).strict(),
  z
    .object({
      kind: z.literal('file'),
      path: z.string().min(1),
      /** Raw reading is divided by this */
      scale: finite.positive().optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('command'),
      command: z.string().min(1),
      args: z.array(z.string()).optional(),
    })
    .strict(),
  z.object({ kind: z.literal('sequence'), values: z.array(finite) }).strict(),
]);

export type InputSpec = z.infer<typeof inputSpecSchema>;

/**
 * Output (actuator) descriptors.
 */
export const outputSpecSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('pwm'),
      chip: z.number().int().min(0).optional(),
      channel: z.number().int().min(0).optional(),
      frequencyHz: finite.positive().optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('command'),
      command: z.string().min(1),
      args: z.array(z.string()).optional(),
    })
    .strict(),
  z.object({ kind: z.literal('log') }).strict(),
]);

export type OutputSpec = z.infer<typeof outputSpecSchema>;

/**
 * Complete pipeline description.
 */
export const pipelineSpecSchema = z
  .object({
    input: inputSpecSchema,
    stages: z.array(stageSpecSchema),
    output: outputSpecSchema,
    /** Sleep between ticks in ms */
    samplePeriodMs: z.number().int().min(1),
  })
  .strict();

export type PipelineSpec = z.infer<typeof pipelineSpecSchema>;

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Config file schema.
 *
 * This is what gets loaded from data/config/pifan.json.
 * All fields are optional - defaults are used for missing values.
 */
export const configFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().min(1).optional(),

    /** Replaces the default pipeline as a whole */
    pipeline: pipelineSpecSchema.optional(),

    /** Monitoring endpoint */
    monitor: z
      .object({
        enabled: z.boolean().optional(),
        socketPath: z.string().min(1).optional(),
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
      })
      .strict()
      .optional(),

    /** Logging configuration */
    logging: z
      .object({
        level: logLevelSchema.optional(),
        pretty: z.boolean().optional(),
        maxFiles: z.number().int().min(1).optional(),
        logDir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type PifanConfigFile = z.infer<typeof configFileSchema>;

/**
 * Merged application configuration.
 *
 * This is the final config after merging:
 * 1. Hardcoded defaults (lowest priority)
 * 2. Config file values
 * 3. Environment variables
 */
export interface MergedConfig {
  pipeline: PipelineSpec;

  monitor: {
    enabled: boolean;
    /** Unix domain socket path (preferred when set) */
    socketPath: string | null;
    host: string;
    /** TCP port, used when no socket path is set */
    port: number | null;
  };

  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string;
    maxFiles: number;
  };

  paths: {
    data: string;
    config: string;
    logs: string;
  };
}

/**
 * Built-in chain used when no pipeline is configured.
 */
export const DEFAULT_PIPELINE: PipelineSpec = {
  input: { kind: 'cpuTemperature' },
  stages: [
    { kind: 'average', n: 5 },
    {
      kind: 'pid',
      kp: 2,
      ki: 2,
      kd: 5,
      pLimit: 100,
      iLimit: 10,
      dLimit: 30,
      setpoint: 35,
      offset: 30,
    },
    { kind: 'clip', min: 30, max: 100 },
    { kind: 'supersample', n: 100 },
    { kind: 'dampenedOscillator', mass: 0.5, springConstant: 2, dt: 0.25 },
    { kind: 'dampenedOscillator', mass: 1, springConstant: 1, dt: 0.25 },
    { kind: 'clip', min: 30, max: 100 },
    { kind: 'subsample', n: 4 },
  ],
  output: { kind: 'pwm' },
  samplePeriodMs: 1000,
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  pipeline: DEFAULT_PIPELINE,
  monitor: {
    enabled: false,
    socketPath: null,
    host: '127.0.0.1',
    port: null,
  },
  logging: {
    level: 'info',
    pretty: true,
    logDir: 'data/logs',
    maxFiles: 10,
  },
  paths: {
    data: 'data',
    config: 'data/config',
    logs: 'data/logs',
  },
};

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;
