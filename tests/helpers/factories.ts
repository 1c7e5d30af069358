/**
 * Test factories for loggers, adapters and observer connections.
 */

import { vi } from 'vitest';
import type { Logger } from '../../src/types/logger.js';
import type { Sample } from '../../src/types/sample.js';
import type { ISampleSink } from '../../src/ports/sample-sink.js';
import type { ISubscriberConnection } from '../../src/ports/subscriber.js';
import type { StageSpec } from '../../src/config/config-schema.js';
import { SequenceSource } from '../../src/io/sequence-source.js';
import { assemblePipeline } from '../../src/pipeline/assembler.js';
import type { Pipeline } from '../../src/pipeline/pipeline.js';
import type { MonitorChannel } from '../../src/monitor/channel.js';

type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface MockLogger extends Logger {
  calls: Record<Level, unknown[][]>;
  child: (bindings: Record<string, unknown>) => MockLogger;
  reset: () => void;
}

/**
 * Create a mock logger that captures all log calls.
 * Children share the parent's capture.
 */
export function createMockLogger(): MockLogger {
  const calls: Record<Level, unknown[][]> = {
    trace: [],
    debug: [],
    info: [],
    warn: [],
    error: [],
    fatal: [],
  };

  const logger: MockLogger = {
    trace: vi.fn((...args: unknown[]) => {
      calls.trace.push(args);
    }),
    debug: vi.fn((...args: unknown[]) => {
      calls.debug.push(args);
    }),
    info: vi.fn((...args: unknown[]) => {
      calls.info.push(args);
    }),
    warn: vi.fn((...args: unknown[]) => {
      calls.warn.push(args);
    }),
    error: vi.fn((...args: unknown[]) => {
      calls.error.push(args);
    }),
    fatal: vi.fn((...args: unknown[]) => {
      calls.fatal.push(args);
    }),
    child: () => logger,
    calls,
    reset: () => {
      for (const level of Object.keys(calls)) {
        if (isLevel(level)) calls[level] = [];
      }
      vi.clearAllMocks();
    },
  };

  return logger;
}

function isLevel(value: string): value is Level {
  return ['trace', 'debug', 'info', 'warn', 'error', 'fatal'].includes(value);
}

/**
 * Messages logged at a level, second argument of each call.
 */
export function loggedMessages(logger: MockLogger, level: Level): unknown[] {
  return logger.calls[level].map((args) => (args.length > 1 ? args[1] : args[0]));
}

/**
 * Sink that records every pushed value. Fails on the push numbered
 * `failOnPush` (1-based) when given.
 */
export class RecordingSink implements ISampleSink {
  readonly name = 'recording';
  readonly values: Sample[] = [];
  pushes = 0;
  opened = false;
  closed = false;

  constructor(private readonly failOnPush?: number) {}

  open(): Promise<void> {
    this.opened = true;
    return Promise.resolve();
  }

  push(value: Sample): Promise<void> {
    this.pushes++;
    if (this.failOnPush !== undefined && this.pushes === this.failOnPush) {
      return Promise.reject(new Error('actuator unplugged'));
    }
    this.values.push(value);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

/**
 * In-memory observer connection. `failing` connections reject every write.
 */
export class FakeConnection implements ISubscriberConnection {
  readonly lines: string[] = [];
  closed = false;

  constructor(
    readonly id: string,
    private readonly failing = false
  ) {}

  write(line: string): Promise<void> {
    if (this.failing || this.closed) {
      return Promise.reject(new Error('broken pipe'));
    }
    this.lines.push(line);
    return Promise.resolve();
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Assemble a pipeline over a fixed list of inputs.
 */
export function createTestPipeline(
  values: readonly number[],
  stages: readonly StageSpec[],
  monitor?: MonitorChannel
): Pipeline {
  return assemblePipeline(new SequenceSource(values), stages, {
    monitor,
    logger: createMockLogger(),
  });
}

/**
 * Pull until the pipeline is exhausted (or `limit` values were produced).
 */
export async function drain(pipeline: Pipeline, limit = 10_000): Promise<number[]> {
  const out: number[] = [];
  while (out.length < limit) {
    const value = await pipeline.next();
    if (value === null) break;
    out.push(value);
  }
  return out;
}
