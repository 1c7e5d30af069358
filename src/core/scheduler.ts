/**
 * Scheduler - drives the pipeline at a fixed sample period.
 *
 * Per tick:
 * 1. Pull one value from the end of the chain
 * 2. No value: the chain is exhausted, stop
 * 3. Pass it through the output filter
 * 4. Push accepted values to the sink; a sink failure stops the loop
 *
 * The next tick is scheduled only after the current one has finished, one
 * sample period later. Missed ticks are never caught up.
 */

import type { Logger, Sample } from '../types/index.js';
import type { ISampleSink } from '../ports/index.js';
import type { Pipeline } from '../pipeline/index.js';
import { createOutputFilter } from './output-filter.js';
import { SinkError, errorMessage } from './errors.js';
import { createTickContext, withTickContext } from './tick-context.js';

/**
 * Scheduler configuration.
 */
export interface SchedulerConfig {
  /** Sleep between ticks in ms */
  samplePeriodMs: number;
}

/**
 * Scheduler lifecycle. `stopped` is terminal.
 */
export type SchedulerState = 'idle' | 'running' | 'stopped';

/**
 * Why the scheduler stopped.
 */
export type StopReason =
  | { reason: 'exhausted'; ticks: number }
  | { reason: 'stopped'; ticks: number }
  | { reason: 'sink_failed'; ticks: number; error: SinkError }
  | { reason: 'failed'; ticks: number; error: Error };

/**
 * Process exit status for a finished run. Exhaustion of the sensor is a
 * normal end.
 */
export function exitCodeFor(reason: StopReason): number {
  return reason.reason === 'exhausted' || reason.reason === 'stopped' ? 0 : 1;
}

/**
 * Result of a single tick.
 */
export type TickOutcome =
  | { kind: 'exhausted' }
  | { kind: 'forwarded'; value: Sample }
  | { kind: 'suppressed'; value: Sample };

export class Scheduler {
  private readonly logger: Logger;
  private readonly filter = createOutputFilter();

  private state: SchedulerState = 'idle';
  private tickCount = 0;
  private tickTimeout: ReturnType<typeof setTimeout> | null = null;
  private completion: Promise<StopReason> | null = null;
  private resolveCompletion: ((reason: StopReason) => void) | null = null;

  constructor(
    private readonly pipeline: Pipeline,
    private readonly sink: ISampleSink,
    private readonly config: SchedulerConfig,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'scheduler' });
  }

  /**
   * Start ticking. The first tick runs immediately.
   * Resolves once the scheduler reaches `stopped`.
   */
  start(): Promise<StopReason> {
    if (this.completion) {
      this.logger.warn({ state: this.state }, 'Scheduler already started');
      return this.completion;
    }

    this.state = 'running';
    this.completion = new Promise<StopReason>((resolve) => {
      this.resolveCompletion = resolve;
    });

    this.logger.info(
      { samplePeriodMs: this.config.samplePeriodMs, sink: this.sink.name },
      'Scheduler started'
    );
    this.scheduleTick(0);

    return this.completion;
  }

  /**
   * Stop after the tick in progress, if any.
   */
  stop(): void {
    if (this.state !== 'running') {
      return;
    }
    if (this.tickTimeout) {
      clearTimeout(this.tickTimeout);
      this.tickTimeout = null;
    }
    this.finish({ reason: 'stopped', ticks: this.tickCount });
  }

  getState(): SchedulerState {
    return this.state;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  /**
   * Run one tick: pull, filter, forward.
   * Rejects with SinkError when the sink refuses the value.
   */
  async tick(): Promise<TickOutcome> {
    this.tickCount++;

    const value = await this.pipeline.next();
    if (value === null) {
      return { kind: 'exhausted' };
    }

    if (!this.filter.shouldForward(value)) {
      this.logger.trace({ value }, 'Output suppressed');
      return { kind: 'suppressed', value };
    }

    try {
      await this.sink.push(value);
    } catch (error) {
      throw error instanceof SinkError
        ? error
        : new SinkError(value, errorMessage(error), { cause: error });
    }

    this.logger.debug({ value }, 'Output forwarded');
    return { kind: 'forwarded', value };
  }

  private scheduleTick(delayMs: number): void {
    if (this.state !== 'running') return;

    this.tickTimeout = setTimeout(() => {
      this.tickTimeout = null;
      void this.runTick();
    }, delayMs);
  }

  private async runTick(): Promise<void> {
    const context = createTickContext(this.tickCount + 1);

    let outcome: TickOutcome;
    try {
      outcome = await withTickContext(context, () => this.tick());
    } catch (error) {
      if (error instanceof SinkError) {
        this.logger.error({ error: error.message, tick: this.tickCount }, 'Sink write failed');
        this.finish({ reason: 'sink_failed', ticks: this.tickCount, error });
      } else {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.logger.error({ error: failure.message, tick: this.tickCount }, 'Tick failed');
        this.finish({ reason: 'failed', ticks: this.tickCount, error: failure });
      }
      return;
    }

    if (outcome.kind === 'exhausted') {
      this.logger.info({ tick: this.tickCount }, 'Pipeline exhausted');
      this.finish({ reason: 'exhausted', ticks: this.tickCount });
      return;
    }

    this.scheduleTick(this.config.samplePeriodMs);
  }

  private finish(reason: StopReason): void {
    if (this.state === 'stopped') return;
    this.state = 'stopped';
    this.logger.info({ reason: reason.reason, ticks: reason.ticks }, 'Scheduler stopped');
    this.resolveCompletion?.(reason);
    this.resolveCompletion = null;
  }
}

/**
 * Create a scheduler.
 */
export function createScheduler(
  pipeline: Pipeline,
  sink: ISampleSink,
  config: SchedulerConfig,
  logger: Logger
): Scheduler {
  return new Scheduler(pipeline, sink, config, logger);
}
