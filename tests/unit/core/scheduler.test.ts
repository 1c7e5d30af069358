import { describe, it, expect, vi } from 'vitest';
import {
  createMockLogger,
  createTestPipeline,
  loggedMessages,
  RecordingSink,
} from '../../helpers/factories.js';
import { Scheduler, exitCodeFor } from '../../../src/core/scheduler.js';
import { SinkError } from '../../../src/core/errors.js';
import { getTickContext, type TickContext } from '../../../src/core/tick-context.js';
import type { ISampleSink } from '../../../src/ports/index.js';

function createScheduler(values: number[], sink: ISampleSink, samplePeriodMs = 1): Scheduler {
  const pipeline = createTestPipeline(values, [{ kind: 'identity' }]);
  return new Scheduler(pipeline, sink, { samplePeriodMs }, createMockLogger());
}

describe('Scheduler', () => {
  describe('tick', () => {
    it('forwards the first value and suppresses repeats at two decimals', async () => {
      const sink = new RecordingSink();
      const scheduler = createScheduler([50.004, 50.001, 50.01], sink);

      expect(await scheduler.tick()).toEqual({ kind: 'forwarded', value: 50.004 });
      expect(await scheduler.tick()).toEqual({ kind: 'suppressed', value: 50.001 });
      expect(await scheduler.tick()).toEqual({ kind: 'forwarded', value: 50.01 });
      expect(await scheduler.tick()).toEqual({ kind: 'exhausted' });

      expect(sink.values).toEqual([50.004, 50.01]);
      expect(scheduler.getTickCount()).toBe(4);
    });

    it('wraps sink failures in SinkError', async () => {
      const scheduler = createScheduler([7], new RecordingSink(1));

      await expect(scheduler.tick()).rejects.toThrow(SinkError);
    });
  });

  describe('start', () => {
    it('runs until the pipeline is exhausted', async () => {
      const sink = new RecordingSink();
      const scheduler = createScheduler([1, 2, 2, 3], sink);

      const reason = await scheduler.start();

      expect(reason).toEqual({ reason: 'exhausted', ticks: 5 });
      expect(sink.values).toEqual([1, 2, 3]);
      expect(scheduler.getState()).toBe('stopped');
    });

    it('stops on the first sink failure', async () => {
      const sink = new RecordingSink(2);
      const scheduler = createScheduler([1, 2, 3], sink);

      const reason = await scheduler.start();

      expect(reason.reason).toBe('sink_failed');
      expect(reason.ticks).toBe(2);
      if (reason.reason !== 'sink_failed') return;
      expect(reason.error.value).toBe(2);
      expect(reason.error.message).toBe('Failed to push 2: actuator unplugged');
      expect(sink.values).toEqual([1]);
    });

    it('resolves with stopped when stopped between ticks', async () => {
      const sink = new RecordingSink();
      const scheduler = createScheduler([1, 2, 3], sink, 60_000);

      const run = scheduler.start();
      await vi.waitFor(() => {
        expect(sink.values).toEqual([1]);
      });
      scheduler.stop();

      expect(await run).toEqual({ reason: 'stopped', ticks: 1 });
      expect(sink.values).toEqual([1]);
    });

    it('returns the same run when started twice', async () => {
      const logger = createMockLogger();
      const scheduler = new Scheduler(
        createTestPipeline([], []),
        new RecordingSink(),
        { samplePeriodMs: 1 },
        logger
      );

      const first = scheduler.start();
      const second = scheduler.start();

      expect(second).toBe(first);
      expect(loggedMessages(logger, 'warn')).toEqual(['Scheduler already started']);
      await first;
    });

    it('runs each tick inside its own tick context', async () => {
      const contexts: (TickContext | undefined)[] = [];
      const sink: ISampleSink = {
        name: 'context-capture',
        push: () => {
          contexts.push(getTickContext());
          return Promise.resolve();
        },
      };
      const scheduler = createScheduler([1, 2], sink);

      await scheduler.start();

      expect(contexts.map((c) => c?.tickNumber)).toEqual([1, 2]);
      expect(contexts[0]?.tickId).toMatch(/^tick_[0-9a-f]{8}$/);
      expect(contexts[0]?.tickId).not.toBe(contexts[1]?.tickId);
    });
  });
});

describe('exitCodeFor', () => {
  it('treats exhaustion and stop as success', () => {
    expect(exitCodeFor({ reason: 'exhausted', ticks: 3 })).toBe(0);
    expect(exitCodeFor({ reason: 'stopped', ticks: 3 })).toBe(0);
  });

  it('fails on sink errors', () => {
    expect(exitCodeFor({ reason: 'sink_failed', ticks: 1, error: new SinkError(1, 'gone') })).toBe(1);
  });
});
