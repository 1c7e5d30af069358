import type { MonitorMessage, StageSnapshot } from '../types/index.js';
import { OUTPUT_TAG } from '../types/index.js';

/**
 * MonitorChannel - unbounded many-producer / single-consumer queue.
 *
 * Stages send through MonitorHandles without ever waiting; the hub is the
 * only receiver. Messages keep their send order.
 *
 * There is no backpressure: if the consumer stalls, pending messages grow
 * without limit.
 */
export class MonitorChannel {
  private readonly buffer: MonitorMessage[] = [];
  private waiter: ((message: MonitorMessage | null) => void) | null = null;
  private closed = false;

  /**
   * Enqueue a message. Dropped silently once the channel is closed.
   */
  send(message: MonitorMessage): void {
    if (this.closed) return;

    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(message);
      return;
    }
    this.buffer.push(message);
  }

  /**
   * Wait for the next message.
   * Resolves to null once the channel is closed and drained.
   */
  receive(): Promise<MonitorMessage | null> {
    const next = this.buffer.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error('MonitorChannel has a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Stop accepting messages and release a waiting consumer.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(null);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of messages waiting for the consumer.
   */
  pending(): number {
    return this.buffer.length;
  }

  /**
   * Create a sender tagged with a stage index.
   */
  handle(stageIndex: number): MonitorHandle {
    return new MonitorHandle(this, stageIndex);
  }
}

/**
 * MonitorHandle - a stage's sender into the shared channel.
 */
export class MonitorHandle {
  constructor(
    private readonly channel: MonitorChannel,
    readonly stageIndex: number
  ) {}

  /**
   * Emit a state snapshot under the stage's tag.
   */
  emitState(tag: string, snapshot: StageSnapshot): void {
    this.channel.send({
      stageIndex: this.stageIndex,
      tag,
      payload: JSON.stringify(snapshot),
    });
  }

  /**
   * Emit the value the stage pushed downstream.
   */
  emitOutput(value: number): void {
    this.channel.send({
      stageIndex: this.stageIndex,
      tag: OUTPUT_TAG,
      payload: String(value),
    });
  }
}

/**
 * Create a monitor channel.
 */
export function createMonitorChannel(): MonitorChannel {
  return new MonitorChannel();
}
