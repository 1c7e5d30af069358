import type { ISubscriberConnection } from '../ports/index.js';

/**
 * SubscriberSet - the observer connections shared by the acceptor and the hub.
 *
 * Every access goes through `withLock`, which runs callers one at a time in
 * arrival order. The hub holds the lock for a whole broadcast pass, awaited
 * writes included, so a stalled observer also delays registration.
 */
export class SubscriberSet {
  private readonly connections: ISubscriberConnection[] = [];
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` with exclusive access to the connection list.
   * The list may be mutated in place; errors from `fn` reach the caller.
   */
  withLock<T>(fn: (connections: ISubscriberConnection[]) => T | Promise<T>): Promise<T> {
    const run = this.tail.then(() => fn(this.connections));
    // Keep the chain alive whatever `fn` did; the caller still sees the rejection
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Register a connection; it takes part in the next broadcast pass.
   */
  add(connection: ISubscriberConnection): Promise<number> {
    return this.withLock((connections) => {
      connections.push(connection);
      return connections.length;
    });
  }

  /**
   * Remove the given connections, closing each.
   */
  prune(connections: ISubscriberConnection[], stale: ReadonlySet<ISubscriberConnection>): void {
    if (stale.size === 0) return;
    const kept = connections.filter((c) => !stale.has(c));
    connections.length = 0;
    connections.push(...kept);
    for (const connection of stale) {
      connection.close();
    }
  }

  /**
   * Number of registered connections (unlocked read).
   */
  size(): number {
    return this.connections.length;
  }

  /**
   * Close and forget every connection.
   */
  closeAll(): Promise<void> {
    return this.withLock((connections) => {
      for (const connection of connections) {
        connection.close();
      }
      connections.length = 0;
    });
  }
}

/**
 * Create an empty subscriber set.
 */
export function createSubscriberSet(): SubscriberSet {
  return new SubscriberSet();
}
