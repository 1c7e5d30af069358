import type { Logger, MonitorMessage } from '../types/index.js';
import type { ISubscriberConnection } from '../ports/index.js';
import type { MonitorChannel } from './channel.js';
import type { SubscriberSet } from './subscriber-set.js';
import { formatMonitorLine } from './protocol.js';
import { errorMessage } from '../core/errors.js';

/**
 * Outcome of one broadcast pass.
 */
export interface BroadcastResult {
  /** Observers that received the line */
  delivered: number;
  /** Observers dropped because their write failed */
  dropped: number;
}

/**
 * MonitorHub - sole consumer of the monitor channel.
 *
 * For every message it takes the subscriber lock, writes the line to each
 * observer in turn and drops the ones whose write failed, all in the same
 * pass. Nothing is buffered for observers that connect later.
 */
export class MonitorHub {
  private readonly logger: Logger;
  private running: Promise<void> | null = null;
  private broadcasts = 0;

  constructor(
    private readonly channel: MonitorChannel,
    private readonly subscribers: SubscriberSet,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'monitor-hub' });
  }

  /**
   * Consume the channel until it is closed.
   * Calling start() again returns the same run.
   */
  start(): Promise<void> {
    this.running ??= this.consume();
    return this.running;
  }

  /**
   * Close the channel; the consume loop drains what is left and ends.
   */
  async stop(): Promise<void> {
    this.channel.close();
    if (this.running) {
      await this.running;
    }
    this.logger.info({ broadcasts: this.broadcasts }, 'Monitor hub stopped');
  }

  /**
   * Deliver one message to every registered observer.
   */
  broadcast(message: MonitorMessage): Promise<BroadcastResult> {
    const line = formatMonitorLine(message);

    return this.subscribers.withLock(async (connections) => {
      const stale = new Set<ISubscriberConnection>();

      for (const connection of connections) {
        try {
          await connection.write(line);
        } catch (error) {
          stale.add(connection);
          this.logger.debug(
            { connectionId: connection.id, error: errorMessage(error) },
            'Dropping observer after failed write'
          );
        }
      }

      this.subscribers.prune(connections, stale);
      this.broadcasts++;

      return { delivered: connections.length, dropped: stale.size };
    });
  }

  private async consume(): Promise<void> {
    this.logger.info('Monitor hub started');

    for (;;) {
      const message = await this.channel.receive();
      if (message === null) {
        return;
      }
      await this.broadcast(message);
    }
  }
}

/**
 * Create a monitor hub.
 */
export function createMonitorHub(
  channel: MonitorChannel,
  subscribers: SubscriberSet,
  logger: Logger
): MonitorHub {
  return new MonitorHub(channel, subscribers, logger);
}
