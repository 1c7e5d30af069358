/**
 * Subscriber acceptor - listens for observers on a Unix domain socket or a
 * TCP port and registers each accepted connection with the subscriber set.
 */

import { createServer, type Server, type Socket } from 'node:net';
import { lstat, rm } from 'node:fs/promises';
import type { Duplex } from 'node:stream';
import type { Logger } from '../types/index.js';
import type { ISubscriberConnection } from '../ports/index.js';
import type { SubscriberSet } from './subscriber-set.js';
import { AcquisitionError, errorMessage } from '../core/errors.js';

/**
 * Where to listen. A socket path wins over host/port.
 */
export type ListenTarget = { socketPath: string } | { host: string; port: number };

/**
 * ISubscriberConnection over a Node stream (a net.Socket in production).
 */
export class StreamConnection implements ISubscriberConnection {
  constructor(
    readonly id: string,
    private readonly stream: Duplex
  ) {}

  write(line: string): Promise<void> {
    if (this.stream.destroyed || !this.stream.writable) {
      return Promise.reject(new Error('connection closed'));
    }

    return new Promise((resolve, reject) => {
      this.stream.write(line, 'utf8', (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (!this.stream.destroyed) {
      this.stream.destroy();
    }
  }
}

/**
 * SubscriberAcceptor - owns the monitoring endpoint.
 */
export class SubscriberAcceptor {
  private readonly logger: Logger;
  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  private nextId = 1;

  constructor(
    private readonly subscribers: SubscriberSet,
    private readonly target: ListenTarget,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'acceptor' });
  }

  /**
   * Bind the endpoint. Rejects with AcquisitionError when binding fails.
   */
  async start(): Promise<void> {
    if (this.server) {
      this.logger.warn('Acceptor already listening');
      return;
    }

    if ('socketPath' in this.target) {
      // A socket file left by a previous run would make listen() fail
      await this.removeStaleSocket(this.target.socketPath);
    }

    const server = createServer((socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
      void this.register(socket);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(
          new AcquisitionError('monitor endpoint', `cannot listen on ${this.describeTarget()}`, {
            cause: error,
          })
        );
      };
      server.once('error', onError);

      const onListening = (): void => {
        server.off('error', onError);
        resolve();
      };
      if ('socketPath' in this.target) {
        server.listen(this.target.socketPath, onListening);
      } else {
        server.listen(this.target.port, this.target.host, onListening);
      }
    });

    server.on('error', (error) => {
      this.logger.error({ error: error.message }, 'Monitor endpoint error');
    });
    this.server = server;
    this.logger.info({ endpoint: this.describeTarget() }, 'Monitor endpoint listening');
  }

  /**
   * Wrap an accepted stream and add it to the subscriber set.
   */
  async register(stream: Duplex): Promise<ISubscriberConnection> {
    const connection = new StreamConnection(`obs_${String(this.nextId++)}`, stream);

    // Observers only read; inbound bytes are discarded
    stream.resume();
    stream.on('error', (error) => {
      this.logger.debug({ connectionId: connection.id, error: error.message }, 'Observer stream error');
    });

    const total = await this.subscribers.add(connection);
    this.logger.debug({ connectionId: connection.id, subscribers: total }, 'Observer connected');
    return connection;
  }

  /**
   * Stop accepting and end every accepted socket. The server only reports
   * closed once all of its sockets are gone.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          this.logger.warn({ error: errorMessage(error) }, 'Monitor endpoint close failed');
        }
        resolve();
      });
    });
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    await closed;

    if ('socketPath' in this.target) {
      try {
        await this.removeStaleSocket(this.target.socketPath);
      } catch (error) {
        this.logger.warn({ error: errorMessage(error) }, 'Socket file left in place');
      }
    }
    this.logger.info('Monitor endpoint closed');
  }

  /**
   * Remove a leftover socket file. Anything else at the path is refused.
   */
  private async removeStaleSocket(socketPath: string): Promise<void> {
    let isSocket: boolean;
    try {
      isSocket = (await lstat(socketPath)).isSocket();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return;
      throw new AcquisitionError('monitor endpoint', `cannot inspect ${socketPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!isSocket) {
      throw new AcquisitionError('monitor endpoint', `${socketPath} exists and is not a socket`);
    }
    await rm(socketPath, { force: true });
  }

  /**
   * Bound address; reports the real port when listening on port 0.
   */
  address(): string | null {
    const address = this.server?.address();
    if (!address) return null;
    return typeof address === 'string' ? address : `${address.address}:${String(address.port)}`;
  }

  private describeTarget(): string {
    return 'socketPath' in this.target
      ? this.target.socketPath
      : `${this.target.host}:${String(this.target.port)}`;
  }
}

/**
 * Create an acceptor.
 */
export function createSubscriberAcceptor(
  subscribers: SubscriberSet,
  target: ListenTarget,
  logger: Logger
): SubscriberAcceptor {
  return new SubscriberAcceptor(subscribers, target, logger);
}
