import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Duplex } from 'node:stream';
import { connect, type Socket } from 'node:net';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createMockLogger } from '../../helpers/factories.js';
import { StreamConnection, SubscriberAcceptor } from '../../../src/monitor/acceptor.js';
import { SubscriberSet } from '../../../src/monitor/subscriber-set.js';
import { MonitorHub } from '../../../src/monitor/hub.js';
import { MonitorChannel } from '../../../src/monitor/channel.js';
import { AcquisitionError } from '../../../src/core/errors.js';

/**
 * In-memory duplex that records what is written to it.
 */
function createObserverStream(failWrites = false): { stream: Duplex; written: string[] } {
  const written: string[] = [];
  const stream = new Duplex({
    read() {
      // observers never send anything
    },
    write(chunk: Buffer, _encoding, callback) {
      if (failWrites) {
        callback(new Error('EPIPE'));
        return;
      }
      written.push(chunk.toString('utf8'));
      callback();
    },
  });
  stream.on('error', () => undefined);
  return { stream, written };
}

describe('StreamConnection', () => {
  it('writes lines to the stream', async () => {
    const { stream, written } = createObserverStream();
    const connection = new StreamConnection('obs_1', stream);

    await connection.write('0: >:1\n');
    await connection.write('0: >:2\n');

    expect(written).toEqual(['0: >:1\n', '0: >:2\n']);
  });

  it('rejects when the write fails', async () => {
    const { stream } = createObserverStream(true);
    const connection = new StreamConnection('obs_1', stream);

    await expect(connection.write('0: >:1\n')).rejects.toThrow('EPIPE');
  });

  it('rejects after close', async () => {
    const { stream } = createObserverStream();
    const connection = new StreamConnection('obs_1', stream);

    connection.close();

    expect(stream.destroyed).toBe(true);
    await expect(connection.write('0: >:1\n')).rejects.toThrow('connection closed');
  });
});

describe('SubscriberAcceptor', () => {
  it('registers accepted streams with sequential ids', async () => {
    const subscribers = new SubscriberSet();
    const acceptor = new SubscriberAcceptor(subscribers, { socketPath: '/tmp/unused.sock' }, createMockLogger());

    const first = await acceptor.register(createObserverStream().stream);
    const second = await acceptor.register(createObserverStream().stream);

    expect([first.id, second.id]).toEqual(['obs_1', 'obs_2']);
    expect(subscribers.size()).toBe(2);
  });

  it('registered connections receive written lines', async () => {
    const subscribers = new SubscriberSet();
    const acceptor = new SubscriberAcceptor(subscribers, { host: '127.0.0.1', port: 0 }, createMockLogger());
    const { stream, written } = createObserverStream();

    const connection = await acceptor.register(stream);
    await connection.write('3: >:70\n');

    expect(written).toEqual(['3: >:70\n']);
  });

  it('has no address before start and stops as a no-op', async () => {
    const acceptor = new SubscriberAcceptor(new SubscriberSet(), { host: '127.0.0.1', port: 0 }, createMockLogger());

    expect(acceptor.address()).toBeNull();
    await expect(acceptor.stop()).resolves.toBeUndefined();
  });
});

interface TestClient {
  socket: Socket;
  received: () => string;
  closed: Promise<void>;
}

function connectClient(socketPath: string): Promise<TestClient> {
  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    const socket = connect(socketPath);
    const closed = new Promise<void>((done) => socket.once('close', () => done()));
    socket.setEncoding('utf8');
    socket.on('data', (chunk: Buffer | string) => chunks.push(String(chunk)));
    socket.once('error', reject);
    socket.once('connect', () => {
      socket.off('error', reject);
      socket.on('error', () => undefined);
      resolve({ socket, received: () => chunks.join(''), closed });
    });
  });
}

describe('SubscriberAcceptor on a Unix socket', () => {
  let dir: string;
  let socketPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pifan-acceptor-'));
    socketPath = join(dir, 'monitor.sock');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('delivers broadcasts to a connected observer and prunes it after it leaves', async () => {
    const subscribers = new SubscriberSet();
    const hub = new MonitorHub(new MonitorChannel(), subscribers, createMockLogger());
    const acceptor = new SubscriberAcceptor(subscribers, { socketPath }, createMockLogger());
    await acceptor.start();

    const client = await connectClient(socketPath);
    await vi.waitFor(() => expect(subscribers.size()).toBe(1));

    await hub.broadcast({ stageIndex: 7, tag: '>', payload: '64' });
    await vi.waitFor(() => expect(client.received()).toBe('7: >:64\n'));

    client.socket.destroy();
    await vi.waitFor(async () => {
      await hub.broadcast({ stageIndex: 7, tag: '>', payload: '65' });
      expect(subscribers.size()).toBe(0);
    });

    await acceptor.stop();
  });

  it('ends connected observers on stop', async () => {
    const subscribers = new SubscriberSet();
    const acceptor = new SubscriberAcceptor(subscribers, { socketPath }, createMockLogger());
    await acceptor.start();

    const client = await connectClient(socketPath);
    await vi.waitFor(() => expect(subscribers.size()).toBe(1));

    await acceptor.stop();

    await expect(client.closed).resolves.toBeUndefined();
    await expect(stat(socketPath)).rejects.toThrow('ENOENT');
  });

  it('refuses to replace a regular file', async () => {
    await writeFile(socketPath, 'keep me');
    const acceptor = new SubscriberAcceptor(new SubscriberSet(), { socketPath }, createMockLogger());

    const started = acceptor.start();

    await expect(started).rejects.toBeInstanceOf(AcquisitionError);
    await expect(started).rejects.toThrow(`monitor endpoint: ${socketPath} exists and is not a socket`);
    expect(await readFile(socketPath, 'utf8')).toBe('keep me');
  });

  it('refuses to replace a directory', async () => {
    await mkdir(socketPath);
    const acceptor = new SubscriberAcceptor(new SubscriberSet(), { socketPath }, createMockLogger());

    await expect(acceptor.start()).rejects.toBeInstanceOf(AcquisitionError);
    expect((await stat(socketPath)).isDirectory()).toBe(true);
  });
});
