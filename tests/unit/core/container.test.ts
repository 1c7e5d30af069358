import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { connect } from 'node:net';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createMockLogger, loggedMessages } from '../../helpers/factories.js';
import { createContainer, resolveListenTarget } from '../../../src/core/container.js';
import { DEFAULT_CONFIG, type MergedConfig } from '../../../src/config/index.js';
import { ConfigurationError } from '../../../src/core/errors.js';

function testConfig(monitor: Partial<MergedConfig['monitor']> = {}): MergedConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.pipeline = {
    input: { kind: 'sequence', values: [40, 42, 42] },
    stages: [{ kind: 'identity' }],
    output: { kind: 'log' },
    samplePeriodMs: 1,
  };
  config.monitor = { ...config.monitor, ...monitor };
  return config;
}

describe('resolveListenTarget', () => {
  const base = DEFAULT_CONFIG.monitor;

  it('is null while monitoring is disabled', () => {
    expect(resolveListenTarget({ ...base, socketPath: '/tmp/x.sock' })).toBeNull();
  });

  it('prefers the socket path', () => {
    expect(resolveListenTarget({ ...base, enabled: true, socketPath: '/tmp/x.sock', port: 7070 })).toEqual({
      socketPath: '/tmp/x.sock',
    });
  });

  it('falls back to TCP', () => {
    expect(resolveListenTarget({ ...base, enabled: true, port: 7070 })).toEqual({ host: '127.0.0.1', port: 7070 });
  });

  it('rejects monitoring without an endpoint', () => {
    expect(() => resolveListenTarget({ ...base, enabled: true })).toThrow(ConfigurationError);
  });
});

describe('createContainer', () => {
  it('runs the configured pipeline into the sink until exhausted', async () => {
    const logger = createMockLogger();
    const container = await createContainer({ config: testConfig(), logger });

    expect(container.monitor).toBeNull();
    const reason = await container.start();
    await container.shutdown();

    expect(reason).toEqual({ reason: 'exhausted', ticks: 4 });
    // 42 repeats, so the second one is suppressed
    expect(logger.calls.info.filter((args) => args[1] === 'Output').map((args) => args[0])).toEqual([
      { value: 40 },
      { value: 42 },
    ]);
    expect(loggedMessages(logger, 'info')).toContain('Shutdown complete');
  });

  it('wires stages to the monitor channel when monitoring is on', async () => {
    const container = await createContainer({
      config: testConfig({ enabled: true, socketPath: '/tmp/pifan-test.sock' }),
      logger: createMockLogger(),
    });

    await container.pipeline.next();

    expect(container.monitor?.channel.pending()).toBe(2);
    await container.shutdown();
    expect(container.monitor?.channel.isClosed()).toBe(true);
  });

  it('shuts down once', async () => {
    const logger = createMockLogger();
    const container = await createContainer({ config: testConfig(), logger });

    await container.shutdown();
    await container.shutdown();

    expect(loggedMessages(logger, 'info').filter((m) => m === 'Shutdown complete')).toHaveLength(1);
  });
});

describe('createContainer with a monitor socket', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pifan-container-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('streams lines to an observer and shuts down while it is still connected', async () => {
    const socketPath = join(dir, 'monitor.sock');
    const container = await createContainer({
      config: testConfig({ enabled: true, socketPath }),
      logger: createMockLogger(),
    });
    const monitor = container.monitor;
    if (!monitor) throw new Error('monitoring should be on');

    const reason = await container.start();
    expect(reason.reason).toBe('exhausted');

    const chunks: string[] = [];
    const client = connect(socketPath);
    client.setEncoding('utf8');
    client.on('data', (chunk: Buffer | string) => chunks.push(String(chunk)));
    const closed = new Promise<void>((resolve) => client.once('close', () => resolve()));
    await vi.waitFor(() => expect(monitor.subscribers.size()).toBe(1));

    monitor.channel.handle(0).emitOutput(55);
    await vi.waitFor(() => expect(chunks.join('')).toBe('0: >:55\n'));

    await container.shutdown();

    await expect(closed).resolves.toBeUndefined();
    expect(monitor.subscribers.size()).toBe(0);
  });
});
