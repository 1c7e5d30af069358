import type { Logger } from '../types/index.js';
import type { ISampleSink, ISampleSource } from '../ports/index.js';
import { type MergedConfig, type ConfigOverrides, loadConfig } from '../config/index.js';
import { type Pipeline, assemblePipeline } from '../pipeline/index.js';
import { createSink, createSource, type IoFactoryOptions } from '../io/index.js';
import {
  type ListenTarget,
  type MonitorChannel,
  type MonitorHub,
  type SubscriberAcceptor,
  type SubscriberSet,
  createMonitorChannel,
  createMonitorHub,
  createSubscriberAcceptor,
  createSubscriberSet,
} from '../monitor/index.js';
import { createLogger } from './logger.js';
import { type Scheduler, type StopReason, createScheduler } from './scheduler.js';
import { ConfigurationError, errorMessage } from './errors.js';

/**
 * Container options.
 */
export interface ContainerOptions {
  /** Config directory holding pifan.json */
  configPath?: string | undefined;
  /** Command-line overrides */
  overrides?: ConfigOverrides | undefined;
  /** Preloaded configuration; skips loading */
  config?: MergedConfig | undefined;
  /** Logger to use instead of one built from the logging config */
  logger?: Logger | undefined;
  /** Process runner and sysfs root for the adapters */
  io?: Omit<IoFactoryOptions, 'logger'> | undefined;
}

/**
 * Monitoring services, present when monitoring is enabled.
 */
export interface MonitorServices {
  channel: MonitorChannel;
  subscribers: SubscriberSet;
  hub: MonitorHub;
  acceptor: SubscriberAcceptor;
}

/**
 * Container holding all application dependencies.
 */
export interface Container {
  /** Loaded configuration */
  config: MergedConfig;
  /** Application logger */
  logger: Logger;
  /** Sensor */
  source: ISampleSource;
  /** Actuator */
  sink: ISampleSink;
  /** Assembled stage chain */
  pipeline: Pipeline;
  /** Tick driver */
  scheduler: Scheduler;
  /** Monitoring endpoint (null when disabled) */
  monitor: MonitorServices | null;
  /**
   * Open the sink, bring up monitoring, run the scheduler.
   * Resolves with the scheduler's stop reason.
   */
  start: () => Promise<StopReason>;
  /** Shutdown function */
  shutdown: () => Promise<void>;
}

/**
 * Where the monitoring endpoint listens, or null when monitoring is off.
 */
export function resolveListenTarget(monitor: MergedConfig['monitor']): ListenTarget | null {
  if (!monitor.enabled) {
    return null;
  }
  if (monitor.socketPath) {
    return { socketPath: monitor.socketPath };
  }
  if (monitor.port !== null) {
    return { host: monitor.host, port: monitor.port };
  }
  throw new ConfigurationError('Monitoring is enabled but no socket path or port is configured');
}

/**
 * Create the application container.
 *
 * Loads configuration (unless given), builds the logger, the adapters, the
 * monitoring services and the pipeline. Nothing is opened or bound until
 * start().
 */
export async function createContainer(options: ContainerOptions = {}): Promise<Container> {
  const config = options.config ?? (await loadConfig(options.configPath, options.overrides));

  const logger: Logger =
    options.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
    });
  logger.info({ configPath: config.paths.config }, 'Loaded configuration');

  const ioOptions: IoFactoryOptions = { ...options.io, logger };
  const source = createSource(config.pipeline.input, ioOptions);
  const sink = createSink(config.pipeline.output, ioOptions);

  const target = resolveListenTarget(config.monitor);
  let monitor: MonitorServices | null = null;
  if (target) {
    const channel = createMonitorChannel();
    const subscribers = createSubscriberSet();
    monitor = {
      channel,
      subscribers,
      hub: createMonitorHub(channel, subscribers, logger),
      acceptor: createSubscriberAcceptor(subscribers, target, logger),
    };
  }

  const pipeline = assemblePipeline(source, config.pipeline.stages, {
    monitor: monitor?.channel,
    logger,
  });
  const scheduler = createScheduler(
    pipeline,
    sink,
    { samplePeriodMs: config.pipeline.samplePeriodMs },
    logger
  );

  let isShutDown = false;

  const start = async (): Promise<StopReason> => {
    await sink.open?.();

    if (monitor) {
      try {
        await monitor.acceptor.start();
      } catch (error) {
        await sink.close?.();
        throw error;
      }
      void monitor.hub.start();
    }

    return scheduler.start();
  };

  const shutdown = async (): Promise<void> => {
    if (isShutDown) return;
    isShutDown = true;
    logger.info('Shutting down...');

    scheduler.stop();

    if (monitor) {
      await monitor.acceptor.stop();
      await monitor.hub.stop();
      await monitor.subscribers.closeAll();
    }

    try {
      await sink.close?.();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Sink close failed');
    }
    logger.info('Shutdown complete');
  };

  return {
    config,
    logger,
    source,
    sink,
    pipeline,
    scheduler,
    monitor,
    start,
    shutdown,
  };
}
