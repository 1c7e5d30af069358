#!/usr/bin/env node
/**
 * pifand - fan control daemon.
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createContainer, type Container } from './core/container.js';
import { createConsoleLogger } from './core/logger.js';
import { PifanError, errorMessage } from './core/errors.js';
import { exitCodeFor } from './core/scheduler.js';
import type { LogLevel } from './config/index.js';
import type { Logger } from './types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('pifand')
    .usage('$0 [options]\n\nRun the fan control loop')
    .option('config', { type: 'string', describe: 'Directory holding pifan.json' })
    .option('monitor', { type: 'string', describe: 'Unix socket for observers' })
    .option('port', { type: 'number', describe: 'TCP port for observers' })
    .option('log-level', { choices: LOG_LEVELS, describe: 'Log level' })
    .strict()
    .help()
    .parseAsync();

  container = await createContainer({
    configPath: argv.config,
    overrides: {
      monitorSocket: argv.monitor,
      monitorPort: argv.port,
      logLevel: argv['log-level'],
    },
  });

  const { logger, config, pipeline, sink, monitor } = container;
  logger.info(
    {
      stages: pipeline.length,
      sink: sink.name,
      samplePeriodMs: config.pipeline.samplePeriodMs,
      monitor: monitor !== null,
    },
    'pifand starting...'
  );

  const reason = await container.start();
  logger.info({ reason: reason.reason, ticks: reason.ticks }, 'Control loop ended');
  if ('error' in reason) {
    logger.fatal({ error: reason.error.message }, 'Control loop failed');
  }

  await container.shutdown();
  process.exitCode = exitCodeFor(reason);
}

// Stop on SIGINT/SIGTERM
async function shutdown(): Promise<void> {
  if (isShuttingDown) {
    return; // Already shutting down, ignore duplicate signals
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

// Start the application
main().catch((error: unknown) => {
  const logger: Logger = container?.logger ?? createConsoleLogger('fatal');
  const code = error instanceof PifanError ? error.code : 'UNEXPECTED';
  logger.fatal({ code, error: errorMessage(error) }, 'Failed to start');
  process.exit(1);
});
