#!/usr/bin/env node
/**
 * pifan-output - print the current output value of a running pifand.
 *
 * The default stage index matches the built-in pipeline only; pass --stage
 * for any other.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createConsoleLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { DEFAULT_FINAL_STAGE_INDEX, connectObserver, readLines, waitForStageOutput } from '../monitor/index.js';
import { resolveEndpoint } from './endpoint.js';
import { formatOutputValue } from './render.js';

const logger = createConsoleLogger();

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('pifan-output')
    .usage('$0 [socket]\n\nPrint the current output of the fan control loop')
    .option('socket', { type: 'string', describe: 'Unix socket of the daemon' })
    .option('host', { type: 'string', default: '127.0.0.1', describe: 'TCP host of the daemon' })
    .option('port', { type: 'number', describe: 'TCP port of the daemon' })
    .option('stage', {
      type: 'number',
      default: DEFAULT_FINAL_STAGE_INDEX,
      describe: 'Index of the stage whose output is reported',
    })
    .help()
    .parseAsync();

  const socket = await connectObserver(resolveEndpoint(argv));
  try {
    const value = await waitForStageOutput(readLines(socket), argv.stage);
    if (value === null) {
      logger.error({ stage: argv.stage }, 'Stream ended before the stage produced a value');
      process.exitCode = 1;
      return;
    }
    // eslint-disable-next-line no-console
    console.log(formatOutputValue(value));
  } finally {
    socket.destroy();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, 'Observer failed');
  process.exitCode = 1;
});
