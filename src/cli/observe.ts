#!/usr/bin/env node
/**
 * pifan-observe - print the monitoring stream of a running pifand.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createConsoleLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { connectObserver, readLines } from '../monitor/index.js';
import { resolveEndpoint } from './endpoint.js';
import { renderObservedLine } from './render.js';

const logger = createConsoleLogger();

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('pifan-observe')
    .usage('$0 [socket]\n\nPrint the internal state of the fan control loop')
    .option('socket', { type: 'string', describe: 'Unix socket of the daemon' })
    .option('host', { type: 'string', default: '127.0.0.1', describe: 'TCP host of the daemon' })
    .option('port', { type: 'number', describe: 'TCP port of the daemon' })
    .help()
    .parseAsync();

  const socket = await connectObserver(resolveEndpoint(argv));

  for await (const line of readLines(socket)) {
    for (const text of renderObservedLine(line)) {
      // eslint-disable-next-line no-console
      console.log(text);
    }
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, 'Observer failed');
  process.exitCode = 1;
});
