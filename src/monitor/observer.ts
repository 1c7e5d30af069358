/**
 * Observer client helpers, shared by the command-line observers.
 */

import { createConnection, type Socket } from 'node:net';
import { createInterface } from 'node:readline';
import type { MonitorMessage } from '../types/index.js';
import { AcquisitionError } from '../core/errors.js';
import type { ListenTarget } from './acceptor.js';
import { isOutputMessage, parseMonitorLine } from './protocol.js';

/**
 * Stage whose output is the final output of the built-in default pipeline.
 *
 * Only meaningful for that exact 8-stage shape; other pipelines must pass
 * their own last index.
 */
export const DEFAULT_FINAL_STAGE_INDEX = 7;

/**
 * Connect to a monitoring endpoint.
 */
export function connectObserver(target: ListenTarget): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket =
      'socketPath' in target
        ? createConnection(target.socketPath)
        : createConnection(target.port, target.host);
    const endpoint = 'socketPath' in target ? target.socketPath : `${target.host}:${String(target.port)}`;
    const onError = (error: Error): void => {
      reject(new AcquisitionError('monitor endpoint', `cannot connect to ${endpoint}`, { cause: error }));
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

/**
 * Iterate the lines of a readable stream.
 */
export function readLines(stream: NodeJS.ReadableStream): AsyncIterable<string> {
  return createInterface({ input: stream, crlfDelay: Infinity });
}

/**
 * Wait for the first output line of the given stage.
 * Resolves to null if the lines end first.
 */
export async function waitForStageOutput(
  lines: AsyncIterable<string>,
  stageIndex: number = DEFAULT_FINAL_STAGE_INDEX
): Promise<number | null> {
  for await (const line of lines) {
    const message = parseMonitorLine(line);
    if (message && message.stageIndex === stageIndex && isOutputMessage(message)) {
      const value = Number(message.payload);
      if (Number.isFinite(value)) {
        return value;
      }
    }
  }
  return null;
}

/**
 * Parse every line, skipping the ones that are not monitor messages.
 */
export async function* readMessages(lines: AsyncIterable<string>): AsyncGenerator<MonitorMessage> {
  for await (const line of lines) {
    const message = parseMonitorLine(line);
    if (message) {
      yield message;
    }
  }
}
