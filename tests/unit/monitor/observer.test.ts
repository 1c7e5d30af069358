import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { readLines, readMessages, waitForStageOutput } from '../../../src/monitor/observer.js';
import type { MonitorMessage } from '../../../src/types/index.js';

async function* lines(...values: string[]): AsyncGenerator<string> {
  for (const value of values) {
    yield value;
  }
}

describe('waitForStageOutput', () => {
  it('returns the first output of the requested stage', async () => {
    const value = await waitForStageOutput(
      lines('6: >:48.2', '7: Subsample: {"n":4}', '7: >:47.25', '7: >:47'),
      7
    );
    expect(value).toBe(47.25);
  });

  it('defaults to the last stage of the built-in pipeline', async () => {
    expect(await waitForStageOutput(lines('0: >:1', '7: >:64'))).toBe(64);
  });

  it('returns null when the stream ends first', async () => {
    expect(await waitForStageOutput(lines('0: >:1', 'garbage'), 7)).toBeNull();
  });
});

describe('readMessages', () => {
  it('skips lines that are not monitor messages', async () => {
    const messages: MonitorMessage[] = [];
    for await (const message of readMessages(lines('noise', '1: Clip: {"min":30000,"max":100000}'))) {
      messages.push(message);
    }
    expect(messages).toEqual([{ stageIndex: 1, tag: 'Clip', payload: '{"min":30000,"max":100000}' }]);
  });
});

describe('readLines', () => {
  it('splits a stream into lines', async () => {
    const stream = new PassThrough();
    stream.end('0: >:1\n1: >:2\n');

    const received: string[] = [];
    for await (const line of readLines(stream)) {
      received.push(line);
    }
    expect(received).toEqual(['0: >:1', '1: >:2']);
  });
});
