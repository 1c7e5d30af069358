/**
 * Text rendering for the observer clients.
 */

import { isOutputMessage, parseMonitorLine, parseNumericState } from '../monitor/index.js';

function term(state: Record<string, number>, key: string): string {
  const value = state[key];
  return value === undefined ? '-' : String(value);
}

/**
 * Lines to print for one received monitor line: the line itself, plus a
 * P/I/D breakdown for PID state or a note when the state does not parse.
 */
export function renderObservedLine(line: string): string[] {
  const message = parseMonitorLine(line);
  if (!message) {
    return [line, 'Malformed monitor line'];
  }
  if (isOutputMessage(message)) {
    return [line];
  }

  const state = parseNumericState(message.payload);
  if (!state) {
    return [line, `Failed to parse state of stage ${String(message.stageIndex)}`];
  }
  if (message.tag === 'PID') {
    return [line, `P: ${term(state, 'P')}\tI: ${term(state, 'I')}\t D: ${term(state, 'D')}\t`];
  }
  return [line];
}

/**
 * Output value as printed by pifan-output: rounded, right-aligned in two
 * columns.
 */
export function formatOutputValue(value: number): string {
  return value.toFixed(0).padStart(2);
}
