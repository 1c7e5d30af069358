/**
 * Monitoring wire protocol.
 *
 * Line-oriented UTF-8, one message per newline-terminated line:
 *
 *   "<stage_index>: <stage_tag>: <state-text>"   state after a tick
 *   "<stage_index>: >:<value>"                   value pushed downstream
 */

import type { MonitorMessage } from '../types/index.js';
import { OUTPUT_TAG } from '../types/index.js';

/**
 * Format a message as a wire line, including the trailing newline.
 */
export function formatMonitorLine(message: MonitorMessage): string {
  if (message.tag === OUTPUT_TAG) {
    return `${String(message.stageIndex)}: ${OUTPUT_TAG}:${message.payload}\n`;
  }
  return `${String(message.stageIndex)}: ${message.tag}: ${message.payload}\n`;
}

/**
 * Parse one wire line (with or without its newline).
 * Returns null for lines that do not start with a stage index and a tag.
 */
export function parseMonitorLine(line: string): MonitorMessage | null {
  const parts = line.replace(/\r?\n$/, '').split(':');
  const [rawIndex, rawTag, ...rest] = parts;
  if (rawIndex === undefined || rawTag === undefined) {
    return null;
  }

  const trimmedIndex = rawIndex.trim();
  if (!/^\d+$/.test(trimmedIndex)) {
    return null;
  }

  return {
    stageIndex: Number(trimmedIndex),
    tag: rawTag.trim(),
    payload: rest.join(':').trimStart(),
  };
}

/**
 * Whether a parsed message is an output line.
 */
export function isOutputMessage(message: MonitorMessage): boolean {
  return message.tag === OUTPUT_TAG;
}

/**
 * Parse a state payload as a flat map of numbers (e.g. the PID's P/I/D).
 * Returns null when the payload is not such an object.
 */
export function parseNumericState(payload: string): Record<string, number> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const result: Record<string, number> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'number') {
      result[key] = value;
    }
  }
  return result;
}
