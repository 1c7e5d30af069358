/**
 * File source - reads one number from a file on every pull.
 *
 * Covers the CPU temperature sensor, which is a sysfs file holding
 * millidegrees Celsius.
 */

import { readFile } from 'node:fs/promises';
import type { Logger, Sample } from '../types/index.js';
import type { ISampleSource } from '../ports/index.js';
import { errorMessage } from '../core/errors.js';
import { parseReading } from './parse-reading.js';

export const CPU_TEMPERATURE_PATH = '/sys/class/thermal/thermal_zone0/temp';

/** The thermal zone reports millidegrees */
export const CPU_TEMPERATURE_SCALE = 1000;

export interface FileSourceOptions {
  name: string;
  path: string;
  /** Raw reading is divided by this (default 1) */
  scale?: number | undefined;
}

export class FileSource implements ISampleSource {
  readonly name: string;
  private readonly path: string;
  private readonly scale: number;
  private readonly logger: Logger;

  constructor(options: FileSourceOptions, logger: Logger) {
    this.name = options.name;
    this.path = options.path;
    this.scale = options.scale ?? 1;
    this.logger = logger.child({ component: 'source', source: this.name });
  }

  async next(): Promise<Sample | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (error) {
      this.logger.warn({ path: this.path, error: errorMessage(error) }, 'Sensor read failed');
      return null;
    }

    const reading = parseReading(raw);
    if (reading === null) {
      this.logger.warn({ path: this.path, raw: raw.trim() }, 'Sensor reading is not a number');
      return null;
    }

    const value = reading / this.scale;
    this.logger.debug({ value }, 'Sensor read');
    return value;
  }
}

/**
 * Raspberry Pi CPU temperature in degrees Celsius.
 */
export function createCpuTemperatureSource(
  logger: Logger,
  path: string = CPU_TEMPERATURE_PATH
): FileSource {
  return new FileSource({ name: 'cpu-temperature', path, scale: CPU_TEMPERATURE_SCALE }, logger);
}
