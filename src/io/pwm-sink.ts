/**
 * PWM sink - drives a fan through the Linux sysfs PWM interface.
 *
 * Layout under the sysfs root:
 *   pwmchip<chip>/export          write the channel number to expose it
 *   pwmchip<chip>/pwm<channel>/   period, duty_cycle (ns), enable
 *
 * A pushed value is a percentage: duty = value / 100 of the period,
 * clamped to [0, 1].
 */

import { access, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger, Sample } from '../types/index.js';
import type { ISampleSink } from '../ports/index.js';
import { AcquisitionError, SinkError, errorMessage } from '../core/errors.js';

export const SYSFS_PWM_ROOT = '/sys/class/pwm';
export const DEFAULT_PWM_FREQUENCY_HZ = 20_000;

/** Duty cycle written when the line is enabled, before the first value */
const INITIAL_DUTY = 0.5;

export interface PwmSinkOptions {
  chip?: number | undefined;
  channel?: number | undefined;
  frequencyHz?: number | undefined;
  /** Override for the sysfs mount point */
  sysfsRoot?: string | undefined;
}

/**
 * Nanosecond duty cycle for a percentage of the period.
 */
export function dutyCycleNs(periodNs: number, percent: number): number {
  const fraction = Math.min(1, Math.max(0, percent / 100));
  return Math.round(periodNs * fraction);
}

export class PwmSink implements ISampleSink {
  readonly name = 'pwm';
  readonly periodNs: number;

  private readonly chipDir: string;
  private readonly channelDir: string;
  private readonly channel: number;
  private readonly logger: Logger;
  private opened = false;

  constructor(options: PwmSinkOptions, logger: Logger) {
    const root = options.sysfsRoot ?? SYSFS_PWM_ROOT;
    this.channel = options.channel ?? 0;
    this.chipDir = join(root, `pwmchip${String(options.chip ?? 0)}`);
    this.channelDir = join(this.chipDir, `pwm${String(this.channel)}`);
    this.periodNs = Math.round(1e9 / (options.frequencyHz ?? DEFAULT_PWM_FREQUENCY_HZ));
    this.logger = logger.child({ component: 'sink', sink: this.name });
  }

  async open(): Promise<void> {
    if (this.opened) return;

    try {
      if (!(await exists(this.channelDir))) {
        await writeFile(join(this.chipDir, 'export'), String(this.channel));
      }
      await this.writeAttribute('period', this.periodNs);
      await this.writeAttribute('duty_cycle', dutyCycleNs(this.periodNs, INITIAL_DUTY * 100));
      await this.writeAttribute('enable', 1);
    } catch (error) {
      throw new AcquisitionError('pwm', `cannot open ${this.channelDir}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.opened = true;
    this.logger.info({ channel: this.channelDir, periodNs: this.periodNs }, 'PWM line opened');
  }

  async push(value: Sample): Promise<void> {
    if (!this.opened) {
      throw new SinkError(value, 'PWM line is not open');
    }

    const duty = dutyCycleNs(this.periodNs, value);
    try {
      await this.writeAttribute('duty_cycle', duty);
    } catch (error) {
      throw new SinkError(value, errorMessage(error), { cause: error });
    }
    this.logger.debug({ value, dutyNs: duty }, 'PWM duty cycle set');
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    this.opened = false;

    try {
      await this.writeAttribute('enable', 0);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'PWM disable failed');
      return;
    }
    this.logger.info('PWM line disabled');
  }

  private async writeAttribute(name: string, value: number): Promise<void> {
    await writeFile(join(this.channelDir, name), String(value));
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}
