/**
 * Output suppression for the actuator.
 *
 * A value is forwarded only when its rounding to two decimals differs from
 * that of the last forwarded value. The first value always goes through.
 * Keeps floating-point noise from chattering the actuator.
 */

/**
 * Round to hundredths, as an integer count of hundredths.
 * Ties round away from zero on both sides.
 */
export function toHundredths(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value) * 100);
}

export class OutputFilter {
  private lastForwarded: number | null = null;

  /**
   * Decide whether to forward `value`. Records it when it is forwarded.
   */
  shouldForward(value: number): boolean {
    const rounded = toHundredths(value);
    if (this.lastForwarded !== null && rounded === this.lastForwarded) {
      return false;
    }
    this.lastForwarded = rounded;
    return true;
  }

  /**
   * Rounded value of the last forwarded sample, in hundredths.
   */
  getLastForwarded(): number | null {
    return this.lastForwarded;
  }

  reset(): void {
    this.lastForwarded = null;
  }
}

/**
 * Create an output filter.
 */
export function createOutputFilter(): OutputFilter {
  return new OutputFilter();
}
