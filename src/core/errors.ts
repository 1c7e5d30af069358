/**
 * Error Types
 *
 * Typed error classes for the failure taxonomy of the control daemon.
 * The code tells the entry point whether to exit and how to report.
 */

/**
 * Error codes for classification.
 */
export type PifanErrorCode = 'CONFIGURATION_INVALID' | 'ACQUISITION_FAILED' | 'SINK_FAILED';

/**
 * Base error class.
 */
export class PifanError extends Error {
  constructor(
    message: string,
    public readonly code: PifanErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PifanError';
  }
}

/**
 * Pipeline description or config file is malformed or semantically invalid.
 * Fatal at startup - fix the configuration.
 */
export class ConfigurationError extends PifanError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      'CONFIGURATION_INVALID'
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Could not acquire an external resource (monitor endpoint, actuator line).
 * Fatal - the process exits.
 */
export class AcquisitionError extends PifanError {
  constructor(
    public readonly resource: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${resource}: ${message}`, 'ACQUISITION_FAILED', options);
    this.name = 'AcquisitionError';
  }
}

/**
 * The actuator rejected a value. Terminates the scheduler, no retry.
 */
export class SinkError extends PifanError {
  constructor(
    public readonly value: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to push ${String(value)}: ${message}`, 'SINK_FAILED', options);
    this.name = 'SinkError';
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
