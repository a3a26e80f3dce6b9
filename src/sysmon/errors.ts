/**
 * Sysmon Error Types
 *
 * Error classes raised across the display pipeline. Formatting and sensor
 * problems never surface here; they degrade to placeholders inside the frames.
 */

/**
 * Base error for all sysmon failures, with a machine-readable code.
 */
export class SysmonError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SysmonError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raised at startup when the configuration or schedule is unusable.
 */
export class ConfigurationError extends SysmonError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, 'CONFIG_ERROR', issues.length > 0 ? { issues } : undefined, cause);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Raised when the serial port cannot be opened, written or closed.
 */
export class SerialLinkError extends SysmonError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, 'SERIAL_LINK_ERROR', { path }, cause);
    this.name = 'SerialLinkError';
  }
}

/**
 * Raised by the scheduler when a frame could not be delivered. Fatal: the
 * scheduler stops and attempts no further writes.
 */
export class TransmissionError extends SysmonError {
  readonly frameKind: string;

  constructor(frameKind: string, cause: unknown) {
    super(
      `Failed to transmit ${frameKind} frame: ${cause instanceof Error ? cause.message : String(cause)}`,
      'TRANSMISSION_ERROR',
      { frameKind },
      cause,
    );
    this.name = 'TransmissionError';
    this.frameKind = frameKind;
  }
}
