/**
 * A probe failed while executing. Contained by the runner and recorded
 * as an ERROR finding; never fatal to the scan.
 */
export class ProbeExecutionError extends Error {
  constructor(
    message: string,
    public readonly probe: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ProbeExecutionError';
  }
}

/**
 * A finalized session was asked to change
 */
export class AlreadyFinalizedError extends Error {
  constructor(
    public readonly scanId: string,
    public readonly operation: 'append' | 'finalize'
  ) {
    super(`Scan ${scanId} is already finalized; ${operation} rejected`);
    this.name = 'AlreadyFinalizedError';
  }
}

/**
 * The caller selected probes the registry does not know
 */
export class InvalidSelectionError extends Error {
  constructor(public readonly unknown: readonly string[]) {
    super(`Unknown probe(s): ${unknown.join(', ')}`);
    this.name = 'InvalidSelectionError';
  }
}

/**
 * The scan target is not an http(s) URL
 */
export class InvalidTargetError extends Error {
  constructor(public readonly target: string) {
    super(`Invalid target URL: ${target || '(empty)'}`);
    this.name = 'InvalidTargetError';
  }
}

/**
 * A batch handed to the session violates the finding contract
 */
export class InvalidFindingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFindingError';
  }
}

/**
 * The scan was cancelled before any probe was submitted
 */
export class ScanCancelledError extends Error {
  constructor(message = 'Scan cancelled before any probe ran') {
    super(message);
    this.name = 'ScanCancelledError';
  }
}

/**
 * Configuration could not be loaded or validated
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
