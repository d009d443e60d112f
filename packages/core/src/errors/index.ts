/**
 * Error taxonomy for scratchpay.
 *
 * Every failure the tool can report maps to exactly one code. The CLI turns
 * any ScratchpayError into a non-zero exit.
 */

export type ErrorCode =
  | 'INVALID_OPERATION'
  | 'INVALID_AMOUNT'
  | 'UNKNOWN_NETWORK'
  | 'CONFIG_LOAD_ERROR'
  | 'WRITE_FAILURE'
  | 'READ_FAILURE';

export class ScratchpayError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ScratchpayError';
  }
}

export class InvalidOperationError extends ScratchpayError {
  constructor(
    public readonly operation: string,
    public readonly allowed: readonly string[]
  ) {
    super(
      'INVALID_OPERATION',
      `Invalid operation '${operation}'. Expected one of: ${allowed.join(', ')}`
    );
    this.name = 'InvalidOperationError';
  }
}

export class InvalidAmountError extends ScratchpayError {
  constructor(public readonly raw: string) {
    super('INVALID_AMOUNT', `Invalid amount '${raw}': not a number`);
    this.name = 'InvalidAmountError';
  }
}

export class UnknownNetworkError extends ScratchpayError {
  constructor(
    public readonly network: string,
    public readonly known: readonly string[]
  ) {
    super(
      'UNKNOWN_NETWORK',
      known.length > 0
        ? `Unknown network '${network}'. Known profiles: ${known.join(', ')}`
        : `Unknown network '${network}'. No network profiles are loaded`
    );
    this.name = 'UnknownNetworkError';
  }
}

export class ConfigLoadError extends ScratchpayError {
  constructor(
    public readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('CONFIG_LOAD_ERROR', `Cannot load network config '${path}': ${reason}`, options);
    this.name = 'ConfigLoadError';
  }
}

export class WriteFailureError extends ScratchpayError {
  constructor(
    public readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('WRITE_FAILURE', `Cannot write '${path}': ${reason}`, options);
    this.name = 'WriteFailureError';
  }
}

export class ReadFailureError extends ScratchpayError {
  constructor(
    public readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('READ_FAILURE', `Cannot read '${path}': ${reason}`, options);
    this.name = 'ReadFailureError';
  }
}

/**
 * Short reason for a caught filesystem or parse error.
 */
export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
