/**
 * Base error class for VIES batch validation
 */
export class VatCheckError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VatCheckError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Raw input cannot be split into an EU prefix and a number.
 * Localized to one row; a batch records it as INVALID_INPUT.
 */
export class FormatError extends VatCheckError {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message, 'INVALID_INPUT', { input });
    this.name = 'FormatError';
    this.input = input;
  }
}

/**
 * Connection-level failure talking to VIES
 */
export class NetworkError extends VatCheckError {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, 'NETWORK_ERROR', { url }, options);
    this.name = 'NetworkError';
    this.url = url;
  }
}

/**
 * A request or a whole batch ran past its time limit
 */
export class TimeoutError extends VatCheckError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(message, 'TIMEOUT', { ...context, timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * VIES answered with a non-definitive `userError` or an unusable payload
 */
export class ServiceError extends VatCheckError {
  readonly serviceCode: string;
  readonly status?: number;

  constructor(message: string, serviceCode: string, status?: number) {
    super(message, 'SERVICE_ERROR', status !== undefined ? { serviceCode, status } : { serviceCode });
    this.name = 'ServiceError';
    this.serviceCode = serviceCode;
    if (status !== undefined) {
      this.status = status;
    }
  }
}

/**
 * An export target could not be written. Nothing was changed at the path.
 */
export class WriteError extends VatCheckError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 'WRITE_ERROR', { path }, options);
    this.name = 'WriteError';
    this.path = path;
  }
}

/**
 * Imported sheet is unreadable or lacks required columns
 */
export class SpreadsheetFormatError extends VatCheckError {
  readonly missingColumns: readonly string[];

  constructor(message: string, missingColumns: readonly string[] = [], context?: Record<string, unknown>) {
    super(message, 'SPREADSHEET_FORMAT', { ...context, missingColumns });
    this.name = 'SpreadsheetFormatError';
    this.missingColumns = missingColumns;
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends VatCheckError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * An operation is not allowed in the object's current state
 */
export class InvalidStateError extends VatCheckError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_STATE', context);
    this.name = 'InvalidStateError';
  }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
