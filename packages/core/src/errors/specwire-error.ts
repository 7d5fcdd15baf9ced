/**
 * SpecwireError - error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a SpecwireError
 */
export interface SpecwireErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a SpecwireError
 */
export interface SerializedSpecwireError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedSpecwireError | { name: string; message: string; stack?: string };
}

/**
 * Base error for everything the protocol engine throws or reports.
 *
 * @example
 * ```typescript
 * try {
 *   await client.run('mv th 10');
 * } catch (error) {
 *   if (SpecwireError.isCode(error, 'SPECWIRE_R400')) {
 *     console.log('Server refused:', error.message);
 *   } else if (SpecwireError.isCategory(error, 'connection')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class SpecwireError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: SpecwireErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'SpecwireError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a SpecwireError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): SpecwireError {
    return new SpecwireError({ code, context });
  }

  /**
   * Wrap an existing error with a SpecwireError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): SpecwireError {
    return new SpecwireError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isSpecwireError(error: unknown): error is SpecwireError {
    return error instanceof SpecwireError;
  }

  static isCode(error: unknown, code: ErrorCode): error is SpecwireError {
    return SpecwireError.isSpecwireError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): error is SpecwireError {
    return SpecwireError.isSpecwireError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedSpecwireError {
    const result: SerializedSpecwireError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (SpecwireError.isSpecwireError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * The transport could not be established
 */
export class ConnectionError extends SpecwireError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'SPECWIRE_C500', message, context, cause });
    this.name = 'ConnectionError';
  }
}

/**
 * The connection failed mid-session; every pending command receives this
 */
export class ConnectionLostError extends SpecwireError {
  constructor(message = 'Connection lost', context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'SPECWIRE_C501', message, context, cause });
    this.name = 'ConnectionLostError';
  }
}

/**
 * A caller-supplied deadline passed before the reply arrived
 */
export class CommandTimeoutError extends SpecwireError {
  /** Correlation id of the abandoned command */
  readonly serial: number;
  readonly timeoutMs: number;

  constructor(serial: number, timeoutMs: number, context?: Record<string, unknown>) {
    super({
      code: 'SPECWIRE_C502',
      message: `Command ${serial} timed out after ${timeoutMs}ms`,
      context: { ...context, serial, timeoutMs },
    });
    this.name = 'CommandTimeoutError';
    this.serial = serial;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A malformed or unframeable message
 */
export class ProtocolError extends SpecwireError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    code: Extract<ErrorCode, `SPECWIRE_P${string}`> = 'SPECWIRE_P100'
  ) {
    super({ code, message, context });
    this.name = 'ProtocolError';
  }
}

/**
 * Declared and actual data types conflict
 */
export class TypeMismatchError extends SpecwireError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string, context?: Record<string, unknown>) {
    super({
      code: 'SPECWIRE_T200',
      message: `Expected ${expected} but got ${actual}`,
      context: { ...context, expected, actual },
    });
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Array access outside the declared shape
 */
export class IndexOutOfRangeError extends SpecwireError {
  readonly index: readonly number[];
  readonly shape: readonly number[];

  constructor(index: readonly number[], shape: readonly number[], context?: Record<string, unknown>) {
    super({
      code: 'SPECWIRE_I300',
      message: `Index [${index.join(', ')}] is out of range for shape (${shape.join(', ')})`,
      context: { ...context, index: [...index], shape: [...shape] },
    });
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.shape = shape;
  }
}

/**
 * The server answered with an error
 */
export class CommandFailedError extends SpecwireError {
  /** Console output captured while the command ran, if any */
  readonly output: string;

  constructor(message: string, context?: Record<string, unknown>, output = '') {
    super({ code: 'SPECWIRE_R400', message, context });
    this.name = 'CommandFailedError';
    this.output = output;
  }
}

/**
 * Attempted write to a read-only property
 */
export class ReadOnlyPropertyError extends SpecwireError {
  constructor(property: string) {
    super({
      code: 'SPECWIRE_R401',
      message: `Property "${property}" is read-only`,
      context: { property },
    });
    this.name = 'ReadOnlyPropertyError';
  }
}

/**
 * Helper function to ensure errors are SpecwireErrors
 */
export function ensureSpecwireError(
  error: unknown,
  defaultCode: ErrorCode = 'SPECWIRE_X900'
): SpecwireError {
  if (SpecwireError.isSpecwireError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return SpecwireError.wrap(error, defaultCode);
  }

  return new SpecwireError({
    code: defaultCode,
    message: String(error),
  });
}
