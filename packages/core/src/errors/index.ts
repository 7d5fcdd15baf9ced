/**
 * specwire error system
 *
 * Every failure surfaced by the protocol engine is a {@link SpecwireError}
 * with a stable code, a category and a suggestion.
 *
 * @example
 * ```typescript
 * import { SpecwireError, TypeMismatchError } from '@specwire/core';
 *
 * try {
 *   await counter.read();
 * } catch (error) {
 *   if (error instanceof TypeMismatchError) {
 *     console.log(`declared ${error.expected}, server sent ${error.actual}`);
 *   } else if (SpecwireError.isCategory(error, 'connection')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  CommandFailedError,
  CommandTimeoutError,
  ConnectionError,
  ConnectionLostError,
  IndexOutOfRangeError,
  ProtocolError,
  ReadOnlyPropertyError,
  SpecwireError,
  TypeMismatchError,
  ensureSpecwireError,
  type SerializedSpecwireError,
  type SpecwireErrorOptions,
} from './specwire-error.js';
