/**
 * specwire error codes
 *
 * Error codes are structured as SPECWIRE_[CATEGORY][NUMBER]:
 * - P: Protocol errors (P100-P199)
 * - T: Type errors (T200-T299)
 * - I: Index errors (I300-I399)
 * - R: Remote command errors (R400-R499)
 * - C: Connection errors (C500-C599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Protocol errors (P100-P199)
  SPECWIRE_P100: {
    code: 'SPECWIRE_P100',
    message: 'Malformed message from server',
    suggestion: 'Check that the port belongs to an instrument-control server speaking protocol version 4.',
  },
  SPECWIRE_P101: {
    code: 'SPECWIRE_P101',
    message: 'Unsupported protocol version',
    suggestion: 'The server must speak protocol version 4 or newer.',
  },
  SPECWIRE_P102: {
    code: 'SPECWIRE_P102',
    message: 'Property name too long',
    suggestion: 'Property names are limited to 80 bytes on the wire.',
  },

  // Type errors (T200-T299)
  SPECWIRE_T200: {
    code: 'SPECWIRE_T200',
    message: 'Data type mismatch',
    suggestion: 'Declare the variable with the data type the server reports for it.',
  },

  // Index errors (I300-I399)
  SPECWIRE_I300: {
    code: 'SPECWIRE_I300',
    message: 'Index out of range',
    suggestion: 'Check the row and column against the array shape.',
  },

  // Remote command errors (R400-R499)
  SPECWIRE_R400: {
    code: 'SPECWIRE_R400',
    message: 'Command failed on the server',
    suggestion: 'Inspect the server message and console output attached to the error.',
  },
  SPECWIRE_R401: {
    code: 'SPECWIRE_R401',
    message: 'Property is read-only',
    suggestion: 'Only writable motor properties can be set.',
  },

  // Connection errors (C500-C599)
  SPECWIRE_C500: {
    code: 'SPECWIRE_C500',
    message: 'Could not connect to server',
    suggestion: 'Verify the host and port, and that the server is accepting connections.',
  },
  SPECWIRE_C501: {
    code: 'SPECWIRE_C501',
    message: 'Connection lost',
    suggestion: 'Create a new client to reconnect.',
  },
  SPECWIRE_C502: {
    code: 'SPECWIRE_C502',
    message: 'Command timed out',
    suggestion: 'Increase the timeout or check whether the server is busy.',
  },

  // Internal errors (X900-X999)
  SPECWIRE_X900: {
    code: 'SPECWIRE_X900',
    message: 'Internal error',
    suggestion: 'This is an unexpected error. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'protocol' | 'type' | 'index' | 'remote' | 'connection' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(9);
  switch (letter) {
    case 'P':
      return 'protocol';
    case 'T':
      return 'type';
    case 'I':
      return 'index';
    case 'R':
      return 'remote';
    case 'C':
      return 'connection';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
