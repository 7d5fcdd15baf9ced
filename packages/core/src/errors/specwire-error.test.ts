import { describe, expect, it } from 'vitest';
import { getErrorCategory } from './error-codes.js';
import {
  CommandFailedError,
  CommandTimeoutError,
  ConnectionLostError,
  IndexOutOfRangeError,
  ReadOnlyPropertyError,
  SpecwireError,
  TypeMismatchError,
  ensureSpecwireError,
} from './specwire-error.js';

describe('SpecwireError', () => {
  it('should take message and suggestion from the code', () => {
    const error = SpecwireError.fromCode('SPECWIRE_C501');

    expect(error.message).toBe('Connection lost');
    expect(error.suggestion).toBe('Create a new client to reconnect.');
    expect(error.category).toBe('connection');
  });

  it('should format code, context and suggestion', () => {
    const error = new SpecwireError({
      code: 'SPECWIRE_R400',
      message: 'Unknown command',
      context: { serial: 3 },
    });

    expect(error.format()).toBe(
      [
        '[SPECWIRE_R400] Unknown command',
        'Context: {"serial":3}',
        'Suggestion: Inspect the server message and console output attached to the error.',
      ].join('\n')
    );
  });

  it('should serialize its cause', () => {
    const cause = new Error('socket hang up');
    const json = new ConnectionLostError('Connection failed', {}, cause).toJSON();

    expect(json.code).toBe('SPECWIRE_C501');
    expect(json.cause).toMatchObject({ name: 'Error', message: 'socket hang up' });
  });

  it('should match by code and category', () => {
    const error = new CommandTimeoutError(12, 500);

    expect(SpecwireError.isCode(error, 'SPECWIRE_C502')).toBe(true);
    expect(SpecwireError.isCategory(error, 'connection')).toBe(true);
    expect(SpecwireError.isSpecwireError(new Error('plain'))).toBe(false);
  });

  it('should wrap foreign errors', () => {
    const wrapped = ensureSpecwireError(new Error('boom'));

    expect(wrapped.code).toBe('SPECWIRE_X900');
    expect(wrapped.message).toBe('boom');
    expect(ensureSpecwireError('text').message).toBe('text');
  });
});

describe('error subclasses', () => {
  it('should describe timeouts', () => {
    const error = new CommandTimeoutError(12, 500);

    expect(error.message).toBe('Command 12 timed out after 500ms');
    expect(error.serial).toBe(12);
    expect(error.context).toEqual({ serial: 12, timeoutMs: 500 });
  });

  it('should describe type mismatches', () => {
    const error = new TypeMismatchError('int', 'STRING');

    expect(error.message).toBe('Expected int but got STRING');
    expect(error.category).toBe('type');
  });

  it('should describe index errors', () => {
    const error = new IndexOutOfRangeError([3, 0], [2, 2]);

    expect(error.message).toBe('Index [3, 0] is out of range for shape (2, 2)');
    expect(error.category).toBe('index');
  });

  it('should carry console output on command failures', () => {
    const error = new CommandFailedError('Syntax error', {}, 'line 1\n');

    expect(error.output).toBe('line 1\n');
    expect(error.category).toBe('remote');
  });

  it('should name the read-only property', () => {
    expect(new ReadOnlyPropertyError('motor/tth/sign').message).toBe(
      'Property "motor/tth/sign" is read-only'
    );
  });
});

describe('getErrorCategory', () => {
  it('should map the category letter', () => {
    expect(getErrorCategory('SPECWIRE_P100')).toBe('protocol');
    expect(getErrorCategory('SPECWIRE_T200')).toBe('type');
    expect(getErrorCategory('SPECWIRE_I300')).toBe('index');
    expect(getErrorCategory('SPECWIRE_X900')).toBe('internal');
  });
});
