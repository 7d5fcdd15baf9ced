import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  bindConnection,
  createLogger,
  formatLogEntry,
  noopLogger,
  resolveLogger,
  type LogEntry,
  type Logger,
} from './logger.js';

describe('createLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log levels', () => {
    it('should log at debug level when enabled', () => {
      const logger = createLogger({ level: 'debug', enabled: true });
      logger.debug('test message');
      expect(console.debug).toHaveBeenCalled();
    });

    it('should respect minimum log level', () => {
      const logger = createLogger({ level: 'warn', enabled: true });

      logger.debug('debug message');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(console.debug).not.toHaveBeenCalled();
      expect(console.info).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalled();
      expect(console.error).toHaveBeenCalled();
    });

    it('should prefix the context and the command serial', () => {
      const logger = createLogger({ enabled: true, context: 'Dispatcher' });
      logger.warn('late reply', { serial: 4 });

      const line = vi.mocked(console.warn).mock.calls[0]![0];
      expect(line).toMatch(/ WARN \[Dispatcher\] #4 late reply$/);
    });
  });

  describe('enabled flag', () => {
    it('should not log when disabled', () => {
      const logger = createLogger({ enabled: false });

      logger.info('test');
      logger.error('test');

      expect(console.info).not.toHaveBeenCalled();
      expect(console.error).not.toHaveBeenCalled();
    });
  });

  describe('custom handler', () => {
    it('should pass structured entries', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({
        enabled: true,
        context: 'Client',
        handler: (entry) => entries.push(entry),
      });

      const failure = new Error('boom');
      logger.info('connected', { server: 'fourc' });
      logger.error('callback failed', failure, { name: 'var/x' });

      expect(entries).toHaveLength(2);
      expect(entries[0]!.level).toBe('info');
      expect(entries[0]!.context).toBe('Client');
      expect(entries[0]!.data).toEqual({ server: 'fourc' });
      expect(entries[1]!.error).toBe(failure);
      expect(entries[1]!.data).toEqual({ name: 'var/x' });
    });
  });
});

describe('formatLogEntry', () => {
  const timestamp = Date.UTC(2024, 4, 1, 12);

  it('should lead with the server, the serial and the property', () => {
    const line = formatLogEntry({
      level: 'warn',
      message: 'Command timed out',
      timestamp,
      context: 'Dispatcher',
      connection: 'beamline-7:6510',
      data: { serial: 42, name: 'var/x', timeoutMs: 30000 },
    });

    expect(line).toBe(
      '2024-05-01T12:00:00.000Z WARN [Dispatcher@beamline-7:6510] #42 var/x Command timed out {"timeoutMs":30000}'
    );
  });

  it('should leave out what the entry lacks', () => {
    expect(formatLogEntry({ level: 'info', message: 'Disconnected', timestamp })).toBe(
      '2024-05-01T12:00:00.000Z INFO Disconnected'
    );
  });
});

describe('bindConnection', () => {
  it('should stamp the address on option loggers', () => {
    const entries: LogEntry[] = [];
    const setting = bindConnection({ enabled: true, handler: (e) => entries.push(e) }, 'localhost:6510');

    resolveLogger(setting, 'Client').info('Connected');

    expect(entries[0]!.connection).toBe('localhost:6510');
    expect(entries[0]!.context).toBe('Client');
  });

  it('should keep an address given explicitly', () => {
    const setting = bindConnection({ connection: 'fourc' }, 'localhost:6510');

    expect(setting).toEqual({ connection: 'fourc' });
  });

  it('should pass ready-made loggers and false through', () => {
    expect(bindConnection(noopLogger, 'localhost:6510')).toBe(noopLogger);
    expect(bindConnection(false, 'localhost:6510')).toBe(false);
  });
});

describe('noopLogger', () => {
  it('should not throw', () => {
    expect(() => {
      noopLogger.debug('test');
      noopLogger.error('test', new Error('x'));
    }).not.toThrow();
  });
});

describe('resolveLogger', () => {
  it('should silence output for false', () => {
    expect(resolveLogger(false, 'Var')).toBe(noopLogger);
  });

  it('should use a custom logger as is', () => {
    const custom: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    expect(resolveLogger(custom, 'Var')).toBe(custom);
  });

  it('should label loggers built from options', () => {
    const entries: LogEntry[] = [];
    const logger = resolveLogger({ enabled: true, handler: (e) => entries.push(e) }, 'Motor');

    logger.info('moving');

    expect(entries[0]!.context).toBe('Motor');
  });
});
