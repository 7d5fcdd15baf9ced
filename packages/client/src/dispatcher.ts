/**
 * Dispatcher - the command/reply multiplexer.
 *
 * One dispatcher owns one transport. It is the only code that writes frames,
 * and its frame handler is the single receive loop of the connection.
 *
 * ```
 *  submit()/send() ──► serial ──► pending table ──► encode ──► transport
 *                                      ▲
 *  transport ──► decode ──► classify ──┤ reply / error: settle pending entry
 *                                      └ notification: registry callbacks
 * ```
 *
 * ## Guarantees
 *
 * - A serial number is never reused while its command is pending, so every
 *   caller sees only the reply to its own command.
 * - Inbound messages are handled strictly in arrival order. Each one is
 *   stamped with a `sequence` number reflecting that order.
 * - A failing notification callback is reported on {@link errors$} and the
 *   logger; it never stops the receive loop or the other callbacks.
 * - When the connection drops every pending command fails with
 *   {@link ConnectionLostError} and the dispatcher stays closed.
 *
 * @module dispatcher
 */

import { BehaviorSubject, Subject } from 'rxjs';
import {
  CommandFailedError,
  CommandTimeoutError,
  ConnectionLostError,
  ProtocolError,
  classifyMessage,
  decodeFrame,
  encodeMessage,
  messageText,
  resolveLogger,
  type Logger,
  type LoggerSetting,
  type OutboundCommand,
  type ReceivedMessage,
} from '@specwire/core';
import type { SubscriptionRegistry } from './subscription-registry.js';
import type { SpecTransport } from './transport/types.js';

export type DispatcherStatus = 'open' | 'closed';

/**
 * How a fire-and-forget command learns that it was accepted.
 *
 * - `on-error`: the server only answers on failure. The command counts as
 *   accepted once a reply to any later command arrives, since the server
 *   answers in command order.
 * - `never`: accepted once written.
 */
export type Acknowledgement = 'on-error' | 'never';

export interface SubmitOptions {
  /** Milliseconds to wait for the reply; `0` waits indefinitely */
  timeout?: number;
}

export interface SendOptions extends SubmitOptions {
  /** @default 'never' */
  acknowledge?: Acknowledgement;
}

export interface DispatcherConfig {
  /** Default reply timeout in milliseconds. @default 30000 */
  timeout?: number;
  /** Logger options for structured logging */
  logger?: LoggerSetting;
}

type Outcome = { ok: true; message: ReceivedMessage | null } | { ok: false; error: Error };

interface PendingCommand {
  readonly serial: number;
  readonly name: string;
  readonly issuedAt: number;
  readonly mode: 'reply' | 'on-error';
  readonly complete: (outcome: Outcome) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

const MAX_SERIAL = 0xffffffff;

export class Dispatcher {
  private readonly config: Required<Omit<DispatcherConfig, 'logger'>>;
  private readonly logger: Logger;
  private readonly pending = new Map<number, PendingCommand>();
  private lastSerial = 0;
  private sequence = 0;
  private terminalError: Error | null = null;

  private readonly statusSubject = new BehaviorSubject<DispatcherStatus>('open');
  private readonly errorSubject = new Subject<Error>();

  /** Connection state; `closed` is final */
  readonly status$ = this.statusSubject.asObservable();

  /** Side channel for failures that belong to no caller */
  readonly errors$ = this.errorSubject.asObservable();

  constructor(
    private readonly transport: SpecTransport,
    private readonly registry: SubscriptionRegistry,
    config: DispatcherConfig = {}
  ) {
    this.config = {
      timeout: config.timeout ?? 30000,
    };
    this.logger = resolveLogger(config.logger, 'Dispatcher');

    transport.onFrame((frame) => this.handleFrame(frame));
    transport.onError((error) => this.handleTransportError(error));
    transport.onDisconnect(() => this.fail(new ConnectionLostError('Server closed the connection')));
  }

  get isOpen(): boolean {
    return this.terminalError === null;
  }

  /** Number of commands waiting for their reply or acknowledgement */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Sequence number of the most recently received message */
  get lastSequence(): number {
    return this.sequence;
  }

  /**
   * Send a command and wait for its reply.
   *
   * @throws CommandFailedError if the server answers with an error
   * @throws CommandTimeoutError if no reply arrives within the timeout
   * @throws ConnectionLostError if the connection is or becomes closed
   */
  submit(command: OutboundCommand, options: SubmitOptions = {}): Promise<ReceivedMessage> {
    return new Promise((resolve, reject) => {
      this.enqueue(command, 'reply', options.timeout, (outcome) => {
        if (!outcome.ok) {
          reject(outcome.error);
        } else if (outcome.message) {
          resolve(outcome.message);
        } else {
          reject(new ProtocolError('Reply expected but command was settled without one'));
        }
      });
    });
  }

  /**
   * Send a command that gets no regular reply.
   *
   * @throws CommandFailedError if the server reports an error for it
   * @throws ConnectionLostError if the connection is or becomes closed
   */
  send(command: OutboundCommand, options: SendOptions = {}): Promise<void> {
    const acknowledge = options.acknowledge ?? 'never';
    return new Promise((resolve, reject) => {
      if (acknowledge === 'never') {
        const serial = this.write(command, reject);
        if (serial !== null) resolve();
        return;
      }
      this.enqueue(command, 'on-error', options.timeout, (outcome) => {
        if (outcome.ok) resolve();
        else reject(outcome.error);
      });
    });
  }

  /**
   * Close the dispatcher, failing everything still pending.
   */
  close(reason = 'Client disconnected'): void {
    this.fail(new ConnectionLostError(reason));
  }

  private enqueue(
    command: OutboundCommand,
    mode: PendingCommand['mode'],
    timeout: number | undefined,
    complete: (outcome: Outcome) => void
  ): void {
    if (this.terminalError) {
      complete({ ok: false, error: this.closedError() });
      return;
    }

    const serial = this.nextSerial();
    const entry: PendingCommand = {
      serial,
      name: command.name ?? '',
      issuedAt: Date.now(),
      mode,
      complete,
      timer: null,
    };

    const limit = timeout ?? this.config.timeout;
    if (limit > 0) {
      entry.timer = setTimeout(() => {
        if (this.pending.get(serial) !== entry) return;
        this.pending.delete(serial);
        this.logger.warn('Command timed out', { serial, name: entry.name, timeoutMs: limit });
        complete({ ok: false, error: new CommandTimeoutError(serial, limit, { name: entry.name }) });
      }, limit);
    }

    this.pending.set(serial, entry);
    this.write(command, (error) => {
      this.remove(entry);
      complete({ ok: false, error });
    }, serial);
  }

  /**
   * Encode and write a frame. Reports failure through `onError` and
   * returns the serial used, or `null` when nothing was written.
   */
  private write(
    command: OutboundCommand,
    onError: (error: Error) => void,
    serial: number = this.nextSerial()
  ): number | null {
    if (this.terminalError) {
      onError(this.closedError());
      return null;
    }

    let frame: Uint8Array;
    try {
      frame = encodeMessage(command, serial);
    } catch (error) {
      onError(error instanceof Error ? error : new ProtocolError(String(error)));
      return null;
    }

    try {
      this.transport.sendFrame(frame);
    } catch (error) {
      const lost =
        error instanceof ConnectionLostError
          ? error
          : new ConnectionLostError('Write failed', { serial }, error instanceof Error ? error : undefined);
      onError(lost);
      this.fail(lost);
      return null;
    }

    this.logger.debug('Sent command', { serial, command: command.command, name: command.name });
    return serial;
  }

  private nextSerial(): number {
    do {
      this.lastSerial = this.lastSerial >= MAX_SERIAL ? 1 : this.lastSerial + 1;
    } while (this.pending.has(this.lastSerial));
    return this.lastSerial;
  }

  private remove(entry: PendingCommand): void {
    if (entry.timer) clearTimeout(entry.timer);
    if (this.pending.get(entry.serial) === entry) {
      this.pending.delete(entry.serial);
    }
  }

  private handleFrame(frame: Uint8Array): void {
    let message: ReceivedMessage;
    try {
      message = { ...decodeFrame(frame), sequence: ++this.sequence };
    } catch (error) {
      this.reportProtocolError(error);
      return;
    }

    switch (classifyMessage(message)) {
      case 'reply':
        this.settle(message, { ok: true, message });
        break;
      case 'error': {
        const text = messageText(message);
        this.settle(message, {
          ok: false,
          error: new CommandFailedError(text || `Server reported error ${message.error}`, {
            serial: message.serial,
            name: message.name,
            error: message.error,
          }),
        });
        break;
      }
      case 'notification':
        this.deliver(message);
        break;
      case 'command':
        this.reportProtocolError(
          new ProtocolError(`Unexpected command ${message.command} from server`, {
            command: message.command,
            name: message.name,
          })
        );
        break;
    }
  }

  private settle(message: ReceivedMessage, outcome: Outcome): void {
    const entry = this.pending.get(message.serial);
    if (!entry) {
      this.logger.warn('Discarding reply for unknown or expired command', {
        serial: message.serial,
        name: message.name,
      });
      return;
    }

    // Silent commands issued before this one were processed without error.
    for (const earlier of [...this.pending.values()]) {
      if (earlier === entry) break;
      if (earlier.mode === 'on-error') {
        this.remove(earlier);
        earlier.complete({ ok: true, message: null });
      }
    }

    this.remove(entry);
    entry.complete(outcome);
  }

  private deliver(message: ReceivedMessage): void {
    for (const callback of this.registry.lookup(message.name)) {
      try {
        const result = callback(message);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportCallbackError(error, message));
        }
      } catch (error) {
        this.reportCallbackError(error, message);
      }
    }
  }

  private reportCallbackError(error: unknown, message: ReceivedMessage): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.logger.error('Subscriber callback failed', err, {
      name: message.name,
      sequence: message.sequence,
    });
    this.errorSubject.next(err);
  }

  private reportProtocolError(error: unknown): void {
    const err = error instanceof ProtocolError ? error : new ProtocolError(String(error));
    this.logger.warn('Discarding malformed message', { code: err.code, reason: err.message });
    this.errorSubject.next(err);
  }

  private handleTransportError(error: Error): void {
    if (error instanceof ProtocolError) {
      this.reportProtocolError(error);
      return;
    }
    this.fail(new ConnectionLostError(`Connection failed: ${error.message}`, {}, error));
  }

  private closedError(): ConnectionLostError {
    return new ConnectionLostError(
      'Connection is closed',
      {},
      this.terminalError ?? undefined
    );
  }

  private fail(error: Error): void {
    if (this.terminalError) return;
    this.terminalError = error;

    const abandoned = [...this.pending.values()];
    this.pending.clear();
    if (abandoned.length > 0) {
      this.logger.warn('Failing pending commands', { count: abandoned.length, reason: error.message });
    } else {
      this.logger.info('Connection closed', { reason: error.message });
    }
    for (const entry of abandoned) {
      if (entry.timer) clearTimeout(entry.timer);
      entry.complete({ ok: false, error });
    }

    this.statusSubject.next('closed');
    this.errorSubject.complete();
  }
}
