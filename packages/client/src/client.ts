import { Observable, ReplaySubject, Subject, firstValueFrom, of, timeout } from 'rxjs';
import {
  CommandFailedError,
  EventType,
  bindConnection,
  decodeValue,
  encodeText,
  encodeValue,
  messageText,
  resolveLogger,
  type DataType,
  type EncodedValue,
  type Logger,
  type LoggerSetting,
  type ReceivedMessage,
  type ValueOf,
} from '@specwire/core';
import { ArrayVar, StringArrayVar, type ArrayVarOptions } from './array-var.js';
import { Dispatcher, type DispatcherStatus, type SubmitOptions } from './dispatcher.js';
import { Motor } from './motor.js';
import {
  SubscriptionRegistry,
  type NotificationCallback,
  type SubscriptionHandle,
} from './subscription-registry.js';
import { createTcpTransport } from './transport/tcp.js';
import type { SpecTransport, TransportConfig } from './transport/types.js';
import type { PropertyChannel, RunResult } from './types.js';
import { Var } from './var.js';

/**
 * Client configuration
 */
export interface ClientConfig extends TransportConfig {
  /** Default reply timeout in milliseconds; `0` waits indefinitely. @default 30000 */
  timeout?: number;
  /** Motor move timeout in milliseconds; `0` waits indefinitely. @default 0 */
  motionTimeout?: number;
  /** Characters of console output kept for {@link Client.run}. @default 10000 */
  maxConsoleOutput?: number;
  /**
   * Milliseconds a new subscription waits for the server to either send the
   * property or report an error; `0` returns as soon as the request is
   * written. @default 1000
   */
  registerTimeout?: number;
  /** Name announced in the handshake. @default 'specwire' */
  clientName?: string;
  /** Logger options for structured logging */
  logger?: LoggerSetting;
  /** Transport to use instead of TCP to `host:port` */
  transport?: SpecTransport;
}

/** Progress callback of {@link Client.count} */
export type CountCallback = (values: Record<string, number>) => void;

interface ConsoleLine {
  sequence: number;
  text: string;
}

const CONSOLE_PROPERTY = 'output/tty';
const ERROR_PROPERTY = 'error';
const NO_ERROR = 'No error';
/** A bare prompt such as `FOURC> ` or `12.FOURC> ` */
const PROMPT = /^(?:\d+\.)?[A-Za-z_]\w*> ?$/;

/**
 * Connection to one server.
 *
 * @example
 * ```typescript
 * const client = await Client.connect({ host: 'beamline-7', port: 6510 });
 *
 * const { output } = await client.run('wa');
 * console.log(output);
 *
 * const counts = await client.count(1);
 * await client.disconnect();
 * ```
 */
export class Client implements PropertyChannel {
  private readonly config: Required<
    Pick<ClientConfig, 'timeout' | 'motionTimeout' | 'maxConsoleOutput' | 'registerTimeout' | 'clientName'>
  >;
  private readonly logger: Logger;
  private readonly registry = new SubscriptionRegistry();
  private readonly dispatcher: Dispatcher;
  private readonly consoleLines: ConsoleLine[] = [];
  private consoleLength = 0;
  private readonly serverErrors = new Subject<string>();
  private registering: Promise<unknown> = Promise.resolve();
  private counters: Map<string, string> | null = null;
  private name = '';

  private constructor(
    private readonly transport: SpecTransport,
    config: ClientConfig
  ) {
    this.config = {
      timeout: config.timeout ?? 30000,
      motionTimeout: config.motionTimeout ?? 0,
      maxConsoleOutput: config.maxConsoleOutput ?? 10000,
      registerTimeout: config.registerTimeout ?? 1000,
      clientName: config.clientName ?? 'specwire',
    };
    const logger = config.transport
      ? config.logger
      : bindConnection(config.logger, `${config.host ?? 'localhost'}:${config.port ?? 6510}`);
    this.logger = resolveLogger(logger, 'Client');
    this.dispatcher = new Dispatcher(transport, this.registry, {
      timeout: this.config.timeout,
      logger,
    });
  }

  /**
   * Connect, perform the handshake and start capturing console output.
   *
   * @throws ConnectionError if the server cannot be reached
   */
  static async connect(config: ClientConfig = {}): Promise<Client> {
    const transport = config.transport ?? createTcpTransport(config);
    const client = new Client(transport, config);

    await transport.connect();
    try {
      await client.handshake();
    } catch (error) {
      await client.disconnect();
      throw error;
    }
    return client;
  }

  /** Name the server reported in the handshake */
  get serverName(): string {
    return this.name;
  }

  get isConnected(): boolean {
    return this.dispatcher.isOpen;
  }

  get status$(): Observable<DispatcherStatus> {
    return this.dispatcher.status$;
  }

  /** Failures that belong to no caller, such as a throwing subscriber */
  get errors$(): Observable<Error> {
    return this.dispatcher.errors$;
  }

  /**
   * Run a command and wait for it to finish.
   *
   * @throws CommandFailedError carrying the console output if the command fails
   */
  async run(command: string, options: SubmitOptions = {}): Promise<RunResult> {
    const from = this.dispatcher.lastSequence;
    let reply: ReceivedMessage;
    try {
      reply = await this.dispatcher.submit(
        { command: EventType.FUNC_WITH_RETURN, ...encodeValue(`${command}\n`, 'string') },
        options
      );
    } catch (error) {
      if (error instanceof CommandFailedError) {
        throw new CommandFailedError(
          error.message,
          { ...error.context, command },
          this.consoleBetween(from, this.dispatcher.lastSequence + 1)
        );
      }
      throw error;
    }

    return {
      reply,
      value: messageText(reply),
      output: this.consoleBetween(from, reply.sequence),
    };
  }

  /**
   * Start a command without waiting for it.
   */
  async runDetached(command: string): Promise<void> {
    await this.dispatcher.send({ command: EventType.FUNC, body: encodeText(`${command}\n`) });
  }

  /** Stop whatever the server is running */
  async abort(): Promise<void> {
    await this.dispatcher.send({ command: EventType.ABORT });
  }

  async get(property: string, options: SubmitOptions = {}): Promise<ReceivedMessage> {
    return this.dispatcher.submit({ command: EventType.CHAN_READ, name: property }, options);
  }

  /**
   * Set a property. Without `dataType` the value is sent as text.
   */
  async set(property: string, value: string | number): Promise<void>;
  async set<D extends DataType>(property: string, value: ValueOf[D], dataType: D): Promise<void>;
  async set(property: string, value: unknown, dataType?: DataType): Promise<void> {
    const encoded =
      dataType === undefined ? encodeValue(String(value), 'string') : encodeValue(value, dataType);
    await this.write(property, encoded);
  }

  /**
   * Write a property, then read it back so the returned promise settles
   * only once the server has applied the write.
   */
  async write(property: string, value: EncodedValue): Promise<ReceivedMessage> {
    const sent = this.dispatcher.send(
      { command: EventType.CHAN_SEND, name: property, ...value },
      { acknowledge: 'on-error' }
    );
    const barrier = this.dispatcher.submit({ command: EventType.CHAN_READ, name: property });
    const [, ack] = await Promise.all([sent, barrier]);
    return ack;
  }

  /**
   * A cached server variable.
   */
  var(name: string): Var<'string'>;
  var<D extends DataType>(name: string, dataType: D): Var<D>;
  var(name: string, dataType: DataType = 'string'): Var<DataType> {
    return new Var(this, `var/${name}`, dataType, name, { logger: this.logger });
  }

  /**
   * A numeric array variable. Reads the array once unless `shape` is given.
   */
  arrayVar(name: string, options: ArrayVarOptions = {}): Promise<ArrayVar> {
    return ArrayVar.open(this, name, { logger: this.logger, ...options });
  }

  stringArrayVar(name: string): Promise<StringArrayVar> {
    return StringArrayVar.open(this, name, { logger: this.logger });
  }

  /**
   * @throws CommandFailedError if the motor is unknown or unusable
   */
  motor(mnemonic: string): Promise<Motor> {
    return Motor.open(this, mnemonic, {
      motionTimeout: this.config.motionTimeout,
      logger: this.logger,
    });
  }

  /** Names of all configured motors */
  async motors(): Promise<string[]> {
    const table = decodeValue(await this.get('var/A'), 'assoc');
    const names: string[] = [];
    for (const index of Object.keys(table)) {
      names.push((await this.run(`motor_name(${index})`)).value);
    }
    return names;
  }

  /**
   * Counter mnemonics mapped to their names.
   *
   * @param refresh - query the server even if the names are known
   */
  async counterNames(refresh = false): Promise<Map<string, string>> {
    if (this.counters && !refresh) {
      return this.counters;
    }
    const count = decodeValue(await this.get('var/COUNTERS'), 'int');
    const counters = new Map<string, string>();
    for (let i = 0; i < count; i++) {
      const mnemonic = (await this.run(`cnt_mne(${i})`)).value;
      counters.set(mnemonic, (await this.run(`cnt_name(${i})`)).value);
    }
    this.counters = counters;
    return counters;
  }

  /**
   * Count for `seconds` and return the final counter values.
   */
  async count(seconds: number, onUpdate?: CountCallback): Promise<Record<string, number>> {
    const mnemonics = [...(await this.counterNames()).keys()];
    const values: Record<string, number> = Object.fromEntries(mnemonics.map((m) => [m, 0]));

    const update = (message: ReceivedMessage): void => {
      const mnemonic = message.name.split('/')[1] ?? '';
      values[mnemonic] = decodeValue(message, 'float');
      onUpdate?.({ ...values });
    };

    const handles: SubscriptionHandle[] = [];
    try {
      for (const mnemonic of mnemonics) {
        handles.push(await this.subscribe(`scaler/${mnemonic}/value`, update));
      }

      const timeout = this.config.timeout > 0 ? this.config.timeout + seconds * 1000 : 0;
      await this.run(`count ${seconds}`, { timeout });

      // Final values, in case the last notification has not arrived yet
      for (const mnemonic of mnemonics) {
        update(await this.get(`scaler/${mnemonic}/value`));
      }
    } finally {
      for (const handle of handles) {
        await this.unsubscribe(handle);
      }
    }
    return values;
  }

  /** Stop a running count */
  async stopCounting(): Promise<void> {
    await this.set('scaler/.all./count', 0);
  }

  /**
   * Receive change notifications for a property. The server is asked for
   * notifications when the first local subscriber appears; the call then
   * waits up to `registerTimeout` ms for the property's value or an error
   * report.
   *
   * @throws CommandFailedError if the server reports an error for the registration
   */
  async subscribe(property: string, callback: NotificationCallback): Promise<SubscriptionHandle> {
    const handle = this.registry.subscribe(property, callback);
    if (this.registry.count(property) === 1) {
      try {
        await this.register(property, this.config.registerTimeout);
      } catch (error) {
        this.registry.unsubscribe(handle);
        throw error;
      }
    }
    return handle;
  }

  /**
   * Remove a subscription. The server stops sending notifications once the
   * last local subscriber is gone.
   */
  async unsubscribe(handle: SubscriptionHandle): Promise<boolean> {
    const removed = this.registry.unsubscribe(handle);
    if (removed && this.registry.count(handle.name) === 0 && this.dispatcher.isOpen) {
      await this.dispatcher.send({ command: EventType.UNREGISTER, name: handle.name });
    }
    return removed;
  }

  /**
   * Notifications for a property as an Observable. Subscribing registers,
   * unsubscribing unregisters.
   */
  observe(property: string): Observable<ReceivedMessage> {
    return new Observable<ReceivedMessage>((subscriber) => {
      let handle: SubscriptionHandle | null = null;
      let active = true;

      const release = (h: SubscriptionHandle): void => {
        this.unsubscribe(h).catch((error: unknown) => {
          this.logger.warn('Failed to unsubscribe', {
            property,
            reason: error instanceof Error ? error.message : String(error),
          });
        });
      };

      this.subscribe(property, (message) => subscriber.next(message)).then(
        (h) => {
          if (active) handle = h;
          else release(h);
        },
        (error: unknown) => subscriber.error(error)
      );

      return () => {
        active = false;
        if (handle) release(handle);
      };
    });
  }

  /**
   * Close the connection. Pending commands fail with ConnectionLostError.
   */
  async disconnect(): Promise<void> {
    if (this.dispatcher.isOpen && this.transport.isConnected()) {
      await this.dispatcher.send({ command: EventType.CLOSE });
    }
    this.dispatcher.close();
    this.registry.clear();
    this.serverErrors.complete();
    await this.transport.disconnect();
    this.logger.info('Disconnected');
  }

  private async handshake(): Promise<void> {
    const reply = await this.dispatcher.submit({
      command: EventType.HELLO,
      name: this.config.clientName,
    });
    this.name = reply.name;
    this.logger.info('Connected', { server: this.name });

    this.registry.subscribe(ERROR_PROPERTY, (message) => {
      const text = messageText(message);
      if (text && text !== NO_ERROR) this.serverErrors.next(text);
    });
    this.registry.subscribe(CONSOLE_PROPERTY, (message) => this.captureConsole(message));
    // Neither property has a value to wait for
    await this.register(ERROR_PROPERTY, 0);
    await this.register(CONSOLE_PROPERTY, 0);
  }

  /** Registrations run one at a time so an error report names the right property */
  private register(property: string, wait: number): Promise<void> {
    const next = this.registering.then(() => this.registerNow(property, wait));
    this.registering = next.catch(() => undefined);
    return next;
  }

  private async registerNow(property: string, wait: number): Promise<void> {
    if (wait <= 0) {
      await this.dispatcher.send({ command: EventType.REGISTER, name: property });
      return;
    }

    const outcome = new ReplaySubject<Error | null>(1);
    const accepted = this.registry.subscribe(property, () => outcome.next(null));
    const rejected = this.serverErrors.subscribe((text) =>
      outcome.next(new CommandFailedError(text, { property }))
    );
    try {
      await this.dispatcher.send({ command: EventType.REGISTER, name: property });
      // Silence means the server accepted it without sending a value
      const failure = await firstValueFrom(outcome.pipe(timeout({ first: wait, with: () => of(null) })));
      if (failure) {
        this.logger.warn('Registration refused', { name: property, reason: failure.message });
        throw failure;
      }
    } finally {
      this.registry.unsubscribe(accepted);
      rejected.unsubscribe();
    }
  }

  private captureConsole(message: ReceivedMessage): void {
    const text = messageText(message)
      .split(/(?<=\n)/)
      .filter((line) => !PROMPT.test(line.replace(/\n$/, '')))
      .join('');
    if (!text) return;
    this.consoleLines.push({ sequence: message.sequence, text });
    this.consoleLength += text.length;

    while (this.consoleLength > this.config.maxConsoleOutput && this.consoleLines.length > 1) {
      const dropped = this.consoleLines.shift();
      this.consoleLength -= dropped?.text.length ?? 0;
    }
  }

  /** Console text received strictly between two sequence numbers */
  private consoleBetween(after: number, before: number): string {
    return this.consoleLines
      .filter((line) => line.sequence > after && line.sequence < before)
      .map((line) => line.text)
      .join('');
  }
}

/**
 * Connects a client to the server described by `config`.
 */
export function createClient(config: ClientConfig = {}): Promise<Client> {
  return Client.connect(config);
}
