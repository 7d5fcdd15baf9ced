import { BehaviorSubject, type Observable } from 'rxjs';
import {
  decodeValue,
  encodeValue,
  isDeleted,
  resolveLogger,
  type DataType,
  type EncodeOptions,
  type Logger,
  type LoggerSetting,
  type ReceivedMessage,
  type ValueOf,
} from '@specwire/core';
import type { NotificationCallback, SubscriptionHandle } from './subscription-registry.js';
import type { PropertyChannel } from './types.js';

export interface VarOptions {
  logger?: LoggerSetting;
}

interface CacheEntry<T> {
  value: T;
}

/**
 * A typed, cached view of one server property.
 *
 * The first {@link read} fetches the value and then subscribes to change
 * notifications, so later reads are served from the cache for as long as
 * the server keeps it current. A deletion notification, or a notification
 * whose payload does not fit the declared type, empties the cache and the
 * next read goes back to the server.
 *
 * Every cache update is tagged with the sequence number of the message it
 * came from; an update older than the current one is ignored. This keeps a
 * slow read from overwriting a newer notification.
 *
 * @typeParam D - Declared data type
 *
 * @example
 * ```typescript
 * const counter = client.var('scan_count', 'int');
 * await counter.write(3);
 * console.log(await counter.read()); // 3, from the cache
 *
 * counter.value$.subscribe((value) => console.log('now', value));
 * ```
 */
export class Var<D extends DataType = DataType> {
  protected readonly logger: Logger;
  /** Wire type of the last payload accepted into the cache */
  protected lastWireType: number | undefined;

  private entry: CacheEntry<ValueOf[D]> | null = null;
  private watermark = 0;
  private fetching: Promise<ValueOf[D]> | null = null;
  private attaching: Promise<void> | null = null;
  private handle: SubscriptionHandle | null = null;
  private closed = false;
  private readonly valueSubject = new BehaviorSubject<ValueOf[D] | undefined>(undefined);

  constructor(
    protected readonly channel: PropertyChannel,
    readonly property: string,
    readonly dataType: D,
    readonly name: string = property,
    options: VarOptions = {}
  ) {
    this.logger = resolveLogger(options.logger, 'Var');
  }

  /** The cached value, if any */
  get cached(): ValueOf[D] | undefined {
    return this.entry?.value;
  }

  get isCached(): boolean {
    return this.entry !== null;
  }

  /** Whether change notifications are being received */
  get isAttached(): boolean {
    return this.handle !== null;
  }

  /**
   * Cached value as it changes; `undefined` while nothing is cached.
   */
  get value$(): Observable<ValueOf[D] | undefined> {
    return this.valueSubject.asObservable();
  }

  /**
   * Current value. Served from the cache when possible; concurrent reads
   * with an empty cache share one server round trip.
   *
   * @throws TypeMismatchError if the server value does not fit the declared type
   */
  async read(): Promise<ValueOf[D]> {
    if (this.entry) {
      return this.entry.value;
    }
    if (!this.fetching) {
      this.fetching = this.fetch().finally(() => {
        this.fetching = null;
      });
    }
    return this.fetching;
  }

  /**
   * Fetch the value from the server, bypassing the cache.
   */
  async refresh(): Promise<ValueOf[D]> {
    return this.fetch();
  }

  /**
   * Write a value and wait until the server has applied it. The cache holds
   * the written value afterwards, and is kept current from then on.
   *
   * @throws TypeMismatchError before any I/O if `value` does not fit the declared type
   * @throws CommandFailedError if the server rejects the write
   */
  async write(value: ValueOf[D]): Promise<void> {
    const encoded = encodeValue(value, this.dataType, this.encodeOptions());
    const ack = await this.channel.write(this.property, encoded);
    this.store(value, ack.sequence);
    await this.attach();
  }

  /**
   * Start receiving change notifications. Idempotent.
   */
  async attach(): Promise<void> {
    if (this.handle || this.closed) {
      return;
    }
    if (!this.attaching) {
      this.attaching = this.subscribeSelf().finally(() => {
        this.attaching = null;
      });
    }
    return this.attaching;
  }

  /**
   * Receive the raw change notifications of the property, alongside the cache.
   */
  subscribe(callback: NotificationCallback): Promise<SubscriptionHandle> {
    return this.channel.subscribe(this.property, callback);
  }

  unsubscribe(handle: SubscriptionHandle): Promise<boolean> {
    return this.channel.unsubscribe(handle);
  }

  /** Drop the cached value */
  invalidate(): void {
    this.clear(this.watermark);
  }

  /**
   * Stop receiving notifications and drop the cache.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.entry = null;
    this.valueSubject.complete();

    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await this.channel.unsubscribe(handle);
    }
  }

  protected encodeOptions(): EncodeOptions {
    return {};
  }

  /**
   * Put a value in the cache unless a newer one is already there.
   *
   * @returns whether the value was stored
   */
  protected store(value: ValueOf[D], sequence: number): boolean {
    if (this.closed || sequence < this.watermark) {
      return false;
    }
    this.watermark = sequence;
    this.entry = { value };
    this.valueSubject.next(value);
    return true;
  }

  private async fetch(): Promise<ValueOf[D]> {
    const message = await this.channel.get(this.property);
    const value = decodeValue(message, this.dataType);
    this.lastWireType = message.dataType;
    this.store(value, message.sequence);
    await this.attach();
    return value;
  }

  private async subscribeSelf(): Promise<void> {
    const handle = await this.channel.subscribe(this.property, (message) =>
      this.handleNotification(message)
    );
    if (this.closed) {
      await this.channel.unsubscribe(handle);
      return;
    }
    this.handle = handle;
  }

  private handleNotification(message: ReceivedMessage): void {
    if (isDeleted(message)) {
      this.logger.debug('Property deleted', { property: this.property });
      this.clear(message.sequence);
      return;
    }

    let value: ValueOf[D];
    try {
      value = decodeValue(message, this.dataType);
    } catch (error) {
      this.clear(message.sequence);
      throw error;
    }
    this.lastWireType = message.dataType;
    this.store(value, message.sequence);
  }

  private clear(sequence: number): void {
    if (sequence < this.watermark || this.closed) {
      return;
    }
    this.watermark = sequence;
    if (this.entry) {
      this.entry = null;
      this.valueSubject.next(undefined);
    }
  }
}
