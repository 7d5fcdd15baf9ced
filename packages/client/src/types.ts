import type { Observable } from 'rxjs';
import type { EncodedValue, ReceivedMessage } from '@specwire/core';
import type { DispatcherStatus, SubmitOptions } from './dispatcher.js';
import type { NotificationCallback, SubscriptionHandle } from './subscription-registry.js';

/**
 * Result of running a command on the server.
 */
export interface RunResult {
  /** The reply message */
  reply: ReceivedMessage;
  /** Reply body as text */
  value: string;
  /** Console output produced while the command ran */
  output: string;
}

/**
 * The connection operations that variables and motors are built on.
 *
 * {@link Client} implements this; tests may substitute their own.
 */
export interface PropertyChannel {
  readonly status$: Observable<DispatcherStatus>;

  /** Read a property's current value from the server */
  get(property: string, options?: SubmitOptions): Promise<ReceivedMessage>;

  /**
   * Write a property and wait until the server has applied it.
   *
   * @returns the reply to the read-back that follows the write
   */
  write(property: string, value: EncodedValue): Promise<ReceivedMessage>;

  /** Run a command and wait for it to finish */
  run(command: string, options?: SubmitOptions): Promise<RunResult>;

  /** Receive change notifications for a property */
  subscribe(property: string, callback: NotificationCallback): Promise<SubscriptionHandle>;

  unsubscribe(handle: SubscriptionHandle): Promise<boolean>;
}
