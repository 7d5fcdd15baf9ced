import {
  ReplaySubject,
  filter,
  firstValueFrom,
  map,
  merge,
  mergeMap,
  throwError,
  timeout,
  type Observable,
} from 'rxjs';
import {
  CommandFailedError,
  CommandTimeoutError,
  ConnectionLostError,
  ReadOnlyPropertyError,
  TypeMismatchError,
  decodeValue,
  isDeleted,
  resolveLogger,
  type Logger,
  type LoggerSetting,
  type ReceivedMessage,
} from '@specwire/core';
import type { NotificationCallback, SubscriptionHandle } from './subscription-registry.js';
import type { PropertyChannel } from './types.js';
import { Var } from './var.js';

interface MotorPropertySpec {
  readonly dataType: 'int' | 'float';
  readonly readonly: boolean;
}

/**
 * Properties the server exposes under `motor/<mnemonic>/`.
 */
export const MOTOR_PROPERTIES = {
  position: { dataType: 'float', readonly: false },
  dial_position: { dataType: 'float', readonly: false },
  offset: { dataType: 'float', readonly: false },
  step_size: { dataType: 'float', readonly: false },
  sign: { dataType: 'int', readonly: true },
  base_rate: { dataType: 'float', readonly: false },
  slew_rate: { dataType: 'float', readonly: false },
  acceleration: { dataType: 'float', readonly: false },
  backlash: { dataType: 'float', readonly: false },
  high_limit: { dataType: 'float', readonly: false },
  low_limit: { dataType: 'float', readonly: false },
  move_done: { dataType: 'int', readonly: true },
  high_lim_hit: { dataType: 'int', readonly: true },
  low_lim_hit: { dataType: 'int', readonly: true },
  emergency_stop: { dataType: 'int', readonly: true },
  motor_fault: { dataType: 'int', readonly: true },
  unusable: { dataType: 'int', readonly: true },
} as const satisfies Record<string, MotorPropertySpec>;

export type MotorProperty = keyof typeof MOTOR_PROPERTIES;

export interface MotorOptions {
  /** Milliseconds to wait for a move to finish; `0` waits indefinitely. @default 0 */
  motionTimeout?: number;
  logger?: LoggerSetting;
}

function isMotorProperty(name: string): name is MotorProperty {
  return Object.prototype.hasOwnProperty.call(MOTOR_PROPERTIES, name);
}

/**
 * A motor on the server, addressed by its mnemonic.
 *
 * The position is subscribed for the lifetime of the object, so
 * `motor.position.cached` always reflects the last reported position.
 *
 * @example
 * ```typescript
 * const tth = await client.motor('tth');
 * await tth.moveTo(12.5);
 * await tth.move(-0.5);
 * console.log(await tth.position.read()); // 12
 * ```
 */
export class Motor {
  readonly position: Var<'float'>;
  readonly stepSize: Var<'float'>;

  private readonly motionTimeout: number;
  private readonly logger: Logger;
  private readonly properties = new Map<MotorProperty, Var<'int' | 'float'>>();

  private constructor(
    private readonly channel: PropertyChannel,
    readonly mnemonic: string,
    options: MotorOptions
  ) {
    this.motionTimeout = options.motionTimeout ?? 0;
    this.logger = resolveLogger(options.logger, 'Motor');

    this.position = new Var(channel, this.path('position'), 'float', 'position', options);
    this.stepSize = new Var(channel, this.path('step_size'), 'float', 'step_size', options);
    this.properties.set('position', this.position);
    this.properties.set('step_size', this.stepSize);
  }

  /**
   * Look up a motor and start following its position.
   *
   * @throws CommandFailedError if the motor is unusable or unknown
   */
  static async open(channel: PropertyChannel, mnemonic: string, options: MotorOptions = {}): Promise<Motor> {
    const motor = new Motor(channel, mnemonic, options);

    const unusable = decodeValue(await channel.get(motor.path('unusable')), 'int');
    if (unusable !== 0) {
      throw new CommandFailedError(`Motor "${mnemonic}" is unusable`, { mnemonic });
    }

    await motor.position.attach();
    return motor;
  }

  /**
   * Read one motor property.
   */
  async read(property: MotorProperty): Promise<number> {
    return this.property(property).read();
  }

  /**
   * Write one motor property.
   *
   * @throws ReadOnlyPropertyError for status properties such as `move_done`
   */
  async write(property: MotorProperty, value: number): Promise<void> {
    const variable = this.property(property);
    if (MOTOR_PROPERTIES[property].readonly) {
      throw new ReadOnlyPropertyError(this.path(property));
    }
    await variable.write(value);
  }

  /**
   * Whether the motor is currently moving.
   */
  async isMoving(): Promise<boolean> {
    const message = await this.channel.get(this.path('move_done'));
    return decodeValue(message, 'int') !== 0;
  }

  /**
   * Receive notifications for a motor property.
   */
  subscribe(property: MotorProperty, callback: NotificationCallback): Promise<SubscriptionHandle> {
    return this.channel.subscribe(this.path(property), callback);
  }

  unsubscribe(handle: SubscriptionHandle): Promise<boolean> {
    return this.channel.unsubscribe(handle);
  }

  /**
   * Move to an absolute position and wait until the motor has stopped.
   *
   * @returns the position reported after the move
   * @throws CommandFailedError if the server refuses the move
   * @throws CommandTimeoutError if the motion outlasts `motionTimeout`
   */
  async moveTo(target: number): Promise<number> {
    if (!Number.isFinite(target)) {
      throw new TypeMismatchError('finite number', String(target), { mnemonic: this.mnemonic });
    }

    // Subscribe before starting so no completion event can be missed.
    const events = new ReplaySubject<ReceivedMessage>();
    const handle = await this.channel.subscribe(this.path('move_done'), (message) => events.next(message));

    try {
      this.logger.debug('Moving', { mnemonic: this.mnemonic, target });
      const result = await this.channel.run(
        `{get_angles;A[${this.mnemonic}]=${target};move_em;}`
      );

      const status = await this.channel.get(this.path('move_done'));
      if (decodeValue(status, 'int') !== 0) {
        await this.settled(events, status.sequence, result.reply.serial);
      }
      return await this.position.refresh();
    } finally {
      events.complete();
      await this.channel.unsubscribe(handle);
    }
  }

  /**
   * Move by `delta` relative to the current position.
   */
  async move(delta: number): Promise<number> {
    const current = await this.position.read();
    return this.moveTo(current + delta);
  }

  /**
   * Stop following the motor's properties.
   */
  async close(): Promise<void> {
    await Promise.all([...this.properties.values()].map((v) => v.close()));
  }

  private path(property: MotorProperty): string {
    return `motor/${this.mnemonic}/${property}`;
  }

  private property(name: MotorProperty): Var<'int' | 'float'> {
    if (!isMotorProperty(name)) {
      throw new CommandFailedError(`Unknown motor property "${String(name)}"`, { mnemonic: this.mnemonic });
    }
    let variable = this.properties.get(name);
    if (!variable) {
      variable = new Var<'int' | 'float'>(
        this.channel,
        this.path(name),
        MOTOR_PROPERTIES[name].dataType,
        name,
        { logger: this.logger }
      );
      this.properties.set(name, variable);
    }
    return variable;
  }

  /**
   * Wait for a `move_done` event reporting 0 that arrived after `after`.
   */
  private settled(events: Observable<ReceivedMessage>, after: number, serial: number): Promise<undefined> {
    const done$ = events.pipe(
      filter((message) => message.sequence > after && !isDeleted(message)),
      filter((message) => decodeValue(message, 'int') === 0)
    );
    const lost$ = this.channel.status$.pipe(
      filter((status) => status === 'closed'),
      mergeMap(() => throwError(() => new ConnectionLostError('Connection lost while moving')))
    );

    let wait$ = merge(done$, lost$).pipe(map(() => undefined));
    if (this.motionTimeout > 0) {
      const limit = this.motionTimeout;
      wait$ = wait$.pipe(
        timeout({
          first: limit,
          with: () => throwError(() => new CommandTimeoutError(serial, limit, { mnemonic: this.mnemonic })),
        })
      );
    }
    return firstValueFrom(wait$);
  }
}
