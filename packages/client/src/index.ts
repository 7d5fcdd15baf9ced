/**
 * @specwire/client - client for the instrument-control server protocol
 *
 * ## Architecture
 *
 * ```
 *   Client ── Var / ArrayVar / Motor
 *     │
 *     ├── SubscriptionRegistry   (property name → callbacks)
 *     │
 *     └── Dispatcher             (serials, pending replies, receive loop)
 *           │
 *           └── SpecTransport    (TCP, whole frames)
 * ```
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createClient } from '@specwire/client';
 *
 * const client = await createClient({ host: 'beamline-7', port: 6510 });
 *
 * const energy = client.var('ENERGY', 'float');
 * await energy.write(8.04);
 *
 * const tth = await client.motor('tth');
 * await tth.moveTo(20);
 *
 * await client.disconnect();
 * ```
 *
 * @packageDocumentation
 * @module @specwire/client
 */

export {
  ArrayRow,
  ArrayVar,
  StringArrayVar,
  quoteString,
  type ArrayShape,
  type ArrayVarOptions,
} from './array-var.js';
export { Client, createClient, type ClientConfig, type CountCallback } from './client.js';
export {
  Dispatcher,
  type Acknowledgement,
  type DispatcherConfig,
  type DispatcherStatus,
  type SendOptions,
  type SubmitOptions,
} from './dispatcher.js';
export { MOTOR_PROPERTIES, Motor, type MotorOptions, type MotorProperty } from './motor.js';
export {
  SubscriptionRegistry,
  type NotificationCallback,
  type SubscriptionHandle,
} from './subscription-registry.js';
export * from './transport/index.js';
export type { PropertyChannel, RunResult } from './types.js';
export { Var, type VarOptions } from './var.js';
