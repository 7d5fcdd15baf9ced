/**
 * SubscriptionRegistry - property name → ordered callbacks
 *
 * Registrations for one name fire in the order they were made. Every
 * registration is independent: registering the same callback twice makes it
 * fire twice, and removing one handle leaves the others untouched.
 */

import type { ReceivedMessage } from '@specwire/core';

/**
 * Callback receiving property-change notifications. A returned promise is
 * not awaited, but a rejection is reported like a thrown error.
 */
export type NotificationCallback = (message: ReceivedMessage) => void | Promise<void>;

/**
 * Opaque handle returned by {@link SubscriptionRegistry.subscribe}.
 */
export interface SubscriptionHandle {
  readonly id: number;
  readonly name: string;
}

interface Registration {
  readonly handle: SubscriptionHandle;
  readonly callback: NotificationCallback;
}

export class SubscriptionRegistry {
  private readonly byName = new Map<string, Registration[]>();
  private nextId = 1;

  /**
   * Add a callback for `name`.
   */
  subscribe(name: string, callback: NotificationCallback): SubscriptionHandle {
    const handle: SubscriptionHandle = { id: this.nextId++, name };
    const registrations = this.byName.get(name);
    if (registrations) {
      registrations.push({ handle, callback });
    } else {
      this.byName.set(name, [{ handle, callback }]);
    }
    return handle;
  }

  /**
   * Remove one registration.
   *
   * @returns `true` if the handle was registered
   */
  unsubscribe(handle: SubscriptionHandle): boolean {
    const registrations = this.byName.get(handle.name);
    if (!registrations) return false;

    const index = registrations.findIndex((r) => r.handle.id === handle.id);
    if (index === -1) return false;

    registrations.splice(index, 1);
    if (registrations.length === 0) {
      this.byName.delete(handle.name);
    }
    return true;
  }

  /**
   * Snapshot of the callbacks for `name`, in registration order. Changes
   * made while the snapshot is being delivered do not affect it.
   */
  lookup(name: string): NotificationCallback[] {
    return (this.byName.get(name) ?? []).map((r) => r.callback);
  }

  count(name: string): number {
    return this.byName.get(name)?.length ?? 0;
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  clear(): void {
    this.byName.clear();
  }
}
