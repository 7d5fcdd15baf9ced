import { describe, expect, it } from 'vitest';
import {
  CommandFailedError,
  EventType,
  TypeMismatchError,
  WireType,
  encodeText,
} from '@specwire/core';
import { FakeSpecServer } from './__tests__/fake-server.js';
import { connect, flush } from './__tests__/helpers.js';

function reads(server: FakeSpecServer, property: string): number {
  return server.sent(EventType.CHAN_READ).filter((m) => m.name === property).length;
}

describe('Var', () => {
  describe('read', () => {
    it('should fetch once and then subscribe', async () => {
      const { server, client } = await connect();
      server.set('var/scan', 3);
      const scan = client.var('scan', 'int');

      expect(await scan.read()).toBe(3);
      expect(await scan.read()).toBe(3);

      expect(reads(server, 'var/scan')).toBe(1);
      expect(server.registered.has('var/scan')).toBe(true);
      expect(scan.isAttached).toBe(true);
    });

    it('should share one fetch between concurrent reads', async () => {
      const { server, client } = await connect();
      server.set('var/scan', 3);
      const scan = client.var('scan', 'int');

      const values = await Promise.all([scan.read(), scan.read(), scan.read()]);

      expect(values).toEqual([3, 3, 3]);
      expect(reads(server, 'var/scan')).toBe(1);
    });

    it('should follow notifications without asking the server', async () => {
      const { server, client } = await connect();
      server.set('var/scan', 3);
      const scan = client.var('scan', 'int');
      await scan.read();

      server.update('var/scan', 7);
      await flush();

      expect(scan.cached).toBe(7);
      expect(await scan.read()).toBe(7);
      expect(reads(server, 'var/scan')).toBe(1);
    });

    it('should read strings by default', async () => {
      const { server, client } = await connect();
      server.set('var/TITLE', 'alignment scan');

      expect(await client.var('TITLE').read()).toBe('alignment scan');
    });

    it('should reject values of the wrong type', async () => {
      const { server, client } = await connect();
      server.set('var/label', 'not a number');

      await expect(client.var('label', 'int').read()).rejects.toBeInstanceOf(TypeMismatchError);
    });

    it('should keep a newer notification over an older read', async () => {
      const { server, client } = await connect();
      server.set('var/x', 3);
      const x = client.var('x', 'int');
      await x.read();

      const refreshed = x.refresh();
      server.update('var/x', 8);

      expect(await refreshed).toBe(3);
      expect(x.cached).toBe(8);
    });
  });

  describe('invalidation', () => {
    it('should go back to the server after a deletion', async () => {
      const { server, client } = await connect();
      server.set('var/tmp', 1);
      const tmp = client.var('tmp', 'int');
      await tmp.read();

      server.remove('var/tmp');
      await flush();
      expect(tmp.isCached).toBe(false);

      server.set('var/tmp', 9);
      expect(await tmp.read()).toBe(9);
      expect(reads(server, 'var/tmp')).toBe(2);
    });

    it('should drop the cache and report a notification of the wrong type', async () => {
      const { server, client } = await connect();
      const errors: Error[] = [];
      client.errors$.subscribe((e) => errors.push(e));
      server.set('var/n', 1);
      const n = client.var('n', 'int');
      await n.read();

      server.update('var/n', 'garbled');
      await flush();

      expect(n.isCached).toBe(false);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(TypeMismatchError);
    });

    it('should drop the cache on request', async () => {
      const { server, client } = await connect();
      server.set('var/x', 1);
      const x = client.var('x', 'int');
      await x.read();

      x.invalidate();

      expect(x.cached).toBeUndefined();
    });
  });

  describe('write', () => {
    it('should cache the written value once the server applied it', async () => {
      const { server, client } = await connect();
      server.set('var/energy', 8);
      const energy = client.var('energy', 'float');

      await energy.write(8.5);

      expect(server.text('var/energy')).toBe('8.5');
      expect(energy.cached).toBe(8.5);
      expect(await energy.read()).toBe(8.5);
      expect(server.sent(EventType.CHAN_SEND)).toHaveLength(1);
    });

    it('should reject a value of the wrong type before sending', async () => {
      const { server, client } = await connect();
      const count = client.var('count', 'int');

      await expect(count.write(1.5)).rejects.toBeInstanceOf(TypeMismatchError);
      expect(server.sent(EventType.CHAN_SEND)).toHaveLength(0);
    });

    it('should leave the cache alone when the server refuses', async () => {
      const { server, client } = await connect();
      server.set('var/locked', 1);
      server.rejectWrites('var/locked', 'Variable is protected');
      const locked = client.var('locked', 'int');
      await locked.read();

      await expect(locked.write(2)).rejects.toBeInstanceOf(CommandFailedError);
      expect(locked.cached).toBe(1);
    });

    it('should write associative arrays', async () => {
      const { server, client } = await connect();
      server.setRaw('var/meta', { dataType: WireType.ASSOC, body: encodeText(''), rows: 0, cols: 0 });
      const meta = client.var('meta', 'assoc');

      await meta.write({ sample: 'Si' });

      expect(server.value('var/meta')?.dataType).toBe(WireType.ASSOC);
      expect(await meta.read()).toEqual({ sample: 'Si' });
    });
  });

  describe('value$', () => {
    it('should emit cache changes', async () => {
      const { server, client } = await connect();
      server.set('var/x', 1);
      const x = client.var('x', 'int');
      const seen: Array<number | undefined> = [];
      x.value$.subscribe((v) => seen.push(v));

      await x.read();
      server.update('var/x', 2);
      await flush();
      server.remove('var/x');
      await flush();

      expect(seen[0]).toBeUndefined();
      expect(seen.slice(-2)).toEqual([2, undefined]);
    });
  });

  describe('subscribe', () => {
    it('should share the registration with the cache', async () => {
      const { server, client } = await connect();
      server.set('var/x', 1);
      const x = client.var('x', 'int');
      await x.read();
      const seen: number[] = [];

      const handle = await x.subscribe((m) => void seen.push(m.sequence));
      server.update('var/x', 2);
      await flush();
      await x.unsubscribe(handle);

      expect(seen).toHaveLength(1);
      expect(x.cached).toBe(2);
      expect(server.sent(EventType.REGISTER).filter((m) => m.name === 'var/x')).toHaveLength(1);
      expect(server.registered.has('var/x')).toBe(true);
    });
  });

  describe('close', () => {
    it('should stop following the property', async () => {
      const { server, client } = await connect();
      server.set('var/x', 1);
      const x = client.var('x', 'int');
      await x.read();

      await x.close();

      expect(server.registered.has('var/x')).toBe(false);
      expect(server.sent(EventType.UNREGISTER).map((m) => m.name)).toEqual(['var/x']);
      expect(x.isCached).toBe(false);
    });
  });
});
