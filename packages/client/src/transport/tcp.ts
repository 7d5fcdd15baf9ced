import { createConnection, type Socket } from 'node:net';
import { ConnectionError, ConnectionLostError, FrameDecoder } from '@specwire/core';
import type { SpecTransport, TransportConfig } from './types.js';

/**
 * TCP transport speaking the binary frame protocol.
 *
 * ## Connection Lifecycle
 *
 * ```
 * connect() ──→ [open] ──→ disconnect() ──→ [closed]
 *                  │
 *                  ▼ (socket error / server hangs up)
 *              [closed]  (disconnect handlers fire once)
 * ```
 *
 * Reconnection is left to the owner: a closed transport stays closed.
 *
 * @example
 * ```typescript
 * const transport = createTcpTransport({ host: 'beamline-7', port: 6510 });
 * transport.onFrame((frame) => handle(decodeFrame(frame)));
 * await transport.connect();
 * transport.sendFrame(encodeMessage({ command: EventType.HELLO, name: 'me' }, 1));
 * ```
 */
export class TcpTransport implements SpecTransport {
  private readonly config: Required<TransportConfig>;
  private socket: Socket | null = null;
  private frameHandler: ((frame: Uint8Array) => void) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;
  private disconnectHandler: (() => void) | null = null;
  private readonly decoder: FrameDecoder;
  private closed = false;

  constructor(config: TransportConfig = {}) {
    this.config = {
      host: config.host ?? 'localhost',
      port: config.port ?? 6510,
      connectTimeout: config.connectTimeout ?? 5000,
      maxFrameSize: config.maxFrameSize ?? 64 * 1024 * 1024,
    };
    this.decoder = new FrameDecoder({
      maxFrameSize: this.config.maxFrameSize,
      onError: (error) => this.errorHandler?.(error),
    });
  }

  get address(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  async connect(): Promise<void> {
    if (this.socket) {
      return;
    }

    return new Promise((resolve, reject) => {
      const socket = createConnection({ host: this.config.host, port: this.config.port });
      let opened = false;

      const timer = setTimeout(() => {
        socket.destroy();
        reject(
          new ConnectionError(`Timed out connecting to ${this.address}`, {
            host: this.config.host,
            port: this.config.port,
            timeoutMs: this.config.connectTimeout,
          })
        );
      }, this.config.connectTimeout);

      socket.setNoDelay(true);

      socket.once('connect', () => {
        clearTimeout(timer);
        opened = true;
        this.socket = socket;
        this.closed = false;
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        for (const frame of this.decoder.push(chunk)) {
          this.frameHandler?.(frame);
        }
      });

      socket.on('error', (error) => {
        if (!opened) {
          clearTimeout(timer);
          reject(
            new ConnectionError(
              `Could not connect to ${this.address}: ${error.message}`,
              { host: this.config.host, port: this.config.port },
              error
            )
          );
          return;
        }
        this.errorHandler?.(error);
      });

      socket.on('close', () => {
        if (opened) {
          this.handleClose();
        }
      });
    });
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end(() => socket.destroy());
    });
  }

  isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  sendFrame(frame: Uint8Array): void {
    if (!this.socket || this.socket.destroyed) {
      throw new ConnectionLostError('Not connected', { address: this.address });
    }
    this.socket.write(frame);
  }

  onFrame(handler: (frame: Uint8Array) => void): void {
    this.frameHandler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  onDisconnect(handler: () => void): void {
    this.disconnectHandler = handler;
  }

  private handleClose(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.socket = null;
    this.decoder.reset();
    this.disconnectHandler?.();
  }
}

/**
 * Creates a TCP transport for the given server.
 */
export function createTcpTransport(config: TransportConfig = {}): TcpTransport {
  return new TcpTransport(config);
}
