/**
 * Transport layer interface for the protocol engine.
 *
 * A transport owns the one connection to the server and moves whole frames
 * in both directions. Implementations reassemble partial reads, so
 * `onFrame` handlers only ever see complete frames, in the order the server
 * sent them.
 *
 * @see {@link TcpTransport}
 */
export interface SpecTransport {
  /**
   * Establish the connection.
   * @throws ConnectionError if the server cannot be reached
   */
  connect(): Promise<void>;

  /**
   * Close the connection. Registered disconnect handlers fire once the
   * connection is gone.
   */
  disconnect(): Promise<void>;

  /** Whether frames can currently be sent */
  isConnected(): boolean;

  /**
   * Write one encoded frame.
   * @throws ConnectionLostError if the connection is not open
   */
  sendFrame(frame: Uint8Array): void;

  /** Register the handler receiving every complete inbound frame */
  onFrame(handler: (frame: Uint8Array) => void): void;

  /**
   * Register the handler for transport errors. A {@link ProtocolError}
   * reports skipped garbage and leaves the connection usable; any other
   * error means the connection failed.
   */
  onError(handler: (error: Error) => void): void;

  /** Register the handler for the connection closing */
  onDisconnect(handler: () => void): void;
}

/**
 * Configuration for socket transports.
 */
export interface TransportConfig {
  /** Server host name or address. @default 'localhost' */
  host?: string;
  /** Server port. @default 6510 */
  port?: number;
  /** Milliseconds to wait for the connection to open. @default 5000 */
  connectTimeout?: number;
  /** Largest frame accepted from the server. @default 67108864 */
  maxFrameSize?: number;
}
