import { ProtocolError } from '../errors/index.js';
import { readBodyLength, readPreamble, PREAMBLE_SIZE } from './codec.js';
import { HEADER_SIZE, MAGIC } from './constants.js';

/**
 * Options for {@link FrameDecoder}
 */
export interface FrameDecoderOptions {
  /** Largest frame accepted before the stream is treated as corrupt. @default 67108864 */
  maxFrameSize?: number;
  /** Called for every span of bytes that had to be skipped */
  onError?: (error: ProtocolError) => void;
}

const MAGIC_BYTES = new Uint8Array(4);
new DataView(MAGIC_BYTES.buffer).setUint32(0, MAGIC, true);

/**
 * Reassembles complete frames out of arbitrarily split socket reads.
 *
 * Bytes are buffered until a full header and body are present, so callers
 * never see a truncated frame. When the stream contains garbage (no magic
 * number where a header should start) the decoder reports a
 * {@link ProtocolError} and skips ahead to the next magic number.
 *
 * @example
 * ```typescript
 * const decoder = new FrameDecoder({ onError: (e) => log.warn(e.message) });
 * socket.on('data', (chunk) => {
 *   for (const frame of decoder.push(chunk)) {
 *     handle(decodeFrame(frame));
 *   }
 * });
 * ```
 */
export class FrameDecoder {
  private buffer = new Uint8Array(0);
  private readonly maxFrameSize: number;
  private readonly onError: (error: ProtocolError) => void;

  constructor(options: FrameDecoderOptions = {}) {
    this.maxFrameSize = options.maxFrameSize ?? 64 * 1024 * 1024;
    this.onError = options.onError ?? (() => {});
  }

  /** Number of bytes waiting for the rest of their frame */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Append a chunk and return every frame it completes, in stream order.
   */
  push(chunk: Uint8Array): Uint8Array[] {
    this.append(chunk);
    const frames: Uint8Array[] = [];

    while (this.buffer.length >= PREAMBLE_SIZE) {
      let headerSize: number;
      try {
        headerSize = readPreamble(this.buffer);
      } catch (error) {
        this.resync(error);
        continue;
      }
      if (headerSize > this.maxFrameSize) {
        this.resync(
          new ProtocolError(`Header of ${headerSize} bytes exceeds the ${this.maxFrameSize} byte limit`, {
            headerSize,
          })
        );
        continue;
      }
      if (this.buffer.length < Math.max(headerSize, HEADER_SIZE)) break;

      const total = headerSize + readBodyLength(this.buffer);
      if (total > this.maxFrameSize) {
        this.resync(
          new ProtocolError(`Frame of ${total} bytes exceeds the ${this.maxFrameSize} byte limit`, {
            size: total,
          })
        );
        continue;
      }
      if (this.buffer.length < total) break;

      frames.push(this.buffer.slice(0, total));
      this.buffer = this.buffer.subarray(total);
    }

    return frames;
  }

  /** Drop everything buffered */
  reset(): void {
    this.buffer = new Uint8Array(0);
  }

  private append(chunk: Uint8Array): void {
    if (this.buffer.length === 0) {
      this.buffer = chunk.slice();
      return;
    }
    const merged = new Uint8Array(this.buffer.length + chunk.length);
    merged.set(this.buffer);
    merged.set(chunk, this.buffer.length);
    this.buffer = merged;
  }

  private resync(cause: unknown): void {
    const next = this.findMagic(1);
    const skipped = next === -1 ? this.buffer.length - (MAGIC_BYTES.length - 1) : next;
    const dropped = Math.max(skipped, 1);
    this.buffer = this.buffer.subarray(Math.min(dropped, this.buffer.length));

    const error =
      cause instanceof ProtocolError
        ? cause
        : new ProtocolError(cause instanceof Error ? cause.message : String(cause));
    const code = error.code === 'SPECWIRE_P101' ? 'SPECWIRE_P101' : 'SPECWIRE_P100';
    this.onError(
      new ProtocolError(
        `${error.message}; skipped ${dropped} bytes`,
        { ...error.context, skipped: dropped },
        code
      )
    );
  }

  private findMagic(from: number): number {
    const limit = this.buffer.length - MAGIC_BYTES.length;
    for (let i = from; i <= limit; i++) {
      if (
        this.buffer[i] === MAGIC_BYTES[0] &&
        this.buffer[i + 1] === MAGIC_BYTES[1] &&
        this.buffer[i + 2] === MAGIC_BYTES[2] &&
        this.buffer[i + 3] === MAGIC_BYTES[3]
      ) {
        return i;
      }
    }
    return -1;
  }
}
