/**
 * Binary encoding of protocol messages.
 *
 * ## Header layout (little-endian, version 4)
 *
 * ```
 *  0 magic   u32    24 cmd    i32    44 err    i32
 *  4 vers    i32    28 type   i32    48 flags  i32
 *  8 size    u32    32 rows   u32    52 name   80 bytes, NUL padded
 * 12 sn      u32    36 cols   u32
 * 16 sec     u32    40 len    u32
 * 20 usec    u32
 * ```
 *
 * The body starts at `size` and is `len` bytes long.
 *
 * @module protocol/codec
 */

import { ProtocolError } from '../errors/index.js';
import { HEADER_SIZE, MAGIC, MAX_HEADER_SIZE, NAME_LENGTH, PROTOCOL_VERSION } from './constants.js';
import { stripNul, type OutboundCommand, type SpecMessage } from './message.js';

/** Bytes needed before the header size can be known */
export const PREAMBLE_SIZE = 12;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

interface FrameFields {
  version: number;
  serial: number;
  sec: number;
  usec: number;
  command: number;
  dataType: number;
  rows: number;
  cols: number;
  error: number;
  flags: number;
  name: string;
  body: Uint8Array;
}

function writeFrame(fields: FrameFields): Uint8Array {
  const name = textEncoder.encode(fields.name);
  if (name.length > NAME_LENGTH) {
    throw new ProtocolError(
      `Property name "${fields.name}" is ${name.length} bytes, the limit is ${NAME_LENGTH}`,
      { name: fields.name },
      'SPECWIRE_P102'
    );
  }

  const frame = new Uint8Array(HEADER_SIZE + fields.body.length);
  const view = new DataView(frame.buffer);

  view.setUint32(0, MAGIC, true);
  view.setInt32(4, fields.version, true);
  view.setUint32(8, HEADER_SIZE, true);
  view.setUint32(12, fields.serial >>> 0, true);
  view.setUint32(16, fields.sec >>> 0, true);
  view.setUint32(20, fields.usec >>> 0, true);
  view.setInt32(24, fields.command, true);
  view.setInt32(28, fields.dataType, true);
  view.setUint32(32, fields.rows >>> 0, true);
  view.setUint32(36, fields.cols >>> 0, true);
  view.setUint32(40, fields.body.length, true);
  view.setInt32(44, fields.error, true);
  view.setInt32(48, fields.flags, true);
  frame.set(name, 52);
  frame.set(fields.body, HEADER_SIZE);

  return frame;
}

/**
 * Serialize a command with the given serial number.
 *
 * @throws ProtocolError if the property name does not fit the name field
 */
export function encodeMessage(
  command: OutboundCommand,
  serial: number,
  now: number = Date.now()
): Uint8Array {
  return writeFrame({
    version: PROTOCOL_VERSION,
    serial,
    sec: Math.floor(now / 1000),
    usec: (now % 1000) * 1000,
    command: command.command,
    dataType: command.dataType ?? 0,
    rows: command.rows ?? 0,
    cols: command.cols ?? 0,
    error: 0,
    flags: command.flags ?? 0,
    name: command.name ?? '',
    body: command.body ?? new Uint8Array(0),
  });
}

/**
 * Serialize an arbitrary message, including server-side fields such as
 * `error`. Used by test servers and tooling that speak for the server.
 */
export function encodeRawMessage(message: SpecMessage): Uint8Array {
  return writeFrame(message);
}

/**
 * Validate magic and version from the first {@link PREAMBLE_SIZE} bytes and
 * return the declared header size.
 */
export function readPreamble(bytes: Uint8Array): number {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const magic = view.getUint32(0, true);
  if (magic !== MAGIC) {
    throw new ProtocolError(`Bad magic number 0x${magic.toString(16)}`, { magic });
  }
  const version = view.getInt32(4, true);
  if (version < PROTOCOL_VERSION) {
    throw new ProtocolError(
      `Server responded with protocol version ${version}, need at least ${PROTOCOL_VERSION}`,
      { version },
      'SPECWIRE_P101'
    );
  }
  const headerSize = view.getUint32(8, true);
  if (headerSize < HEADER_SIZE) {
    throw new ProtocolError(`Header size ${headerSize} is smaller than ${HEADER_SIZE}`, {
      headerSize,
    });
  }
  if (headerSize > MAX_HEADER_SIZE) {
    throw new ProtocolError(`Header size ${headerSize} exceeds ${MAX_HEADER_SIZE}`, { headerSize });
  }
  return headerSize;
}

/**
 * Body length from a buffer holding at least a full header.
 */
export function readBodyLength(bytes: Uint8Array): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(40, true);
}

/**
 * Decode one complete frame.
 *
 * @throws ProtocolError when the frame is malformed or truncated
 */
export function decodeFrame(frame: Uint8Array): SpecMessage {
  if (frame.length < HEADER_SIZE) {
    throw new ProtocolError(`Frame of ${frame.length} bytes is shorter than a header`);
  }
  const headerSize = readPreamble(frame);
  const bodyLength = readBodyLength(frame);
  if (frame.length < headerSize + bodyLength) {
    throw new ProtocolError(
      `Frame of ${frame.length} bytes is shorter than its declared ${headerSize + bodyLength}`
    );
  }

  const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
  const nameBytes = frame.subarray(52, 52 + NAME_LENGTH);
  const nul = nameBytes.indexOf(0);

  return {
    version: view.getInt32(4, true),
    serial: view.getUint32(12, true),
    sec: view.getUint32(16, true),
    usec: view.getUint32(20, true),
    command: view.getInt32(24, true),
    dataType: view.getInt32(28, true),
    rows: view.getUint32(32, true),
    cols: view.getUint32(36, true),
    error: view.getInt32(44, true),
    flags: view.getInt32(48, true),
    name: stripNul(textDecoder.decode(nul === -1 ? nameBytes : nameBytes.subarray(0, nul))),
    body: frame.slice(headerSize, headerSize + bodyLength),
  };
}
