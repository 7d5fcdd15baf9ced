/**
 * Mapping between wire payloads and the values callers see.
 *
 * Each variable is declared with a {@link DataType}. Decoding checks the
 * payload the server sent against that declaration and fails with
 * {@link TypeMismatchError} instead of guessing.
 *
 * | DataType  | Value                     | Accepted wire types      |
 * |-----------|---------------------------|--------------------------|
 * | `int`     | `number` (integral)       | STRING, DOUBLE           |
 * | `float`   | `number`                  | STRING, DOUBLE           |
 * | `string`  | `string`                  | STRING                   |
 * | `array`   | `number[][]` (rows×cols)  | numeric ARR_* types      |
 * | `strings` | `string[]`                | ARR_STRING               |
 * | `assoc`   | `Record<string, string>`  | ASSOC                    |
 *
 * @module protocol/values
 */

import { TypeMismatchError } from '../errors/index.js';
import { WireType, isNumericArrayType, wireTypeName, type NumericArrayType } from './constants.js';
import { messageText, stripNul, type SpecMessage } from './message.js';

export type DataType = 'int' | 'float' | 'string' | 'array' | 'strings' | 'assoc';

/** Row-major numeric matrix; one-dimensional arrays have a single row or column */
export type Matrix = number[][];

export interface ValueOf {
  int: number;
  float: number;
  string: string;
  array: Matrix;
  strings: string[];
  assoc: Record<string, string>;
}

/** Payload fields of an outbound write */
export interface EncodedValue {
  dataType: WireType;
  body: Uint8Array;
  rows: number;
  cols: number;
}

export interface EncodeOptions {
  /** Element type for `array` values. @default WireType.ARR_DOUBLE */
  elementType?: NumericArrayType;
}

interface ElementCodec {
  size: number;
  read(view: DataView, offset: number): number;
  write(view: DataView, offset: number, value: number): void;
}

const ELEMENT_CODECS: Record<NumericArrayType, ElementCodec> = {
  [WireType.ARR_DOUBLE]: {
    size: 8,
    read: (v, o) => v.getFloat64(o, true),
    write: (v, o, x) => v.setFloat64(o, x, true),
  },
  [WireType.ARR_FLOAT]: {
    size: 4,
    read: (v, o) => v.getFloat32(o, true),
    write: (v, o, x) => v.setFloat32(o, x, true),
  },
  [WireType.ARR_LONG]: {
    size: 4,
    read: (v, o) => v.getInt32(o, true),
    write: (v, o, x) => v.setInt32(o, x, true),
  },
  [WireType.ARR_ULONG]: {
    size: 4,
    read: (v, o) => v.getUint32(o, true),
    write: (v, o, x) => v.setUint32(o, x, true),
  },
  [WireType.ARR_SHORT]: {
    size: 2,
    read: (v, o) => v.getInt16(o, true),
    write: (v, o, x) => v.setInt16(o, x, true),
  },
  [WireType.ARR_USHORT]: {
    size: 2,
    read: (v, o) => v.getUint16(o, true),
    write: (v, o, x) => v.setUint16(o, x, true),
  },
  [WireType.ARR_CHAR]: {
    size: 1,
    read: (v, o) => v.getInt8(o),
    write: (v, o, x) => v.setInt8(o, x),
  },
  [WireType.ARR_UCHAR]: {
    size: 1,
    read: (v, o) => v.getUint8(o),
    write: (v, o, x) => v.setUint8(o, x),
  },
  // 64-bit integers lose precision beyond Number.MAX_SAFE_INTEGER
  [WireType.ARR_LONG64]: {
    size: 8,
    read: (v, o) => Number(v.getBigInt64(o, true)),
    write: (v, o, x) => v.setBigInt64(o, BigInt(Math.trunc(x)), true),
  },
  [WireType.ARR_ULONG64]: {
    size: 8,
    read: (v, o) => Number(v.getBigUint64(o, true)),
    write: (v, o, x) => v.setBigUint64(o, BigInt(Math.trunc(x)), true),
  },
};

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

function mismatch(expected: DataType, message: Pick<SpecMessage, 'dataType' | 'name'>): TypeMismatchError {
  return new TypeMismatchError(expected, wireTypeName(message.dataType), { property: message.name });
}

function decodeNumber(
  message: Pick<SpecMessage, 'dataType' | 'name' | 'body'>,
  expected: 'int' | 'float'
): number {
  let value: number;
  if (message.dataType === WireType.DOUBLE) {
    if (message.body.length < 8) {
      throw new TypeMismatchError(expected, 'truncated DOUBLE', { property: message.name });
    }
    value = new DataView(message.body.buffer, message.body.byteOffset, 8).getFloat64(0, true);
  } else if (message.dataType === WireType.STRING) {
    const text = messageText(message).trim();
    value = text === '' ? Number.NaN : Number(text);
    if (!Number.isFinite(value)) {
      throw new TypeMismatchError(expected, `non-numeric text "${text}"`, { property: message.name });
    }
  } else {
    throw mismatch(expected, message);
  }

  if (expected === 'int' && !Number.isInteger(value)) {
    throw new TypeMismatchError('int', `non-integral number ${value}`, { property: message.name });
  }
  return value;
}

function decodeMatrix(message: SpecMessage): Matrix {
  if (!isNumericArrayType(message.dataType)) {
    throw mismatch('array', message);
  }
  const codec = ELEMENT_CODECS[message.dataType];
  const { rows, cols, body } = message;
  if (body.length < rows * cols * codec.size) {
    throw new TypeMismatchError('array', `body of ${body.length} bytes for ${rows}x${cols}`, {
      property: message.name,
    });
  }

  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const matrix: Matrix = [];
  for (let r = 0; r < rows; r++) {
    const row: number[] = [];
    for (let c = 0; c < cols; c++) {
      row.push(codec.read(view, (r * cols + c) * codec.size));
    }
    matrix.push(row);
  }
  return matrix;
}

function decodeStrings(message: SpecMessage): string[] {
  if (message.dataType !== WireType.ARR_STRING) {
    throw mismatch('strings', message);
  }
  const out: string[] = [];
  for (let r = 0; r < message.rows; r++) {
    const slice = message.body.subarray(r * message.cols, (r + 1) * message.cols);
    const nul = slice.indexOf(0);
    out.push(textDecoder.decode(nul === -1 ? slice : slice.subarray(0, nul)));
  }
  return out;
}

function decodeAssoc(message: SpecMessage): Record<string, string> {
  if (message.dataType !== WireType.ASSOC) {
    throw mismatch('assoc', message);
  }
  const parts = stripNul(textDecoder.decode(message.body)).split('\0');
  const out: Record<string, string> = {};
  for (let i = 0; i + 1 < parts.length; i += 2) {
    out[parts[i] ?? ''] = parts[i + 1] ?? '';
  }
  return out;
}

/**
 * Decode a message payload as the declared data type.
 *
 * @throws TypeMismatchError when the payload does not fit `dataType`
 */
export function decodeValue<D extends DataType>(message: SpecMessage, dataType: D): ValueOf[D];
export function decodeValue(message: SpecMessage, dataType: DataType): ValueOf[DataType] {
  switch (dataType) {
    case 'int':
    case 'float':
      return decodeNumber(message, dataType);
    case 'string':
      if (message.dataType !== WireType.STRING) {
        throw mismatch('string', message);
      }
      return messageText(message);
    case 'array':
      return decodeMatrix(message);
    case 'strings':
      return decodeStrings(message);
    case 'assoc':
      return decodeAssoc(message);
  }
}

/** Encode text as a NUL-terminated STRING body */
export function encodeText(text: string): Uint8Array {
  const bytes = textEncoder.encode(text);
  const body = new Uint8Array(bytes.length + 1);
  body.set(bytes);
  return body;
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

function encodeMatrix(value: unknown, elementType: NumericArrayType): EncodedValue {
  if (!Array.isArray(value) || value.length === 0 || !value.every(Array.isArray)) {
    throw new TypeMismatchError('array', describe(value));
  }
  const rows: unknown[][] = value;
  const cols = rows[0]?.length ?? 0;
  if (rows.some((row) => row.length !== cols)) {
    throw new TypeMismatchError('array', 'ragged rows');
  }

  const codec = ELEMENT_CODECS[elementType];
  const body = new Uint8Array(rows.length * cols * codec.size);
  const view = new DataView(body.buffer);
  rows.forEach((row, r) => {
    row.forEach((cell, c) => {
      if (typeof cell !== 'number' || !Number.isFinite(cell)) {
        throw new TypeMismatchError('array', `element ${describe(cell)} at [${r}, ${c}]`);
      }
      codec.write(view, (r * cols + c) * codec.size, cell);
    });
  });

  return { dataType: elementType, body, rows: rows.length, cols };
}

/**
 * Encode a caller value for a write to a property declared as `dataType`.
 *
 * Numbers travel as text, which is how the server stores scalar variables.
 *
 * @throws TypeMismatchError when `value` is not a valid `dataType` value
 */
export function encodeValue<D extends DataType>(
  value: ValueOf[D],
  dataType: D,
  options?: EncodeOptions
): EncodedValue;
export function encodeValue(value: unknown, dataType: DataType, options?: EncodeOptions): EncodedValue;
export function encodeValue(value: unknown, dataType: DataType, options: EncodeOptions = {}): EncodedValue {
  switch (dataType) {
    case 'int':
    case 'float': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new TypeMismatchError(dataType, describe(value));
      }
      if (dataType === 'int' && !Number.isInteger(value)) {
        throw new TypeMismatchError('int', `non-integral number ${value}`);
      }
      return { dataType: WireType.STRING, body: encodeText(String(value)), rows: 0, cols: 0 };
    }
    case 'string':
      if (typeof value !== 'string') {
        throw new TypeMismatchError('string', describe(value));
      }
      return { dataType: WireType.STRING, body: encodeText(value), rows: 0, cols: 0 };
    case 'array':
      return encodeMatrix(value, options.elementType ?? WireType.ARR_DOUBLE);
    case 'strings': {
      if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
        throw new TypeMismatchError('strings', describe(value));
      }
      const encoded = value.map((item) => textEncoder.encode(item));
      const cols = Math.max(1, ...encoded.map((bytes) => bytes.length + 1));
      const body = new Uint8Array(encoded.length * cols);
      encoded.forEach((bytes, r) => body.set(bytes, r * cols));
      return { dataType: WireType.ARR_STRING, body, rows: encoded.length, cols };
    }
    case 'assoc': {
      if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new TypeMismatchError('assoc', describe(value));
      }
      const pairs = Object.entries(value).map(([key, item]) => `${key}\0${String(item)}\0`);
      return {
        dataType: WireType.ASSOC,
        body: textEncoder.encode(`${pairs.join('')}\0`),
        rows: 0,
        cols: 0,
      };
    }
  }
}
