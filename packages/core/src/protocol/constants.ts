/** Magic number opening every header (`0xFEEDFACE`) */
export const MAGIC = 4277009102;

/** Protocol version spoken by the client; older servers are rejected */
export const PROTOCOL_VERSION = 4;

/** Size of the version 4 header in bytes */
export const HEADER_SIZE = 132;

/** Largest header size accepted from a server; anything above is corrupt */
export const MAX_HEADER_SIZE = 4096;

/** Width of the NUL-padded property name field */
export const NAME_LENGTH = 80;

/**
 * Command and event codes carried in the header's `cmd` field.
 */
export const EventType = {
  CLOSE: 1,
  ABORT: 2,
  CMD: 3,
  CMD_WITH_RETURN: 4,
  RETURN: 5,
  REGISTER: 6,
  UNREGISTER: 7,
  EVENT: 8,
  FUNC: 9,
  FUNC_WITH_RETURN: 10,
  CHAN_READ: 11,
  CHAN_SEND: 12,
  REPLY: 13,
  HELLO: 14,
  HELLO_REPLY: 15,
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

/**
 * Payload type codes carried in the header's `type` field.
 */
export const WireType = {
  DOUBLE: 1,
  STRING: 2,
  ERROR: 3,
  ASSOC: 4,
  ARR_DOUBLE: 5,
  ARR_FLOAT: 6,
  ARR_LONG: 7,
  ARR_ULONG: 8,
  ARR_SHORT: 9,
  ARR_USHORT: 10,
  ARR_CHAR: 11,
  ARR_UCHAR: 12,
  ARR_STRING: 13,
  ARR_LONG64: 14,
  ARR_ULONG64: 15,
} as const;

export type WireType = (typeof WireType)[keyof typeof WireType];

/** Array payload types holding numbers */
export type NumericArrayType = Exclude<
  WireType,
  typeof WireType.DOUBLE | typeof WireType.STRING | typeof WireType.ERROR | typeof WireType.ASSOC | typeof WireType.ARR_STRING
>;

/** Bits of the header's `flags` field */
export const MessageFlag = {
  /** Sent with notifications when a watched variable or array element is deleted */
  DELETED: 0x1000,
} as const;

const NUMERIC_ARRAY_TYPES: ReadonlySet<number> = new Set<number>([
  WireType.ARR_DOUBLE,
  WireType.ARR_FLOAT,
  WireType.ARR_LONG,
  WireType.ARR_ULONG,
  WireType.ARR_SHORT,
  WireType.ARR_USHORT,
  WireType.ARR_CHAR,
  WireType.ARR_UCHAR,
  WireType.ARR_LONG64,
  WireType.ARR_ULONG64,
]);

export function isNumericArrayType(type: number): type is NumericArrayType {
  return NUMERIC_ARRAY_TYPES.has(type);
}

export function isArrayType(type: number): boolean {
  return type === WireType.ARR_STRING || NUMERIC_ARRAY_TYPES.has(type);
}

/** Human readable name of a wire type code, for error messages */
export function wireTypeName(type: number): string {
  for (const [name, code] of Object.entries(WireType)) {
    if (code === type) return name;
  }
  return `UNKNOWN(${type})`;
}
