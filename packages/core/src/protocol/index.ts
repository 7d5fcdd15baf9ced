export { decodeFrame, encodeMessage, encodeRawMessage, readBodyLength, readPreamble, PREAMBLE_SIZE } from './codec.js';
export {
  EventType,
  HEADER_SIZE,
  MAGIC,
  MAX_HEADER_SIZE,
  MessageFlag,
  NAME_LENGTH,
  PROTOCOL_VERSION,
  WireType,
  isArrayType,
  isNumericArrayType,
  wireTypeName,
  type NumericArrayType,
} from './constants.js';
export { FrameDecoder, type FrameDecoderOptions } from './frame-decoder.js';
export {
  classifyMessage,
  isDeleted,
  messageShape,
  messageText,
  stripNul,
  type MessageKind,
  type OutboundCommand,
  type ReceivedMessage,
  type SpecMessage,
} from './message.js';
export {
  decodeValue,
  encodeText,
  encodeValue,
  type DataType,
  type EncodedValue,
  type EncodeOptions,
  type Matrix,
  type ValueOf,
} from './values.js';
