import { EventType, MessageFlag, WireType, isArrayType } from './constants.js';

/**
 * A decoded protocol message, in either direction.
 *
 * `serial` is the correlation id: a reply carries the serial of the command
 * it answers, notifications carry no meaningful serial and are addressed by
 * `name` alone.
 */
export interface SpecMessage {
  readonly version: number;
  readonly serial: number;
  readonly sec: number;
  readonly usec: number;
  readonly command: number;
  readonly dataType: number;
  readonly rows: number;
  readonly cols: number;
  /** Non-zero when the server reports a failure */
  readonly error: number;
  readonly flags: number;
  readonly name: string;
  readonly body: Uint8Array;
}

/**
 * A message as seen by the dispatcher's receive loop, stamped with its
 * position in the inbound stream.
 */
export interface ReceivedMessage extends SpecMessage {
  readonly sequence: number;
}

/**
 * What the client asks the server to do. The dispatcher assigns the serial.
 */
export interface OutboundCommand {
  readonly command: EventType;
  readonly name?: string;
  readonly dataType?: WireType;
  readonly body?: Uint8Array;
  readonly rows?: number;
  readonly cols?: number;
  readonly flags?: number;
}

export type MessageKind = 'command' | 'reply' | 'notification' | 'error';

/**
 * Classify a message by the role it plays in the conversation.
 */
export function classifyMessage(message: SpecMessage): MessageKind {
  switch (message.command) {
    case EventType.EVENT:
      return 'notification';
    case EventType.REPLY:
    case EventType.HELLO_REPLY:
      return message.error !== 0 || message.dataType === WireType.ERROR ? 'error' : 'reply';
    default:
      return 'command';
  }
}

/**
 * `[rows, cols]` for array payloads, `undefined` otherwise.
 */
export function messageShape(message: SpecMessage): readonly [number, number] | undefined {
  if (!isArrayType(message.dataType)) {
    return undefined;
  }
  return [message.rows, message.cols];
}

const textDecoder = new TextDecoder('utf-8');

/**
 * Body as text with trailing NUL padding removed.
 */
export function messageText(message: Pick<SpecMessage, 'body'>): string {
  return stripNul(textDecoder.decode(message.body));
}

export function stripNul(text: string): string {
  return text.replace(/\0+$/, '');
}

export function isDeleted(message: SpecMessage): boolean {
  return (message.flags & MessageFlag.DELETED) !== 0;
}
