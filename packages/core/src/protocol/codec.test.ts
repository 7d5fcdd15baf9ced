import { describe, expect, it } from 'vitest';
import { ProtocolError } from '../errors/index.js';
import { decodeFrame, encodeMessage, encodeRawMessage, readPreamble } from './codec.js';
import { EventType, HEADER_SIZE, MAGIC, MessageFlag, WireType } from './constants.js';
import { classifyMessage, isDeleted, messageShape, messageText, type SpecMessage } from './message.js';
import { encodeText } from './values.js';

function message(overrides: Partial<SpecMessage> = {}): SpecMessage {
  return {
    version: 4,
    serial: 0,
    sec: 0,
    usec: 0,
    command: EventType.REPLY,
    dataType: WireType.STRING,
    rows: 0,
    cols: 0,
    error: 0,
    flags: 0,
    name: '',
    body: new Uint8Array(0),
    ...overrides,
  };
}

function view(frame: Uint8Array): DataView {
  return new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
}

describe('encodeMessage', () => {
  it('should lay out the header little-endian', () => {
    const frame = encodeMessage(
      { command: EventType.CHAN_READ, name: 'var/x' },
      7,
      1_700_000_123_456
    );
    const v = view(frame);

    expect(frame.length).toBe(HEADER_SIZE);
    expect(v.getUint32(0, true)).toBe(MAGIC);
    expect(v.getInt32(4, true)).toBe(4);
    expect(v.getUint32(8, true)).toBe(132);
    expect(v.getUint32(12, true)).toBe(7);
    expect(v.getUint32(16, true)).toBe(1_700_000_123);
    expect(v.getUint32(20, true)).toBe(456_000);
    expect(v.getInt32(24, true)).toBe(EventType.CHAN_READ);
    expect(v.getUint32(40, true)).toBe(0);
    expect(Array.from(frame.subarray(52, 58))).toEqual([118, 97, 114, 47, 120, 0]);
  });

  it('should append the body after the header', () => {
    const frame = encodeMessage(
      { command: EventType.FUNC_WITH_RETURN, dataType: WireType.STRING, body: encodeText('wa\n') },
      1
    );

    expect(frame.length).toBe(HEADER_SIZE + 4);
    expect(view(frame).getUint32(40, true)).toBe(4);
    expect(view(frame).getInt32(28, true)).toBe(WireType.STRING);
    expect(Array.from(frame.subarray(HEADER_SIZE))).toEqual([119, 97, 10, 0]);
  });

  it('should reject names longer than the name field', () => {
    expect(() => encodeMessage({ command: EventType.CHAN_READ, name: 'x'.repeat(81) }, 1)).toThrow(
      ProtocolError
    );

    try {
      encodeMessage({ command: EventType.CHAN_READ, name: 'x'.repeat(81) }, 1);
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError);
      expect((error as ProtocolError).code).toBe('SPECWIRE_P102');
    }
  });

  it('should accept a name of exactly 80 bytes', () => {
    const frame = encodeMessage({ command: EventType.CHAN_READ, name: 'y'.repeat(80) }, 1);
    expect(decodeFrame(frame).name).toBe('y'.repeat(80));
  });
});

describe('decodeFrame', () => {
  it('should decode every header field of a server message', () => {
    const frame = encodeRawMessage(
      message({
        serial: 42,
        sec: 10,
        usec: 20,
        command: EventType.EVENT,
        dataType: WireType.STRING,
        flags: MessageFlag.DELETED,
        error: 0,
        name: 'motor/tth/position',
        body: encodeText('12.5'),
      })
    );

    const decoded = decodeFrame(frame);

    expect(decoded.serial).toBe(42);
    expect(decoded.sec).toBe(10);
    expect(decoded.usec).toBe(20);
    expect(decoded.command).toBe(EventType.EVENT);
    expect(decoded.flags).toBe(MessageFlag.DELETED);
    expect(decoded.name).toBe('motor/tth/position');
    expect(messageText(decoded)).toBe('12.5');
  });

  it('should honor a header size larger than its own', () => {
    const base = encodeRawMessage(message({ serial: 3, body: encodeText('ok') }));
    const padded = new Uint8Array(base.length + 8);
    padded.set(base.subarray(0, HEADER_SIZE));
    padded.set(base.subarray(HEADER_SIZE), HEADER_SIZE + 8);
    view(padded).setUint32(8, HEADER_SIZE + 8, true);

    const decoded = decodeFrame(padded);

    expect(decoded.serial).toBe(3);
    expect(messageText(decoded)).toBe('ok');
  });

  it('should reject a truncated frame', () => {
    const frame = encodeRawMessage(message({ body: encodeText('hello') }));
    expect(() => decodeFrame(frame.subarray(0, frame.length - 2))).toThrow(/shorter than its declared/);
    expect(() => decodeFrame(frame.subarray(0, 100))).toThrow(/shorter than a header/);
  });
});

describe('readPreamble', () => {
  it('should reject a bad magic number', () => {
    const frame = encodeRawMessage(message());
    frame[0] = 0;

    expect(() => readPreamble(frame)).toThrow(ProtocolError);
  });

  it('should reject servers older than version 4', () => {
    const frame = encodeRawMessage(message({ version: 3 }));

    try {
      readPreamble(frame);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError);
      expect((error as ProtocolError).code).toBe('SPECWIRE_P101');
    }
  });

  it('should return the declared header size', () => {
    expect(readPreamble(encodeRawMessage(message()))).toBe(HEADER_SIZE);
  });
});

describe('classifyMessage', () => {
  it('should classify events as notifications', () => {
    expect(classifyMessage(message({ command: EventType.EVENT }))).toBe('notification');
  });

  it('should classify replies', () => {
    expect(classifyMessage(message({ command: EventType.REPLY }))).toBe('reply');
    expect(classifyMessage(message({ command: EventType.HELLO_REPLY }))).toBe('reply');
  });

  it('should classify replies carrying an error', () => {
    expect(classifyMessage(message({ command: EventType.REPLY, error: 1 }))).toBe('error');
    expect(classifyMessage(message({ command: EventType.REPLY, dataType: WireType.ERROR }))).toBe(
      'error'
    );
  });

  it('should classify anything else as a command', () => {
    expect(classifyMessage(message({ command: EventType.CMD }))).toBe('command');
  });
});

describe('message helpers', () => {
  it('should detect the deleted flag', () => {
    expect(isDeleted(message({ flags: MessageFlag.DELETED }))).toBe(true);
    expect(isDeleted(message({ flags: 0 }))).toBe(false);
  });

  it('should report array shapes only', () => {
    expect(messageShape(message({ dataType: WireType.ARR_DOUBLE, rows: 2, cols: 3 }))).toEqual([2, 3]);
    expect(messageShape(message({ dataType: WireType.ARR_STRING, rows: 4, cols: 16 }))).toEqual([4, 16]);
    expect(messageShape(message({ rows: 2, cols: 3 }))).toBeUndefined();
    expect(messageShape(message())).toBeUndefined();
  });
});
