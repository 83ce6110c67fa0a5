/**
 * RFC 6455 frame codec.
 *
 * Parses client frames (masked per §5.3) and encodes server frames
 * (never masked). Payload lengths up to `maxPayloadBytes` are accepted in
 * all three length encodings.
 */

export const Opcode = {
  CONTINUATION: 0x0,
  TEXT: 0x1,
  BINARY: 0x2,
  CLOSE: 0x8,
  PING: 0x9,
  PONG: 0xa,
} as const;

/** Close status codes used by the server (RFC 6455 §7.4.1). */
export const CloseCode = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  PROTOCOL_ERROR: 1002,
  TOO_LARGE: 1009,
} as const;

export interface ParsedFrame {
  fin: boolean;
  opcode: number;
  payload: Buffer;
  nextOffset: number;
}

/** Raised for input that can never become a valid frame. */
export class FrameError extends Error {
  readonly closeCode: number;

  constructor(message: string, closeCode: number = CloseCode.PROTOCOL_ERROR) {
    super(message);
    this.name = 'FrameError';
    this.closeCode = closeCode;
  }
}

/**
 * Parse ONE WebSocket frame from the front of `buf`.
 * Returns null when more bytes are needed.
 * Throws FrameError on oversized or malformed frames.
 */
export function tryParseFrame(buf: Buffer, maxPayloadBytes: number): ParsedFrame | null {
  if (buf.length < 2) return null;

  const b0 = buf.readUInt8(0);
  const b1 = buf.readUInt8(1);

  const fin = (b0 & 0x80) === 0x80;
  const opcode = b0 & 0x0f;
  const masked = (b1 & 0x80) === 0x80;

  if ((b0 & 0x70) !== 0) {
    throw new FrameError('reserved bits set without a negotiated extension');
  }

  if (!masked) {
    throw new FrameError('client frames must be masked');
  }

  const isControl = (opcode & 0x08) === 0x08;
  let payloadLen = b1 & 0x7f;
  let offset = 2;

  if (isControl && (!fin || payloadLen > 125)) {
    throw new FrameError('control frames must be final and at most 125 bytes');
  }

  if (payloadLen === 126) {
    if (buf.length < offset + 2) return null;
    payloadLen = buf.readUInt16BE(offset);
    offset += 2;
  } else if (payloadLen === 127) {
    if (buf.length < offset + 8) return null;
    const longLen = buf.readBigUInt64BE(offset);
    if (longLen > BigInt(maxPayloadBytes)) {
      throw new FrameError(`frame payload exceeds ${maxPayloadBytes} bytes`, CloseCode.TOO_LARGE);
    }
    payloadLen = Number(longLen);
    offset += 8;
  }

  if (payloadLen > maxPayloadBytes) {
    throw new FrameError(`frame payload exceeds ${maxPayloadBytes} bytes`, CloseCode.TOO_LARGE);
  }

  if (buf.length < offset + 4 + payloadLen) return null;

  const maskingKey = buf.subarray(offset, offset + 4);
  offset += 4;

  const maskedPayload = buf.subarray(offset, offset + payloadLen);
  const payload = Buffer.allocUnsafe(payloadLen);
  for (let i = 0; i < payloadLen; i++) {
    payload[i] = maskedPayload[i]! ^ maskingKey[i % 4]!;
  }

  return { fin, opcode, payload, nextOffset: offset + payloadLen };
}

/** Encodes a final, unmasked frame. */
export function encodeFrame(opcode: number, payload: Buffer): Buffer {
  const len = payload.length;

  let header: Buffer;
  if (len < 126) {
    header = Buffer.alloc(2);
    header[1] = len;
  } else if (len <= 0xffff) {
    header = Buffer.alloc(4);
    header[1] = 126;
    header.writeUInt16BE(len, 2);
  } else {
    header = Buffer.alloc(10);
    header[1] = 127;
    header.writeBigUInt64BE(BigInt(len), 2);
  }
  header[0] = 0x80 | opcode; // FIN + opcode

  return Buffer.concat([header, payload]);
}

export function encodeTextFrame(data: string): Buffer {
  return encodeFrame(Opcode.TEXT, Buffer.from(data, 'utf-8'));
}

export function encodeCloseFrame(code: number, reason = ''): Buffer {
  // §5.5: control payload ≤ 125 bytes, 2 of which are the status code
  const reasonBytes = Buffer.from(reason, 'utf-8').subarray(0, 123);
  const payload = Buffer.alloc(2 + reasonBytes.length);
  payload.writeUInt16BE(code, 0);
  reasonBytes.copy(payload, 2);
  return encodeFrame(Opcode.CLOSE, payload);
}
