import { ChecksumMismatchError, InvalidArgumentError, PayloadTooLargeError, TooShortError } from '../errors.js';
import type { FramingError } from '../errors.js';
import { isByte } from '../utils/bytes.js';

/**
 * TP90x wire frame:
 *
 *   [0]        opcode
 *   [1]        payload length N (0..255)
 *   [2..N+1]   payload
 *   [N+2]      checksum = (opcode + N + sum(payload)) & 0xff
 *
 * Notifications are usually padded to 20 bytes; anything after the checksum is ignored.
 */
export interface Frame {
  opcode: number;
  payload: Uint8Array;
}

export type FrameDecodeResult = { ok: true; frame: Frame } | { ok: false; error: FramingError };

export const MAX_PAYLOAD_LENGTH = 0xff;
export const FRAME_OVERHEAD = 3;

/** Low byte of the sum of `bytes[start..end)`. */
export function frameChecksum(bytes: Uint8Array, start = 0, end = bytes.length): number {
  let sum = 0;
  for (let i = start; i < end; i++) sum += bytes[i];
  return sum & 0xff;
}

export function encodeFrame(opcode: number, payload: Uint8Array = new Uint8Array(0)): Uint8Array {
  if (!isByte(opcode)) {
    throw new InvalidArgumentError(`Opcode must be a byte, got ${opcode}`);
  }
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new PayloadTooLargeError(payload.length);
  }

  const out = new Uint8Array(payload.length + FRAME_OVERHEAD);
  out[0] = opcode;
  out[1] = payload.length;
  out.set(payload, 2);
  out[out.length - 1] = frameChecksum(out, 0, out.length - 1);
  return out;
}

export function decodeFrame(raw: Uint8Array): FrameDecodeResult {
  if (raw.length < FRAME_OVERHEAD) {
    return { ok: false, error: new TooShortError(raw.length, FRAME_OVERHEAD) };
  }

  const opcode = raw[0];
  const length = raw[1];
  const total = length + FRAME_OVERHEAD;
  if (raw.length < total) {
    return { ok: false, error: new TooShortError(raw.length, total) };
  }

  const expected = frameChecksum(raw, 0, total - 1);
  const actual = raw[total - 1];
  if (expected !== actual) {
    return { ok: false, error: new ChecksumMismatchError(opcode, expected, actual) };
  }

  // Copy so the frame does not alias the transport's notification buffer
  return { ok: true, frame: { opcode, payload: raw.slice(2, 2 + length) } };
}
