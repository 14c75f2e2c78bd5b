import { InvalidArgumentError, InvalidBcdError } from '../errors.js';

/**
 * Probe temperature as carried on the wire.
 *
 * Readings are signed integer tenths of a degree in whatever unit the device
 * reports; `absent` means the probe is not plugged in.
 */
export type Temperature = { kind: 'reading'; tenths: number } | { kind: 'absent' };

export const ABSENT: Temperature = Object.freeze({ kind: 'absent' });

/** Three BCD digits plus tenths, with the top digit limited to 7 by the sign bit. */
export const MAX_TENTHS = 7999;

const SIGN_BIT = 0x80;
const ABSENT_RAW = 0xffff;

export function reading(degrees: number): Temperature {
  if (!Number.isFinite(degrees)) {
    throw new InvalidArgumentError(`Temperature must be finite, got ${degrees}`);
  }
  const tenths = Math.round(Math.abs(degrees) * 10);
  return { kind: 'reading', tenths: degrees < 0 && tenths !== 0 ? -tenths : tenths };
}

export function toDegrees(temp: Temperature): number | null {
  return temp.kind === 'reading' ? temp.tenths / 10 : null;
}

export function formatTemperature(temp: Temperature): string {
  return temp.kind === 'reading' ? (temp.tenths / 10).toFixed(1) : '---';
}

/**
 * Decode a 2-byte BCD temperature at `offset`.
 *
 *   hi: [S][hundreds:3][tens:4]   lo: [ones:4][tenths:4]
 *
 * `ff ff` is the absent sentinel.
 */
export function decodeTemperature(bytes: Uint8Array, offset = 0): Temperature {
  if (bytes.length < offset + 2) {
    throw new InvalidArgumentError(`Temperature needs 2 bytes at offset ${offset}`);
  }
  const hi = bytes[offset];
  const lo = bytes[offset + 1];
  const raw = (hi << 8) | lo;
  if (raw === ABSENT_RAW) return ABSENT;

  const negative = (hi & SIGN_BIT) !== 0;
  const digits = [(hi & 0x7f) >> 4, hi & 0x0f, lo >> 4, lo & 0x0f];
  if (digits.some((d) => d > 9)) {
    throw new InvalidBcdError(raw);
  }

  const magnitude = digits[0] * 1000 + digits[1] * 100 + digits[2] * 10 + digits[3];
  return { kind: 'reading', tenths: negative && magnitude !== 0 ? -magnitude : magnitude };
}

export function encodeTemperature(temp: Temperature): Uint8Array {
  if (temp.kind === 'absent') return Uint8Array.of(0xff, 0xff);

  const { tenths } = temp;
  if (!Number.isInteger(tenths) || Math.abs(tenths) > MAX_TENTHS) {
    throw new InvalidArgumentError(
      `Temperature must be whole tenths within ±${MAX_TENTHS / 10}, got ${tenths / 10}`,
    );
  }

  const magnitude = Math.abs(tenths);
  const hundreds = Math.floor(magnitude / 1000);
  const tens = Math.floor(magnitude / 100) % 10;
  const ones = Math.floor(magnitude / 10) % 10;
  const tenthDigit = magnitude % 10;

  let hi = (hundreds << 4) | tens;
  if (tenths < 0) hi |= SIGN_BIT;
  return Uint8Array.of(hi, (ones << 4) | tenthDigit);
}
