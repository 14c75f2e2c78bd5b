/**
 * 0x01 handshake payloads.
 *
 * The vendor app derives the 9-byte payload from random words run through
 * six 16-entry lookup tables. Those tables are not published, so the payload
 * source is pluggable. The default replays a payload captured from a working
 * session, which the devices accept.
 */

import { InvalidArgumentError } from '../errors.js';

export type AuthPayloadGenerator = () => Uint8Array;

export const AUTH_PAYLOAD_LENGTH = 9;

const CAPTURED_AUTH_PAYLOAD = Uint8Array.of(0x99, 0xa8, 0x89, 0x3c, 0x66, 0x81, 0x75, 0x0d, 0xe3);

export const capturedAuthPayload: AuthPayloadGenerator = () => CAPTURED_AUTH_PAYLOAD.slice();

/** Use a fixed payload, e.g. one captured from another device. */
export function fixedAuthPayload(payload: Uint8Array): AuthPayloadGenerator {
  if (payload.length !== AUTH_PAYLOAD_LENGTH) {
    throw new InvalidArgumentError(`Auth payload must be ${AUTH_PAYLOAD_LENGTH} bytes, got ${payload.length}`);
  }
  const copy = payload.slice();
  return () => copy.slice();
}
