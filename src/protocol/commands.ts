/**
 * Payload builders for outbound commands.
 *
 * These return payloads only; the session wraps them in a frame after checking
 * them against the catalog.
 */

import { InvalidArgumentError } from '../errors.js';
import {
  ALARM_MODE_OFF,
  ALARM_MODE_RANGE,
  ALARM_MODE_TARGET,
  EPOCH_2020,
  FLAG_OFF,
  FLAG_ON,
  MAX_PROBES,
  UNITS_CELSIUS,
  UNITS_FAHRENHEIT,
} from './constants.js';
import type { AlarmMode, TemperatureUnit } from './messages.js';
import { ABSENT, encodeTemperature, type Temperature } from './temperature.js';

const EMPTY = new Uint8Array(0);

export function assertChannel(channel: number, probeCount = MAX_PROBES): number {
  if (!Number.isInteger(channel) || channel < 1 || channel > probeCount) {
    throw new InvalidArgumentError(`Channel must be between 1 and ${probeCount}, got ${channel}`);
  }
  return channel;
}

export function buildStatusRequest(): Uint8Array {
  return EMPTY;
}

export function buildFirmwareRequest(): Uint8Array {
  return EMPTY;
}

export function buildAlarmRequest(channel: number, probeCount?: number): Uint8Array {
  return Uint8Array.of(assertChannel(channel, probeCount));
}

export function buildSetUnits(unit: TemperatureUnit): Uint8Array {
  return Uint8Array.of(unit === 'celsius' ? UNITS_CELSIUS : UNITS_FAHRENHEIT);
}

export function buildSetAlarmSound(enabled: boolean): Uint8Array {
  return Uint8Array.of(enabled ? FLAG_ON : FLAG_OFF);
}

/**
 * 0x23 payload: [channel][mode][primary BCD][secondary BCD]
 *
 * Off sends both temperatures as `ff ff`; target sends `00 00` as the secondary.
 */
export function buildSetAlarm(
  channel: number,
  mode: AlarmMode,
  primary: Temperature = ABSENT,
  secondary: Temperature = ABSENT,
  probeCount?: number,
): Uint8Array {
  assertChannel(channel, probeCount);

  let modeByte: number;
  let first: Temperature;
  let second: Temperature;
  switch (mode) {
    case 'off':
      modeByte = ALARM_MODE_OFF;
      first = ABSENT;
      second = ABSENT;
      break;
    case 'target':
      if (primary.kind === 'absent') {
        throw new InvalidArgumentError('Target alarm needs a target temperature');
      }
      modeByte = ALARM_MODE_TARGET;
      first = primary;
      second = { kind: 'reading', tenths: 0 };
      break;
    case 'range':
      if (primary.kind === 'absent' || secondary.kind === 'absent') {
        throw new InvalidArgumentError('Range alarm needs both a high and a low temperature');
      }
      if (secondary.tenths > primary.tenths) {
        throw new InvalidArgumentError('Range alarm low bound is above the high bound');
      }
      modeByte = ALARM_MODE_RANGE;
      first = primary;
      second = secondary;
      break;
    default:
      throw new InvalidArgumentError(`Unknown alarm mode '${String(mode)}'`);
  }

  const out = new Uint8Array(6);
  out[0] = channel;
  out[1] = modeByte;
  out.set(encodeTemperature(first), 2);
  out.set(encodeTemperature(second), 4);
  return out;
}

/** Seconds since 2020-01-01T00:00:00Z for the given instant (default: now). */
export function secondsSince2020(now: Date = new Date()): number {
  return Math.max(0, Math.floor(now.getTime() / 1000) - EPOCH_2020);
}

/** 0x28 payload: uint32 little-endian seconds since 2020-01-01 UTC. */
export function buildSyncTime(seconds: number): Uint8Array {
  if (!Number.isInteger(seconds) || seconds < 0 || seconds > 0xffffffff) {
    throw new InvalidArgumentError(`Time must be an unsigned 32-bit second count, got ${seconds}`);
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, seconds, true);
  return out;
}
