/**
 * Payload decoders for inbound frames.
 *
 * Each decoder receives a payload whose length the catalog has already checked.
 * Decoders throw (e.g. InvalidBcdError) only on content they cannot represent.
 */

import type { Temperature } from './temperature.js';
import { decodeTemperature } from './temperature.js';
import {
  ALARM_MODE_OFF,
  ALARM_MODE_RANGE,
  ALARM_MODE_TARGET,
  FLAG_ON,
  UNITS_CELSIUS,
  UNITS_FAHRENHEIT,
} from './constants.js';
import type { AlarmMode, InboundMessage, TemperatureUnit } from './messages.js';

export function decodeUnits(byte: number): TemperatureUnit | 'unknown' {
  if (byte === UNITS_CELSIUS) return 'celsius';
  if (byte === UNITS_FAHRENHEIT) return 'fahrenheit';
  return 'unknown';
}

export function decodeAlarmMode(byte: number): AlarmMode | 'unknown' {
  switch (byte) {
    case ALARM_MODE_OFF:
      return 'off';
    case ALARM_MODE_TARGET:
      return 'target';
    case ALARM_MODE_RANGE:
      return 'range';
    default:
      return 'unknown';
  }
}

function decodeProbes(payload: Uint8Array, offset: number): Temperature[] {
  const temps: Temperature[] = [];
  for (let i = offset; i + 1 < payload.length; i += 2) {
    temps.push(decodeTemperature(payload, i));
  }
  return temps;
}

/** 0x01 reply: 2 bytes, meaning only partly known. */
export function parseAuthResponse(payload: Uint8Array): InboundMessage {
  return {
    kind: 'auth',
    deviceTypeHint: payload[0],
    probeCountHint: payload[1],
    raw: payload,
  };
}

/** 0x26 reply: [units][beeper][battery][?][?] */
export function parseStatus(payload: Uint8Array): InboundMessage {
  return {
    kind: 'status',
    units: decodeUnits(payload[0]),
    beeperEnabled: payload[1] === FLAG_ON,
    batteryPercent: payload[2],
  };
}

/** 0x30 broadcast: [battery][units][alarm][probe temps × N] */
export function parseBroadcast(payload: Uint8Array): InboundMessage {
  return {
    kind: 'broadcast',
    batteryPercent: payload[0],
    units: decodeUnits(payload[1]),
    deviceAlarmFlag: payload[2] !== 0,
    alarmBits: payload[2],
    temps: decodeProbes(payload, 3),
  };
}

/** 0x25 snapshot: [probe count][alarm][probe temps × N] */
export function parseSnapshot(payload: Uint8Array): InboundMessage {
  return {
    kind: 'snapshot',
    probeCount: payload[0],
    deviceAlarmFlag: payload[1] !== 0,
    alarmBits: payload[1],
    temps: decodeProbes(payload, 2),
  };
}

/** 0x24 reply: [channel][mode][primary BCD][secondary BCD] */
export function parseAlarmConfig(payload: Uint8Array): InboundMessage {
  return {
    kind: 'alarm',
    channel: payload[0],
    mode: decodeAlarmMode(payload[1]),
    modeByte: payload[1],
    primaryTemp: decodeTemperature(payload, 2),
    secondaryTemp: decodeTemperature(payload, 4),
  };
}

/** 0x41 reply: [major:4|minor:4][build][build] */
export function parseFirmwareVersion(payload: Uint8Array): InboundMessage {
  return {
    kind: 'firmware',
    major: payload[0] >> 4,
    minor: payload[0] & 0x0f,
    buildInfo: payload.slice(1),
  };
}

export function rawMessage(opcode: number, payload: Uint8Array): InboundMessage {
  return { kind: 'raw', opcode, payload };
}
