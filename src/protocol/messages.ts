import type { Temperature } from './temperature.js';

export type TemperatureUnit = 'celsius' | 'fahrenheit';

export type AlarmMode = 'off' | 'target' | 'range';

export interface AuthResponse {
  /** First reply byte; believed to identify the device type. */
  deviceTypeHint: number;
  /** Second reply byte; believed to carry the probe count. */
  probeCountHint: number;
  raw: Uint8Array;
}

export interface DeviceStatus {
  units: TemperatureUnit | 'unknown';
  beeperEnabled: boolean;
  batteryPercent: number;
}

export interface TemperatureBroadcast {
  batteryPercent: number;
  units: TemperatureUnit | 'unknown';
  deviceAlarmFlag: boolean;
  /** Alarm byte exactly as sent by the device. */
  alarmBits: number;
  temps: Temperature[];
}

/** Reply to an on-demand read (0x25). Always in °C. */
export interface TemperatureSnapshot {
  probeCount: number;
  deviceAlarmFlag: boolean;
  alarmBits: number;
  temps: Temperature[];
}

export interface AlarmConfig {
  channel: number;
  mode: AlarmMode | 'unknown';
  modeByte: number;
  /** Target temperature, or the upper bound in range mode. */
  primaryTemp: Temperature;
  /** Lower bound in range mode. */
  secondaryTemp: Temperature;
}

export interface FirmwareVersion {
  major: number;
  minor: number;
  /** Trailing bytes of the 0x41 reply; format unconfirmed. */
  buildInfo: Uint8Array;
}

export type InboundMessage =
  | ({ kind: 'auth' } & AuthResponse)
  | ({ kind: 'status' } & DeviceStatus)
  | ({ kind: 'broadcast' } & TemperatureBroadcast)
  | ({ kind: 'snapshot' } & TemperatureSnapshot)
  | ({ kind: 'alarm' } & AlarmConfig)
  | ({ kind: 'firmware' } & FirmwareVersion)
  | { kind: 'raw'; opcode: number; payload: Uint8Array };

export type InboundKind = InboundMessage['kind'];

export function formatFirmwareVersion(fw: FirmwareVersion): string {
  const build = Array.from(fw.buildInfo, (b) => b.toString(16).padStart(2, '0'));
  return [`${fw.major}.${fw.minor}`, ...build].join('.');
}
