/**
 * Protocol constants for the TP90x thermometer family.
 */

export const SERVICE_UUID = '1086fff0-3343-4817-8bb2-b32206336ce8';
export const WRITE_CHAR_UUID = '1086fff1-3343-4817-8bb2-b32206336ce8';
export const NOTIFY_CHAR_UUID = '1086fff2-3343-4817-8bb2-b32206336ce8';

export const Opcode = {
  Auth: 0x01,
  Backlight: 0x02,
  Unclassified03: 0x03,
  SetUnits: 0x20,
  SetAlarmSound: 0x21,
  SetAlarm: 0x23,
  Alarm: 0x24,
  Snapshot: 0x25,
  Status: 0x26,
  SnoozeAlarm: 0x27,
  SyncTime: 0x28,
  Unclassified29: 0x29,
  Broadcast: 0x30,
  Firmware: 0x41,
  Unclassified42: 0x42,
  DeviceError: 0xe0,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];

/** Shared byte pair for units and the on/off style flags. */
export const UNITS_CELSIUS = 0x0c;
export const UNITS_FAHRENHEIT = 0x0f;
export const FLAG_ON = 0x0c;
export const FLAG_OFF = 0x0f;

export const ALARM_MODE_OFF = 0x00;
export const ALARM_MODE_TARGET = 0x0a;
export const ALARM_MODE_RANGE = 0x82;

/** 2020-01-01T00:00:00Z as Unix seconds. */
export const EPOCH_2020 = 1_577_836_800;

export const MAX_PROBES = 6;
