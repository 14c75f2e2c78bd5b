import type {
  AlarmConfig,
  DeviceStatus,
  TemperatureBroadcast,
  TemperatureUnit,
} from './protocol/messages.js';
import { formatTemperature, type Temperature } from './protocol/temperature.js';

export function unitSymbol(units: TemperatureUnit | 'unknown'): string {
  if (units === 'celsius') return '°C';
  if (units === 'fahrenheit') return '°F';
  return '';
}

function probe(temp: Temperature, symbol: string): string {
  return temp.kind === 'reading' ? `${formatTemperature(temp)}${symbol}` : formatTemperature(temp);
}

/** `P1 21.5°C | P2 --- | Battery 80%`, with ` | ALARM` appended while the device alarm is set. */
export function formatBroadcast(b: TemperatureBroadcast): string {
  const symbol = unitSymbol(b.units);
  const probes = b.temps.map((t, i) => `P${i + 1} ${probe(t, symbol)}`);
  const parts = [...probes, `Battery ${b.batteryPercent}%`];
  if (b.deviceAlarmFlag) parts.push('ALARM');
  return parts.join(' | ');
}

export function formatStatus(s: DeviceStatus): string {
  const units = s.units === 'unknown' ? 'unknown units' : unitSymbol(s.units);
  return `Units ${units}, beeper ${s.beeperEnabled ? 'on' : 'off'}, battery ${s.batteryPercent}%`;
}

export function formatAlarm(a: AlarmConfig): string {
  switch (a.mode) {
    case 'off':
      return `P${a.channel} alarm off`;
    case 'target':
      return `P${a.channel} alarm at ${formatTemperature(a.primaryTemp)}`;
    case 'range':
      return (
        `P${a.channel} alarm outside ` +
        `${formatTemperature(a.secondaryTemp)}..${formatTemperature(a.primaryTemp)}`
      );
    case 'unknown':
      return `P${a.channel} alarm mode 0x${a.modeByte.toString(16).padStart(2, '0')}`;
  }
}
