import type { BleDriver, BleLink, Locator, OpenOptions } from './types.js';
import { bleLog } from './types.js';

export type {
  BleDriver,
  BleLink,
  Locator,
  OpenOptions,
  PullTransport,
  Transport,
} from './types.js';
export { fromPullTransport } from './pull.js';

/** Resolve a NOBLE_DRIVER value to a driver, or null for the OS default. */
export function parseBleDriver(raw: string | undefined): BleDriver | null {
  const driver = raw?.trim().toLowerCase();
  if (driver === 'abandonware' || driver === 'noble') return 'abandonware';
  if (driver === 'node-ble' || driver === 'bluez') return 'node-ble';
  return null;
}

/** OS default: BlueZ D-Bus on Linux, noble everywhere else. */
export function resolveBleDriver(
  override: BleDriver | null,
  platform: NodeJS.Platform = process.platform,
): BleDriver {
  if (override) return override;
  return platform === 'linux' ? 'node-ble' : 'abandonware';
}

/**
 * Scan for the device, connect, and bind the TP90x characteristics.
 *
 * The driver comes from `driver`, then NOBLE_DRIVER, then the OS default.
 * Dynamic import() ensures the unused library is never loaded.
 */
export async function openBleTransport(
  locator: Locator,
  opts: OpenOptions = {},
  driver?: BleDriver,
): Promise<BleLink> {
  const resolved = resolveBleDriver(driver ?? parseBleDriver(process.env.NOBLE_DRIVER));
  bleLog.debug(
    `BLE handler: ${resolved === 'node-ble' ? 'node-ble (BlueZ D-Bus)' : 'noble (@abandonware/noble)'}`,
  );

  if (resolved === 'node-ble') {
    const { openTransport } = await import('./handler-node-ble.js');
    return openTransport(locator, opts);
  }
  const { openTransport } = await import('./handler-noble.js');
  return openTransport(locator, opts);
}
