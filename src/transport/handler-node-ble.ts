import NodeBle from 'node-ble';
import { NOTIFY_CHAR_UUID, SERVICE_UUID, WRITE_CHAR_UUID } from '../protocol/constants.js';
import { TransportError } from '../errors.js';
import type { BleLink, Locator, OpenOptions, Transport } from './types.js';
import {
  bleLog,
  formatMac,
  matchesName,
  describeLocator,
  abortableSleep,
  errMsg,
  withTimeout,
  SCAN_TIMEOUT_MS,
  CONNECT_TIMEOUT_MS,
  MAX_CONNECT_RETRIES,
  DISCOVERY_POLL_MS,
  GATT_DISCOVERY_TIMEOUT_MS,
} from './types.js';

type Device = NodeBle.Device;
type Adapter = NodeBle.Adapter;
type GattCharacteristic = NodeBle.GattCharacteristic;

// ─── Discovery helpers ────────────────────────────────────────────────────────

/** Start BlueZ discovery; returns false when only passive scanning is available. */
async function startDiscoverySafe(btAdapter: Adapter): Promise<boolean> {
  try {
    await btAdapter.startDiscovery();
    bleLog.debug('Discovery started');
    return true;
  } catch (e) {
    bleLog.debug(`startDiscovery failed: ${errMsg(e)}`);
  }

  // Already running (another D-Bus client owns the session)
  if (await btAdapter.isDiscovering()) {
    bleLog.debug('Discovery already active (owned by another client), continuing');
    return true;
  }

  bleLog.warn(
    'Could not start active discovery. ' +
      'Proceeding with passive scanning (device may take longer to appear).',
  );
  return false;
}

/** BlueZ on low-power hosts often aborts the connection while discovery is running. */
async function stopDiscoverySafe(btAdapter: Adapter): Promise<void> {
  try {
    await btAdapter.stopDiscovery();
    bleLog.debug('Discovery stopped');
  } catch (e) {
    bleLog.debug(`stopDiscovery failed (may already be stopped): ${errMsg(e)}`);
  }
}

async function findByName(
  btAdapter: Adapter,
  wanted: string | RegExp,
  scanTimeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<Device> {
  const deadline = Date.now() + scanTimeoutMs;
  const checked = new Set<string>();
  let heartbeat = 0;

  while (Date.now() < deadline) {
    abortSignal?.throwIfAborted();
    const addresses = await btAdapter.devices();

    for (const addr of addresses) {
      if (checked.has(addr)) continue;
      checked.add(addr);

      try {
        const dev = await btAdapter.getDevice(addr);
        const name = await dev.getName().catch(() => '');
        if (!name) {
          // Name may resolve on a later poll
          checked.delete(addr);
          continue;
        }
        bleLog.debug(`Discovered: ${name} [${addr}]`);
        if (matchesName(name, wanted)) return dev;
      } catch (e) {
        bleLog.debug(`Device ${addr} went away: ${errMsg(e)}`);
      }
    }

    heartbeat++;
    if (heartbeat % 5 === 0) {
      bleLog.info('Still scanning...');
    }
    await abortableSleep(DISCOVERY_POLL_MS, abortSignal);
  }

  throw new TransportError(`No device with name ${String(wanted)} found within ${scanTimeoutMs / 1000}s`);
}

async function connectWithRetries(
  device: Device,
  maxRetries: number,
  connectTimeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<void> {
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    abortSignal?.throwIfAborted();
    try {
      const t0 = Date.now();
      bleLog.debug(`Connect attempt ${attempt + 1}/${maxRetries + 1}...`);
      await withTimeout(device.connect(), connectTimeoutMs, 'Connection timed out');
      bleLog.debug(`Connected (took ${Date.now() - t0}ms)`);
      return;
    } catch (err: unknown) {
      const msg = errMsg(err);
      if (attempt >= maxRetries) {
        throw new TransportError(`Connection failed after ${maxRetries + 1} attempts: ${msg}`);
      }
      const delay = 1000 + attempt * 500;
      bleLog.warn(`Connect error: ${msg}. Retrying (${attempt + 1}/${maxRetries}) in ${delay}ms...`);
      await device.disconnect().catch((e: unknown) => {
        bleLog.debug(`Disconnect before retry failed: ${errMsg(e)}`);
      });
      await abortableSleep(delay, abortSignal);
    }
  }
}

// ─── Transport wrapper ────────────────────────────────────────────────────────

function wrapDevice(
  device: Device,
  writeChar: GattCharacteristic,
  notifyChar: GattCharacteristic,
  destroy: () => void,
): Transport {
  return {
    write: async (data) => {
      await writeChar.writeValue(Buffer.from(data));
    },
    subscribe: async (onData) => {
      const listener = (data: Buffer): void => onData(new Uint8Array(data));
      notifyChar.on('valuechanged', listener);
      await notifyChar.startNotifications();
      return () => {
        notifyChar.removeListener('valuechanged', listener);
      };
    },
    onDisconnect: (callback) => {
      device.once('disconnect', () => callback());
    },
    close: async () => {
      try {
        await notifyChar.stopNotifications();
        await device.disconnect();
      } finally {
        destroy();
      }
    },
  };
}

// ─── Exports ──────────────────────────────────────────────────────────────────

/**
 * Find, connect and bind the TP90x characteristics.
 * Uses node-ble (BlueZ D-Bus) and requires bluetoothd running on Linux.
 */
export async function openTransport(locator: Locator, opts: OpenOptions = {}): Promise<BleLink> {
  const scanTimeoutMs = opts.scanTimeoutMs ?? SCAN_TIMEOUT_MS;
  const { bluetooth, destroy } = NodeBle.createBluetooth();
  let device: Device | null = null;

  try {
    const btAdapter = await bluetooth.defaultAdapter();

    if (!(await btAdapter.isPowered())) {
      throw new TransportError(
        'Bluetooth adapter is not powered on. ' +
          'Ensure bluetoothd is running: sudo systemctl start bluetooth',
      );
    }

    await startDiscoverySafe(btAdapter);
    bleLog.info(`Scanning for ${describeLocator(locator)}...`);

    if (locator.by === 'address') {
      const mac = formatMac(locator.address);
      device = await withTimeout(
        btAdapter.waitDevice(mac),
        scanTimeoutMs,
        `Device ${mac} not found within ${scanTimeoutMs / 1000}s`,
      );
    } else {
      device = await findByName(btAdapter, locator.name, scanTimeoutMs, opts.abortSignal);
    }

    const address = await device.getAddress();
    const name = await device.getName().catch(() => '');
    bleLog.debug(`Found device: ${name} [${address}]`);

    await stopDiscoverySafe(btAdapter);
    await connectWithRetries(
      device,
      opts.maxConnectRetries ?? MAX_CONNECT_RETRIES,
      opts.connectTimeoutMs ?? CONNECT_TIMEOUT_MS,
      opts.abortSignal,
    );
    bleLog.info(`Connected to ${name || address}. Discovering characteristics...`);

    const connected = device;
    const { writeChar, notifyChar } = await withTimeout(
      (async () => {
        const gatt = await connected.gatt();
        const service = await gatt.getPrimaryService(SERVICE_UUID);
        return {
          writeChar: await service.getCharacteristic(WRITE_CHAR_UUID),
          notifyChar: await service.getCharacteristic(NOTIFY_CHAR_UUID),
        };
      })(),
      GATT_DISCOVERY_TIMEOUT_MS,
      'GATT service discovery timed out',
    );

    return { transport: wrapDevice(connected, writeChar, notifyChar, destroy), address, name };
  } catch (err) {
    if (device) {
      await device.disconnect().catch((e: unknown) => {
        bleLog.debug(`Disconnect after failed setup failed: ${errMsg(e)}`);
      });
    }
    destroy();
    throw err instanceof TransportError ? err : new TransportError(errMsg(err));
  }
}
