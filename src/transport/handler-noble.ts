import noble from '@abandonware/noble';
import type { Characteristic, Peripheral } from '@abandonware/noble';
import { NOTIFY_CHAR_UUID, SERVICE_UUID, WRITE_CHAR_UUID } from '../protocol/constants.js';
import { TransportError } from '../errors.js';
import type { BleLink, Locator, OpenOptions, Transport } from './types.js';
import {
  bleLog,
  normalizeUuid,
  sameAddress,
  matchesName,
  describeLocator,
  abortableSleep,
  abortReason,
  errMsg,
  withTimeout,
  SCAN_TIMEOUT_MS,
  CONNECT_TIMEOUT_MS,
  MAX_CONNECT_RETRIES,
  GATT_DISCOVERY_TIMEOUT_MS,
} from './types.js';

// ─── Noble state management ───────────────────────────────────────────────────

/** Wait for the Bluetooth adapter to reach 'poweredOn' state. */
function waitForPoweredOn(): Promise<void> {
  if (noble._state === 'poweredOn') return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      noble.removeListener('stateChange', onState);
      reject(new TransportError(`Bluetooth adapter state: '${noble._state}' (expected 'poweredOn')`));
    }, 10_000);

    const onState = (state: string): void => {
      if (state === 'poweredOn') {
        clearTimeout(timeout);
        noble.removeListener('stateChange', onState);
        resolve();
      }
    };
    noble.on('stateChange', onState);
  });
}

/** Get a stable device address: MAC on Windows/Linux, peripheral.id on macOS. */
function peripheralAddress(peripheral: Peripheral): string {
  if (peripheral.address && !['', 'unknown', '<unknown>'].includes(peripheral.address)) {
    return peripheral.address.toUpperCase();
  }
  return peripheral.id;
}

function matchesLocator(peripheral: Peripheral, locator: Locator): boolean {
  if (locator.by === 'address') {
    return (
      sameAddress(peripheral.address ?? '', locator.address) ||
      sameAddress(peripheral.id ?? '', locator.address)
    );
  }
  return matchesName(peripheral.advertisement?.localName ?? '', locator.name);
}

// ─── Discovery ────────────────────────────────────────────────────────────────

function discoverPeripheral(
  locator: Locator,
  scanTimeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<Peripheral> {
  if (abortSignal?.aborted) {
    return Promise.reject(abortReason(abortSignal));
  }

  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      cleanup();
      reject(
        new TransportError(
          `No device with ${describeLocator(locator)} found within ${scanTimeoutMs / 1000}s`,
        ),
      );
    }, scanTimeoutMs);

    const cleanup = (): void => {
      clearTimeout(timeout);
      noble.removeListener('discover', onDiscover);
      noble.stopScanningAsync().catch((err: unknown) => {
        bleLog.debug(`stopScanning failed: ${errMsg(err)}`);
      });
      abortSignal?.removeEventListener('abort', onAbort);
    };

    const onAbort = (): void => {
      cleanup();
      if (abortSignal) reject(abortReason(abortSignal));
    };

    abortSignal?.addEventListener('abort', onAbort, { once: true });

    const onDiscover = (peripheral: Peripheral): void => {
      const name = peripheral.advertisement?.localName ?? '';
      bleLog.debug(`Discovered: ${name || '(no name)'} [${peripheralAddress(peripheral)}]`);
      if (!matchesLocator(peripheral, locator)) return;

      cleanup();
      resolve(peripheral);
    };

    noble.on('discover', onDiscover);

    // Scan for everything: not all firmware puts the service UUID in the advertisement
    noble.startScanningAsync([], true).catch((err: unknown) => {
      cleanup();
      reject(new TransportError(`Failed to start scanning: ${errMsg(err)}`));
    });

    bleLog.info(`Scanning for ${describeLocator(locator)}...`);
  });
}

async function connectWithRetries(
  peripheral: Peripheral,
  maxRetries: number,
  connectTimeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<void> {
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    abortSignal?.throwIfAborted();
    try {
      bleLog.debug(`Connect attempt ${attempt + 1}/${maxRetries + 1}...`);
      await withTimeout(peripheral.connectAsync(), connectTimeoutMs, 'Connection timed out');
      return;
    } catch (err: unknown) {
      const msg = errMsg(err);
      if (attempt >= maxRetries) {
        throw new TransportError(`Connection failed after ${maxRetries + 1} attempts: ${msg}`);
      }
      const delay = 1000 + attempt * 500;
      bleLog.warn(`Connect error: ${msg}. Retrying (${attempt + 1}/${maxRetries}) in ${delay}ms...`);
      await peripheral.disconnectAsync().catch((e: unknown) => {
        bleLog.debug(`Disconnect before retry failed: ${errMsg(e)}`);
      });
      await abortableSleep(delay, abortSignal);
    }
  }
}

// ─── Transport wrapper ────────────────────────────────────────────────────────

function wrapPeripheral(
  peripheral: Peripheral,
  writeChar: Characteristic,
  notifyChar: Characteristic,
): Transport {
  return {
    write: async (data) => {
      await writeChar.writeAsync(Buffer.from(data), false);
    },
    subscribe: async (onData) => {
      const listener = (data: Buffer): void => onData(new Uint8Array(data));
      notifyChar.on('data', listener);
      await notifyChar.subscribeAsync();
      return () => {
        notifyChar.removeListener('data', listener);
      };
    },
    onDisconnect: (callback) => {
      peripheral.once('disconnect', () => callback());
    },
    close: async () => {
      try {
        await notifyChar.unsubscribeAsync();
      } catch (err) {
        bleLog.debug(`Unsubscribe failed: ${errMsg(err)}`);
      }
      await peripheral.disconnectAsync();
    },
  };
}

// ─── Exports ──────────────────────────────────────────────────────────────────

/**
 * Find, connect and bind the TP90x characteristics using noble.
 * Works on Windows and macOS, and on Linux with HCI socket access.
 */
export async function openTransport(locator: Locator, opts: OpenOptions = {}): Promise<BleLink> {
  await waitForPoweredOn();

  const peripheral = await discoverPeripheral(
    locator,
    opts.scanTimeoutMs ?? SCAN_TIMEOUT_MS,
    opts.abortSignal,
  );
  const address = peripheralAddress(peripheral);
  const name = peripheral.advertisement?.localName ?? '';

  await connectWithRetries(
    peripheral,
    opts.maxConnectRetries ?? MAX_CONNECT_RETRIES,
    opts.connectTimeoutMs ?? CONNECT_TIMEOUT_MS,
  );
  bleLog.info(`Connected to ${name || address}. Discovering characteristics...`);

  try {
    const { characteristics } = await withTimeout(
      peripheral.discoverSomeServicesAndCharacteristicsAsync(
        [normalizeUuid(SERVICE_UUID)],
        [normalizeUuid(WRITE_CHAR_UUID), normalizeUuid(NOTIFY_CHAR_UUID)],
      ),
      GATT_DISCOVERY_TIMEOUT_MS,
      'GATT service discovery timed out',
    );

    const byUuid = new Map(
      characteristics.map((c): [string, Characteristic] => [normalizeUuid(c.uuid), c]),
    );
    const writeChar = byUuid.get(normalizeUuid(WRITE_CHAR_UUID));
    const notifyChar = byUuid.get(normalizeUuid(NOTIFY_CHAR_UUID));
    if (!writeChar || !notifyChar) {
      throw new TransportError(
        `Required characteristics not found. Discovered: [${[...byUuid.keys()].join(', ')}]`,
      );
    }

    return { transport: wrapPeripheral(peripheral, writeChar, notifyChar), address, name };
  } catch (err) {
    await peripheral.disconnectAsync().catch((e: unknown) => {
      bleLog.debug(`Disconnect after failed setup failed: ${errMsg(e)}`);
    });
    throw err instanceof TransportError ? err : new TransportError(errMsg(err));
  }
}
