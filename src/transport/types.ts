import { createLogger } from '../logger.js';
export { errMsg } from '../utils/error.js';

// ─── Constants ────────────────────────────────────────────────────────────────

export const BT_BASE_UUID_SUFFIX = '00001000800000805f9b34fb';
export const SCAN_TIMEOUT_MS = 10_000;
export const CONNECT_TIMEOUT_MS = 20_000;
export const MAX_CONNECT_RETRIES = 3;
export const DISCOVERY_POLL_MS = 1_000;

/** Timeout for GATT service/characteristic enumeration after connecting. */
export const GATT_DISCOVERY_TIMEOUT_MS = 15_000;

// ─── Types ────────────────────────────────────────────────────────────────────

/**
 * Push-style link to one connected device.
 *
 * `write` sends one frame to the write characteristic; notifications from the
 * notify characteristic are delivered to the `subscribe` callback as they arrive.
 */
export interface Transport {
  write(data: Uint8Array): Promise<void>;
  /** Subscribe to notifications. Returns an unsubscribe function. */
  subscribe(onData: (data: Uint8Array) => void): Promise<() => void>;
  /** `error` is set when the link failed rather than closed normally. */
  onDisconnect(callback: (error?: Error) => void): void;
  close(): Promise<void>;
}

/**
 * Pull-style link: the caller asks for the next notification.
 * `receive` resolves null when nothing arrived within the timeout.
 */
export interface PullTransport {
  send(data: Uint8Array): Promise<void>;
  receive(timeoutMs: number): Promise<Uint8Array | null>;
  close(): Promise<void>;
}

/** How to find the device: by its address, or by its advertised name. */
export type Locator = { by: 'address'; address: string } | { by: 'name'; name: string | RegExp };

export type BleDriver = 'abandonware' | 'node-ble';

export interface OpenOptions {
  scanTimeoutMs?: number;
  connectTimeoutMs?: number;
  maxConnectRetries?: number;
  abortSignal?: AbortSignal;
}

/** A connected transport plus what discovery learned about the device. */
export interface BleLink {
  transport: Transport;
  address: string;
  name: string;
}

// ─── Pure utilities ───────────────────────────────────────────────────────────

export const bleLog = createLogger('BLE');

/** Normalize a UUID to lowercase 32-char (no dashes) form for comparison. */
export function normalizeUuid(uuid: string): string {
  const stripped = uuid.replace(/-/g, '').toLowerCase();
  if (stripped.length === 4) {
    return `0000${stripped}${BT_BASE_UUID_SUFFIX}`;
  }
  return stripped;
}

/** Format MAC address for BlueZ D-Bus (uppercase with colons). */
export function formatMac(mac: string): string {
  const clean = mac.replace(/[:-]/g, '').toUpperCase();
  return (clean.match(/.{2}/g) ?? []).join(':');
}

/** Compare two addresses ignoring case and separators. */
export function sameAddress(a: string, b: string): boolean {
  const norm = (s: string): string => s.replace(/[:-]/g, '').toUpperCase();
  return norm(a) === norm(b);
}

/** Exact (case-insensitive) match for strings, `test()` for patterns. */
export function matchesName(localName: string, wanted: string | RegExp): boolean {
  if (!localName) return false;
  if (typeof wanted === 'string') return localName.toLowerCase() === wanted.toLowerCase();
  return wanted.test(localName);
}

export function describeLocator(locator: Locator): string {
  return locator.by === 'address' ? `address ${locator.address}` : `name ${String(locator.name)}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/** The signal's abort reason, or a generic AbortError. */
export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DOMException('Aborted', 'AbortError');
}

/** `sleep` that rejects with the abort reason as soon as `signal` fires. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return sleep(ms);
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
