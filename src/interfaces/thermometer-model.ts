import type { Locator } from '../transport/types.js';

export type ModelId = 'tp902' | 'tp904';

/** Minimal BLE advertisement info needed for model matching. */
export interface BleDeviceInfo {
  localName: string;
  address?: string;
}

/**
 * One product variant. Variants share the frame grammar and command catalog;
 * they differ in probe count and in how they are found on the air.
 */
export interface ThermometerModel {
  readonly id: ModelId;
  readonly name: string;
  /** Number of probe sockets; also the highest valid alarm channel. */
  readonly probeCount: number;
  /** Advertised-name pattern used when no address or explicit name is configured. */
  readonly namePattern: RegExp;

  matches(device: BleDeviceInfo): boolean;
  /** Locator for this model: by address when known, else by advertised name. */
  locate(target?: { address?: string; name?: string }): Locator;
}
