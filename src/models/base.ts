import type {
  BleDeviceInfo,
  ModelId,
  ThermometerModel,
} from '../interfaces/thermometer-model.js';
import type { Locator } from '../transport/types.js';

/** Shared matching and locating logic; subclasses only declare their identity. */
export abstract class BaseModel implements ThermometerModel {
  abstract readonly id: ModelId;
  abstract readonly name: string;
  abstract readonly probeCount: number;
  abstract readonly namePattern: RegExp;

  matches(device: BleDeviceInfo): boolean {
    return this.namePattern.test(device.localName || '');
  }

  locate(target: { address?: string; name?: string } = {}): Locator {
    if (target.address) return { by: 'address', address: target.address };
    if (target.name) return { by: 'name', name: target.name };
    return { by: 'name', name: this.namePattern };
  }
}
