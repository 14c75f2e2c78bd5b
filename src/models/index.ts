import type { BleDeviceInfo, ModelId, ThermometerModel } from '../interfaces/thermometer-model.js';
import { Tp902Model } from './tp902.js';
import { Tp904Model } from './tp904.js';

export { Thermometer } from './thermometer.js';
export type { ThermometerOptions } from './thermometer.js';

export const models: readonly ThermometerModel[] = [new Tp902Model(), new Tp904Model()];

export function findModel(id: ModelId): ThermometerModel {
  const model = models.find((m) => m.id === id);
  if (!model) throw new Error(`Unknown model '${id}'`);
  return model;
}

/** Identify a model from its advertisement, if any model claims it. */
export function matchModel(device: BleDeviceInfo): ThermometerModel | undefined {
  return models.find((m) => m.matches(device));
}
