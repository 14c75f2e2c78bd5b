import type { ThermometerModel } from './interfaces/thermometer-model.js';
import { createLogger } from './logger.js';
import { Thermometer, type ThermometerOptions } from './models/thermometer.js';
import { Session, type SessionOptions } from './session/session.js';
import { openBleTransport } from './transport/index.js';
import type { BleDriver, Locator, OpenOptions, Transport } from './transport/types.js';
import { errMsg } from './utils/error.js';

const log = createLogger('Connect');

export interface ConnectOptions {
  ble?: OpenOptions;
  /** Force a BLE driver; defaults to NOBLE_DRIVER, then the OS default. */
  driver?: BleDriver;
  session?: SessionOptions;
  thermometer?: ThermometerOptions;
}

/**
 * Wrap an already-open transport: start a session on it and return the facade.
 * The transport is closed if the session cannot be opened.
 */
export async function createThermometer(
  transport: Transport,
  model: ThermometerModel,
  options: Omit<ConnectOptions, 'ble' | 'driver'> = {},
): Promise<Thermometer> {
  const session = new Session(transport, options.session);
  try {
    await session.open();
  } catch (err) {
    await transport.close().catch((closeErr: unknown) => {
      log.debug(`Transport close after failed open failed: ${errMsg(closeErr)}`);
    });
    throw err;
  }
  return new Thermometer(session, model, options.thermometer);
}

/**
 * Find the device over BLE, connect, and open a session.
 * The returned thermometer still needs `authenticate()`.
 */
export async function connectThermometer(
  model: ThermometerModel,
  locator: Locator = model.locate(),
  options: ConnectOptions = {},
): Promise<Thermometer> {
  const link = await openBleTransport(locator, options.ble, options.driver);
  log.info(`Connected to ${link.name || model.name} [${link.address}]`);
  return createThermometer(link.transport, model, options);
}
