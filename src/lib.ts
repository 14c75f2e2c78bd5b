export * from './protocol/index.js';
export * from './errors.js';
export { Session, DEFAULT_ACK_GRACE_MS, DEFAULT_REQUEST_TIMEOUT_MS } from './session/session.js';
export type {
  SessionState,
  SessionOptions,
  RequestOptions,
  CommandOptions,
} from './session/session.js';
export { BroadcastStream } from './session/broadcast-stream.js';
export {
  openBleTransport,
  parseBleDriver,
  resolveBleDriver,
  fromPullTransport,
} from './transport/index.js';
export type {
  BleDriver,
  BleLink,
  Locator,
  OpenOptions,
  PullTransport,
  Transport,
} from './transport/index.js';
export { Thermometer, models, findModel, matchModel } from './models/index.js';
export type { ThermometerOptions } from './models/index.js';
export type { ModelId, ThermometerModel, BleDeviceInfo } from './interfaces/thermometer-model.js';
export { connectThermometer, createThermometer } from './connect.js';
export type { ConnectOptions } from './connect.js';
export { createLogger, setLogLevel, LogLevel } from './logger.js';
export type { Logger } from './logger.js';
