#!/usr/bin/env tsx

// Load .env FIRST, before any other module initializes
import './env.js';

import chalk from 'chalk';
import { loadConfig, resolveTarget } from './config/load.js';
import { connectThermometer } from './connect.js';
import { formatAlarm, formatBroadcast, formatStatus } from './format.js';
import { createLogger, LogLevel, setLogLevel } from './logger.js';
import type { Thermometer } from './models/thermometer.js';
import { formatFirmwareVersion } from './protocol/messages.js';
import { errMsg } from './utils/error.js';
import { withRetry } from './utils/retry.js';

const log = createLogger('Monitor');

// ─── Abort / signal handling ─────────────────────────────────────────────────

const ac = new AbortController();
const { signal } = ac;
let forceExitOnNext = false;

function onSignal(): void {
  if (forceExitOnNext) {
    log.info('Force exit.');
    process.exit(1);
  }
  forceExitOnNext = true;
  log.info('\nShutting down gracefully... (press again to force exit)');
  ac.abort();
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

// ─── Session ─────────────────────────────────────────────────────────────────

async function describeDevice(tp: Thermometer): Promise<void> {
  const status = await tp.getStatus();
  log.info(formatStatus(status));

  const fw = await tp.getFirmwareVersion();
  log.info(`Firmware ${formatFirmwareVersion(fw)}`);

  for (let channel = 1; channel <= tp.model.probeCount; channel++) {
    try {
      log.info(formatAlarm(await tp.readAlarm(channel)));
    } catch (err) {
      log.warn(`P${channel} alarm unreadable: ${errMsg(err)}`);
    }
  }
}

async function monitor(tp: Thermometer, syncTime: boolean): Promise<void> {
  const auth = await tp.authenticate();
  log.debug(`Auth reply: type 0x${auth.deviceTypeHint.toString(16)}, probes ${auth.probeCountHint}`);

  if (syncTime) await tp.syncTime();
  await describeDevice(tp);

  log.info(chalk.dim('Streaming temperatures (Ctrl+C to stop)...'));
  for await (const broadcast of tp.subscribeBroadcasts()) {
    const line = formatBroadcast(broadcast);
    console.log(broadcast.deviceAlarmFlag ? chalk.red.bold(line) : line);
  }

  if (!signal.aborted) throw new Error('Connection lost');
}

// ─── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadConfig();
  if (config.runtime.debug) setLogLevel(LogLevel.DEBUG);

  const { model, locator, driver } = resolveTarget(config);
  log.info(chalk.bold(`\nTP90x Monitor: ${model.name} (${model.probeCount} probes)`));

  const tp = await withRetry(
    () =>
      connectThermometer(model, locator, {
        driver: driver ?? undefined,
        ble: {
          scanTimeoutMs: config.ble.scan_timeout_ms,
          connectTimeoutMs: config.ble.connect_timeout_ms,
          abortSignal: signal,
        },
        session: {
          requestTimeoutMs: config.session.request_timeout_ms,
          ackGraceMs: config.session.ack_grace_ms,
        },
      }),
    { maxRetries: 2, delayMs: 2_000, log, label: 'connect', shouldRetry: () => !signal.aborted },
  );

  const onAbort = (): void => {
    tp.disconnect().catch((err: unknown) => log.debug(`Disconnect failed: ${errMsg(err)}`));
  };
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    await monitor(tp, config.runtime.sync_time_on_connect);
  } finally {
    signal.removeEventListener('abort', onAbort);
    await tp.disconnect();
  }
  log.info('Stopped.');
}

main().catch((err: unknown) => {
  if (signal.aborted) {
    log.info('Stopped.');
    return;
  }
  log.error(errMsg(err));
  process.exit(1);
});
