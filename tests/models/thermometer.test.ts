import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createThermometer } from '../../src/connect.js';
import { findModel } from '../../src/models/index.js';
import type { Thermometer } from '../../src/models/thermometer.js';
import { fixedAuthPayload } from '../../src/protocol/auth.js';
import { ABSENT, reading } from '../../src/protocol/temperature.js';
import { InvalidArgumentError, SessionStateError, ThermometerError } from '../../src/errors.js';
import type { ModelId } from '../../src/interfaces/thermometer-model.js';
import type { TemperatureBroadcast } from '../../src/protocol/messages.js';
import type { ThermometerOptions } from '../../src/models/thermometer.js';
import { FakeTransport } from '../helpers/fake-transport.js';

// Suppress log output during tests
beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Test helpers ────────────────────────────────────────────────────────────

/** Answers the way a TP902 does: auth, status, firmware and alarm reads. */
function device(data: Uint8Array, t: FakeTransport): void {
  switch (data[0]) {
    case 0x01:
      t.emitFrame(0x01, [0x24, 0x06]);
      break;
    case 0x26:
      t.emitFrame(0x26, [0x0c, 0x0c, 0x50, 0x00, 0x00]);
      break;
    case 0x41:
      t.emitFrame(0x41, [0x12, 0x0a, 0x1b]);
      break;
    case 0x24:
      t.emitFrame(0x24, [data[2], 0x0a, 0x06, 0x50, 0x00, 0x00]);
      break;
  }
}

async function setup(
  modelId: ModelId = 'tp902',
  thermometer: ThermometerOptions = {},
): Promise<{ tp: Thermometer; transport: FakeTransport }> {
  const transport = new FakeTransport();
  transport.onWrite = device;
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const tp = await createThermometer(transport, findModel(modelId), {
    session: { logger },
    thermometer: { ackGraceMs: 0, ...thermometer },
  });
  return { tp, transport };
}

async function readyThermometer(
  modelId: ModelId = 'tp902',
): Promise<{ tp: Thermometer; transport: FakeTransport }> {
  const ctx = await setup(modelId);
  await ctx.tp.authenticate();
  return ctx;
}

function lastWritten(transport: FakeTransport): number[] {
  return Array.from(transport.written[transport.written.length - 1]);
}

// ─── Handshake ───────────────────────────────────────────────────────────────

describe('Thermometer.authenticate()', () => {
  it('returns the decoded handshake reply', async () => {
    const { tp, transport } = await setup();
    expect(tp.state).toBe('connected');

    const auth = await tp.authenticate();

    expect(auth).toEqual({ deviceTypeHint: 0x24, probeCountHint: 6, raw: Uint8Array.of(0x24, 0x06) });
    expect(tp.state).toBe('ready');
    expect(lastWritten(transport)).toEqual([
      0x01, 0x09, 0x99, 0xa8, 0x89, 0x3c, 0x66, 0x81, 0x75, 0x0d, 0xe3, 0x5c,
    ]);
  });

  it('uses a custom payload source', async () => {
    const { tp, transport } = await setup('tp902', {
      authPayload: fixedAuthPayload(new Uint8Array(9).fill(1)),
    });
    await tp.authenticate();
    // 0x01 + 0x09 + 9 × 0x01 = 0x13
    expect(lastWritten(transport)).toEqual([0x01, 0x09, 1, 1, 1, 1, 1, 1, 1, 1, 1, 0x13]);
  });

  it('rejects other commands until authenticated', async () => {
    const { tp } = await setup();
    await expect(tp.getStatus()).rejects.toBeInstanceOf(SessionStateError);
  });
});

// ─── Queries ─────────────────────────────────────────────────────────────────

describe('Thermometer queries', () => {
  it('reads the status', async () => {
    const { tp } = await readyThermometer();
    expect(await tp.getStatus()).toEqual({
      units: 'celsius',
      beeperEnabled: true,
      batteryPercent: 80,
    });
  });

  it('reads the firmware version', async () => {
    const { tp } = await readyThermometer();
    const fw = await tp.getFirmwareVersion();
    expect(fw.major).toBe(1);
    expect(fw.minor).toBe(2);
    expect(Array.from(fw.buildInfo)).toEqual([0x0a, 0x1b]);
  });

  it('reads one channel alarm', async () => {
    const { tp, transport } = await readyThermometer();
    const alarm = await tp.readAlarm(3);

    expect(lastWritten(transport)).toEqual([0x24, 0x01, 0x03, 0x28]);
    expect(alarm).toEqual({
      channel: 3,
      mode: 'target',
      modeByte: 0x0a,
      primaryTemp: { kind: 'reading', tenths: 650 },
      secondaryTemp: { kind: 'reading', tenths: 0 },
    });
  });

  it('rejects a reply for another channel', async () => {
    const { tp, transport } = await readyThermometer();
    transport.onWrite = (data, t) => {
      if (data[0] === 0x24) t.emitFrame(0x24, [0x07, 0x0a, 0x06, 0x50, 0x00, 0x00]);
    };

    const err = await tp.readAlarm(2).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ThermometerError);
    expect(err).toHaveProperty('message', 'Alarm reply is for channel 7, requested channel 2');
  });

  it('rejects a channel outside the model before writing', async () => {
    const { tp, transport } = await readyThermometer();
    await expect(tp.readAlarm(7)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(transport.written).toHaveLength(1);
  });

  it('limits a TP904 to two channels', async () => {
    const { tp } = await readyThermometer('tp904');
    await expect(tp.readAlarm(3)).rejects.toThrow('Channel must be between 1 and 2, got 3');
    await expect(tp.setAlarmConfig(3, 'off')).rejects.toThrow(InvalidArgumentError);
  });
});

// ─── Writes ──────────────────────────────────────────────────────────────────

describe('Thermometer writes', () => {
  it('sets units and alarm sound', async () => {
    const { tp, transport } = await readyThermometer();

    await tp.setUnits('fahrenheit');
    expect(lastWritten(transport)).toEqual([0x20, 0x01, 0x0f, 0x30]);

    await tp.setAlarmSound(false);
    expect(lastWritten(transport)).toEqual([0x21, 0x01, 0x0f, 0x31]);
  });

  it('configures a range alarm', async () => {
    const { tp, transport } = await readyThermometer();
    await tp.setAlarmConfig(1, 'range', reading(30), reading(20));
    expect(lastWritten(transport)).toEqual([0x23, 0x06, 0x01, 0x82, 0x03, 0x00, 0x02, 0x00, 0xb1]);
  });

  it('turns an alarm off', async () => {
    const { tp, transport } = await readyThermometer();
    await tp.setAlarmConfig(2, 'off', ABSENT, ABSENT);
    // 0x23 + 0x06 + 0x02 + 4 × 0xff = 0x427
    expect(lastWritten(transport)).toEqual([0x23, 0x06, 0x02, 0x00, 0xff, 0xff, 0xff, 0xff, 0x27]);
  });

  it('syncs an explicit time', async () => {
    const { tp, transport } = await readyThermometer();
    await tp.syncTime(100);
    expect(lastWritten(transport)).toEqual([0x28, 0x04, 0x64, 0x00, 0x00, 0x00, 0x90]);
  });

  it('syncs the current time by default', async () => {
    const { tp, transport } = await readyThermometer();
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2020-01-01T00:01:40Z'));
    try {
      await tp.syncTime();
    } finally {
      vi.useRealTimers();
    }
    expect(lastWritten(transport)).toEqual([0x28, 0x04, 0x64, 0x00, 0x00, 0x00, 0x90]);
  });

  it('sends backlight and snooze with empty payloads', async () => {
    const { tp, transport } = await readyThermometer();
    await tp.backlightOn();
    expect(lastWritten(transport)).toEqual([0x02, 0x00, 0x02]);
    await tp.snoozeAlarm();
    expect(lastWritten(transport)).toEqual([0x27, 0x00, 0x27]);
  });
});

// ─── Broadcasts ──────────────────────────────────────────────────────────────

describe('Thermometer.subscribeBroadcasts()', () => {
  it('yields temperature broadcasts only, until the connection ends', async () => {
    const { tp, transport } = await readyThermometer('tp904');

    transport.emitFrame(0x30, [0x32, 0x0c, 0x00, 0x02, 0x15, 0xff, 0xff]);
    transport.emitFrame(0x42, [0x00]);
    transport.emitFrame(0x30, [0x31, 0x0c, 0x01, 0xff, 0xff, 0x02, 0x16]);
    transport.triggerDisconnect();

    const seen: TemperatureBroadcast[] = [];
    for await (const b of tp.subscribeBroadcasts()) seen.push(b);

    expect(seen).toEqual([
      {
        batteryPercent: 50,
        units: 'celsius',
        deviceAlarmFlag: false,
        alarmBits: 0,
        temps: [{ kind: 'reading', tenths: 215 }, ABSENT],
      },
      {
        batteryPercent: 49,
        units: 'celsius',
        deviceAlarmFlag: true,
        alarmBits: 1,
        temps: [ABSENT, { kind: 'reading', tenths: 216 }],
      },
    ]);
  });

  it('disconnects', async () => {
    const { tp, transport } = await readyThermometer();
    await tp.disconnect();
    expect(tp.state).toBe('disconnected');
    expect(transport.closeCount).toBe(1);
  });
});
