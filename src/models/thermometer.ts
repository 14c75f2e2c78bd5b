import { ThermometerError } from '../errors.js';
import type { ThermometerModel } from '../interfaces/thermometer-model.js';
import { createLogger } from '../logger.js';
import { capturedAuthPayload, type AuthPayloadGenerator } from '../protocol/auth.js';
import { decodeInbound } from '../protocol/catalog.js';
import {
  buildAlarmRequest,
  buildFirmwareRequest,
  buildSetAlarm,
  buildSetAlarmSound,
  buildSetUnits,
  buildStatusRequest,
  buildSyncTime,
  secondsSince2020,
} from '../protocol/commands.js';
import { Opcode } from '../protocol/constants.js';
import type {
  AlarmConfig,
  AlarmMode,
  AuthResponse,
  DeviceStatus,
  FirmwareVersion,
  InboundKind,
  InboundMessage,
  TemperatureBroadcast,
  TemperatureUnit,
} from '../protocol/messages.js';
import type { Temperature } from '../protocol/temperature.js';
import type { Session, SessionState } from '../session/session.js';

const log = createLogger('Thermometer');

export interface ThermometerOptions {
  /** Source of the 0x01 handshake payload (default: captured payload). */
  authPayload?: AuthPayloadGenerator;
  /** Grace period for writes that may or may not be acknowledged. */
  ackGraceMs?: number;
}

type MessageOf<K extends InboundKind> = Extract<InboundMessage, { kind: K }>;

function isKind<K extends InboundKind>(message: InboundMessage, kind: K): message is MessageOf<K> {
  return message.kind === kind;
}

/**
 * Public API for one connected TP90x thermometer.
 *
 * @example
 * ```typescript
 * const tp = await connectThermometer(findModel('tp902'), { by: 'name', name: 'TP902' });
 * await tp.authenticate();
 * await tp.syncTime();
 * for await (const b of tp.subscribeBroadcasts()) console.log(b.temps);
 * ```
 */
export class Thermometer {
  private readonly authPayload: AuthPayloadGenerator;

  constructor(
    readonly session: Session,
    readonly model: ThermometerModel,
    private readonly options: ThermometerOptions = {},
  ) {
    this.authPayload = options.authPayload ?? capturedAuthPayload;
  }

  get state(): SessionState {
    return this.session.state;
  }

  /** Must succeed before any other command is accepted. */
  async authenticate(timeoutMs?: number): Promise<AuthResponse> {
    const reply = await this.session.authenticate(this.authPayload(), timeoutMs);
    const { kind: _kind, ...auth } = this.decodeReply(Opcode.Auth, reply, 'auth');
    log.debug(
      `Authenticated (type hint 0x${auth.deviceTypeHint.toString(16)}, ` +
        `probe hint ${auth.probeCountHint})`,
    );
    return auth;
  }

  async getStatus(timeoutMs?: number): Promise<DeviceStatus> {
    const { kind: _kind, ...status } = await this.query(
      Opcode.Status,
      buildStatusRequest(),
      'status',
      timeoutMs,
    );
    return status;
  }

  async getFirmwareVersion(timeoutMs?: number): Promise<FirmwareVersion> {
    const { kind: _kind, ...fw } = await this.query(
      Opcode.Firmware,
      buildFirmwareRequest(),
      'firmware',
      timeoutMs,
    );
    return fw;
  }

  async readAlarm(channel: number, timeoutMs?: number): Promise<AlarmConfig> {
    const payload = buildAlarmRequest(channel, this.model.probeCount);
    const { kind: _kind, ...alarm } = await this.query(Opcode.Alarm, payload, 'alarm', timeoutMs);
    if (alarm.channel !== channel) {
      throw new ThermometerError(
        `Alarm reply is for channel ${alarm.channel}, requested channel ${channel}`,
      );
    }
    return alarm;
  }

  // ─── Writes (reply optional) ──────────────────────────────────────────────

  async setUnits(unit: TemperatureUnit): Promise<void> {
    await this.command(Opcode.SetUnits, buildSetUnits(unit));
  }

  async setAlarmSound(enabled: boolean): Promise<void> {
    await this.command(Opcode.SetAlarmSound, buildSetAlarmSound(enabled));
  }

  /**
   * Configure one channel's alarm. `primary` is the target (target mode) or
   * the upper bound (range mode); `secondary` is the lower bound.
   * The device owns the alarm state from here on.
   */
  async setAlarmConfig(
    channel: number,
    mode: AlarmMode,
    primary?: Temperature,
    secondary?: Temperature,
  ): Promise<void> {
    const payload = buildSetAlarm(channel, mode, primary, secondary, this.model.probeCount);
    await this.command(Opcode.SetAlarm, payload);
  }

  /** Set the device clock. Defaults to the current time. */
  async syncTime(secondsSinceEpoch2020: number = secondsSince2020()): Promise<void> {
    await this.command(Opcode.SyncTime, buildSyncTime(secondsSinceEpoch2020));
  }

  /** Light the display, as a button press would. */
  async backlightOn(): Promise<void> {
    await this.command(Opcode.Backlight, new Uint8Array(0));
  }

  /** Reported to silence a sounding alarm until it next triggers. */
  async snoozeAlarm(): Promise<void> {
    await this.command(Opcode.SnoozeAlarm, new Uint8Array(0));
  }

  // ─── Broadcasts ─────────────────────────────────────────────────────────────

  /**
   * Periodic 0x30 temperature broadcasts for the life of the connection.
   * Other unsolicited messages are consumed and skipped.
   */
  async *subscribeBroadcasts(): AsyncGenerator<TemperatureBroadcast, void, undefined> {
    for await (const message of this.session.broadcasts()) {
      if (message.kind !== 'broadcast') continue;
      const { kind: _kind, ...broadcast } = message;
      yield broadcast;
    }
  }

  async disconnect(): Promise<void> {
    await this.session.close();
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async query<K extends InboundKind>(
    opcode: number,
    payload: Uint8Array,
    kind: K,
    timeoutMs?: number,
  ): Promise<MessageOf<K>> {
    const reply = await this.session.submitRequest(opcode, payload, { timeoutMs });
    return this.decodeReply(opcode, reply, kind);
  }

  private decodeReply<K extends InboundKind>(
    opcode: number,
    payload: Uint8Array,
    kind: K,
  ): MessageOf<K> {
    const decoded = decodeInbound({ opcode, payload });
    if (!decoded.ok) throw decoded.error;
    if (!isKind(decoded.message, kind)) {
      throw new ThermometerError(
        `Expected ${kind} reply to 0x${opcode.toString(16)}, got ${decoded.message.kind}`,
      );
    }
    return decoded.message;
  }

  private async command(opcode: number, payload: Uint8Array): Promise<void> {
    const ack = await this.session.sendCommand(opcode, payload, {
      graceMs: this.options.ackGraceMs,
    });
    log.debug(`0x${opcode.toString(16)} ${ack ? 'acknowledged' : 'sent (no ack)'}`);
  }
}
