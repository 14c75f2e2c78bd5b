import { CatalogMismatchError, InvalidArgumentError, ThermometerError } from '../errors.js';
import { errMsg } from '../utils/error.js';
import { Opcode } from './constants.js';
import type { Frame } from './frame.js';
import type { InboundMessage } from './messages.js';
import {
  parseAlarmConfig,
  parseAuthResponse,
  parseBroadcast,
  parseFirmwareVersion,
  parseSnapshot,
  parseStatus,
  rawMessage,
} from './responses.js';

/**
 * One known opcode. Outbound payloads come from the `build*` functions in
 * `commands.ts`; `outbound.lengths` is what `validateOutbound` holds them to.
 */
export interface CommandDescriptor {
  readonly opcode: number;
  readonly name: string;
  readonly outbound?: { readonly lengths: readonly number[] };
  readonly inbound?: {
    readonly lengths: readonly number[];
    decode(payload: Uint8Array, opcode: number): InboundMessage;
  };
}

export type InboundDecodeResult =
  | { ok: true; message: InboundMessage }
  | { ok: false; error: ThermometerError };

const passthrough = (payload: Uint8Array, opcode: number): InboundMessage =>
  rawMessage(opcode, payload);

const DESCRIPTORS: CommandDescriptor[] = [
  {
    opcode: Opcode.Auth,
    name: 'auth',
    outbound: { lengths: [9] },
    inbound: { lengths: [2], decode: parseAuthResponse },
  },
  {
    opcode: Opcode.Backlight,
    name: 'backlight',
    outbound: { lengths: [0] },
    inbound: { lengths: [0], decode: passthrough },
  },
  { opcode: Opcode.Unclassified03, name: 'unclassified-03', inbound: { lengths: [0], decode: passthrough } },
  { opcode: Opcode.SetUnits, name: 'set-units', outbound: { lengths: [1] } },
  { opcode: Opcode.SetAlarmSound, name: 'set-alarm-sound', outbound: { lengths: [1] } },
  { opcode: Opcode.SetAlarm, name: 'set-alarm', outbound: { lengths: [6] } },
  {
    opcode: Opcode.Alarm,
    name: 'alarm',
    outbound: { lengths: [1] },
    inbound: { lengths: [6], decode: parseAlarmConfig },
  },
  // 6 probes (TP902) or 2 probes (TP904)
  { opcode: Opcode.Snapshot, name: 'snapshot', inbound: { lengths: [14, 6], decode: parseSnapshot } },
  {
    opcode: Opcode.Status,
    name: 'status',
    outbound: { lengths: [0] },
    inbound: { lengths: [5], decode: parseStatus },
  },
  { opcode: Opcode.SnoozeAlarm, name: 'snooze-alarm', outbound: { lengths: [0] } },
  { opcode: Opcode.SyncTime, name: 'sync-time', outbound: { lengths: [4] } },
  { opcode: Opcode.Unclassified29, name: 'unclassified-29', inbound: { lengths: [9], decode: passthrough } },
  { opcode: Opcode.Broadcast, name: 'broadcast', inbound: { lengths: [15, 7], decode: parseBroadcast } },
  {
    opcode: Opcode.Firmware,
    name: 'firmware',
    outbound: { lengths: [0] },
    inbound: { lengths: [3], decode: parseFirmwareVersion },
  },
  { opcode: Opcode.Unclassified42, name: 'unclassified-42', inbound: { lengths: [1], decode: passthrough } },
  { opcode: Opcode.DeviceError, name: 'device-error', inbound: { lengths: [2], decode: passthrough } },
];

function buildCatalog(entries: CommandDescriptor[]): ReadonlyMap<number, CommandDescriptor> {
  const map = new Map<number, CommandDescriptor>();
  for (const entry of entries) {
    if (map.has(entry.opcode)) {
      throw new Error(`Duplicate catalog entry for opcode 0x${entry.opcode.toString(16)}`);
    }
    map.set(entry.opcode, Object.freeze(entry));
  }
  return map;
}

/** Every known opcode. Built once at load, never mutated. */
export const CATALOG: ReadonlyMap<number, CommandDescriptor> = buildCatalog(DESCRIPTORS);

export function lookupCommand(opcode: number): CommandDescriptor | undefined {
  return CATALOG.get(opcode);
}

/** True if the device is known to answer this opcode with a frame of the same opcode. */
export function expectsReply(opcode: number): boolean {
  const entry = CATALOG.get(opcode);
  return entry?.outbound !== undefined && entry.inbound !== undefined;
}

/**
 * Check an outbound payload against the catalog before anything is written.
 * @throws {InvalidArgumentError} for unknown or inbound-only opcodes
 * @throws {CatalogMismatchError} for a wrong payload length
 */
export function validateOutbound(opcode: number, payload: Uint8Array): CommandDescriptor {
  const entry = CATALOG.get(opcode);
  if (!entry?.outbound) {
    throw new InvalidArgumentError(`Opcode 0x${opcode.toString(16)} cannot be sent`);
  }
  if (!entry.outbound.lengths.includes(payload.length)) {
    throw new CatalogMismatchError(opcode, payload.length, entry.outbound.lengths);
  }
  return entry;
}

/**
 * Decode a checked frame into a typed message. Never throws.
 * Unknown opcodes are not an error: they come back as `raw` messages.
 */
export function decodeInbound(frame: Frame): InboundDecodeResult {
  const { opcode, payload } = frame;
  const entry = CATALOG.get(opcode);
  if (!entry?.inbound) {
    return { ok: true, message: rawMessage(opcode, payload) };
  }
  if (!entry.inbound.lengths.includes(payload.length)) {
    return {
      ok: false,
      error: new CatalogMismatchError(opcode, payload.length, entry.inbound.lengths),
    };
  }
  try {
    return { ok: true, message: entry.inbound.decode(payload, opcode) };
  } catch (err) {
    return {
      ok: false,
      error: err instanceof ThermometerError ? err : new ThermometerError(errMsg(err)),
    };
  }
}
