import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Session } from '../../src/session/session.js';
import {
  CatalogMismatchError,
  ChecksumMismatchError,
  RequestCancelledError,
  RequestTimeoutError,
  SessionStateError,
  TransportError,
} from '../../src/errors.js';
import type { Logger } from '../../src/logger.js';
import { capturedAuthPayload } from '../../src/protocol/auth.js';
import type { InboundMessage } from '../../src/protocol/messages.js';
import { FakeTransport } from '../helpers/fake-transport.js';

// ─── Test helpers ────────────────────────────────────────────────────────────

const STATUS = [0x0c, 0x0c, 0x50, 0x00, 0x00];
const BROADCAST_A = [0x32, 0x0c, 0x00, 0x02, 0x15, 0xff, 0xff];
const BROADCAST_B = [0x31, 0x0c, 0x00, 0x02, 0x16, 0xff, 0xff];
const EMPTY = new Uint8Array(0);

function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Answers the handshake; everything else is left to the test. */
function answerAuth(data: Uint8Array, transport: FakeTransport): void {
  if (data[0] === 0x01) transport.emitFrame(0x01, [0x24, 0x06]);
}

async function openSession(
  opts: { onBroadcast?: (m: InboundMessage) => void } = {},
): Promise<{ session: Session; transport: FakeTransport; log: Logger }> {
  const transport = new FakeTransport();
  const log = createMockLogger();
  const session = new Session(transport, { logger: log, ...opts });
  await session.open();
  return { session, transport, log };
}

async function readySession(
  opts: { onBroadcast?: (m: InboundMessage) => void } = {},
): Promise<{ session: Session; transport: FakeTransport; log: Logger }> {
  const ctx = await openSession(opts);
  ctx.transport.onWrite = answerAuth;
  await ctx.session.authenticate(capturedAuthPayload());
  ctx.transport.onWrite = null;
  return ctx;
}

const flush = (): Promise<void> => new Promise((r) => setImmediate(r));

// ─── Lifecycle ───────────────────────────────────────────────────────────────

describe('Session lifecycle', () => {
  it('moves through connected, authenticating and ready', async () => {
    const { session, transport } = await openSession();
    expect(session.state).toBe('connected');
    expect(transport.subscribed).toBe(true);

    let during: string | undefined;
    transport.onWrite = (data, t) => {
      during = session.state;
      answerAuth(data, t);
    };
    const reply = await session.authenticate(capturedAuthPayload());

    expect(during).toBe('authenticating');
    expect(Array.from(reply)).toEqual([0x24, 0x06]);
    expect(session.state).toBe('ready');
  });

  it('cannot be opened twice', async () => {
    const { session } = await openSession();
    await expect(session.open()).rejects.toThrow('Session already opened');
  });

  it('refuses requests on a session that was never opened', async () => {
    const session = new Session(new FakeTransport(), { logger: createMockLogger() });
    await expect(session.submitRequest(0x26)).rejects.toThrow(SessionStateError);
    await expect(session.submitRequest(0x26)).rejects.toThrow('Session is not open');
  });

  it('accepts only the handshake before authentication', async () => {
    const { session, transport } = await openSession();
    await expect(session.submitRequest(0x26)).rejects.toThrow(
      'Opcode 0x26 not accepted before authentication',
    );
    expect(transport.written).toHaveLength(0);
  });

  it('validates the request before any I/O', async () => {
    const { session, transport } = await readySession();
    await expect(session.submitRequest(0x23, new Uint8Array(2))).rejects.toThrow(
      CatalogMismatchError,
    );
    expect(transport.written).toHaveLength(1);
  });

  it('closes the transport once', async () => {
    const { session, transport } = await readySession();
    await session.close();
    await session.close();
    expect(session.state).toBe('disconnected');
    expect(transport.closeCount).toBe(1);
    expect(transport.subscribed).toBe(false);
  });
});

// ─── Request / response ──────────────────────────────────────────────────────

describe('Session requests', () => {
  it('completes the request from the first matching frame and queues the rest', async () => {
    const { session, transport } = await readySession();
    transport.onWrite = (data, t) => {
      if (data[0] !== 0x26) return;
      t.emitFrame(0x30, BROADCAST_A);
      t.emitFrame(0x26, STATUS);
      t.emitFrame(0x30, BROADCAST_B);
    };

    const reply = await session.submitRequest(0x26);
    expect(Array.from(reply)).toEqual(STATUS);

    const stream = session.broadcasts();
    const first = await stream.next();
    const second = await stream.next();
    expect(first.value?.kind === 'broadcast' && first.value.batteryPercent).toBe(50);
    expect(second.value?.kind === 'broadcast' && second.value.batteryPercent).toBe(49);
  });

  it('writes the encoded frame', async () => {
    const { session, transport } = await readySession();
    transport.onWrite = (data, t) => t.emitFrame(0x24, [0x01, 0x00, 0xff, 0xff, 0xff, 0xff]);
    await session.submitRequest(0x24, Uint8Array.of(0x01));
    expect(Array.from(transport.written[1])).toEqual([0x24, 0x01, 0x01, 0x26]);
  });

  it('serializes concurrent requests', async () => {
    const { session, transport } = await readySession();

    const status = session.submitRequest(0x26);
    const firmware = session.submitRequest(0x41);
    await flush();
    expect(transport.writtenOpcodes).toEqual([0x01, 0x26]);
    expect(session.hasPendingRequest).toBe(true);

    transport.emitFrame(0x26, STATUS);
    await status;
    await flush();
    expect(transport.writtenOpcodes).toEqual([0x01, 0x26, 0x41]);

    transport.emitFrame(0x41, [0x12, 0x0a, 0x1b]);
    expect(Array.from(await firmware)).toEqual([0x12, 0x0a, 0x1b]);
    expect(session.hasPendingRequest).toBe(false);
  });

  it('routes a frame with another opcode to the broadcast stream', async () => {
    const { session, transport } = await readySession();
    const status = session.submitRequest(0x26);
    await flush();

    transport.emitFrame(0x41, [0x12, 0x0a, 0x1b]);
    expect(session.hasPendingRequest).toBe(true);

    transport.emitFrame(0x26, STATUS);
    await status;
    const queued = await session.broadcasts().next();
    expect(queued.value?.kind).toBe('firmware');
  });
});

// ─── Timeouts and acks ───────────────────────────────────────────────────────

describe('Session timing', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('times out and frees the slot for the next request', async () => {
    const { session, transport } = await readySession();

    const first = session.submitRequest(0x26, EMPTY, { timeoutMs: 1000 });
    const assertion = expect(first).rejects.toThrow('No reply to opcode 0x26 within 1000ms');
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
    expect(session.hasPendingRequest).toBe(false);
    expect(session.state).toBe('ready');

    transport.onWrite = (data, t) => t.emitFrame(0x26, STATUS);
    const second = await session.submitRequest(0x26, EMPTY, { timeoutMs: 1000 });
    expect(Array.from(second)).toEqual(STATUS);
  });

  it('uses the configured default timeout', async () => {
    const transport = new FakeTransport();
    transport.onWrite = answerAuth;
    const session = new Session(transport, { logger: createMockLogger(), requestTimeoutMs: 250 });
    await session.open();
    await session.authenticate(capturedAuthPayload());
    transport.onWrite = null;

    const request = session.submitRequest(0x41);
    const assertion = expect(request).rejects.toBeInstanceOf(RequestTimeoutError);
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
  });

  it('returns to connected when the handshake times out', async () => {
    const { session, transport } = await openSession();

    const attempt = session.authenticate(capturedAuthPayload(), 500);
    const assertion = expect(attempt).rejects.toBeInstanceOf(RequestTimeoutError);
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    expect(session.state).toBe('connected');

    transport.onWrite = answerAuth;
    await session.authenticate(capturedAuthPayload(), 500);
    expect(session.state).toBe('ready');
  });

  it('treats a missing ack as success', async () => {
    const { session } = await readySession();

    const command = session.sendCommand(0x20, Uint8Array.of(0x0c), { graceMs: 300 });
    await vi.advanceTimersByTimeAsync(300);
    expect(await command).toBeNull();
    expect(session.hasPendingRequest).toBe(false);
  });

  it('returns the ack payload when one arrives', async () => {
    const { session, transport } = await readySession();
    transport.onWrite = (data, t) => {
      if (data[0] === 0x20) t.emitFrame(0x20, [0x0c]);
    };

    const ack = await session.sendCommand(0x20, Uint8Array.of(0x0c));
    expect(ack && Array.from(ack)).toEqual([0x0c]);
  });
});

// ─── Cancellation and transport failure ──────────────────────────────────────

describe('Session cancellation', () => {
  it('cancels the pending and queued requests on close', async () => {
    const { session, transport } = await readySession();

    const pending = session.submitRequest(0x26);
    const queued = session.submitRequest(0x41);
    const pendingAssertion = expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
    const queuedAssertion = expect(queued).rejects.toBeInstanceOf(RequestCancelledError);
    await flush();
    await session.close();

    await pendingAssertion;
    await queuedAssertion;
    expect(transport.writtenOpcodes).toEqual([0x01, 0x26]);
  });

  it('cancels the pending request when the transport disconnects', async () => {
    const { session, transport } = await readySession();

    const pending = session.submitRequest(0x26);
    await flush();
    transport.triggerDisconnect();

    await expect(pending).rejects.toThrow('Request 0x26 cancelled: connection closed');
    expect(session.state).toBe('disconnected');
    await expect(session.submitRequest(0x26)).rejects.toBeInstanceOf(RequestCancelledError);

    await session.close();
    expect(transport.closeCount).toBe(1);
  });

  it('fails the pending request with TransportError when the link fails', async () => {
    const { session, transport, log } = await readySession();

    const pending = session.submitRequest(0x26);
    await flush();
    transport.triggerDisconnect(new Error('adapter reset'));

    await expect(pending).rejects.toThrow(new TransportError('Transport failed: adapter reset'));
    expect(session.state).toBe('disconnected');
    expect(log.info).toHaveBeenCalledWith('Session closed: adapter reset');
  });

  it('passes a TransportError from the link through unchanged', async () => {
    const { session, transport } = await readySession();
    const cause = new TransportError('Receive failed: gone');

    const pending = session.submitRequest(0x26);
    await flush();
    transport.triggerDisconnect(cause);

    await expect(pending).rejects.toBe(cause);
  });

  it('ends the broadcast stream on disconnect', async () => {
    const { session, transport } = await readySession();
    transport.emitFrame(0x30, BROADCAST_A);
    transport.triggerDisconnect();

    const seen: string[] = [];
    for await (const message of session.broadcasts()) seen.push(message.kind);
    expect(seen).toEqual(['broadcast']);
  });

  it('fails the request and closes the session when a write fails', async () => {
    const { session, transport } = await readySession();
    transport.writeError = new Error('link lost');

    await expect(session.submitRequest(0x26)).rejects.toThrow(TransportError);
    expect(session.state).toBe('disconnected');
    await expect(session.submitRequest(0x26)).rejects.toBeInstanceOf(RequestCancelledError);
  });

  it('reports the write failure message', async () => {
    const { session, transport } = await readySession();
    transport.writeError = new Error('link lost');
    await expect(session.sendCommand(0x27)).rejects.toThrow('Write failed: link lost');
  });
});

// ─── Inbound anomalies ───────────────────────────────────────────────────────

describe('Session inbound anomalies', () => {
  it('fails the pending request on a damaged reply', async () => {
    const { session, transport } = await readySession();
    transport.onWrite = (data, t) => {
      if (data[0] === 0x26) t.emit([0x26, 0x00, 0x27]);
    };

    await expect(session.submitRequest(0x26)).rejects.toBeInstanceOf(ChecksumMismatchError);
    expect(session.state).toBe('ready');
  });

  it('fails the pending request on a reply of the wrong length', async () => {
    const { session, transport } = await readySession();
    transport.onWrite = (data, t) => {
      if (data[0] === 0x26) t.emitFrame(0x26, [0x0c, 0x0c]);
    };

    await expect(session.submitRequest(0x26)).rejects.toThrow(
      'Unexpected payload length 2 for opcode 0x26 (expected 5)',
    );
  });

  it('logs and drops damaged broadcast traffic', async () => {
    const { session, transport, log } = await readySession();

    transport.emit([0x30, 0x01, 0x00, 0x00]);
    transport.emitFrame(0x30, [0x00, 0x00, 0x00]);
    transport.emit([0x30]);

    expect(log.warn).toHaveBeenCalledWith(
      'Dropped inbound frame: Checksum mismatch for opcode 0x30: expected 0x31, got 0x00',
    );
    expect(log.warn).toHaveBeenCalledWith(
      'Dropped inbound frame: Unexpected payload length 3 for opcode 0x30 (expected 15 or 7)',
    );
    expect(log.warn).toHaveBeenCalledWith(
      'Dropped inbound frame: Frame too short: got 1 byte(s), need 3',
    );
    expect(session.state).toBe('ready');

    transport.emitFrame(0x30, BROADCAST_A);
    const next = await session.broadcasts().next();
    expect(next.value?.kind).toBe('broadcast');
  });

  it('delivers unknown opcodes as raw messages', async () => {
    const { session, transport } = await readySession();
    transport.emitFrame(0x77, [0x01]);
    const next = await session.broadcasts().next();
    expect(next.value).toEqual({ kind: 'raw', opcode: 0x77, payload: Uint8Array.of(0x01) });
  });
});

// ─── Broadcast callback ──────────────────────────────────────────────────────

describe('Session onBroadcast', () => {
  it('sees every message the stream sees', async () => {
    const received: string[] = [];
    const { session, transport } = await readySession({
      onBroadcast: (m) => received.push(m.kind),
    });

    transport.emitFrame(0x30, BROADCAST_A);
    transport.emitFrame(0x42, [0x00]);

    expect(received).toEqual(['broadcast', 'raw']);
    expect((await session.broadcasts().next()).value?.kind).toBe('broadcast');
  });

  it('logs a throwing callback without losing the message', async () => {
    const { session, transport, log } = await readySession({
      onBroadcast: () => {
        throw new Error('boom');
      },
    });

    transport.emitFrame(0x30, BROADCAST_A);

    expect(log.error).toHaveBeenCalledWith('Broadcast callback failed: boom');
    expect((await session.broadcasts().next()).value?.kind).toBe('broadcast');
  });
});
