import {
  RequestCancelledError,
  RequestTimeoutError,
  SessionStateError,
  ThermometerError,
  TransportError,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { decodeInbound, validateOutbound } from '../protocol/catalog.js';
import { Opcode } from '../protocol/constants.js';
import { decodeFrame, encodeFrame } from '../protocol/frame.js';
import type { InboundMessage } from '../protocol/messages.js';
import type { Transport } from '../transport/types.js';
import { toHex } from '../utils/bytes.js';
import { errMsg } from '../utils/error.js';
import { createLock, type Lock } from '../utils/lock.js';
import { BroadcastStream } from './broadcast-stream.js';

export type SessionState = 'disconnected' | 'connected' | 'authenticating' | 'ready';

export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;
export const DEFAULT_ACK_GRACE_MS = 300;

export interface SessionOptions {
  /** How long `submitRequest` waits for the reply (default 5000ms). */
  requestTimeoutMs?: number;
  /** How long `sendCommand` waits for an optional ack (default 300ms). */
  ackGraceMs?: number;
  /** Called for every unsolicited message, in arrival order. */
  onBroadcast?: (message: InboundMessage) => void;
  logger?: Logger;
}

export interface RequestOptions {
  timeoutMs?: number;
  /** Opcode of the reply frame; defaults to the request opcode. */
  replyOpcode?: number;
}

export interface CommandOptions {
  graceMs?: number;
}

interface PendingRequest {
  opcode: number;
  replyOpcode: number;
  timer: ReturnType<typeof setTimeout>;
  resolve: (payload: Uint8Array | null) => void;
  reject: (error: Error) => void;
}

const EMPTY = new Uint8Array(0);

/**
 * One protocol session over one transport connection.
 *
 * Outbound traffic is half-duplex: requests are serialized and at most one
 * waits for a reply at a time. Inbound traffic is classified as it arrives:
 * the first frame carrying the pending reply opcode completes the request,
 * everything else goes to the broadcast stream in arrival order.
 *
 * States: disconnected → connected → authenticating → ready → disconnected.
 * Only the auth exchange is accepted before `ready`.
 */
export class Session {
  private _state: SessionState = 'disconnected';
  private opened = false;
  private transportClosed = false;
  private pending: PendingRequest | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly stream = new BroadcastStream<InboundMessage>();
  private readonly lock: Lock = createLock();
  private readonly log: Logger;
  private readonly requestTimeoutMs: number;
  private readonly ackGraceMs: number;

  constructor(
    private readonly transport: Transport,
    private readonly options: SessionOptions = {},
  ) {
    this.log = options.logger ?? createLogger('Session');
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.ackGraceMs = options.ackGraceMs ?? DEFAULT_ACK_GRACE_MS;
  }

  get state(): SessionState {
    return this._state;
  }

  /** True while a request is waiting for its reply. */
  get hasPendingRequest(): boolean {
    return this.pending !== null;
  }

  /**
   * Start receiving. Notifications are buffered for `broadcasts()` from here on.
   * A session is single-use: it cannot be reopened after it closes.
   */
  async open(): Promise<void> {
    if (this.opened) {
      throw new SessionStateError('Session already opened');
    }
    this.opened = true;
    this.transport.onDisconnect((error) =>
      this.teardown(error ? errMsg(error) : 'transport disconnected', error),
    );
    this.unsubscribe = await this.transport.subscribe((data) => this.handleNotification(data));
    this._state = 'connected';
    this.log.debug('Session connected');
  }

  /**
   * Run the 0x01 handshake. Moves the session to `ready` on a reply;
   * a failed handshake leaves it `connected` so it can be retried.
   */
  async authenticate(payload: Uint8Array, timeoutMs = this.requestTimeoutMs): Promise<Uint8Array> {
    validateOutbound(Opcode.Auth, payload);
    return this.lock(async () => {
      if (this._state === 'connected' || this._state === 'ready') {
        this._state = 'authenticating';
      }
      try {
        const reply = await this.exchange(Opcode.Auth, payload, Opcode.Auth, timeoutMs);
        if (!reply) throw new RequestTimeoutError(Opcode.Auth, timeoutMs);
        this._state = 'ready';
        this.log.debug('Session ready');
        return reply;
      } catch (err) {
        if (this._state === 'authenticating') this._state = 'connected';
        throw err;
      }
    });
  }

  /**
   * Send a request and wait for its reply payload.
   *
   * @throws {InvalidArgumentError|CatalogMismatchError} before any I/O for a bad request
   * @throws {RequestTimeoutError} if no reply arrives in time; the next request may proceed
   * @throws {RequestCancelledError} if the connection closes while waiting
   * @throws {TransportError} if the write fails; the session is closed
   */
  async submitRequest(
    opcode: number,
    payload: Uint8Array = EMPTY,
    opts: RequestOptions = {},
  ): Promise<Uint8Array> {
    validateOutbound(opcode, payload);
    const replyOpcode = opts.replyOpcode ?? opcode;
    const timeoutMs = opts.timeoutMs ?? this.requestTimeoutMs;

    return this.lock(async () => {
      const reply = await this.exchange(opcode, payload, replyOpcode, timeoutMs);
      if (!reply) throw new RequestTimeoutError(opcode, timeoutMs);
      return reply;
    });
  }

  /**
   * Send a write whose reply is optional. Waits a short grace period for a
   * frame with the same opcode; resolves null when none arrives.
   */
  async sendCommand(
    opcode: number,
    payload: Uint8Array = EMPTY,
    opts: CommandOptions = {},
  ): Promise<Uint8Array | null> {
    validateOutbound(opcode, payload);
    const graceMs = opts.graceMs ?? this.ackGraceMs;
    return this.lock(() => this.exchange(opcode, payload, opcode, graceMs));
  }

  /**
   * Unsolicited messages, in arrival order, for the life of the connection.
   * Single-consumer: every call returns the same underlying stream.
   */
  broadcasts(): AsyncIterableIterator<InboundMessage> {
    return this.stream;
  }

  /** Close the connection. Cancels the pending request and ends the broadcast stream. */
  async close(): Promise<void> {
    this.teardown('closed by caller');
    if (!this.opened || this.transportClosed) return;
    this.transportClosed = true;
    try {
      await this.transport.close();
    } catch (err) {
      this.log.debug(`Transport close failed: ${errMsg(err)}`);
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private assertAccepts(opcode: number): void {
    switch (this._state) {
      case 'ready':
        return;
      case 'connected':
      case 'authenticating':
        if (opcode === Opcode.Auth) return;
        throw new SessionStateError(
          `Opcode 0x${opcode.toString(16)} not accepted before authentication`,
        );
      case 'disconnected':
        if (this.opened) throw new RequestCancelledError(opcode);
        throw new SessionStateError('Session is not open');
    }
  }

  /**
   * Write one frame and wait up to `waitMs` for `replyOpcode`.
   * Resolves null on timeout; callers decide whether that is an error.
   * Must run under the lock.
   */
  private async exchange(
    opcode: number,
    payload: Uint8Array,
    replyOpcode: number,
    waitMs: number,
  ): Promise<Uint8Array | null> {
    this.assertAccepts(opcode);
    const frame = encodeFrame(opcode, payload);

    // Installed before the write so a fast reply cannot slip past
    const reply = new Promise<Uint8Array | null>((resolve, reject) => {
      const pending: PendingRequest = {
        opcode,
        replyOpcode,
        resolve,
        reject,
        timer: setTimeout(() => {
          if (this.pending !== pending) return;
          this.pending = null;
          this.log.debug(`No reply to 0x${opcode.toString(16)} within ${waitMs}ms`);
          resolve(null);
        }, waitMs),
      };
      this.pending = pending;
    });

    this.log.debug(`TX ${toHex(frame)}`);
    try {
      await this.transport.write(frame);
    } catch (err) {
      const error = new TransportError(`Write failed: ${errMsg(err)}`);
      const current = this.pending;
      if (current) this.failPending(current, error);
      this.teardown(error.message);
    }
    return reply;
  }

  private failPending(pending: PendingRequest, error: Error): void {
    if (this.pending !== pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(error);
  }

  private handleNotification(data: Uint8Array): void {
    this.log.debug(`RX ${toHex(data)}`);

    const decoded = decodeFrame(data);
    if (!decoded.ok) {
      this.handleAnomaly(data.length > 0 ? data[0] : undefined, decoded.error);
      return;
    }

    const { frame } = decoded;
    const message = decodeInbound(frame);
    const pending = this.pending;

    if (pending && frame.opcode === pending.replyOpcode) {
      if (!message.ok) {
        this.failPending(pending, message.error);
        return;
      }
      this.pending = null;
      clearTimeout(pending.timer);
      pending.resolve(frame.payload);
      return;
    }

    if (!message.ok) {
      this.log.warn(`Dropped inbound frame: ${message.error.message}`);
      return;
    }
    this.deliver(message.message);
  }

  /** A damaged frame fails the pending request only if it carries the awaited opcode. */
  private handleAnomaly(opcode: number | undefined, error: ThermometerError): void {
    const pending = this.pending;
    if (pending && opcode === pending.replyOpcode) {
      this.failPending(pending, error);
      return;
    }
    this.log.warn(`Dropped inbound frame: ${error.message}`);
  }

  private teardownError(opcode: number, cause?: Error): Error {
    if (!cause) return new RequestCancelledError(opcode);
    if (cause instanceof TransportError) return cause;
    return new TransportError(`Transport failed: ${errMsg(cause)}`);
  }

  private deliver(message: InboundMessage): void {
    this.stream.push(message);
    if (!this.options.onBroadcast) return;
    try {
      this.options.onBroadcast(message);
    } catch (err) {
      this.log.error(`Broadcast callback failed: ${errMsg(err)}`);
    }
  }

  /** A `cause` means the link failed: the pending request gets a TransportError instead. */
  private teardown(reason: string, cause?: Error): void {
    if (this._state === 'disconnected') return;
    this._state = 'disconnected';

    const pending = this.pending;
    if (pending) this.failPending(pending, this.teardownError(pending.opcode, cause));

    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    this.stream.end();
    this.log.info(`Session closed: ${reason}`);
  }
}
