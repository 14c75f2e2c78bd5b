/**
 * Error classes for the TP90x protocol engine.
 *
 * Inbound framing and catalog problems are reported as values by the codecs
 * and only thrown when they affect a pending request.
 */

export class ThermometerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ThermometerError';
  }
}

// ─── Framing ──────────────────────────────────────────────────────────────────

export class FramingError extends ThermometerError {
  constructor(message: string) {
    super(message);
    this.name = 'FramingError';
  }
}

export class TooShortError extends FramingError {
  constructor(
    readonly received: number,
    readonly required: number,
  ) {
    super(`Frame too short: got ${received} byte(s), need ${required}`);
    this.name = 'TooShortError';
  }
}

export class ChecksumMismatchError extends FramingError {
  constructor(
    readonly opcode: number,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `Checksum mismatch for opcode 0x${hex(opcode)}: ` +
        `expected 0x${hex(expected)}, got 0x${hex(actual)}`,
    );
    this.name = 'ChecksumMismatchError';
  }
}

export class PayloadTooLargeError extends FramingError {
  constructor(readonly length: number) {
    super(`Payload of ${length} bytes exceeds the 255 byte frame limit`);
    this.name = 'PayloadTooLargeError';
  }
}

// ─── Payload decoding ─────────────────────────────────────────────────────────

export class InvalidBcdError extends ThermometerError {
  constructor(readonly raw: number) {
    super(`Invalid BCD temperature 0x${raw.toString(16).padStart(4, '0')}`);
    this.name = 'InvalidBcdError';
  }
}

/** Known opcode, unexpected payload length. */
export class CatalogMismatchError extends ThermometerError {
  constructor(
    readonly opcode: number,
    readonly length: number,
    readonly expected: readonly number[],
  ) {
    super(
      `Unexpected payload length ${length} for opcode 0x${hex(opcode)} ` +
        `(expected ${expected.join(' or ')})`,
    );
    this.name = 'CatalogMismatchError';
  }
}

// ─── Session ──────────────────────────────────────────────────────────────────

export class RequestTimeoutError extends ThermometerError {
  constructor(
    readonly opcode: number,
    readonly timeoutMs: number,
  ) {
    super(`No reply to opcode 0x${hex(opcode)} within ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class RequestCancelledError extends ThermometerError {
  constructor(readonly opcode: number) {
    super(`Request 0x${hex(opcode)} cancelled: connection closed`);
    this.name = 'RequestCancelledError';
  }
}

export class SessionStateError extends ThermometerError {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

export class InvalidArgumentError extends ThermometerError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class TransportError extends ThermometerError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

function hex(byte: number): string {
  return byte.toString(16).padStart(2, '0');
}
