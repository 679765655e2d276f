import type { ReconcileResult } from './types.js';

/** Why a call could not be evaluated */
export type DnsApiErrorKind = 'transport' | 'decode' | 'input';

/** Base class for failures where the provider's verdict is unknown */
export class DnsApiError extends Error {
  readonly kind: DnsApiErrorKind;

  constructor(kind: DnsApiErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DnsApiError';
    this.kind = kind;
  }
}

/** Network failure, timeout, empty body or an unhandled HTTP status */
export class TransportError extends DnsApiError {
  /** HTTP status, when a response was received at all */
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('transport', message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

/** Body is not JSON or lacks the `result`/`data` envelope fields */
export class DecodeError extends DnsApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('decode', message, options);
    this.name = 'DecodeError';
  }
}

/** Record name or address rejected before any request was sent */
export class InvalidInputError extends DnsApiError {
  constructor(message: string) {
    super('input', message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Removal of the old address failed after the new one was added.
 *
 * The record now resolves to both addresses; `result` carries the
 * committed add so the caller can retry the cleanup.
 */
export class ReconcileError extends DnsApiError {
  readonly result: ReconcileResult;
  declare readonly cause: DnsApiError;

  constructor(result: ReconcileResult, cause: DnsApiError) {
    super(
      cause.kind,
      `DreamHost: new address added but old address not removed: ${cause.message}`,
      { cause }
    );
    this.name = 'ReconcileError';
    this.result = result;
  }
}
