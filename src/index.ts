export { createTransport, decodeOutcome } from './transport.js';
export { createReconciler } from './reconcile.js';
export { listRecords } from './records.js';
export { cleanRecordName, parseAddress } from './domain.js';
export { loadConfig } from './config.js';
export { createLogger, resolveLevel } from './logger.js';
export {
  DnsApiError,
  TransportError,
  DecodeError,
  InvalidInputError,
  ReconcileError,
} from './errors.js';
export {
  DREAMHOST_API_URL,
  DREAMHOST_COMMANDS,
  RATE_LIMIT_STATUS,
  RATE_LIMIT_COOLDOWN_MS,
  RATE_LIMIT_MAX_RETRIES,
  ADDRESS_RECORD_TYPE,
  RESPONSE_FORMAT,
} from './constants.js';
export type { Transport, TransportOptions } from './transport.js';
export type { Reconciler, ReconcilerOptions } from './reconcile.js';
export type { ListRecordsFilter } from './records.js';
export type { SyncConfig } from './config.js';
export type { Logger, LoggerOptions } from './logger.js';
export type { DnsApiErrorKind } from './errors.js';
export type {
  CommandOutcome,
  CommandStatus,
  CommandParameters,
  ReconcileResult,
  DnsRecord,
  RecordListing,
} from './types.js';
