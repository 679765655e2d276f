/** DreamHost web-panel API origin */
export const DREAMHOST_API_URL = 'https://api.dreamhost.com/';

/** Remote command names understood by the API */
export const DREAMHOST_COMMANDS = {
  listRecords: 'dns-list_records',
  addRecord: 'dns-add_record',
  removeRecord: 'dns-remove_record',
} as const;

/** Status code the API answers with once the hourly quota is used up */
export const RATE_LIMIT_STATUS = 429;

/** Pause before retrying a rate-limited request (10 minutes) */
export const RATE_LIMIT_COOLDOWN_MS = 600_000;

/** A rate-limited request is retried at most this many times */
export const RATE_LIMIT_MAX_RETRIES = 1;

/** The only record type this package manages */
export const ADDRESS_RECORD_TYPE = 'A';

/** Response format directive sent with every request */
export const RESPONSE_FORMAT = 'json';
