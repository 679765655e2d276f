/** Provider verdict on a single remote command */
export type CommandStatus = 'success' | 'failure';

/** Result of one remote command, decoded from the provider's envelope */
export interface CommandOutcome {
  readonly status: CommandStatus;
  /**
   * Provider payload: a confirmation token on success (e.g. `record_added`),
   * an error token on failure (e.g. `record_already_exists_not_editable`).
   */
  readonly detail: string;
}

/** Result of a full replace (add new address, then remove the old one) */
export interface ReconcileResult {
  addOutcome?: CommandOutcome;
  /** Only present when `addOutcome.status` is `success` */
  removeOutcome?: CommandOutcome;
}

/** Query parameters describing one remote command */
export type CommandParameters = Readonly<Record<string, string>>;

/** A DNS record as listed by the provider */
export interface DnsRecord {
  /** Full record name (e.g. home.example.com) */
  record: string;
  /** Zone the record belongs to (e.g. example.com) */
  zone: string;
  type: string;
  value: string;
  comment: string;
  /** False for records managed by the provider itself */
  editable: boolean;
  accountId: string;
}

/** Outcome of listing records; a provider rejection is a value, not an error */
export type RecordListing =
  | { status: 'success'; records: DnsRecord[] }
  | { status: 'failure'; detail: string };
