import { z } from 'zod';
import { DREAMHOST_COMMANDS } from './constants.js';
import { cleanRecordName } from './domain.js';
import { DecodeError } from './errors.js';
import type { Transport } from './transport.js';
import type { DnsRecord, RecordListing } from './types.js';

export interface ListRecordsFilter {
  /** Only records with this name (cleaned before comparing) */
  record?: string;
  /** Only records of this type (case-insensitive) */
  type?: string;
}

const recordSchema = z.object({
  account_id: z.union([z.string(), z.number()]).transform(String),
  zone: z.string(),
  record: z.string(),
  type: z.string(),
  value: z.string(),
  comment: z.string().default(''),
  editable: z.union([z.string(), z.number()]).transform((v) => String(v) === '1'),
});

const listEnvelopeSchema = z.discriminatedUnion('result', [
  z.object({ result: z.literal('success'), data: z.array(recordSchema) }),
  z.object({ result: z.literal('error'), data: z.string() }),
]);

/**
 * List the DNS records visible to the API key.
 *
 * The API always returns every record of every zone on the account;
 * `filter` narrows the result client-side.
 */
export async function listRecords(
  transport: Transport,
  filter: ListRecordsFilter = {}
): Promise<RecordListing> {
  const payload = await transport.request({ cmd: DREAMHOST_COMMANDS.listRecords });

  const parsed = listEnvelopeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DecodeError('DreamHost: malformed dns-list_records response', {
      cause: parsed.error,
    });
  }

  if (parsed.data.result === 'error') {
    return { status: 'failure', detail: parsed.data.data };
  }

  const name = filter.record === undefined ? undefined : cleanRecordName(filter.record);
  const type = filter.type?.toUpperCase();

  const records: DnsRecord[] = parsed.data.data
    .map((r) => ({
      record: r.record,
      zone: r.zone,
      type: r.type,
      value: r.value,
      comment: r.comment,
      editable: r.editable,
      accountId: r.account_id,
    }))
    .filter(
      (r) =>
        (name === undefined || cleanRecordName(r.record) === name) &&
        (type === undefined || r.type.toUpperCase() === type)
    );

  return { status: 'success', records };
}
