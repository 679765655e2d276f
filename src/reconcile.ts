import { ADDRESS_RECORD_TYPE, DREAMHOST_COMMANDS } from './constants.js';
import { cleanRecordName, parseAddress } from './domain.js';
import { DnsApiError, InvalidInputError, ReconcileError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import type { Transport } from './transport.js';
import type { CommandOutcome, CommandParameters, ReconcileResult } from './types.js';

export interface ReconcilerOptions {
  logger?: Logger;
}

/** Add, remove and replace the `A` record of a hostname */
export interface Reconciler {
  add(domain: string, address: string, comment?: string): Promise<CommandOutcome>;
  remove(domain: string, address: string, comment?: string): Promise<CommandOutcome>;
  replace(
    domain: string,
    oldAddress: string,
    newAddress: string,
    comment?: string
  ): Promise<ReconcileResult>;
}

function recordCommand(
  cmd: string,
  domain: string,
  address: string,
  comment?: string
): CommandParameters {
  const record = cleanRecordName(domain);
  if (!record) {
    throw new InvalidInputError('DreamHost: record name is required');
  }

  const params: Record<string, string> = {
    cmd,
    record,
    type: ADDRESS_RECORD_TYPE,
    value: parseAddress(address),
  };
  if (comment) {
    params['comment'] = comment;
  }
  return params;
}

/**
 * Create a reconciler on top of a transport.
 *
 * `add` and `remove` return the provider's verdict as a value: a rejected
 * command (duplicate record, unknown record) resolves with status `failure`.
 * Only transport and decode problems reject.
 *
 * `replace` adds the new address first and removes the old one only once the
 * add is confirmed, so the hostname never goes without an `A` record:
 *
 * 1. Add fails with an error: the error propagates, nothing is removed
 * 2. Add is rejected: resolves with `addOutcome` only
 * 3. Add succeeds, removal fails with an error: rejects with a
 *    `ReconcileError` whose `result` holds the `addOutcome`
 * 4. Otherwise resolves with both outcomes
 */
export function createReconciler(
  transport: Transport,
  options: ReconcilerOptions = {}
): Reconciler {
  const logger = options.logger ?? defaultLogger;

  async function run(params: CommandParameters): Promise<CommandOutcome> {
    const outcome = await transport.invoke(params);
    const context = { cmd: params['cmd'], record: params['record'], value: params['value'] };
    if (outcome.status === 'success') {
      logger.info({ ...context, detail: outcome.detail }, 'DreamHost command succeeded');
    } else {
      logger.warn({ ...context, detail: outcome.detail }, 'DreamHost rejected command');
    }
    return outcome;
  }

  return {
    async add(domain, address, comment) {
      return run(recordCommand(DREAMHOST_COMMANDS.addRecord, domain, address, comment));
    },

    async remove(domain, address, comment) {
      return run(recordCommand(DREAMHOST_COMMANDS.removeRecord, domain, address, comment));
    },

    async replace(domain, oldAddress, newAddress, comment) {
      const addParams = recordCommand(DREAMHOST_COMMANDS.addRecord, domain, newAddress, comment);
      const removeParams = recordCommand(
        DREAMHOST_COMMANDS.removeRecord,
        domain,
        oldAddress,
        comment
      );
      if (addParams['value'] === removeParams['value']) {
        throw new InvalidInputError(
          `DreamHost: old and new address are both ${addParams['value']}, nothing to replace`
        );
      }

      const addOutcome = await run(addParams);
      if (addOutcome.status !== 'success') {
        return { addOutcome };
      }

      try {
        const removeOutcome = await run(removeParams);
        return { addOutcome, removeOutcome };
      } catch (err) {
        if (err instanceof DnsApiError) {
          logger.error(
            { record: addParams['record'], oldAddress: removeParams['value'], err },
            'New address added but old address is still live'
          );
          throw new ReconcileError({ addOutcome }, err);
        }
        throw err;
      }
    },
  };
}
