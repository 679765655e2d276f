import { Command } from 'commander';
import { loadConfig, type SyncConfig } from './config.js';
import { ReconcileError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { createReconciler, type Reconciler } from './reconcile.js';
import { listRecords } from './records.js';
import { createTransport, type Transport } from './transport.js';
import type { CommandOutcome, ReconcileResult } from './types.js';

/** Process exit codes reported by the CLI */
export const EXIT_CODES = {
  applied: 0,
  error: 1,
  notApplied: 2,
  partiallyApplied: 3,
} as const;

export interface CliContext {
  env?: NodeJS.ProcessEnv;
  write?: (text: string) => void;
  setExitCode?: (code: number) => void;
}

interface Session {
  logger: Logger;
  transport: Transport;
  reconciler: Reconciler;
}

function openSession(config: SyncConfig): Session {
  const logger = createLogger({ level: config.logLevel });
  const transport = createTransport({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    cooldownMs: config.cooldownMs,
    timeoutMs: config.timeoutMs,
    logger,
  });
  return { logger, transport, reconciler: createReconciler(transport, { logger }) };
}

/** Exit code for a replace: fully, partially or not applied */
export function replaceExitCode(result: ReconcileResult): number {
  if (result.addOutcome?.status !== 'success') return EXIT_CODES.notApplied;
  if (result.removeOutcome?.status !== 'success') return EXIT_CODES.partiallyApplied;
  return EXIT_CODES.applied;
}

function outcomeExitCode(outcome: CommandOutcome): number {
  return outcome.status === 'success' ? EXIT_CODES.applied : EXIT_CODES.notApplied;
}

/**
 * Build the `dreamhost-dns-sync` program.
 *
 * Configuration comes from the environment (see `loadConfig`). Results are
 * printed to stdout as JSON; logs go to stderr.
 */
export function createProgram(context: CliContext = {}): Command {
  const env = context.env ?? process.env;
  const write = context.write ?? ((text: string) => process.stdout.write(text));
  const setExitCode =
    context.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  function print(value: unknown): void {
    write(`${JSON.stringify(value, null, 2)}\n`);
  }

  function session(): Session {
    return openSession(loadConfig(env));
  }

  const program = new Command();
  program
    .name('dreamhost-dns-sync')
    .description('Keep a DreamHost A record pointed at an address');

  program
    .command('list')
    .description('List DNS records on the account')
    .option('-r, --record <name>', 'Only records with this name')
    .option('-t, --type <type>', 'Only records of this type (e.g. A)')
    .action(async (opts: { record?: string; type?: string }) => {
      const { transport } = session();
      const listing = await listRecords(transport, opts);
      print(listing);
      setExitCode(
        listing.status === 'success' ? EXIT_CODES.applied : EXIT_CODES.notApplied
      );
    });

  program
    .command('add <record> <address>')
    .description('Add an A record')
    .option('-c, --comment <text>', 'Comment stored with the record')
    .action(async (record: string, address: string, opts: { comment?: string }) => {
      const { reconciler } = session();
      const outcome = await reconciler.add(record, address, opts.comment);
      print(outcome);
      setExitCode(outcomeExitCode(outcome));
    });

  program
    .command('remove <record> <address>')
    .description('Remove an A record')
    .option('-c, --comment <text>', 'Comment sent with the request')
    .action(async (record: string, address: string, opts: { comment?: string }) => {
      const { reconciler } = session();
      const outcome = await reconciler.remove(record, address, opts.comment);
      print(outcome);
      setExitCode(outcomeExitCode(outcome));
    });

  program
    .command('replace <record> <old-address> <new-address>')
    .description('Add the new address, then remove the old one once the add succeeded')
    .option('-c, --comment <text>', 'Comment stored with the new record')
    .action(
      async (
        record: string,
        oldAddress: string,
        newAddress: string,
        opts: { comment?: string }
      ) => {
        const { reconciler, logger } = session();
        try {
          const result = await reconciler.replace(record, oldAddress, newAddress, opts.comment);
          print(result);
          setExitCode(replaceExitCode(result));
        } catch (err) {
          if (!(err instanceof ReconcileError)) throw err;
          logger.error(
            { record, oldAddress },
            'Old address must be removed manually or by re-running remove'
          );
          print({ ...err.result, error: { kind: err.kind, message: err.cause.message } });
          setExitCode(EXIT_CODES.partiallyApplied);
        }
      }
    );

  return program;
}
