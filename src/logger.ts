import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: string;
}

const DEFAULT_LEVEL = 'info';

/** Known pino level, or `info` for anything else (e.g. an app's own `verbose`) */
export function resolveLevel(level: string | undefined): string {
  if (level === undefined) return DEFAULT_LEVEL;
  if (level === 'silent' || Object.hasOwn(pino.levels.values, level)) return level;
  return DEFAULT_LEVEL;
}

/** JSON logger on stderr, leaving stdout to command output */
export const logger = pino(
  {
    name: 'dreamhost-dns-sync',
    level: resolveLevel(process.env['LOG_LEVEL']),
  },
  pino.destination(2)
);

/** Child of the module logger; shares its stderr destination */
export function createLogger(options: LoggerOptions = {}): Logger {
  return logger.child(options.name ? { name: options.name } : {}, {
    level: resolveLevel(options.level ?? logger.level),
  });
}
