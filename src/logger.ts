import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

let rootLogger: Logger | undefined;

/** Root logger, created on first use. `LOG_LEVEL` picks the level. */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'linode-dns',
      level: resolveLevel(process.env.LOG_LEVEL),
    });
  }
  return rootLogger;
}

/** Child logger tagged with the component that owns it */
export function createChildLogger(bindings: Record<string, string>): Logger {
  return getLogger().child(bindings);
}

/** Override the level picked from the environment */
export function setLogLevel(level: LevelWithSilent): void {
  getLogger().level = level;
}

function resolveLevel(raw: string | undefined): LevelWithSilent {
  switch (raw) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return raw;
    default:
      return 'info';
  }
}
