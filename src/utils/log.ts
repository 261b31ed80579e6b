import { resolveConfig, type HashmixConfig } from '../config';

export interface Logger {
  readonly enabled: boolean;
  debug(message: string): void;
  warn(message: string): void;
}

// Console output prefixed with [tag]. Debug lines need HASHMIX_DEBUG=1 and stop
// after HASHMIX_LOG_LIMIT lines; warnings always print.
export function createLogger(tag: string, config: Pick<HashmixConfig, 'debug' | 'logLimit'> = resolveConfig()): Logger {
  let logCount = 0;
  const limit = config.logLimit;
  return {
    enabled: config.debug,
    debug(message: string): void {
      if (!config.debug) return;
      if (limit > 0 && logCount >= limit) return;
      logCount++;
      // eslint-disable-next-line no-console
      console.log(`[${tag}] ${message}`);
    },
    warn(message: string): void {
      // eslint-disable-next-line no-console
      console.warn(`[${tag}] ${message}`);
    },
  };
}
