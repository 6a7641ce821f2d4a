import bole from 'bole';

bole.setFastTime();

export interface Logger<T> {
  debug: (log?: T | undefined) => void;
  info: (log: { message: string; prefix?: string | undefined }) => void;
  warn: (log: {
    message: string;
    prefix?: string | undefined;
    error?: Error | undefined;
  }) => void;
  error: (err: Error, log?: string | Error | undefined) => void;
}

const rootLogger = bole('nix-pkgdiff');

function wrap<T>(boleLogger: bole.Logger): Logger<T> {
  return {
    debug: (log?: T | undefined): void => {
      boleLogger.debug(log);
    },
    info: (log): void => {
      boleLogger.info(log);
    },
    warn: (log): void => {
      boleLogger.warn(log);
    },
    error: (err: Error, log?: string | Error | undefined): void => {
      boleLogger.error(err, log);
    },
  };
}

/**
 * `logger.debug(...)` logs under `nix-pkgdiff`, `logger<Message>('stage')`
 * creates the `nix-pkgdiff:stage` child logger.
 */
export const logger = Object.assign(
  <T>(name: string): Logger<T> => wrap<T>(rootLogger(name)),
  wrap<object>(rootLogger)
);

const globalLogger = bole('nix-pkgdiff:global');

export function globalWarn(message: string): void {
  globalLogger.warn(message);
}
