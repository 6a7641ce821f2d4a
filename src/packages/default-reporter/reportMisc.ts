import type { Log } from '../core-loggers/index.ts';
import { LOG_LEVEL_NUMBER, type LogLevel } from '../logger/index.ts';
import * as Rx from 'rxjs';
import { filter, map } from 'rxjs/operators';
import { reportError } from './reportError.ts';
import { formatWarn } from './formatWarn.ts';

const MAX_SHOWN_WARNINGS = 5;

export function reportMisc(
  log$: Rx.Observable<Log>,
  opts: {
    logLevel: LogLevel;
  }
): Rx.Observable<string> {
  const maxLogLevel = LOG_LEVEL_NUMBER[opts.logLevel];

  let warningsCounter = 0;

  return log$.pipe(
    filter((obj: Log): boolean => LOG_LEVEL_NUMBER[obj.level] <= maxLogLevel),
    map((obj: Log): string | null => {
      switch (obj.level) {
        case 'warn': {
          warningsCounter++;

          if (warningsCounter > MAX_SHOWN_WARNINGS) {
            return null;
          }

          return formatWarn(withPrefix(obj.prefix, obj.message));
        }
        case 'error': {
          return reportError(obj);
        }
        default: {
          return typeof obj.message === 'string'
            ? withPrefix(obj.prefix, obj.message)
            : null;
        }
      }
    }),
    filter((msg: string | null): msg is string => msg !== null)
  );
}

function withPrefix(prefix: string | undefined, message: string): string {
  return typeof prefix === 'string' && prefix !== ''
    ? `${prefix}: ${message}`
    : message;
}
