import process from 'node:process';
import {
  isLog,
  type Log,
  type SnapshotLog,
  type StageLog,
  type StoreQueryLog,
} from '../core-loggers/index.ts';
import type { LogLevel, StreamParser } from '../logger/index.ts';
import * as Rx from 'rxjs';
import { filter, share } from 'rxjs/operators';
import { EOL } from './constants.ts';
import { formatWarn } from './formatWarn.ts';
import { reportMisc } from './reportMisc.ts';
import { reportProgress } from './reportProgress.ts';

export { formatWarn };
export { formatErrorSummary, reportError } from './reportError.ts';

export function initDefaultReporter(opts: {
  useStderr?: boolean | undefined;
  streamParser: StreamParser<object>;
  reportingOptions?:
    | {
        logLevel?: LogLevel | undefined;
      }
    | undefined;
  context: {
    argv: string[];
    process?: NodeJS.Process | undefined;
  };
}): () => void {
  const proc = opts.context.process ?? process;

  const write =
    opts.useStderr === true
      ? proc.stderr.write.bind(proc.stderr)
      : proc.stdout.write.bind(proc.stdout);

  const subscription = toOutput$(opts).subscribe({
    error: (err: unknown): void => {
      write(`${String(err)}${EOL}`);
    },
    next: (msg: string): void => {
      write(msg.endsWith(EOL) ? msg : `${msg}${EOL}`);
    },
  });

  return (): void => {
    subscription.unsubscribe();
  };
}

export function toOutput$(opts: {
  streamParser: StreamParser<object>;
  reportingOptions?:
    | {
        logLevel?: LogLevel | undefined;
      }
    | undefined;
}): Rx.Observable<string> {
  const log$ = Rx.fromEventPattern<object>(
    (handler): void => {
      opts.streamParser.on('data', handler);
    },
    (handler): void => {
      opts.streamParser.removeListener('data', handler);
    }
  ).pipe(filter(isLog), share());

  const logLevel = opts.reportingOptions?.logLevel ?? 'info';

  return Rx.merge(
    reportProgress(
      {
        stage: log$.pipe(
          filter((log: Log): log is StageLog => log.name === 'nix-pkgdiff:stage')
        ),
        snapshot: log$.pipe(
          filter(
            (log: Log): log is SnapshotLog => log.name === 'nix-pkgdiff:snapshot'
          )
        ),
        storeQuery: log$.pipe(
          filter(
            (log: Log): log is StoreQueryLog =>
              log.name === 'nix-pkgdiff:store-query'
          )
        ),
      },
      { logLevel }
    ),
    reportMisc(
      log$.pipe(
        filter(
          (log: Log): boolean =>
            log.name === 'nix-pkgdiff' || log.name === 'nix-pkgdiff:global'
        )
      ),
      { logLevel }
    )
  );
}
