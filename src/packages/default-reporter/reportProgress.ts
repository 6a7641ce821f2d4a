import type {
  SnapshotLog,
  StageLog,
  StoreQueryLog,
} from '../core-loggers/index.ts';
import { LOG_LEVEL_NUMBER, type LogLevel } from '../logger/index.ts';
import chalk from 'chalk';
import * as Rx from 'rxjs';
import { filter, map } from 'rxjs/operators';

type ProgressLine = {
  level: 'info' | 'debug';
  msg: string;
};

export function reportProgress(
  log$: {
    stage: Rx.Observable<StageLog>;
    snapshot: Rx.Observable<SnapshotLog>;
    storeQuery: Rx.Observable<StoreQueryLog>;
  },
  opts: {
    logLevel: LogLevel;
  }
): Rx.Observable<string> {
  const maxLogLevel = LOG_LEVEL_NUMBER[opts.logLevel];

  return Rx.merge(
    log$.stage.pipe(map(formatStage)),
    log$.snapshot.pipe(map(formatSnapshot)),
    log$.storeQuery.pipe(map(formatStoreQuery))
  ).pipe(
    filter(
      (line: ProgressLine): boolean =>
        LOG_LEVEL_NUMBER[line.level] <= maxLogLevel
    ),
    map((line: ProgressLine): string => line.msg)
  );
}

function formatStage(log: StageLog): ProgressLine {
  switch (log.stage) {
    case 'collecting_packages':
      return { level: 'info', msg: 'Collecting system packages' };
    case 'collecting_dependencies':
      return { level: 'info', msg: 'Collecting dependencies' };
    case 'done':
      return { level: 'debug', msg: 'Collected the system snapshot' };
  }
}

function formatSnapshot(log: SnapshotLog): ProgressLine {
  if ('collected' in log) {
    return {
      level: 'info',
      msg: `Found ${chalk.blue(log.collected.packages)} system packages with ${chalk.blue(log.collected.dependencies)} dependencies`,
    };
  }

  if ('saved' in log) {
    return {
      level: 'debug',
      msg: `Saved the state of ${log.saved.packages} packages to ${log.prefix}`,
    };
  }

  return {
    level: 'debug',
    msg: `Loaded the state of ${log.loaded.packages} packages saved at ${new Date(log.loaded.createdAt).toISOString()}`,
  };
}

function formatStoreQuery(log: StoreQueryLog): ProgressLine {
  return {
    level: 'debug',
    msg: `${log.source}: ${log.rows} rows for ${log.query} of ${log.prefix}`,
  };
}
