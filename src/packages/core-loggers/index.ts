import type { SnapshotLog, StageLog, StoreQueryLog } from './all.ts';
import type { LogBase } from '../logger/index.ts';

export * from './all.ts';

export type GlobalLog = { name: 'nix-pkgdiff:global' } & LogBase;

export type RootLog = { name: 'nix-pkgdiff' } & LogBase;

export type Log = GlobalLog | RootLog | SnapshotLog | StageLog | StoreQueryLog;

const LOG_NAMES = new Set<string>([
  'nix-pkgdiff',
  'nix-pkgdiff:global',
  'nix-pkgdiff:snapshot',
  'nix-pkgdiff:stage',
  'nix-pkgdiff:store-query',
] satisfies Array<Log['name']>);

const LOG_LEVELS = new Set<string>(['debug', 'info', 'warn', 'error']);

/**
 * Narrows a line of the log stream to one of the logs this tool writes.
 */
export function isLog(obj: object): obj is Log {
  return (
    'name' in obj &&
    typeof obj.name === 'string' &&
    LOG_NAMES.has(obj.name) &&
    'level' in obj &&
    typeof obj.level === 'string' &&
    LOG_LEVELS.has(obj.level)
  );
}
