import path from 'node:path';
import process from 'node:process';
import { DEFAULT_LOOKUP_CONCURRENCY } from '../deps.closure/index.ts';
import { PkgdiffError } from '../error/index.ts';
import { SNAPSHOT_FILENAME } from '../snapshot.fs/index.ts';
import { DEFAULT_DB_PATH } from '../store.sources/index.ts';
import type { CliOptions, Color, Config } from './Config.ts';
import { getDataDir } from './dirs.ts';
import { types } from './types.ts';

export type { CliOptions, Color, Config };
export { getDataDir, types };

const COLORS = ['auto', 'always', 'never'] as const;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const REPORTERS = ['default', 'ndjson', 'silent'] as const;

const SOURCES = ['database', 'command'] as const;

export function getConfig(
  cliOptions: CliOptions,
  opts: {
    env: NodeJS.ProcessEnv;
    platform: string;
    cwd?: string | undefined;
  }
): Config {
  const dir = opts.cwd ?? process.cwd();

  const stateDir =
    typeof cliOptions['state-dir'] === 'string'
      ? path.resolve(dir, requireValue(cliOptions['state-dir'], 'state-dir'))
      : getDataDir(opts);

  const reporter = pickOption(cliOptions, 'reporter', REPORTERS);

  return {
    color: pickOption(cliOptions, 'color', COLORS) ?? 'auto',
    concurrency: parseConcurrency(cliOptions['concurrency']),
    dbPath:
      typeof cliOptions['db-path'] === 'string'
        ? path.resolve(dir, requireValue(cliOptions['db-path'], 'db-path'))
        : DEFAULT_DB_PATH,
    dir,
    json: cliOptions['json'] === true,
    loglevel: pickOption(cliOptions, 'loglevel', LOG_LEVELS) ?? 'info',
    ...(typeof reporter === 'undefined' ? {} : { reporter }),
    source: pickOption(cliOptions, 'source', SOURCES) ?? 'database',
    stateDir,
    stateFile: path.join(stateDir, SNAPSHOT_FILENAME),
  };
}

function pickOption<T extends string>(
  cliOptions: CliOptions,
  name: string,
  allowed: readonly T[]
): T | undefined {
  const value = cliOptions[name];

  if (typeof value === 'undefined') {
    return undefined;
  }

  const match = allowed.find((option: T): boolean => option === value);

  if (typeof match === 'undefined') {
    throw new PkgdiffError(
      'BAD_OPTION_VALUE',
      `Invalid value for --${name}: "${String(value)}"`,
      { hint: `Supported values are: ${allowed.join(', ')}` }
    );
  }

  return match;
}

function parseConcurrency(value: unknown): number {
  if (typeof value === 'undefined') {
    return DEFAULT_LOOKUP_CONCURRENCY;
  }

  const concurrency = typeof value === 'string' && /^\d+$/.test(value)
    ? Number.parseInt(value, 10)
    : Number.NaN;

  if (!(concurrency >= 1)) {
    throw new PkgdiffError(
      'BAD_OPTION_VALUE',
      `Invalid value for --concurrency: "${String(value)}"`,
      { hint: 'The concurrency should be a positive integer' }
    );
  }

  return concurrency;
}

function requireValue(value: string, name: string): string {
  if (value === '') {
    throw new PkgdiffError('BAD_OPTION_VALUE', `--${name} requires a path`);
  }

  return value;
}
