import fs from 'node:fs';
import process from 'node:process';
import { dedupeStorePaths } from '../dedupe.store-paths/index.ts';
import { parseRawStorePaths } from '../deps.closure/index.ts';
import { storeQueryLogger } from '../core-loggers/index.ts';
import { PkgdiffError, StoreQueryError, errorMessage } from '../error/index.ts';
import type { RawStorePath, StorePathRecord } from '../types/index.ts';
import Database from 'better-sqlite3';
import type { StoreSource } from './StoreSource.ts';

export const DEFAULT_DB_PATH = '/nix/var/nix/db/db.sqlite';

const SQL_DIR = new URL('../../../sql/', import.meta.url);

function readQuery(fileName: string): string {
  return fs.readFileSync(new URL(fileName, SQL_DIR), 'utf8');
}

export function createDatabaseSource(opts: { dbPath: string }): StoreSource {
  const db = openDatabase(opts.dbPath);

  const selectSystemStores = db.prepare(readQuery('select_system_stores.sql'));

  const selectStoreDeps = db.prepare(readQuery('select_store_deps.sql'));

  return {
    name: 'database',
    listSystemPackages: async (): Promise<StorePathRecord[]> => {
      const rows = toRawStorePaths(selectSystemStores.all(), opts.dbPath);

      storeQueryLogger.debug({
        prefix: opts.dbPath,
        source: 'database',
        query: 'system-packages',
        rows: rows.length,
      });

      return Array.from(dedupeStorePaths(parseRawStorePaths(rows)).values());
    },
    listDependencies: async (
      primary: StorePathRecord
    ): Promise<RawStorePath[]> => {
      const storePath = primary.origin?.path;

      const id = primary.origin?.id;

      if (typeof id !== 'number') {
        throw new StoreQueryError(
          storePath,
          `${storePath ?? primary.name} was not read from the Nix database`
        );
      }

      const rows = toRawStorePaths(
        selectStoreDeps.all({ referrer: id }),
        storePath
      );

      storeQueryLogger.debug({
        prefix: storePath ?? primary.name,
        source: 'database',
        query: 'dependencies',
        rows: rows.length,
      });

      return rows;
    },
    close: (): void => {
      db.close();
    },
  };
}

function openDatabase(dbPath: string): Database.Database {
  try {
    return new Database(dbPath, { readonly: true, fileMustExist: true });
  } catch (error: unknown) {
    throw new PkgdiffError(
      'NIX_DB_UNREADABLE',
      `Cannot open the Nix database at ${dbPath}: ${errorMessage(error)}`,
      {
        hint:
          process.getuid?.() === 0
            ? 'Check that this is a NixOS system, or pass --source command'
            : 'Must run as root to access the Nix database, or pass --source command',
        cause: error,
      }
    );
  }
}

function toRawStorePaths(
  rows: unknown[],
  storePath: string | undefined
): RawStorePath[] {
  return rows.map((row: unknown): RawStorePath => {
    if (!isStorePathRow(row)) {
      throw new StoreQueryError(
        storePath,
        'The Nix database returned a row without an id, path and registration time'
      );
    }

    return {
      id: row.id,
      path: row.path,
      registrationTime: row.registrationTime,
    };
  });
}

function isStorePathRow(
  row: unknown
): row is { id: number; path: string; registrationTime: number } {
  return (
    typeof row === 'object' &&
    row !== null &&
    'id' in row &&
    typeof row.id === 'number' &&
    'path' in row &&
    typeof row.path === 'string' &&
    'registrationTime' in row &&
    typeof row.registrationTime === 'number'
  );
}
