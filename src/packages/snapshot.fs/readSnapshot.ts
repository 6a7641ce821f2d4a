import util from 'node:util';
import { snapshotLogger } from '../core-loggers/index.ts';
import { SnapshotFileError } from '../error/index.ts';
import { identityKey } from '../store-path/index.ts';
import type {
  DependencyMap,
  PackageMap,
  SnapshotSourceName,
  StorePathRecord,
} from '../types/index.ts';
import { loadJsonFile } from 'load-json-file';
import { SNAPSHOT_VERSION, type SavedSnapshot } from './types.ts';

const SAVE_HINT = 'Run "nix-pkgdiff save" before updating the system, then run "nix-pkgdiff" after the update';

export async function readSnapshot(filePath: string): Promise<SavedSnapshot> {
  let data: unknown;

  try {
    data = await loadJsonFile<unknown>(filePath);
  } catch (error: unknown) {
    if (
      util.types.isNativeError(error) &&
      'code' in error &&
      error.code === 'ENOENT'
    ) {
      throw new SnapshotFileError(
        'NO_SAVED_STATE',
        filePath,
        `No saved state found at ${filePath}`,
        { hint: SAVE_HINT, cause: error }
      );
    }

    if (error instanceof SyntaxError) {
      throw new SnapshotFileError(
        'BAD_STATE_FILE',
        filePath,
        `The saved state at ${filePath} is not valid JSON`,
        { cause: error }
      );
    }

    throw error;
  }

  const snapshot = parseSnapshot(filePath, data);

  snapshotLogger.debug({
    prefix: filePath,
    loaded: {
      packages: snapshot.packages.size,
      createdAt: snapshot.createdAt,
    },
  });

  return snapshot;
}

function parseSnapshot(filePath: string, data: unknown): SavedSnapshot {
  function invalid(reason: string): SnapshotFileError {
    return new SnapshotFileError(
      'BAD_STATE_FILE',
      filePath,
      `The saved state at ${filePath} is not valid: ${reason}`
    );
  }

  if (!isPlainObject(data)) {
    throw invalid('expected an object');
  }

  if (data.snapshotVersion !== SNAPSHOT_VERSION) {
    if (typeof data.snapshotVersion === 'number') {
      throw new SnapshotFileError(
        'STATE_FILE_BREAKING_CHANGE',
        filePath,
        `The saved state at ${filePath} has format version ${data.snapshotVersion}, which this version of nix-pkgdiff cannot read`,
        { hint: 'Run "nix-pkgdiff save" to record the state again' }
      );
    }

    throw invalid('"snapshotVersion" is missing');
  }

  if (typeof data.createdAt !== 'number') {
    throw invalid('"createdAt" should be a number');
  }

  const source = parseSourceName(data.source);

  if (typeof source === 'undefined') {
    throw invalid('"source" should be "database" or "command"');
  }

  if (!Array.isArray(data.packages)) {
    throw invalid('"packages" should be an array');
  }

  const packages: PackageMap = new Map();

  for (const [index, value] of data.packages.entries()) {
    const where = `packages[${index}]`;

    if (!isPlainObject(value)) {
      throw invalid(`${where} should be an object`);
    }

    const primary = parseRecord(value, where, invalid);

    if (!Array.isArray(value.dependencies)) {
      throw invalid(`${where}.dependencies should be an array`);
    }

    const dependencies: DependencyMap = new Map();

    for (const [depIndex, dep] of value.dependencies.entries()) {
      const depWhere = `${where}.dependencies[${depIndex}]`;

      if (!isPlainObject(dep)) {
        throw invalid(`${depWhere} should be an object`);
      }

      addUnique(dependencies, parseRecord(dep, depWhere, invalid), depWhere, invalid);
    }

    const key = identityKey(primary);

    if (packages.has(key)) {
      throw invalid(`${where} repeats the package ${key}`);
    }

    packages.set(key, { primary, dependencies });
  }

  return { createdAt: data.createdAt, source, packages };
}

function parseRecord(
  value: Record<string, unknown>,
  where: string,
  invalid: (reason: string) => Error
): StorePathRecord {
  if (typeof value.name !== 'string' || value.name === '') {
    throw invalid(`${where}.name should be a non-empty string`);
  }

  if (typeof value.version !== 'string' || value.version === '') {
    throw invalid(`${where}.version should be a non-empty string`);
  }

  const record: StorePathRecord = { name: value.name, version: value.version };

  if (typeof value.suffix === 'string') {
    record.suffix = value.suffix;
  } else if (typeof value.suffix !== 'undefined') {
    throw invalid(`${where}.suffix should be a string`);
  }

  if (typeof value.registrationTime === 'number') {
    record.registrationTime = value.registrationTime;
  } else if (typeof value.registrationTime !== 'undefined') {
    throw invalid(`${where}.registrationTime should be a number`);
  }

  return record;
}

function addUnique(
  dependencies: DependencyMap,
  record: StorePathRecord,
  where: string,
  invalid: (reason: string) => Error
): void {
  const key = identityKey(record);

  if (dependencies.has(key)) {
    throw invalid(`${where} repeats the dependency ${key}`);
  }

  dependencies.set(key, record);
}

function parseSourceName(value: unknown): SnapshotSourceName | undefined {
  return value === 'database' || value === 'command' ? value : undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
