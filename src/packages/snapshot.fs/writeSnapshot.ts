import { snapshotLogger } from '../core-loggers/index.ts';
import { identityKey } from '../store-path/index.ts';
import type {
  PackageMap,
  SnapshotSourceName,
  StorePathRecord,
  SystemPackage,
} from '../types/index.ts';
import { sortBy } from 'ramda';
import { writeJsonFile } from 'write-json-file';
import {
  SNAPSHOT_VERSION,
  type SnapshotFile,
  type SnapshotFilePackage,
  type SnapshotFileRecord,
} from './types.ts';

export async function writeSnapshot(
  filePath: string,
  packages: PackageMap,
  meta: {
    source: SnapshotSourceName;
    createdAt?: number | undefined;
  }
): Promise<SnapshotFile> {
  const snapshot: SnapshotFile = {
    snapshotVersion: SNAPSHOT_VERSION,
    createdAt: meta.createdAt ?? Date.now(),
    source: meta.source,
    packages: sortBy(
      (pkg: SnapshotFilePackage): string => identityKey(pkg),
      Array.from(packages.values(), toFilePackage)
    ),
  };

  // The parent directories are created as needed
  await writeJsonFile(filePath, snapshot, { indent: 2 });

  snapshotLogger.debug({
    prefix: filePath,
    saved: {
      packages: snapshot.packages.length,
      createdAt: snapshot.createdAt,
    },
  });

  return snapshot;
}

function toFilePackage(pkg: SystemPackage): SnapshotFilePackage {
  return {
    ...toFileRecord(pkg.primary),
    dependencies: sortBy(
      (dep: SnapshotFileRecord): string => identityKey(dep),
      Array.from(pkg.dependencies.values(), toFileRecord)
    ),
  };
}

function toFileRecord(record: StorePathRecord): SnapshotFileRecord {
  const fileRecord: SnapshotFileRecord = {
    name: record.name,
    version: record.version,
  };

  if (typeof record.suffix === 'string') {
    fileRecord.suffix = record.suffix;
  }

  if (typeof record.registrationTime === 'number') {
    fileRecord.registrationTime = record.registrationTime;
  }

  return fileRecord;
}
