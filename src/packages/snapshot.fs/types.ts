import type { PackageMap, SnapshotSourceName } from '../types/index.ts';

export const SNAPSHOT_VERSION = 1;

export type SnapshotFileRecord = {
  name: string;
  version: string;
  suffix?: string | undefined;
  registrationTime?: number | undefined;
};

export type SnapshotFilePackage = SnapshotFileRecord & {
  dependencies: SnapshotFileRecord[];
};

export type SnapshotFile = {
  snapshotVersion: typeof SNAPSHOT_VERSION;
  /** Epoch milliseconds. */
  createdAt: number;
  source: SnapshotSourceName;
  packages: SnapshotFilePackage[];
};

export type SavedSnapshot = {
  createdAt: number;
  source: SnapshotSourceName;
  packages: PackageMap;
};
