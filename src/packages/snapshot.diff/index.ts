import { toSystemSnapshot } from '../deps.shared-partitioner/index.ts';
import type { PackageMap, SystemSnapshot } from '../types/index.ts';
import { diffStorePaths, diffSystemPackages } from './diff.ts';
import { sortPackageChanges, sortVersionChanges } from './sort.ts';
import type { SnapshotDiff } from './types.ts';

export { diffStorePath, diffStorePaths, diffSystemPackages } from './diff.ts';
export { sortPackageChanges, sortVersionChanges } from './sort.ts';
export type { PackageChange, SnapshotDiff, VersionChange } from './types.ts';

/**
 * Diffs two partitioned snapshots. The result is sorted.
 */
export function diffSnapshots(
  newer: SystemSnapshot,
  older: SystemSnapshot
): SnapshotDiff {
  return {
    packages: sortPackageChanges(
      diffSystemPackages(newer.packages, older.packages)
    ),
    shared: sortVersionChanges(
      diffStorePaths(newer.sharedDependencies, older.sharedDependencies)
    ),
  };
}

/**
 * Partitions both collected package maps, then diffs them. Neither input is
 * modified.
 */
export function diffPackageMaps(
  newer: PackageMap,
  older: PackageMap
): SnapshotDiff {
  return diffSnapshots(toSystemSnapshot(newer), toSystemSnapshot(older));
}
