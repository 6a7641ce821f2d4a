import type {
  DependencyMap,
  PackageMap,
  StorePathRecord,
} from '../types/index.ts';
import type { PackageChange, VersionChange } from './types.ts';

/**
 * Compares two records already known to share an identity.
 *
 * Gives nothing when the versions are equal, or when the suffixes differ,
 * since a differently tagged build output is not an update of the other one.
 */
export function diffStorePath(
  newer: StorePathRecord,
  older: StorePathRecord
): VersionChange | undefined {
  if (newer.version === older.version) {
    return undefined;
  }

  if (newer.suffix !== older.suffix) {
    return undefined;
  }

  const change: VersionChange = {
    name: newer.name,
    from: older.version,
    to: newer.version,
  };

  if (typeof newer.suffix === 'string') {
    change.suffix = newer.suffix;
  }

  return change;
}

/**
 * Records present only in `newer` are additions, not changes, and are skipped.
 */
export function diffStorePaths(
  newer: DependencyMap,
  older: DependencyMap
): VersionChange[] {
  const changes: VersionChange[] = [];

  for (const [key, record] of newer) {
    const previous = older.get(key);

    if (typeof previous === 'undefined') {
      continue;
    }

    const change = diffStorePath(record, previous);

    if (typeof change !== 'undefined') {
      changes.push(change);
    }
  }

  return changes;
}

export function diffSystemPackages(
  newer: PackageMap,
  older: PackageMap
): PackageChange[] {
  const changes: PackageChange[] = [];

  for (const [key, pkg] of newer) {
    const previous = older.get(key);

    if (typeof previous === 'undefined') {
      continue;
    }

    const packageChange = diffStorePath(pkg.primary, previous.primary);

    const dependencyChanges = diffStorePaths(
      pkg.dependencies,
      previous.dependencies
    );

    if (typeof packageChange === 'undefined' && dependencyChanges.length === 0) {
      continue;
    }

    const change: PackageChange = {
      name: pkg.primary.name,
      dependencies: dependencyChanges,
    };

    if (typeof pkg.primary.suffix === 'string') {
      change.suffix = pkg.primary.suffix;
    }

    if (typeof packageChange !== 'undefined') {
      change.package = packageChange;
    }

    changes.push(change);
  }

  return changes;
}
