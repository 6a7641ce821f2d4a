import type {
  DependencyMap,
  IdentityKey,
  PackageMap,
  SystemPackage,
  SystemSnapshot,
} from '../types/index.ts';

type DependencyScan = {
  lastVersion: string;
  hasMultipleVersions: boolean;
};

/**
 * Moves every dependency that has the same version in all the packages
 * depending on it out of those packages, into the returned map.
 *
 * `packages` is modified in place.
 */
export function partitionSharedDependencies(
  packages: PackageMap
): DependencyMap {
  const sharedKeys = findSharedDependencyKeys(packages.values());

  return Array.from(packages.values())
    .map((pkg: SystemPackage): DependencyMap => takeDependencies(pkg, sharedKeys))
    .reduce(mergeDependencyMaps, new Map());
}

/**
 * Splits a collected package map into per-package and shared dependencies
 * without touching the input.
 */
export function toSystemSnapshot(packages: PackageMap): SystemSnapshot {
  const copy = clonePackageMap(packages);

  const sharedDependencies = partitionSharedDependencies(copy);

  return { packages: copy, sharedDependencies };
}

export function findSharedDependencyKeys(
  packages: Iterable<SystemPackage>
): Set<IdentityKey> {
  const scans = new Map<IdentityKey, DependencyScan>();

  for (const pkg of packages) {
    for (const [key, dependency] of pkg.dependencies) {
      const scan = scans.get(key);

      if (typeof scan === 'undefined') {
        scans.set(key, {
          lastVersion: dependency.version,
          hasMultipleVersions: false,
        });

        continue;
      }

      if (scan.lastVersion !== dependency.version) {
        scan.hasMultipleVersions = true;
      }

      scan.lastVersion = dependency.version;
    }
  }

  const sharedKeys = new Set<IdentityKey>();

  for (const [key, scan] of scans) {
    if (!scan.hasMultipleVersions) {
      sharedKeys.add(key);
    }
  }

  return sharedKeys;
}

function takeDependencies(
  pkg: SystemPackage,
  keys: Set<IdentityKey>
): DependencyMap {
  const taken: DependencyMap = new Map();

  for (const [key, dependency] of pkg.dependencies) {
    if (!keys.has(key)) {
      continue;
    }

    // deleting the entry being visited does not disturb Map iteration
    pkg.dependencies.delete(key);

    taken.set(key, dependency);
  }

  return taken;
}

function mergeDependencyMaps(
  acc: DependencyMap,
  dependencies: DependencyMap
): DependencyMap {
  for (const [key, dependency] of dependencies) {
    if (!acc.has(key)) {
      acc.set(key, dependency);
    }
  }

  return acc;
}

function clonePackageMap(packages: PackageMap): PackageMap {
  const copy: PackageMap = new Map();

  for (const [key, pkg] of packages) {
    copy.set(key, {
      primary: pkg.primary,
      dependencies: new Map(pkg.dependencies),
    });
  }

  return copy;
}
