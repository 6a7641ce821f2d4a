import type { DependencyMap, IdentityKey, StorePathRecord } from './storePath.ts';

export type SystemPackage = {
  primary: StorePathRecord;
  /** Never contains the identity of `primary`. */
  dependencies: DependencyMap;
};

export type PackageMap = Map<IdentityKey, SystemPackage>;

export type SystemSnapshot = {
  packages: PackageMap;
  /**
   * Dependencies that have one version across every package depending on
   * them. None of these keys is left in any `packages[*].dependencies`.
   */
  sharedDependencies: DependencyMap;
};

export type SnapshotSourceName = 'database' | 'command';
