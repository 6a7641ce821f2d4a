import { ascend, descend, sortWith } from 'ramda';
import { identityKey } from '../store-path/index.ts';
import type { PackageChange, VersionChange } from './types.ts';

export function sortVersionChanges(changes: VersionChange[]): VersionChange[] {
  return sortWith<VersionChange>([
    ascend((change: VersionChange): string => change.name),
    ascend((change: VersionChange): string => identityKey(change)),
  ])(changes);
}

/**
 * Packages that changed version come first, then the ones with the most
 * changed dependencies, then by name. Dependencies are sorted by name.
 */
export function sortPackageChanges(changes: PackageChange[]): PackageChange[] {
  return sortWith<PackageChange>([
    descend((change: PackageChange): number =>
      typeof change.package === 'undefined' ? 0 : 1
    ),
    descend((change: PackageChange): number => change.dependencies.length),
    ascend((change: PackageChange): string => change.name),
    ascend((change: PackageChange): string => identityKey(change)),
  ])(changes).map(
    (change: PackageChange): PackageChange => ({
      ...change,
      dependencies: sortVersionChanges(change.dependencies),
    })
  );
}
