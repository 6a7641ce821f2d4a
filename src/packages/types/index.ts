export type {
  DependencyMap,
  IdentityKey,
  RawStorePath,
  StorePathOrigin,
  StorePathRecord,
} from './storePath.ts';
export type {
  PackageMap,
  SnapshotSourceName,
  SystemPackage,
  SystemSnapshot,
} from './systemPackage.ts';
