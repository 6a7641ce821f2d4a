import type { DependencyLookup } from '../deps.closure/index.ts';
import type { SnapshotSourceName, StorePathRecord } from '../types/index.ts';

export interface StoreSource {
  readonly name: SnapshotSourceName;
  /**
   * The top-level packages of the system, one record per identity.
   */
  listSystemPackages: () => Promise<StorePathRecord[]>;
  listDependencies: DependencyLookup;
  close: () => void;
}
