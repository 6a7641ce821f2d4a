import path from 'node:path';

export const SNAPSHOT_FILENAME = 'packages.json';

export function getSnapshotFilePath(stateDir: string): string {
  return path.join(stateDir, SNAPSHOT_FILENAME);
}

export { readSnapshot } from './readSnapshot.ts';
export { writeSnapshot } from './writeSnapshot.ts';
export {
  SNAPSHOT_VERSION,
  type SavedSnapshot,
  type SnapshotFile,
  type SnapshotFilePackage,
  type SnapshotFileRecord,
} from './types.ts';
