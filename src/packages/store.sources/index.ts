import type { SnapshotSourceName } from '../types/index.ts';
import { createCommandSource } from './commandSource.ts';
import { createDatabaseSource } from './databaseSource.ts';
import type { StoreSource } from './StoreSource.ts';

export type { StoreSource };
export {
  createCommandSource,
  parseRequisitesOutput,
  parseSystemPackagesOutput,
  type RunCommand,
} from './commandSource.ts';
export { createDatabaseSource, DEFAULT_DB_PATH } from './databaseSource.ts';

export function createStoreSource(opts: {
  source: SnapshotSourceName;
  dbPath: string;
}): StoreSource {
  switch (opts.source) {
    case 'database':
      return createDatabaseSource({ dbPath: opts.dbPath });
    case 'command':
      return createCommandSource();
  }
}
