import { type Config, types as allTypes } from '../config/index.ts';
import { createStoreSource, type StoreSource } from '../store.sources/index.ts';
import { pick } from 'ramda';

export type SnapshotCommandOptions = Pick<
  Config,
  'concurrency' | 'dbPath' | 'json' | 'source' | 'stateFile'
> & {
  createSource?: ((opts: Pick<Config, 'dbPath' | 'source'>) => StoreSource) | undefined;
};

export function cliOptionsTypes(): Record<string, unknown> {
  return pick(['concurrency', 'db-path', 'json', 'source'], allTypes);
}

export function openSource(opts: SnapshotCommandOptions): StoreSource {
  return (opts.createSource ?? createStoreSource)({
    dbPath: opts.dbPath,
    source: opts.source,
  });
}
