import { dedupeStorePaths } from '../dedupe.store-paths/index.ts';
import { StoreQueryError, errorMessage } from '../error/index.ts';
import { identityKey, parseStorePath } from '../store-path/index.ts';
import type {
  PackageMap,
  RawStorePath,
  StorePathRecord,
  SystemPackage,
} from '../types/index.ts';
import pLimit from 'p-limit';

/**
 * Returns every store path the package depends on, directly or not. The
 * package's own path may be among them.
 */
export type DependencyLookup = (
  primary: StorePathRecord
) => Promise<Iterable<RawStorePath | string>>;

export const DEFAULT_LOOKUP_CONCURRENCY = 4;

export async function buildSystemPackage(
  primary: StorePathRecord,
  lookupDependencies: DependencyLookup
): Promise<SystemPackage> {
  const rawDependencies = await lookupDependencies(primary);

  const dependencies = dedupeStorePaths(parseRawStorePaths(rawDependencies));

  dependencies.delete(identityKey(primary));

  return { primary, dependencies };
}

/**
 * Builds a package for every primary record, running at most `concurrency`
 * lookups at a time. The first failed lookup rejects the whole call.
 */
export async function buildSystemPackages(
  primaries: Iterable<StorePathRecord>,
  lookupDependencies: DependencyLookup,
  opts?: { concurrency?: number | undefined } | undefined
): Promise<PackageMap> {
  const limit = pLimit(opts?.concurrency ?? DEFAULT_LOOKUP_CONCURRENCY);

  const packages = await Promise.all(
    Array.from(
      primaries,
      (primary: StorePathRecord): Promise<SystemPackage> =>
        limit(async (): Promise<SystemPackage> => {
          try {
            return await buildSystemPackage(primary, lookupDependencies);
          } catch (error: unknown) {
            limit.clearQueue();

            if (error instanceof StoreQueryError) {
              throw error;
            }

            const storePath = primary.origin?.path ?? identityKey(primary);

            throw new StoreQueryError(
              storePath,
              `Failed to query the dependencies of ${storePath}: ${errorMessage(error)}`,
              { cause: error }
            );
          }
        })
    )
  );

  const packageMap: PackageMap = new Map();

  for (const pkg of packages) {
    packageMap.set(identityKey(pkg.primary), pkg);
  }

  return packageMap;
}

export function* parseRawStorePaths(
  rawStorePaths: Iterable<RawStorePath | string>
): Generator<StorePathRecord> {
  for (const raw of rawStorePaths) {
    const record =
      typeof raw === 'string'
        ? parseStorePath(raw)
        : parseStorePath(raw.path, {
            id: raw.id,
            registrationTime: raw.registrationTime,
          });

    if (typeof record !== 'undefined') {
      yield record;
    }
  }
}
