import { snapshotLogger, stageLogger } from '../core-loggers/index.ts';
import { buildSystemPackages } from '../deps.closure/index.ts';
import type { StoreSource } from '../store.sources/index.ts';
import type { PackageMap, SystemPackage } from '../types/index.ts';

/**
 * Reads the top-level packages of the system and the dependencies of each.
 * The result is not partitioned yet.
 */
export async function collectSystemPackages(
  source: StoreSource,
  opts?: { concurrency?: number | undefined } | undefined
): Promise<PackageMap> {
  stageLogger.debug({ prefix: source.name, stage: 'collecting_packages' });

  const primaries = await source.listSystemPackages();

  stageLogger.debug({ prefix: source.name, stage: 'collecting_dependencies' });

  const packages = await buildSystemPackages(
    primaries,
    source.listDependencies,
    { concurrency: opts?.concurrency }
  );

  stageLogger.debug({ prefix: source.name, stage: 'done' });

  snapshotLogger.debug({
    prefix: source.name,
    collected: {
      packages: packages.size,
      dependencies: Array.from(packages.values()).reduce(
        (sum: number, pkg: SystemPackage): number => sum + pkg.dependencies.size,
        0
      ),
    },
  });

  return packages;
}
