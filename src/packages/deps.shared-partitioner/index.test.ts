import { describe, expect, it } from 'vitest';
import type {
  PackageMap,
  StorePathRecord,
  SystemPackage,
} from '../types/index.ts';
import {
  findSharedDependencyKeys,
  partitionSharedDependencies,
  toSystemSnapshot,
} from './index.ts';

function record(name: string, version: string): StorePathRecord {
  return { name, version };
}

function pkg(
  name: string,
  version: string,
  dependencies: StorePathRecord[]
): SystemPackage {
  return {
    primary: record(name, version),
    dependencies: new Map(
      dependencies.map((dep): [string, StorePathRecord] => [dep.name, dep])
    ),
  };
}

function packageMap(...pkgs: SystemPackage[]): PackageMap {
  return new Map(pkgs.map((p): [string, SystemPackage] => [p.primary.name, p]));
}

function dependencyVersions(
  packages: PackageMap
): Record<string, Record<string, string>> {
  return Object.fromEntries(
    Array.from(packages, ([key, p]): [string, Record<string, string>] => [
      key,
      Object.fromEntries(
        Array.from(p.dependencies, ([depKey, dep]): [string, string] => [
          depKey,
          dep.version,
        ])
      ),
    ])
  );
}

function assertMutuallyExclusive(
  packages: PackageMap,
  shared: Map<string, StorePathRecord>
): void {
  for (const p of packages.values()) {
    for (const key of p.dependencies.keys()) {
      expect(shared.has(key)).toBe(false);
    }
  }
}

describe('partitionSharedDependencies', () => {
  it('extracts only the dependencies every package agrees on', () => {
    const packages = packageMap(
      pkg('test1', '1.0', [record('db', '4.8.30'), record('glibc', '2.27')]),
      pkg('test2', '1.0', [record('db', '5.0.0'), record('glibc', '2.27')]),
      pkg('test3', '1.0', [record('db', '4.8.30'), record('glibc', '2.27')])
    );

    const shared = partitionSharedDependencies(packages);

    expect(Array.from(shared.values())).toStrictEqual([
      record('glibc', '2.27'),
    ]);
    expect(dependencyVersions(packages)).toStrictEqual({
      test1: { db: '4.8.30' },
      test2: { db: '5.0.0' },
      test3: { db: '4.8.30' },
    });
    assertMutuallyExclusive(packages, shared);
  });

  it('flags a version change that only the last package introduces', () => {
    const packages = packageMap(
      pkg('a', '1', [record('openssl', '1.0.2')]),
      pkg('b', '1', [record('openssl', '1.0.2')]),
      pkg('c', '1', [record('openssl', '1.1.1')])
    );

    const shared = partitionSharedDependencies(packages);

    expect(shared.size).toBe(0);
    expect(dependencyVersions(packages)).toStrictEqual({
      a: { openssl: '1.0.2' },
      b: { openssl: '1.0.2' },
      c: { openssl: '1.1.1' },
    });
  });

  it('treats a dependency of a single package as shared', () => {
    const packages = packageMap(
      pkg('steam', '1.0.0.59', [record('steam-runtime', '2016-08-26')]),
      pkg('vim', '8.1.0', [])
    );

    const shared = partitionSharedDependencies(packages);

    expect(Array.from(shared.keys())).toStrictEqual(['steam-runtime']);
    expect(packages.get('steam')?.dependencies.size).toBe(0);
  });

  it('returns an empty map for an empty package map', () => {
    expect(partitionSharedDependencies(new Map()).size).toBe(0);
  });

  it('keeps the mutual exclusion on a mixed system', () => {
    const packages = packageMap(
      pkg('p1', '1', [record('x', '1'), record('y', '1'), record('z', '1')]),
      pkg('p2', '1', [record('x', '2'), record('y', '1')]),
      pkg('p3', '1', [record('z', '1'), record('w', '3')]),
      pkg('p4', '1', [record('x', '1'), record('w', '3'), record('y', '1')])
    );

    const shared = partitionSharedDependencies(packages);

    expect(Array.from(shared.keys()).sort()).toStrictEqual(['w', 'y', 'z']);
    expect(dependencyVersions(packages)).toStrictEqual({
      p1: { x: '1' },
      p2: { x: '2' },
      p3: {},
      p4: { x: '1' },
    });
    assertMutuallyExclusive(packages, shared);
  });
});

describe('findSharedDependencyKeys', () => {
  it('does not modify the packages', () => {
    const packages = packageMap(
      pkg('a', '1', [record('zlib', '1.2.11')]),
      pkg('b', '1', [record('zlib', '1.2.11')])
    );

    expect(Array.from(findSharedDependencyKeys(packages.values()))).toStrictEqual([
      'zlib',
    ]);
    expect(packages.get('a')?.dependencies.size).toBe(1);
  });
});

describe('toSystemSnapshot', () => {
  it('partitions a copy and leaves the input alone', () => {
    const packages = packageMap(
      pkg('a', '1', [record('zlib', '1.2.11'), record('db', '4')]),
      pkg('b', '1', [record('zlib', '1.2.11'), record('db', '5')])
    );

    const snapshot = toSystemSnapshot(packages);

    expect(Array.from(snapshot.sharedDependencies.keys())).toStrictEqual([
      'zlib',
    ]);
    expect(dependencyVersions(snapshot.packages)).toStrictEqual({
      a: { db: '4' },
      b: { db: '5' },
    });
    expect(dependencyVersions(packages)).toStrictEqual({
      a: { zlib: '1.2.11', db: '4' },
      b: { zlib: '1.2.11', db: '5' },
    });
  });
});
