import { describe, expect, it } from 'vitest';
import { identityKey } from '../store-path/index.ts';
import type {
  DependencyMap,
  PackageMap,
  StorePathRecord,
  SystemPackage,
} from '../types/index.ts';
import {
  diffPackageMaps,
  diffStorePath,
  diffStorePaths,
  diffSystemPackages,
  type PackageChange,
  sortPackageChanges,
} from './index.ts';

function record(
  name: string,
  version: string,
  suffix?: string
): StorePathRecord {
  return typeof suffix === 'string'
    ? { name, version, suffix }
    : { name, version };
}

function dependencyMap(...records: StorePathRecord[]): DependencyMap {
  return new Map(
    records.map((r): [string, StorePathRecord] => [identityKey(r), r])
  );
}

function pkg(primary: StorePathRecord, ...deps: StorePathRecord[]): SystemPackage {
  return { primary, dependencies: dependencyMap(...deps) };
}

function packageMap(...pkgs: SystemPackage[]): PackageMap {
  return new Map(
    pkgs.map((p): [string, SystemPackage] => [identityKey(p.primary), p])
  );
}

describe('diffStorePath', () => {
  it('gives nothing for a record compared with itself', () => {
    const records = [
      record('glxinfo', '8.4.0'),
      record('ffmpeg', '3.4.5', 'bin'),
      record('rpcs3', '7788-4c59395'),
    ];

    for (const r of records) {
      expect(diffStorePath(r, r)).toBeUndefined();
    }
  });

  it('reports a version change', () => {
    expect(
      diffStorePath(record('glxinfo', '8.5.0'), record('glxinfo', '8.4.0'))
    ).toStrictEqual({ name: 'glxinfo', from: '8.4.0', to: '8.5.0' });
  });

  it('keeps the suffix of a changed build output', () => {
    expect(
      diffStorePath(
        record('same-suffix', '1.0.1', 'bin'),
        record('same-suffix', '1.0.0', 'bin')
      )
    ).toStrictEqual({
      name: 'same-suffix',
      suffix: 'bin',
      from: '1.0.0',
      to: '1.0.1',
    });
  });

  it('ignores records whose suffixes differ', () => {
    expect(
      diffStorePath(
        record('diff-suffix', '3.4.6', 'bin'),
        record('diff-suffix', '3.4.5', 'out')
      )
    ).toBeUndefined();
    expect(
      diffStorePath(
        record('partial-suffix', '1.0.1'),
        record('partial-suffix', '1.0.0', 'bin')
      )
    ).toBeUndefined();
  });
});

describe('diffStorePaths', () => {
  it('reports only the records whose version changed', () => {
    const newer = dependencyMap(
      record('glxinfo', '8.5.0'),
      record('ffmpeg', '3.4.5'),
      record('wine-wow', '4.1', 'staging'),
      record('steam-runtime', '2019-02-15'),
      record('dxvk', 'v0.96')
    );
    const older = dependencyMap(
      record('glxinfo', '8.4.0'),
      record('ffmpeg', '3.4.5'),
      record('wine-wow', '4.0-rc5', 'staging'),
      record('steam-runtime', '2016-08-26'),
      record('dxvk', 'v0.96')
    );

    expect(diffStorePaths(newer, older)).toStrictEqual([
      { name: 'glxinfo', from: '8.4.0', to: '8.5.0' },
      { name: 'wine-wow', suffix: 'staging', from: '4.0-rc5', to: '4.1' },
      { name: 'steam-runtime', from: '2016-08-26', to: '2019-02-15' },
    ]);
  });

  it('skips records that are new or differ only in suffix', () => {
    const newer = dependencyMap(
      record('brand-new', '1.0'),
      record('diff-suffix', '3.4.6', 'bin'),
      record('partial-suffix', '1.0.1')
    );
    const older = dependencyMap(
      record('diff-suffix', '3.4.5', 'out'),
      record('partial-suffix', '1.0.0', 'bin'),
      record('removed', '2.0')
    );

    expect(diffStorePaths(newer, older)).toStrictEqual([]);
  });
});

describe('diffSystemPackages', () => {
  it('bundles the package change with its dependency changes', () => {
    const newer = packageMap(
      pkg(record('firefox', '66.0'), record('nss', '3.42')),
      pkg(record('vim', '8.1.0'), record('ncurses', '6.1')),
      pkg(record('git', '2.20.1'), record('curl', '7.64.0')),
      pkg(record('new-package', '1.0'))
    );
    const older = packageMap(
      pkg(record('firefox', '65.0'), record('nss', '3.41')),
      pkg(record('vim', '8.1.0'), record('ncurses', '6.1')),
      pkg(record('git', '2.20.1'), record('curl', '7.63.0'))
    );

    expect(diffSystemPackages(newer, older)).toStrictEqual([
      {
        name: 'firefox',
        package: { name: 'firefox', from: '65.0', to: '66.0' },
        dependencies: [{ name: 'nss', from: '3.41', to: '3.42' }],
      },
      {
        name: 'git',
        dependencies: [{ name: 'curl', from: '7.63.0', to: '7.64.0' }],
      },
    ]);
  });
});

describe('sortPackageChanges', () => {
  function change(
    name: string,
    packageChanged: boolean,
    dependencyNames: string[]
  ): PackageChange {
    const result: PackageChange = {
      name,
      dependencies: dependencyNames.map((dep) => ({
        name: dep,
        from: '1',
        to: '2',
      })),
    };

    if (packageChanged) {
      result.package = { name, from: '1', to: '2' };
    }

    return result;
  }

  it('puts changed packages first, then by dependency count, then by name', () => {
    const sorted = sortPackageChanges([
      change('a', true, ['x']),
      change('b', false, ['x', 'y', 'z']),
      change('d', true, ['x', 'y', 'z']),
      change('c', true, ['x', 'y', 'z']),
      change('e', false, ['x']),
    ]);

    expect(sorted.map((c) => c.name)).toStrictEqual(['c', 'd', 'a', 'b', 'e']);
  });

  it('sorts the dependencies of each package by name', () => {
    const [sorted] = sortPackageChanges([change('a', false, ['zlib', 'db', 'glibc'])]);

    expect(sorted?.dependencies.map((c) => c.name)).toStrictEqual([
      'db',
      'glibc',
      'zlib',
    ]);
  });
});

describe('diffPackageMaps', () => {
  it('separates shared dependency updates from package updates', () => {
    const older = packageMap(
      pkg(record('test1', '1.0'), record('db', '4.8.30'), record('glibc', '2.27')),
      pkg(record('test2', '1.0'), record('db', '5.0.0'), record('glibc', '2.27'))
    );
    const newer = packageMap(
      pkg(record('test1', '1.1'), record('db', '4.8.30'), record('glibc', '2.28')),
      pkg(record('test2', '1.0'), record('db', '5.0.1'), record('glibc', '2.28'))
    );

    expect(diffPackageMaps(newer, older)).toStrictEqual({
      packages: [
        {
          name: 'test1',
          package: { name: 'test1', from: '1.0', to: '1.1' },
          dependencies: [],
        },
        {
          name: 'test2',
          dependencies: [{ name: 'db', from: '5.0.0', to: '5.0.1' }],
        },
      ],
      shared: [{ name: 'glibc', from: '2.27', to: '2.28' }],
    });
    expect(older.get('test1')?.dependencies.size).toBe(2);
  });
});
