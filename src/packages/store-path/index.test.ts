import { describe, expect, it } from 'vitest';
import {
  identityKey,
  isVersionFragment,
  parseStorePath,
  sameIdentity,
  stripStorePrefix,
} from './index.ts';

const HASH = '0c9rz8kyh1ga8x7bvaqsl6ml4hq2mf2a';

function storePath(name: string): string {
  return `/nix/store/${HASH}-${name}`;
}

describe('parseStorePath', () => {
  const parsed: Array<[string, string, string, string | undefined]> = [
    ['glxinfo-8.4.0', 'glxinfo', '8.4.0', undefined],
    ['pcre-8.42', 'pcre', '8.42', undefined],
    ['gcc-7.4.0', 'gcc', '7.4.0', undefined],
    ['dxvk-v0.96', 'dxvk', 'v0.96', undefined],
    ['dxvk-v1.4.6', 'dxvk', 'v1.4.6', undefined],
    [
      'dxvk-6062dfbef4d5c0f061b9f6e342acab54f34e089a',
      'dxvk',
      '6062dfbef4d5c0f061b9f6e342acab54f34e089a',
      undefined,
    ],
    ['rpcs3-7788-4c59395', 'rpcs3', '7788-4c59395', undefined],
    ['steam-runtime-2016-08-26', 'steam-runtime', '2016-08-26', undefined],
    ['single-version-8', 'single-version', '8', undefined],
    ['single-4', 'single', '4', undefined],
    ['vulkan-loader-1.1.85', 'vulkan-loader', '1.1.85', undefined],
    ['vpnc-0.5.3-post-r550', 'vpnc', '0.5.3-post-r550', undefined],
    ['python3.9-requests-2.25.1', 'python3.9-requests', '2.25.1', undefined],
    ['wine-wow-4.21-staging', 'wine-wow', '4.21', 'staging'],
    ['wine-wow-4.0-rc5-staging', 'wine-wow', '4.0-rc5', 'staging'],
    ['ffmpeg-3.4.5-bin', 'ffmpeg', '3.4.5', 'bin'],
    ['some-tool-v-edition-2.0', 'some-tool-v-edition', '2.0', undefined],
    ['0ad-data-0.0.26', '0ad-data', '0.0.26', undefined],
    ['389-ds-base-2.0.3', '389-ds-base', '2.0.3', undefined],
  ];

  it.each(parsed)('parses %s', (name, expectedName, version, suffix) => {
    const record = parseStorePath(storePath(name));

    expect(record?.name).toBe(expectedName);
    expect(record?.version).toBe(version);
    expect(record?.suffix).toBe(suffix);
  });

  it('parses a path whose hash is shorter than usual', () => {
    const record = parseStorePath('/nix/store/123shortprefix-short-prefix-1.0');

    expect(record?.name).toBe('short-prefix');
    expect(record?.version).toBe('1.0');
  });

  const rejected = [
    'fix-static.patch',
    'some-deriv.drv',
    'nix-wallpaper-simple-dark-gray_bottom.png.drv',
    'dash-edge-case-',
    'dash-short-',
    'hello',
    'only-letters-here',
    '-1.0',
  ];

  it.each(rejected)('rejects %s', (name) => {
    expect(parseStorePath(storePath(name))).toBeUndefined();
  });

  it('rejects a path with nothing after the hash', () => {
    expect(parseStorePath(`/nix/store/${HASH}-`)).toBeUndefined();
  });

  it('keeps the raw path and the registration data', () => {
    const raw = storePath('glxinfo-8.4.0');

    expect(
      parseStorePath(raw, { id: 42, registrationTime: 1_550_000_000 })
    ).toStrictEqual({
      name: 'glxinfo',
      version: '8.4.0',
      registrationTime: 1_550_000_000,
      origin: { path: raw, id: 42 },
    });
  });
});

describe('stripStorePrefix', () => {
  it('strips the store directory and hash', () => {
    expect(
      stripStorePrefix('/nix/store/03lp4drizbh8cl3f9mjysrrzrg3ssakv-glxinfo-8.4.0')
    ).toBe('glxinfo-8.4.0');
  });

  it('rejects a path that ends with the separator', () => {
    expect(stripStorePrefix(`/nix/store/${HASH}-`)).toBeUndefined();
  });

  it('rejects a path without a separator', () => {
    expect(stripStorePrefix('/nix/store/nohash')).toBeUndefined();
  });
});

describe('isVersionFragment', () => {
  it.each(['1', '8.4.0', '2019_01', 'v0.96', '4c59395'])(
    'accepts %s',
    (fragment) => {
      expect(isVersionFragment(fragment)).toBe(true);
    }
  );

  it.each(['', 'v', 'vx1', 'rc5', 'c47095a8', '1.0A', 'static.patch'])(
    'rejects %s',
    (fragment) => {
      expect(isVersionFragment(fragment)).toBe(false);
    }
  );
});

describe('identityKey', () => {
  it('is the name when there is no suffix', () => {
    expect(identityKey({ name: 'glxinfo' })).toBe('glxinfo');
  });

  it('joins the suffix with a pipe', () => {
    expect(identityKey({ name: 'wine-wow', suffix: 'staging' })).toBe(
      'wine-wow|staging'
    );
  });

  it('ignores the version', () => {
    expect(
      sameIdentity(
        { name: 'ffmpeg', suffix: 'bin' },
        { name: 'ffmpeg', suffix: 'bin' }
      )
    ).toBe(true);
    expect(sameIdentity({ name: 'ffmpeg', suffix: 'bin' }, { name: 'ffmpeg' })).toBe(
      false
    );
  });
});
