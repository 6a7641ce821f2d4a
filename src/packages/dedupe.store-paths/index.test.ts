import { describe, expect, it } from 'vitest';
import type { StorePathRecord } from '../types/index.ts';
import { dedupeStorePaths } from './index.ts';

function record(
  name: string,
  version: string,
  registrationTime?: number,
  suffix?: string
): StorePathRecord {
  const result: StorePathRecord = { name, version };

  if (typeof registrationTime === 'number') {
    result.registrationTime = registrationTime;
  }

  if (typeof suffix === 'string') {
    result.suffix = suffix;
  }

  return result;
}

function versions(map: Map<string, StorePathRecord>): Record<string, string> {
  return Object.fromEntries(
    Array.from(map, ([key, value]): [string, string] => [key, value.version])
  );
}

describe('dedupeStorePaths', () => {
  it('keeps records with distinct identities', () => {
    const unique = dedupeStorePaths([
      record('glxinfo', '8.4.0', 100),
      record('pcre', '8.42', 200),
    ]);

    expect(versions(unique)).toStrictEqual({ glxinfo: '8.4.0', pcre: '8.42' });
  });

  it('keeps one record when the same version shows up twice', () => {
    const unique = dedupeStorePaths([
      record('gcc', '7.4.0', 100),
      record('gcc', '7.4.0', 50_000),
    ]);

    expect(unique.size).toBe(1);
    expect(unique.get('gcc')?.registrationTime).toBe(50_000);
  });

  it('drops a name whose versions were registered within an hour', () => {
    const unique = dedupeStorePaths([
      record('db', '4.8.30', 10_000),
      record('db', '5.0.0', 8_000),
      record('db', '4.8.30', 1_000),
      record('zlib', '1.2.11', 9_000),
    ]);

    expect(versions(unique)).toStrictEqual({ zlib: '1.2.11' });
  });

  it('keeps the newer version when the versions are an hour or more apart', () => {
    const unique = dedupeStorePaths([
      record('db', '4.8.30', 6_400),
      record('db', '5.0.0', 10_000),
    ]);

    expect(versions(unique)).toStrictEqual({ db: '5.0.0' });
  });

  it('does not depend on the input order when times tie', () => {
    const forward = dedupeStorePaths([
      record('db', '4.8.30', 5_000),
      record('db', '5.0.0', 5_000),
    ]);
    const backward = dedupeStorePaths([
      record('db', '5.0.0', 5_000),
      record('db', '4.8.30', 5_000),
    ]);

    expect(forward.size).toBe(0);
    expect(backward.size).toBe(0);
  });

  it('drops a name with two versions when there are no registration times', () => {
    const unique = dedupeStorePaths([
      record('glibc', '2.27'),
      record('glibc', '2.28'),
      record('bash', '4.4-p23'),
      record('bash', '4.4-p23'),
    ]);

    expect(versions(unique)).toStrictEqual({ bash: '4.4-p23' });
  });

  it('treats a missing registration time as ambiguous', () => {
    const unique = dedupeStorePaths([
      record('glibc', '2.27', 100_000),
      record('glibc', '2.28'),
    ]);

    expect(unique.size).toBe(0);
  });

  it('never merges build outputs with different suffixes', () => {
    const unique = dedupeStorePaths([
      record('ffmpeg', '3.4.5', 100),
      record('ffmpeg', '3.4.5', 100, 'bin'),
    ]);

    expect(Array.from(unique.keys()).sort()).toStrictEqual([
      'ffmpeg',
      'ffmpeg|bin',
    ]);
  });
});
