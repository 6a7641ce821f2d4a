import type { StorePathRecord } from '../types/index.ts';
import { stripStorePrefix } from './strip.ts';

const FRAGMENT_DELIMITER = '-';

const DIGIT = /\d/;
const ALPHABETIC = /^\p{L}*$/u;
const VERSION_BODY = /^[\d._a-z]*$/;

export type ParseStorePathOptions = {
  id?: number | undefined;
  registrationTime?: number | undefined;
};

/**
 * Parses `/nix/store/<hash>-<name>-<version>[-<suffix>]` into a record.
 *
 * Paths that carry no version, such as patches and `.drv` files, give
 * `undefined`.
 */
export function parseStorePath(
  storePath: string,
  opts?: ParseStorePathOptions | undefined
): StorePathRecord | undefined {
  const stripped = stripStorePrefix(storePath);

  if (typeof stripped === 'undefined') {
    return undefined;
  }

  const parsed = parseStoreName(stripped);

  if (typeof parsed === 'undefined') {
    return undefined;
  }

  const record: StorePathRecord = {
    ...parsed,
    origin:
      typeof opts?.id === 'number'
        ? { path: storePath, id: opts.id }
        : { path: storePath },
  };

  if (typeof opts?.registrationTime === 'number') {
    record.registrationTime = opts.registrationTime;
  }

  return record;
}

/**
 * Parses the part of a store path that follows the hash.
 */
export function parseStoreName(
  storeName: string
): Pick<StorePathRecord, 'name' | 'version' | 'suffix'> | undefined {
  const fragments = storeName.split(FRAGMENT_DELIMITER);

  if (fragments.length < 2) {
    return undefined;
  }

  if (fragments.length === 2) {
    const [name, version] = fragments;

    if (
      typeof name === 'undefined' ||
      typeof version === 'undefined' ||
      name === '' ||
      !DIGIT.test(version)
    ) {
      return undefined;
    }

    return { name, version };
  }

  let suffix: string | undefined;

  const lastFragment = fragments[fragments.length - 1];

  if (typeof lastFragment === 'string' && ALPHABETIC.test(lastFragment)) {
    suffix = lastFragment;
    fragments.pop();
  }

  // The name takes at least the first fragment.
  const versionStart = fragments.findIndex(
    (fragment: string, index: number): boolean =>
      index > 0 && isVersionFragment(fragment)
  );

  if (versionStart === -1) {
    return undefined;
  }

  const name = fragments.slice(0, versionStart).join(FRAGMENT_DELIMITER);

  if (name === '') {
    return undefined;
  }

  const result: Pick<StorePathRecord, 'name' | 'version' | 'suffix'> = {
    name,
    version: fragments.slice(versionStart).join(FRAGMENT_DELIMITER),
  };

  if (typeof suffix === 'string') {
    result.suffix = suffix;
  }

  return result;
}

/**
 * `1.2.3`, `2019_01`, `7788` and `v0.96` qualify. `v`, `rc5` and `c47095a8`
 * don't.
 */
export function isVersionFragment(fragment: string): boolean {
  const first = fragment[0];

  if (typeof first === 'undefined') {
    return false;
  }

  let body = fragment;

  if (first === 'v') {
    const second = fragment[1];

    if (typeof second === 'undefined' || !DIGIT.test(second)) {
      return false;
    }

    body = fragment.slice(1);
  } else if (!DIGIT.test(first)) {
    return false;
  }

  return VERSION_BODY.test(body);
}
