import type { IdentityKey, StorePathRecord } from '../types/index.ts';

export const SUFFIX_SEPARATOR = '|';

export function identityKey(
  record: Pick<StorePathRecord, 'name' | 'suffix'>
): IdentityKey {
  if (typeof record.suffix === 'undefined') {
    return record.name;
  }

  return `${record.name}${SUFFIX_SEPARATOR}${record.suffix}`;
}

export function sameIdentity(
  a: Pick<StorePathRecord, 'name' | 'suffix'>,
  b: Pick<StorePathRecord, 'name' | 'suffix'>
): boolean {
  return identityKey(a) === identityKey(b);
}
