import { identityKey } from '../store-path/index.ts';
import type {
  DependencyMap,
  IdentityKey,
  StorePathRecord,
} from '../types/index.ts';

/**
 * Two versions of one name registered closer together than this come from the
 * same system update, so neither of them can be told apart from the other.
 */
export const SAME_UPDATE_WINDOW_SECONDS = 3600;

/**
 * Keeps one record per identity.
 *
 * Records are visited newest first, so the first record seen for an identity
 * is the newest one. A later record with another version makes the identity
 * ambiguous, and the identity is dropped, unless both registration times are
 * known and at least {@link SAME_UPDATE_WINDOW_SECONDS} apart.
 */
export function dedupeStorePaths(
  records: Iterable<StorePathRecord>
): DependencyMap {
  const unique: DependencyMap = new Map();
  const ambiguous = new Set<IdentityKey>();

  for (const record of sortByRegistrationTime(records)) {
    const key = identityKey(record);

    if (ambiguous.has(key)) {
      continue;
    }

    const existing = unique.get(key);

    if (typeof existing === 'undefined') {
      unique.set(key, record);

      continue;
    }

    if (existing.version === record.version) {
      continue;
    }

    if (isSameUpdate(existing, record)) {
      unique.delete(key);

      ambiguous.add(key);
    }
  }

  return unique;
}

function isSameUpdate(a: StorePathRecord, b: StorePathRecord): boolean {
  if (
    typeof a.registrationTime !== 'number' ||
    typeof b.registrationTime !== 'number'
  ) {
    return true;
  }

  return (
    Math.abs(a.registrationTime - b.registrationTime) <
    SAME_UPDATE_WINDOW_SECONDS
  );
}

function sortByRegistrationTime(
  records: Iterable<StorePathRecord>
): StorePathRecord[] {
  // the sort is stable, records without a time keep their relative order
  return Array.from(records).sort(
    (a: StorePathRecord, b: StorePathRecord): number => {
      if (typeof a.registrationTime !== 'number') {
        return typeof b.registrationTime === 'number' ? 1 : 0;
      }

      if (typeof b.registrationTime !== 'number') {
        return -1;
      }

      return b.registrationTime - a.registrationTime;
    }
  );
}
