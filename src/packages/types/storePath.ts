/**
 * `name` when the store path has no suffix, `name|suffix` when it has one.
 */
export type IdentityKey = string;

/**
 * Where a record was read from. Only the sources look at it, to query the
 * dependencies of a top-level package.
 */
export type StorePathOrigin = {
  path: string;
  /** Row id in the Nix database, when the record came from there. */
  id?: number | undefined;
};

export type StorePathRecord = {
  name: string;
  version: string;
  /**
   * Trailing alphabetic fragment, e.g. the `bin` of `ffmpeg-3.4.5-bin` or the
   * `staging` of `wine-wow-4.0-rc5-staging`.
   */
  suffix?: string | undefined;
  /** Epoch seconds. Only set for records read from the Nix database. */
  registrationTime?: number | undefined;
  origin?: StorePathOrigin | undefined;
};

export type RawStorePath = {
  path: string;
  id?: number | undefined;
  registrationTime?: number | undefined;
};

export type DependencyMap = Map<IdentityKey, StorePathRecord>;
