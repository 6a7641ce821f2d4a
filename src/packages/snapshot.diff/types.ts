export type VersionChange = {
  name: string;
  suffix?: string | undefined;
  from: string;
  to: string;
};

export type PackageChange = {
  name: string;
  suffix?: string | undefined;
  /** Set when the package itself changed version. */
  package?: VersionChange | undefined;
  dependencies: VersionChange[];
};

export type SnapshotDiff = {
  packages: PackageChange[];
  shared: VersionChange[];
};
