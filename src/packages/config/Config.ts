import type { ReporterType } from '../../reporter/index.ts';
import type { LogLevel } from '../logger/index.ts';
import type { SnapshotSourceName } from '../types/index.ts';

export type Color = 'always' | 'auto' | 'never';

export type CliOptions = Record<string, unknown>;

export type Config = {
  color: Color;
  /**
   * How many dependency lookups run at once.
   */
  concurrency: number;
  /**
   * The Nix database, read by the `database` source.
   */
  dbPath: string;
  dir: string;
  json: boolean;
  loglevel: LogLevel | 'silent';
  reporter?: ReporterType | undefined;
  source: SnapshotSourceName;
  stateDir: string;
  /**
   * The file the `save` command writes and the `diff` command reads.
   */
  stateFile: string;
};
