import { type LogBase, logger } from '../logger/index.ts';

export const snapshotLogger = logger<SnapshotMessage>('snapshot');

export type SnapshotMessage = {
  prefix: string;
} & (
  | {
      collected: {
        packages: number;
        dependencies: number;
      };
    }
  | {
      saved: {
        packages: number;
        createdAt: number;
      };
    }
  | {
      loaded: {
        packages: number;
        createdAt: number;
      };
    }
);

export type SnapshotLog = { name: 'nix-pkgdiff:snapshot' } & LogBase &
  SnapshotMessage;
