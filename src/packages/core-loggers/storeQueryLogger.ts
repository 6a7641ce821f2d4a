import { type LogBase, logger } from '../logger/index.ts';

export const storeQueryLogger = logger<StoreQueryMessage>('store-query');

export type StoreQueryMessage = {
  prefix: string;
  source: 'database' | 'command';
  query: 'system-packages' | 'dependencies';
  rows: number;
};

export type StoreQueryLog = { name: 'nix-pkgdiff:store-query' } & LogBase &
  StoreQueryMessage;
