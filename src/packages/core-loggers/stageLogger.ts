import { type LogBase, logger } from '../logger/index.ts';

export const stageLogger = logger<StageMessage>('stage');

export type StageMessage = {
  prefix: string;
  stage: 'collecting_packages' | 'collecting_dependencies' | 'done';
};

export type StageLog = { name: 'nix-pkgdiff:stage' } & LogBase & StageMessage;
