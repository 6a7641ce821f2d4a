export * from './snapshotLogger.ts';
export * from './stageLogger.ts';
export * from './storeQueryLogger.ts';
