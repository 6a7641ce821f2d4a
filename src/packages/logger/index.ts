export { type LogLevel, LOG_LEVEL_NUMBER } from './LogLevel.ts';
export type {
  LogBase,
  LogBaseDebug,
  LogBaseError,
  LogBaseInfo,
  LogBaseWarn,
} from './LogBase.ts';
export { type Logger, logger, globalWarn } from './logger.ts';
export {
  type Reporter,
  type StreamParser,
  createStreamParser,
  streamParser,
} from './streamParser.ts';
export { writeToConsole } from './writeToConsole.ts';
