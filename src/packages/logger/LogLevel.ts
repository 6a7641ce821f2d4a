export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NUMBER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};
