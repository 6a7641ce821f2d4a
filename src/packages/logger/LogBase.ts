import type { LogLevel } from './LogLevel.ts';

export type OptionalErrorProperties = {
  hint?: string | undefined;
  err?:
    | {
        name?: string | undefined;
        message: string;
        code?: string | undefined;
        stack?: string | undefined;
      }
    | undefined;
};

export interface LogBaseTemplate extends OptionalErrorProperties {
  level?: LogLevel | undefined;
  prefix?: string | undefined;
  message?: string | undefined;
}

export interface LogBaseDebug extends LogBaseTemplate {
  level: 'debug';
}

export interface LogBaseError extends LogBaseTemplate {
  level: 'error';
}

export interface LogBaseInfo extends LogBaseTemplate {
  level: 'info';
  message: string;
}

export interface LogBaseWarn extends LogBaseTemplate {
  level: 'warn';
  message: string;
}

export type LogBase = LogBaseDebug | LogBaseError | LogBaseInfo | LogBaseWarn;
