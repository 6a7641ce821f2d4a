declare module 'bole' {
  import type { Writable } from 'node:stream';

  namespace bole {
    type Level = 'debug' | 'info' | 'warn' | 'error';

    type LogFn = (...args: unknown[]) => void;

    interface Logger {
      (name: string): Logger;
      debug: LogFn;
      info: LogFn;
      warn: LogFn;
      error: LogFn;
    }

    interface Output {
      level: Level;
      stream: Writable;
    }

    interface Bole {
      (name: string): Logger;
      output(output: Output | Output[]): Bole;
      reset(): Bole;
      setFastTime(enabled?: boolean): Bole;
    }
  }

  const bole: bole.Bole;

  export = bole;
}
