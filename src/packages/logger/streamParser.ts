import bole from 'bole';
import ndjson from 'ndjson';

export type Reporter<T> = (logObj: T) => void;

export type StreamParser<T> = {
  on: (event: 'data', reporter: Reporter<T>) => void;
  removeListener: (event: 'data', reporter: Reporter<T>) => void;
};

export function createStreamParser<T>(): StreamParser<T> {
  const sp = ndjson.parse();

  bole.output([
    {
      level: 'debug',
      stream: sp,
    },
  ]);

  return sp;
}

export const streamParser: StreamParser<object> = createStreamParser<object>();
