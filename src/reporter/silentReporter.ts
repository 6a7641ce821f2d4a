import { isLog } from '../packages/core-loggers/index.ts';
import type { StreamParser } from '../packages/logger/index.ts';

export function silentReporter(streamParser: StreamParser<object>): void {
  streamParser.on('data', (obj: object): void => {
    if (!isLog(obj) || obj.level !== 'error') {
      return;
    }

    // Known errors are not printed
    if (obj.err?.code?.startsWith('ERR_PKGDIFF_') === true) {
      return;
    }

    console.info(obj.err?.message ?? obj.message);

    if (typeof obj.err?.stack === 'string') {
      console.info(`\n${obj.err.stack}`);
    }
  });
}
