import type { Config } from '../packages/config/index.ts';
import { initDefaultReporter } from '../packages/default-reporter/index.ts';
import { streamParser, writeToConsole } from '../packages/logger/index.ts';
import { silentReporter } from './silentReporter.ts';

export type ReporterType = 'default' | 'ndjson' | 'silent';

export function initReporter(
  reporterType: ReporterType,
  opts: {
    cmd: string | null;
    config: Config;
  }
): void {
  switch (reporterType) {
    case 'default':
      initDefaultReporter({
        // stdout carries the diff
        useStderr: true,
        context: {
          argv: opts.cmd !== null ? [opts.cmd] : [],
        },
        reportingOptions: {
          logLevel: opts.config.loglevel === 'silent' ? 'error' : opts.config.loglevel,
        },
        streamParser,
      });
      return;
    case 'ndjson':
      writeToConsole();
      return;
    case 'silent':
      silentReporter(streamParser);
  }
}
