export const REPORTER_INITIALIZED = Symbol('reporterInitialized');

export type Global = typeof globalThis & {
  [REPORTER_INITIALIZED]?: ReporterType;
};

declare const global: Global;

import process from 'node:process';
import loudRejection from 'loud-rejection';
import { cliMeta } from './packages/cli-meta/index.ts';
import { type Config, getConfig } from './packages/config/index.ts';
import { errorMessage, PkgdiffError } from './packages/error/index.ts';
import type { ParsedCliArgs } from './packages/parse-cli-args/index.ts';
import chalk from 'chalk';
import { pkgdiffCmds, type CommandResponse } from './cmd/index.ts';
import { formatUnknownOptionsError } from './formatError.ts';
import { parseCliArgs } from './parseCliArgs.ts';
import { initReporter, type ReporterType } from './reporter/index.ts';

loudRejection();

export async function main(inputArgv: string[]): Promise<void> {
  let parsedCliArgs: ParsedCliArgs;

  try {
    parsedCliArgs = parseCliArgs(inputArgv);
  } catch (err: unknown) {
    // Reporting is not initialized at this point, so just printing the error
    printError(errorMessage(err), err instanceof PkgdiffError ? err.hint : undefined);

    process.exitCode = 1;

    return;
  }

  const { params: cliParams, options: cliOptions, cmd, unknownOptions } =
    parsedCliArgs;

  if (cmd !== null && typeof pkgdiffCmds[cmd] === 'undefined') {
    printError(`Unknown command '${cmd}'`, 'For help, run: nix-pkgdiff help');

    process.exitCode = 1;

    return;
  }

  if (unknownOptions.size > 0) {
    printError(
      formatUnknownOptionsError(unknownOptions),
      `For help, run: nix-pkgdiff help${typeof cmd === 'string' ? ` ${cmd}` : ''}`
    );

    process.exitCode = 1;

    return;
  }

  let config: Config;

  try {
    config = getConfig(cliOptions, {
      env: process.env,
      platform: process.platform,
    });
  } catch (err: unknown) {
    // Reporting is not initialized at this point, so just printing the error
    const hint =
      err instanceof PkgdiffError && typeof err.hint === 'string'
        ? err.hint
        : `For help, run: nix-pkgdiff help${typeof cmd === 'string' ? ` ${cmd}` : ''}`;

    printError(errorMessage(err), hint);

    process.exitCode = 1;

    return;
  }

  if (cmd === null) {
    if (cliOptions['version'] === true) {
      console.info(cliMeta.version);
    }

    return;
  }

  // chalk reads the FORCE_COLOR env variable only when it is loaded
  if (config.color === 'always') {
    process.env.FORCE_COLOR = '1';

    if (chalk.level === 0) {
      chalk.level = 1;
    }
  } else if (config.color === 'never') {
    process.env.FORCE_COLOR = '0';
    chalk.level = 0;
  }

  const reporterType: ReporterType =
    config.loglevel === 'silent' ? 'silent' : (config.reporter ?? 'default');

  if (!config.json) {
    initReporter(reporterType, {
      cmd,
      config,
    });

    global[REPORTER_INITIALIZED] = reporterType;
  }

  // NOTE: we defer the next stage, otherwise reporter might not catch all the logs
  await new Promise<void>((resolve): void => {
    globalThis.setTimeout((): void => {
      resolve();
    }, 0);
  });

  const handler = pkgdiffCmds[cmd];

  if (typeof handler === 'undefined') {
    return;
  }

  const result: CommandResponse = await handler(config, cliParams);

  const { output, exitCode } =
    typeof result === 'string' ? { output: result, exitCode: 0 } : result;

  if (typeof output === 'string' && output !== '') {
    process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
  }

  process.exitCode = exitCode;
}

function printError(message: string, hint?: string | undefined): void {
  const ERROR = chalk.bgRed.black('\u2009ERROR\u2009');

  console.error(
    `${message.startsWith(ERROR) ? '' : `${ERROR} `}${chalk.red(message)}`
  );

  if (typeof hint === 'string') {
    console.error(hint);
  }
}
