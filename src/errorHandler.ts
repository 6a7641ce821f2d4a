import util from 'node:util';
import process from 'node:process';
import { logger } from './packages/logger/index.ts';
import pidTree from 'pidtree';
import { type Global, REPORTER_INITIALIZED } from './main.ts';

declare const global: Global;

const getDescendentProcesses = util.promisify(
  (
    pid: number,
    callback: (error: Error | undefined, result: number[]) => void
  ): void => {
    pidTree(pid, { root: false }, callback);
  }
);

export async function errorHandler(
  error: Error & { code?: string | undefined }
): Promise<void> {
  if (error.name !== 'nix-pkgdiff' && !error.name.startsWith('nix-pkgdiff:')) {
    try {
      error.name = 'nix-pkgdiff';
    } catch (nameError: unknown) {
      // Sometimes the name property is read-only
      logger.debug({ message: `Cannot rename ${error.name}: ${String(nameError)}` });
    }
  }

  if (typeof global[REPORTER_INITIALIZED] === 'undefined') {
    // print parseable error on unhandled exception
    console.info(
      JSON.stringify(
        {
          error: {
            code: error.code ?? error.name,
            message: error.message,
          },
        },
        null,
        2
      )
    );

    process.exitCode = 1;

    return;
  }

  if (global[REPORTER_INITIALIZED] === 'silent') {
    process.exitCode = 1;

    return;
  }

  // bole passes only the name, message and stack of an error
  // that is why we pass error as a message as well, to pass
  // any additional info
  logger.error(error, error);

  // Deferring exit. Otherwise, the reporter wouldn't show the error
  setTimeout((): void => {
    killProcesses(1).catch((killError: unknown): void => {
      console.error(killError);

      process.exit(1);
    });
  }, 0);
}

async function killProcesses(status: number): Promise<void> {
  const descendentProcesses = await getDescendentProcesses(process.pid);

  for (const pid of descendentProcesses) {
    try {
      process.kill(pid);
    } catch (error: unknown) {
      // The process may have exited in the meantime
      if (
        !(util.types.isNativeError(error) && 'code' in error && error.code === 'ESRCH')
      ) {
        throw error;
      }
    }
  }

  // eslint-disable-next-line n/no-process-exit
  process.exit(status);
}
