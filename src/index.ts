import '@total-typescript/ts-reset';

import process from 'node:process';

// Avoid "Possible EventEmitter memory leak detected" warnings
// because they break the CLI output
process.setMaxListeners(0);

const argv = process.argv.slice(2);

const { errorHandler } = await import('./errorHandler.ts');

try {
  const { main } = await import('./main.ts');

  await main(argv);
} catch (err: unknown) {
  await errorHandler(err instanceof Error ? err : new Error(String(err)));
}
