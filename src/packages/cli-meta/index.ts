import { fileURLToPath } from 'node:url';
import { loadJsonFileSync } from 'load-json-file';

export type CliMeta = {
  name: string;
  version: string;
};

function readCliMeta(): CliMeta {
  const manifest = loadJsonFileSync<unknown>(
    fileURLToPath(new URL('../../../package.json', import.meta.url))
  );

  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'name' in manifest &&
    typeof manifest.name === 'string' &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return { name: manifest.name, version: manifest.version };
  }

  throw new Error('package.json has no name or version');
}

export const cliMeta: CliMeta = readCliMeta();
