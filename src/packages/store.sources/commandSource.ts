import { storeQueryLogger } from '../core-loggers/index.ts';
import { StoreQueryError, errorMessage } from '../error/index.ts';
import { identityKey, parseStorePath } from '../store-path/index.ts';
import type { IdentityKey, StorePathRecord } from '../types/index.ts';
import { execa } from 'execa';
import type { StoreSource } from './StoreSource.ts';

const QUOTED = /"(.+?)"/;

export type RunCommand = (
  file: string,
  args: string[]
) => Promise<{ stdout: string }>;

async function runCommand(
  file: string,
  args: string[]
): Promise<{ stdout: string }> {
  const { stdout } = await execa(file, args);

  return { stdout };
}

/**
 * Reads the system through `nixos-option` and `nix-store`. Neither needs
 * root.
 */
export function createCommandSource(opts?: {
  run?: RunCommand | undefined;
}): StoreSource {
  const run = opts?.run ?? runCommand;

  return {
    name: 'command',
    listSystemPackages: async (): Promise<StorePathRecord[]> => {
      const stdout = await query(run, undefined, 'nixos-option', [
        'environment.systemPackages',
      ]);

      const records = parseSystemPackagesOutput(stdout);

      storeQueryLogger.debug({
        prefix: 'environment.systemPackages',
        source: 'command',
        query: 'system-packages',
        rows: records.length,
      });

      return records;
    },
    listDependencies: async (primary: StorePathRecord): Promise<string[]> => {
      const storePath = primary.origin?.path;

      if (typeof storePath === 'undefined') {
        throw new StoreQueryError(
          undefined,
          `The store path of ${primary.name} is unknown`
        );
      }

      const stdout = await query(run, storePath, 'nix-store', [
        '-qR',
        storePath,
      ]);

      const requisites = parseRequisitesOutput(stdout);

      storeQueryLogger.debug({
        prefix: storePath,
        source: 'command',
        query: 'dependencies',
        rows: requisites.length,
      });

      return requisites;
    },
    close: (): void => {},
  };
}

async function query(
  run: RunCommand,
  storePath: string | undefined,
  file: string,
  args: string[]
): Promise<string> {
  try {
    const { stdout } = await run(file, args);

    return stdout;
  } catch (error: unknown) {
    throw new StoreQueryError(
      storePath,
      `${file} ${args.join(' ')} failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Parses the value printed by `nixos-option environment.systemPackages`:
 * a list of quoted store paths between `[ ` and `]`. When one identity shows
 * up twice, the higher version string wins.
 */
export function parseSystemPackagesOutput(output: string): StorePathRecord[] {
  const start = output.indexOf('[ ');

  const end = output.indexOf(']');

  if (start === -1 || end < start + 2) {
    throw new StoreQueryError(
      undefined,
      'Unexpected output from nixos-option: no list of system packages',
      { hint: 'nixos-option is only available on NixOS. Try --source database' }
    );
  }

  const records = new Map<IdentityKey, StorePathRecord>();

  for (const token of output.slice(start + 2, end).split(/\s+/)) {
    const storePath = QUOTED.exec(token)?.[1];

    if (typeof storePath === 'undefined') {
      continue;
    }

    const record = parseStorePath(storePath);

    if (typeof record === 'undefined') {
      continue;
    }

    const key = identityKey(record);

    const existing = records.get(key);

    if (typeof existing !== 'undefined' && existing.version > record.version) {
      continue;
    }

    records.set(key, record);
  }

  return Array.from(records.values());
}

/**
 * Parses `nix-store -qR <path>`. The queried path is printed last and is
 * left out.
 */
export function parseRequisitesOutput(output: string): string[] {
  const lastStorePath = output.lastIndexOf('/nix/');

  const requisites = lastStorePath === -1 ? output : output.slice(0, lastStorePath);

  return requisites
    .split('\n')
    .map((line: string): string => line.trim())
    .filter((line: string): boolean => line !== '');
}
