import {
  OPTIONS,
  UNIVERSAL_OPTIONS,
} from '../common-cli-options-help/index.ts';
import { writeSnapshot } from '../snapshot.fs/index.ts';
import { collectSystemPackages } from '../system-snapshot/index.ts';
import type { PackageMap } from '../types/index.ts';
import renderHelp from 'render-help';
import {
  cliOptionsTypes,
  openSource,
  type SnapshotCommandOptions,
} from './common.ts';

export { cliOptionsTypes };

export const commandNames = ['save', 'save-state'];

export function help(): string {
  return renderHelp({
    description:
      'Records the version of every system package and of its dependencies. Run it before updating the system.',
    descriptionLists: [
      {
        title: 'Options',

        list: [
          OPTIONS.source,
          OPTIONS.dbPath,
          OPTIONS.concurrency,
          {
            description: 'Print the result as JSON',
            name: '--json',
          },
          ...UNIVERSAL_OPTIONS,
        ],
      },
    ],
    usages: ['nix-pkgdiff save [--source <database|command>]'],
  });
}

export async function handler(opts: SnapshotCommandOptions): Promise<string> {
  const source = openSource(opts);

  let packages: PackageMap;

  try {
    packages = await collectSystemPackages(source, {
      concurrency: opts.concurrency,
    });
  } finally {
    source.close();
  }

  const snapshot = await writeSnapshot(opts.stateFile, packages, {
    source: source.name,
  });

  if (opts.json) {
    return JSON.stringify(
      {
        stateFile: opts.stateFile,
        createdAt: snapshot.createdAt,
        packages: snapshot.packages.length,
      },
      null,
      2
    );
  }

  return `Saved the state of ${snapshot.packages.length} packages to ${opts.stateFile}`;
}
