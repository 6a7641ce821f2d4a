import {
  OPTIONS,
  UNIVERSAL_OPTIONS,
} from '../common-cli-options-help/index.ts';
import { globalWarn } from '../logger/index.ts';
import { renderSnapshotDiff } from '../render-pkg-diff/index.ts';
import { diffPackageMaps } from '../snapshot.diff/index.ts';
import { readSnapshot } from '../snapshot.fs/index.ts';
import { collectSystemPackages } from '../system-snapshot/index.ts';
import type { PackageMap } from '../types/index.ts';
import renderHelp from 'render-help';
import {
  cliOptionsTypes,
  openSource,
  type SnapshotCommandOptions,
} from './common.ts';

export { cliOptionsTypes };

export const commandNames = ['diff'];

export function help(): string {
  return renderHelp({
    description:
      'Shows the system packages and dependencies whose version changed since the state was saved. This is the default command.',
    descriptionLists: [
      {
        title: 'Options',

        list: [
          OPTIONS.source,
          OPTIONS.dbPath,
          OPTIONS.concurrency,
          {
            description: 'Print the changes as JSON',
            name: '--json',
          },
          ...UNIVERSAL_OPTIONS,
        ],
      },
    ],
    usages: ['nix-pkgdiff', 'nix-pkgdiff diff [--json]'],
  });
}

export async function handler(opts: SnapshotCommandOptions): Promise<string> {
  // Fails before the system is read when nothing was saved
  const saved = await readSnapshot(opts.stateFile);

  const source = openSource(opts);

  if (saved.source !== source.name) {
    globalWarn(
      `The saved state was read with the ${saved.source} source and the current one with the ${source.name} source. Versions may differ only because of that.`
    );
  }

  let current: PackageMap;

  try {
    current = await collectSystemPackages(source, {
      concurrency: opts.concurrency,
    });
  } finally {
    source.close();
  }

  return renderSnapshotDiff(diffPackageMaps(current, saved.packages), {
    json: opts.json,
  });
}
