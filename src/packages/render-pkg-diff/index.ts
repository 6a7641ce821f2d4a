import type {
  PackageChange,
  SnapshotDiff,
  VersionChange,
} from '../snapshot.diff/index.ts';
import chalk from 'chalk';

const EOL = '\n';

export function renderSnapshotDiff(
  diff: SnapshotDiff,
  opts?: { json?: boolean | undefined } | undefined
): string {
  if (opts?.json === true) {
    return JSON.stringify(diff, null, 2);
  }

  return [
    `${chalk.blue(diff.packages.length)} package update(s)`,
    '',
    ...diff.packages.flatMap(renderPackageChange),
    '',
    `${chalk.blue(diff.shared.length)} global dependency update(s)`,
    '',
    ...diff.shared.map(
      (change: VersionChange): string =>
        `${chalk.blue(displayName(change))}: ${formatVersionChange(change)}`
    ),
  ].join(EOL);
}

function renderPackageChange(change: PackageChange): string[] {
  const title =
    typeof change.package === 'undefined'
      ? chalk.blue(displayName(change))
      : `${chalk.blue(displayName(change))}: ${formatVersionChange(change.package)}`;

  return [
    title,
    ...change.dependencies.map(
      (dep: VersionChange): string =>
        `${chalk.yellow('^')} ${chalk.blue(displayName(dep))}: ${formatVersionChange(dep)}`
    ),
  ];
}

export function displayName(record: {
  name: string;
  suffix?: string | undefined;
}): string {
  return typeof record.suffix === 'string'
    ? `${record.name} (${record.suffix})`
    : record.name;
}

export function formatVersionChange(change: VersionChange): string {
  return `${chalk.red(change.from)} -> ${boldenDiff(change.from, change.to)}`;
}

/**
 * Colors `to` green, underlining the characters that differ from the
 * character at the same position in `from`.
 */
export function boldenDiff(from: string, to: string): string {
  const fromChars = Array.from(from);

  const runs: Array<{ changed: boolean; text: string }> = [];

  Array.from(to).forEach((char: string, index: number): void => {
    const changed = fromChars[index] !== char;

    const last = runs[runs.length - 1];

    if (typeof last !== 'undefined' && last.changed === changed) {
      last.text += char;
    } else {
      runs.push({ changed, text: char });
    }
  });

  return runs
    .map(({ changed, text }): string =>
      changed ? chalk.greenBright.underline(text) : chalk.green(text)
    )
    .join('');
}
