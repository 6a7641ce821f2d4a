import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { SnapshotDiff } from '../snapshot.diff/index.ts';
import { boldenDiff, displayName, renderSnapshotDiff } from './index.ts';

const DIFF: SnapshotDiff = {
  packages: [
    {
      name: 'firefox',
      package: { name: 'firefox', from: '65.0', to: '66.0' },
      dependencies: [{ name: 'nss', from: '3.41', to: '3.42' }],
    },
    {
      name: 'ffmpeg',
      suffix: 'bin',
      dependencies: [{ name: 'x264', from: '20180806', to: '20190101' }],
    },
  ],
  shared: [{ name: 'glibc', from: '2.27', to: '2.28' }],
};

describe('renderSnapshotDiff', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
  });

  it('lists package updates, then global dependency updates', () => {
    expect(renderSnapshotDiff(DIFF)).toBe(
      [
        '2 package update(s)',
        '',
        'firefox: 65.0 -> 66.0',
        '^ nss: 3.41 -> 3.42',
        'ffmpeg (bin)',
        '^ x264: 20180806 -> 20190101',
        '',
        '1 global dependency update(s)',
        '',
        'glibc: 2.27 -> 2.28',
      ].join('\n')
    );
  });

  it('renders an empty diff', () => {
    expect(renderSnapshotDiff({ packages: [], shared: [] })).toBe(
      '0 package update(s)\n\n\n0 global dependency update(s)\n'
    );
  });

  it('prints the diff as JSON', () => {
    expect(JSON.parse(renderSnapshotDiff(DIFF, { json: true }))).toStrictEqual(
      DIFF
    );
  });
});

describe('displayName', () => {
  it('shows the suffix in parentheses', () => {
    expect(displayName({ name: 'wine-wow', suffix: 'staging' })).toBe(
      'wine-wow (staging)'
    );
    expect(displayName({ name: 'glibc' })).toBe('glibc');
  });
});

describe('boldenDiff', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 1;
  });

  afterEach(() => {
    chalk.level = level;
  });

  it('underlines the characters that changed', () => {
    expect(boldenDiff('2.27', '2.28')).toBe(
      `${chalk.green('2.2')}${chalk.greenBright.underline('8')}`
    );
  });

  it('underlines characters past the end of the old version', () => {
    expect(boldenDiff('1.9', '1.10')).toBe(
      `${chalk.green('1.')}${chalk.greenBright.underline('10')}`
    );
  });

  it('groups runs of changed and unchanged characters', () => {
    expect(boldenDiff('1.2.3', '1.4.3')).toBe(
      `${chalk.green('1.')}${chalk.greenBright.underline('4')}${chalk.green('.3')}`
    );
  });
});
