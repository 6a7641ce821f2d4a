export const shorthands: Record<string, string | string[]> = {
  d: ['--loglevel', 'debug'],
  h: '--help',
  s: '--save-state',
  silent: ['--loglevel', 'silent'],
  v: '--version',
};
