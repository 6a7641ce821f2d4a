import os from 'node:os';
import path from 'node:path';

export function getDataDir(opts: {
  env: NodeJS.ProcessEnv;
  platform: string;
}): string {
  if (typeof opts.env.NIX_PKGDIFF_HOME === 'string' && opts.env.NIX_PKGDIFF_HOME !== '') {
    return opts.env.NIX_PKGDIFF_HOME;
  }

  if (typeof opts.env.XDG_DATA_HOME === 'string' && opts.env.XDG_DATA_HOME !== '') {
    return path.join(opts.env.XDG_DATA_HOME, 'nix-pkgdiff');
  }

  if (opts.platform === 'darwin') {
    return path.join(os.homedir(), 'Library/nix-pkgdiff');
  }

  return path.join(os.homedir(), '.local/share/nix-pkgdiff');
}
