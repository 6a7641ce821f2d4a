export const OPTIONS = {
  concurrency: {
    description:
      'Maximum number of dependency lookups that run at the same time. Default is 4',
    name: '--concurrency <number>',
  },
  dbPath: {
    description:
      'The Nix database read by the database source. Default is /nix/var/nix/db/db.sqlite',
    name: '--db-path <path>',
  },
  source: {
    description:
      'Where the system packages are read from. "database" reads the Nix database and needs root. "command" runs nixos-option and nix-store',
    name: '--source <database|command>',
  },
};

export const UNIVERSAL_OPTIONS = [
  {
    description: 'Directory of the saved state. Default is $XDG_DATA_HOME/nix-pkgdiff',
    name: '--state-dir <dir>',
  },
  {
    description: 'Controls colors in the output. Default is auto',
    name: '--color <auto|always|never>',
  },
  {
    description: 'What level of logs to report. Default is info',
    name: '--loglevel <debug|info|warn|error|silent>',
  },
  {
    description: 'How logs are written: default, ndjson or silent',
    name: '--reporter <name>',
  },
];
