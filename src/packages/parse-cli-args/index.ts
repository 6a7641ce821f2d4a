import type { CliOptions } from '../config/index.ts';
import nopt from 'nopt';
import didYouMean, { ReturnTypeEnums } from 'didyoumean2';

export type ParsedCliArgs = {
  argv: {
    remain: string[];
    cooked: string[];
    original: string[];
  };
  params: string[];
  options: CliOptions;
  cmd: string | null;
  unknownOptions: Map<string, string[]>;
  fallbackCommandUsed: boolean;
};

export function parseCliArgs(
  opts: {
    /**
     * The options of every command. Lets the command name be found after
     * options that take a value.
     */
    allOptionsTypes?: Record<string, unknown> | undefined;
    fallbackCommand?: string | undefined;
    getCommandLongName: (commandName: string) => string | null;
    getTypesByCommandName: (commandName: string) => Record<string, unknown>;
    shorthandsByCommandName: Record<string, Record<string, string | string[]>>;
    universalOptionsTypes: Record<string, unknown>;
    universalShorthands: Record<string, string | string[]>;
  },
  inputArgv: string[]
): ParsedCliArgs {
  const noptExploratoryResults = nopt(
    {
      help: Boolean,
      version: Boolean,
      ...toFlagTypeMap({
        ...opts.allOptionsTypes,
        ...opts.universalOptionsTypes,
      }),
    },
    opts.universalShorthands,
    inputArgv,
    0
  );

  const givenCommandName = noptExploratoryResults.argv.remain[0];

  if (noptExploratoryResults['help'] === true) {
    return {
      argv: noptExploratoryResults.argv,
      cmd: 'help',
      options: {},
      params: noptExploratoryResults.argv.remain,
      unknownOptions: new Map(),
      fallbackCommandUsed: false,
    };
  }

  if (
    noptExploratoryResults['version'] === true &&
    typeof givenCommandName === 'undefined'
  ) {
    return {
      argv: noptExploratoryResults.argv,
      cmd: null,
      options: {
        version: true,
      },
      params: [],
      unknownOptions: new Map(),
      fallbackCommandUsed: false,
    };
  }

  const fallbackCommandUsed =
    typeof givenCommandName === 'undefined' &&
    typeof opts.fallbackCommand === 'string';

  const commandName = givenCommandName ?? opts.fallbackCommand ?? '';

  // An unknown command name is kept as is, so the caller can report it
  const cmd =
    commandName === ''
      ? null
      : (opts.getCommandLongName(commandName) ?? commandName);

  const types = {
    ...opts.universalOptionsTypes,
    ...opts.getTypesByCommandName(cmd ?? ''),
  };

  const { argv, ...options } = nopt(
    toFlagTypeMap(types),
    {
      ...opts.universalShorthands,
      ...opts.shorthandsByCommandName[cmd ?? ''],
    },
    inputArgv,
    0
  );

  const params = fallbackCommandUsed ? argv.remain : argv.remain.slice(1);

  const knownOptions = new Set(Object.keys(types));

  return {
    argv,
    cmd,
    params,
    fallbackCommandUsed,
    ...normalizeOptions(options, knownOptions),
  };
}

function toFlagTypeMap(types: Record<string, unknown>): Parameters<typeof nopt>[0] {
  const flagTypes: Parameters<typeof nopt>[0] = {};

  for (const [name, type] of Object.entries(types)) {
    if (typeof type === 'function' || Array.isArray(type)) {
      flagTypes[name] = type;
    }
  }

  return flagTypes;
}

const CUSTOM_OPTION_PREFIX = 'config.';

interface NormalizeOptionsResult {
  options: Record<string, unknown>;
  unknownOptions: Map<string, string[]>;
}

function normalizeOptions(
  options: Record<string, unknown>,
  knownOptions: Set<string>
): NormalizeOptionsResult {
  const standardOptionNames = [];

  const normalizedOptions: Record<string, unknown> = {};

  for (const [optionName, optionValue] of Object.entries(options)) {
    if (optionName.startsWith(CUSTOM_OPTION_PREFIX)) {
      normalizedOptions[optionName.substring(CUSTOM_OPTION_PREFIX.length)] =
        optionValue;
      continue;
    }

    normalizedOptions[optionName] = optionValue;

    standardOptionNames.push(optionName);
  }

  const unknownOptions = getUnknownOptions(standardOptionNames, knownOptions);

  return { options: normalizedOptions, unknownOptions };
}

function getUnknownOptions(
  usedOptions: string[],
  knownOptions: Set<string>
): Map<string, string[]> {
  const unknownOptions = new Map<string, string[]>();

  const closestMatches = getClosestOptionMatches.bind(
    null,
    Array.from(knownOptions)
  );

  for (const usedOption of usedOptions) {
    if (knownOptions.has(usedOption)) {
      continue;
    }

    unknownOptions.set(usedOption, closestMatches(usedOption));
  }

  return unknownOptions;
}

function getClosestOptionMatches(
  knownOptions: string[],
  option: string
): string[] {
  return didYouMean(option, knownOptions, {
    returnType: ReturnTypeEnums.ALL_CLOSEST_MATCHES,
  });
}
