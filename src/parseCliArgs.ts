import { types as allTypes } from './packages/config/index.ts';
import { PkgdiffError } from './packages/error/index.ts';
import {
  type ParsedCliArgs,
  parseCliArgs as parseCliArgsLib,
} from './packages/parse-cli-args/index.ts';
import { omit } from 'ramda';
import {
  getCliOptionsTypes,
  getCommandFullName,
  GLOBAL_OPTIONS,
  shorthandsByCommandName,
} from './cmd/index.ts';
import { shorthands as universalShorthands } from './shorthands.ts';

export function parseCliArgs(inputArgv: string[]): ParsedCliArgs {
  const parsedCliArgs = parse(inputArgv);

  if (parsedCliArgs.options['save-state'] !== true) {
    return parsedCliArgs;
  }

  // `--save-state` stands in for the save command
  const saveCliArgs = parsedCliArgs.fallbackCommandUsed
    ? parse(['save', ...inputArgv])
    : parsedCliArgs;

  if (saveCliArgs.cmd !== 'save') {
    throw new PkgdiffError(
      'OPTIONS_CONFLICT',
      `--save-state may not be used with the ${saveCliArgs.cmd ?? ''} command`
    );
  }

  return {
    ...saveCliArgs,
    options: omit(['save-state'], saveCliArgs.options),
  };
}

function parse(inputArgv: string[]): ParsedCliArgs {
  return parseCliArgsLib(
    {
      allOptionsTypes: allTypes,
      fallbackCommand: 'diff',
      getCommandLongName: getCommandFullName,
      getTypesByCommandName: getCliOptionsTypes,
      shorthandsByCommandName,
      universalOptionsTypes: GLOBAL_OPTIONS,
      universalShorthands,
    },
    inputArgv
  );
}
