import { types as allTypes, type Config } from '../packages/config/index.ts';
import { diff, save } from '../packages/plugin-commands-snapshot/index.ts';
import { pick } from 'ramda';
import { createHelp } from './help.ts';

export const GLOBAL_OPTIONS = pick(
  ['color', 'loglevel', 'reporter', 'save-state', 'state-dir'],
  allTypes
);

export type CommandResponse = string | { output?: string; exitCode: number };

export type Command = (
  opts: Config,
  params: string[]
) => CommandResponse | Promise<CommandResponse>;

export type CommandDefinition = {
  /** The main logic of the command. */
  handler: Command;
  /** The help text for the command that describes its usage and options. */
  help: () => string;
  /** The names that will trigger this command handler. */
  commandNames: string[];
  /**
   * A function that returns an object whose keys are acceptable CLI options
   * for this command and whose values are the types of values
   * for these options for validation.
   */
  cliOptionsTypes: () => Record<string, unknown>;
  /**
   * Option names that will resolve into one or more of the other options.
   */
  shorthands?: Record<string, string | string[]> | undefined;
};

const commands: CommandDefinition[] = [diff, save];

const handlerByCommandName: Record<string, Command> = {};

const helpByCommandName: Record<string, () => string> = {};

const cliOptionsTypesByCommandName: Record<
  string,
  () => Record<string, unknown>
> = {};

const aliasToFullName = new Map<string, string>();

export const shorthandsByCommandName: Record<
  string,
  Record<string, string | string[]>
> = {};

for (const { cliOptionsTypes, commandNames, handler, help, shorthands } of commands) {
  const [fullName, ...aliases] = commandNames;

  if (typeof fullName === 'undefined') {
    throw new Error("A command doesn't have command names");
  }

  handlerByCommandName[fullName] = handler;

  helpByCommandName[fullName] = help;

  cliOptionsTypesByCommandName[fullName] = cliOptionsTypes;

  shorthandsByCommandName[fullName] = shorthands ?? {};

  for (const alias of aliases) {
    aliasToFullName.set(alias, fullName);

    helpByCommandName[alias] = help;
  }
}

handlerByCommandName.help = createHelp(helpByCommandName);

export const pkgdiffCmds = handlerByCommandName;

export function getCliOptionsTypes(
  commandName: string
): Record<string, unknown> {
  return cliOptionsTypesByCommandName[commandName]?.() ?? {};
}

export function getCommandFullName(commandName: string): string | null {
  return (
    aliasToFullName.get(commandName) ??
    (typeof handlerByCommandName[commandName] === 'undefined' ? null : commandName)
  );
}
