import { cliMeta } from '../packages/cli-meta/index.ts';
import { UNIVERSAL_OPTIONS } from '../packages/common-cli-options-help/index.ts';
import renderHelp from 'render-help';

export function createHelp(
  helpByCommandName: Record<string, () => string>
): (opts: unknown, params: string[]) => string {
  return (_opts: unknown, params: string[]): string => {
    let helpText: string;

    const commandName = params[0];

    const commandHelp =
      typeof commandName === 'string' ? helpByCommandName[commandName] : undefined;

    if (typeof commandHelp === 'undefined') {
      helpText = getHelpText();
    } else {
      helpText = commandHelp();
    }

    return `Version ${cliMeta.version}\n${helpText}\n`;
  };
}

function getHelpText(): string {
  return renderHelp({
    description:
      'Shows which NixOS system packages and dependencies changed version since the state was saved.',
    descriptionLists: [
      {
        title: 'Commands',

        list: [
          {
            description:
              'Records the versions of the system packages. Run it before updating the system',
            name: 'save',
          },
          {
            description:
              'Shows what changed since the last save. Run it after updating the system',
            name: 'diff',
          },
          {
            description: 'Shows the help of a command',
            name: 'help <command>',
          },
        ],
      },
      {
        title: 'Options',

        list: [
          {
            description: 'Same as the save command',
            name: '--save-state',
            shortAlias: '-s',
          },
          {
            description: 'Print the output as JSON',
            name: '--json',
          },
          ...UNIVERSAL_OPTIONS,
          {
            description: 'Print the version',
            name: '--version',
            shortAlias: '-v',
          },
        ],
      },
    ],
    usages: ['nix-pkgdiff [command] [flags]', 'nix-pkgdiff --save-state'],
  });
}
