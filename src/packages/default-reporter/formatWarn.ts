import chalk from 'chalk';

export function formatWarn(message: string): string {
  // \u2009 is a thin space; chalk trims regular leading whitespace
  return `${chalk.bgYellow.black('\u2009WARN\u2009')} ${message}`;
}
