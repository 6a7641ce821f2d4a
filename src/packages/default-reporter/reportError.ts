import type { Log } from '../core-loggers/index.ts';
import chalk from 'chalk';
import { EOL } from './constants.ts';

const highlight = chalk.yellow;
const colorPath = chalk.gray;

type ErrorInfo = {
  title: string;
  body?: string | undefined;
};

export function reportError(logObj: Log): string | null {
  const errorInfo = getErrorInfo(logObj);

  if (errorInfo === null) {
    return null;
  }

  let output = formatErrorSummary(errorInfo.title, logObj.err?.code);

  if (typeof errorInfo.body === 'string' && errorInfo.body !== '') {
    output += `${EOL}${EOL}${errorInfo.body}`;
  }

  return output;
}

function getErrorInfo(logObj: Log): ErrorInfo | null {
  const err = logObj.err;

  if (typeof err === 'undefined') {
    if (typeof logObj.message === 'string') {
      return { title: logObj.message };
    }

    return null;
  }

  switch (err.code) {
    case 'ERR_PKGDIFF_STORE_QUERY_FAILED': {
      return reportStoreQueryFailure(err.message, logObj);
    }

    case 'ERR_PKGDIFF_BAD_STATE_FILE':
    case 'ERR_PKGDIFF_STATE_FILE_BREAKING_CHANGE': {
      return reportBadStateFile(err.message, logObj);
    }

    default: {
      if (err.code?.startsWith('ERR_PKGDIFF_') === true) {
        return { title: err.message, body: logObj.hint };
      }

      return { title: err.message, body: formatStack(err.stack) };
    }
  }
}

function reportStoreQueryFailure(message: string, logObj: Log): ErrorInfo {
  const lines: string[] = [];

  if ('storePath' in logObj && typeof logObj.storePath === 'string') {
    lines.push(`This error happened while querying ${colorPath(logObj.storePath)}`);
  }

  if (typeof logObj.hint === 'string') {
    lines.push(logObj.hint);
  }

  return { title: message, body: lines.join(`${EOL}${EOL}`) };
}

function reportBadStateFile(message: string, logObj: Log): ErrorInfo {
  const lines: string[] = [];

  if ('filePath' in logObj && typeof logObj.filePath === 'string') {
    lines.push(`The saved state is at ${colorPath(logObj.filePath)}`);
  }

  lines.push(
    typeof logObj.hint === 'string'
      ? logObj.hint
      : `Run ${highlight('nix-pkgdiff save')} to record the state again.`
  );

  return { title: message, body: lines.join(`${EOL}${EOL}`) };
}

function formatStack(stack: string | undefined): string | undefined {
  if (typeof stack === 'undefined') {
    return undefined;
  }

  // The first line repeats the message
  return stack
    .split('\n')
    .slice(1)
    .map((line: string): string => colorPath(line.trim()))
    .join(EOL);
}

export function formatErrorSummary(message: string, code?: string): string {
  return `${chalk.bgRed.black(`\u2009${code ?? 'ERROR'}\u2009`)} ${chalk.red(message)}`;
}
