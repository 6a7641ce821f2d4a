export class PkgdiffError extends Error {
  readonly code: string;
  readonly hint?: string | undefined;
  prefix?: string | undefined;
  constructor(
    code: string,
    message: string,
    opts?:
      | {
          hint?: string | undefined;
          cause?: unknown;
        }
      | undefined
  ) {
    super(message, { cause: opts?.cause });
    this.code = code.startsWith('ERR_PKGDIFF_') ? code : `ERR_PKGDIFF_${code}`;
    this.hint = opts?.hint;
  }
}

/**
 * A failed dependency or package lookup. Aborts the whole run.
 */
export class StoreQueryError extends PkgdiffError {
  readonly storePath: string | undefined;

  constructor(
    storePath: string | undefined,
    message: string,
    opts?:
      | {
          hint?: string | undefined;
          cause?: unknown;
        }
      | undefined
  ) {
    super('STORE_QUERY_FAILED', message, opts);
    this.storePath = storePath;
    this.prefix = storePath;
  }
}

export class SnapshotFileError extends PkgdiffError {
  readonly filePath: string;

  constructor(
    code: string,
    filePath: string,
    message: string,
    opts?:
      | {
          hint?: string | undefined;
          cause?: unknown;
        }
      | undefined
  ) {
    super(code, message, opts);
    this.filePath = filePath;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
