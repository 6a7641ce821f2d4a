/**
 * Removes the `/nix/store/<hash>-` prefix of a store path. The hash never
 * contains a `-`, so the prefix ends at the first one.
 *
 * @returns `undefined` when there is no `-` or nothing follows the first one.
 */
export function stripStorePrefix(storePath: string): string | undefined {
  const dashIndex = storePath.indexOf('-');

  if (dashIndex === -1 || dashIndex + 1 >= storePath.length) {
    return undefined;
  }

  return storePath.slice(dashIndex + 1);
}
