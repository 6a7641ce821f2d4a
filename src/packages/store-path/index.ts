export {
  type ParseStorePathOptions,
  isVersionFragment,
  parseStoreName,
  parseStorePath,
} from './parse.ts';
export { stripStorePrefix } from './strip.ts';
export { SUFFIX_SEPARATOR, identityKey, sameIdentity } from './identity.ts';
