/**
 * Utility exports
 */

export {
  PATH_SEPARATOR,
  resolvePath,
  trimTrailingSeparators,
  validatePathSegment,
} from './path-resolver.js';
