export {
  RECURSIVE_WILDCARD,
  splitPath,
  firstWildcardIndex,
  hasWildcard,
  globMatch,
  matchSegments,
} from './matcher.js';
