/**
 * Path glob matching.
 *
 * Patterns are matched segment by segment. A `**` segment matches zero or more
 * whole segments; every other segment uses shell glob rules and never crosses
 * a `/`.
 */

/** Pattern segment that matches any number of path segments */
export const RECURSIVE_WILDCARD = '**';

/** Characters that start a wildcard in an object path */
const WILDCARD_CHARS = ['*', '[', '\\'];

/**
 * Split a path on `/`, dropping empty segments
 */
export function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * Position of the first wildcard character in a path, or -1
 */
export function firstWildcardIndex(path: string): number {
  for (let i = 0; i < path.length; i++) {
    if (WILDCARD_CHARS.includes(path.charAt(i))) {
      return i;
    }
  }
  return -1;
}

/**
 * Check whether a path contains a wildcard character
 */
export function hasWildcard(path: string): boolean {
  return firstWildcardIndex(path) !== -1;
}

interface BracketMatch {
  matched: boolean;
  /** Index just past the closing `]` */
  next: number;
}

/**
 * Evaluate a `[...]` class starting at `start` against `ch`.
 * Returns undefined when the class is not terminated.
 */
function matchBracket(pattern: string, start: number, ch: string): BracketMatch | undefined {
  let i = start + 1;
  let invert = false;
  if (pattern.charAt(i) === '!') {
    invert = true;
    i++;
  }

  let matched = false;
  let first = true;
  while (i < pattern.length) {
    const c = pattern.charAt(i);
    if (c === ']' && !first) {
      return { matched: matched !== invert, next: i + 1 };
    }
    first = false;

    if (pattern.charAt(i + 1) === '-' && i + 2 < pattern.length && pattern.charAt(i + 2) !== ']') {
      const low = c;
      const high = pattern.charAt(i + 2);
      if (ch >= low && ch <= high) {
        matched = true;
      }
      i += 3;
    } else {
      if (ch === c) {
        matched = true;
      }
      i++;
    }
  }

  return undefined;
}

function globMatchFrom(text: string, ti: number, pattern: string, pi: number): boolean {
  while (pi < pattern.length) {
    const p = pattern.charAt(pi);

    if (p === '*') {
      while (pattern.charAt(pi) === '*') {
        pi++;
      }
      if (pi === pattern.length) {
        return true;
      }
      for (let k = ti; k <= text.length; k++) {
        if (globMatchFrom(text, k, pattern, pi)) {
          return true;
        }
      }
      return false;
    }

    if (p === '[') {
      const bracket = matchBracket(pattern, pi, text.charAt(ti));
      if (!bracket || ti >= text.length || !bracket.matched) {
        return false;
      }
      ti++;
      pi = bracket.next;
      continue;
    }

    if (p === '?') {
      if (ti >= text.length) {
        return false;
      }
      ti++;
      pi++;
      continue;
    }

    let literal = p;
    if (p === '\\' && pi + 1 < pattern.length) {
      pi++;
      literal = pattern.charAt(pi);
    }
    if (ti >= text.length || text.charAt(ti) !== literal) {
      return false;
    }
    ti++;
    pi++;
  }

  return ti === text.length;
}

/**
 * Match a single path segment against a shell glob.
 *
 * `*` matches any run of characters, `?` one character, `[abc]`, `[a-z]` and
 * `[!a-z]` a character class, and `\x` the character `x`.
 */
export function globMatch(text: string, pattern: string): boolean {
  return globMatchFrom(text, 0, pattern, 0);
}

function matchSegmentsFrom(key: readonly string[], ki: number, pattern: readonly string[], pi: number): boolean {
  while (pi < pattern.length) {
    const segment = pattern[pi];
    if (segment === undefined) {
      return false;
    }

    if (segment === RECURSIVE_WILDCARD) {
      if (pi + 1 === pattern.length) {
        return true;
      }
      for (let k = ki; k <= key.length; k++) {
        if (matchSegmentsFrom(key, k, pattern, pi + 1)) {
          return true;
        }
      }
      return false;
    }

    const keySegment = key[ki];
    if (keySegment === undefined || !globMatch(keySegment, segment)) {
      return false;
    }
    ki++;
    pi++;
  }

  return ki === key.length;
}

/**
 * Match a key against a pattern, both already split into path segments.
 * Both sequences must be fully consumed.
 */
export function matchSegments(key: readonly string[], pattern: readonly string[]): boolean {
  return matchSegmentsFrom(key, 0, pattern, 0);
}
