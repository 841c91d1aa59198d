import { InvalidPatternError } from '../errors/cache-errors';
import { CACHE_LEVELS } from '../types/cache.types';

/**
 * Compiled invalidation pattern
 * Redis-style glob anchored against the whole key
 */
export interface KeyPattern {
  source: string;
  regex: RegExp;
  matches(key: string): boolean;
}

const REGEX_SPECIAL = /[.*+?^${}()|\\/[\]]/;
const LEVEL_PREFIXES = CACHE_LEVELS.map((level) => `${level}:`);

function escapeRegexChar(char: string): string {
  return REGEX_SPECIAL.test(char) ? `\\${char}` : char;
}

/**
 * Compile `*`, `?`, `[...]` (with `^`/`!` negation and ranges) and `\` escapes.
 * The pattern must open with a literal `<level>:` prefix, so one call never
 * reaches beyond a single level. Throws InvalidPatternError for empty
 * patterns, unterminated classes and a missing level prefix.
 */
export function compileKeyPattern(pattern: string): KeyPattern {
  if (pattern.trim().length === 0) {
    throw new InvalidPatternError(pattern, 'pattern is empty');
  }

  let source = '^';
  // literal text before the first wildcard
  let prefix = '';
  let inPrefix = true;
  let index = 0;

  while (index < pattern.length) {
    const char = pattern[index];

    if (char === '\\') {
      if (index + 1 >= pattern.length) {
        throw new InvalidPatternError(pattern, 'trailing escape character');
      }
      const escaped = pattern[index + 1];
      source += escapeRegexChar(escaped);
      if (inPrefix) prefix += escaped;
      index += 2;
      continue;
    }

    if (char === '*') {
      inPrefix = false;
      source += '.*';
      index++;
      continue;
    }

    if (char === '?') {
      inPrefix = false;
      source += '.';
      index++;
      continue;
    }

    if (char === '[') {
      inPrefix = false;
      const close = findClassEnd(pattern, index + 1);
      if (close === -1) {
        throw new InvalidPatternError(pattern, 'unterminated character class');
      }
      source += compileClass(pattern.slice(index + 1, close));
      index = close + 1;
      continue;
    }

    if (inPrefix) prefix += char;
    source += escapeRegexChar(char);
    index++;
  }

  if (!LEVEL_PREFIXES.some((levelPrefix) => prefix.startsWith(levelPrefix))) {
    throw new InvalidPatternError(
      pattern,
      `pattern must start with a cache level prefix such as "${LEVEL_PREFIXES[0]}"`,
    );
  }

  source += '$';
  const regex = new RegExp(source, 's');

  return {
    source: pattern,
    regex,
    matches: (key: string) => regex.test(key),
  };
}

function findClassEnd(pattern: string, from: number): number {
  let index = from;
  // a leading ']' (after optional negation) is a literal member
  if (pattern[index] === '^' || pattern[index] === '!') index++;
  if (pattern[index] === ']') index++;

  while (index < pattern.length) {
    if (pattern[index] === '\\') {
      index += 2;
      continue;
    }
    if (pattern[index] === ']') return index;
    index++;
  }
  return -1;
}

function classLiteral(char: string): string {
  return /[A-Za-z0-9]/.test(char) ? char : `\\${char}`;
}

function compileClass(body: string): string {
  let negated = false;
  let rest = body;
  if (rest.startsWith('^') || rest.startsWith('!')) {
    negated = true;
    rest = rest.slice(1);
  }

  let members = '';
  let index = 0;
  while (index < rest.length) {
    const char = rest[index];
    if (char === '\\' && index + 1 < rest.length) {
      members += classLiteral(rest[index + 1]);
      index += 2;
      continue;
    }
    if (char === '-' && index > 0 && index < rest.length - 1) {
      members += '-';
    } else if (char === ']' || char === '[' || char === '^' || char === '-') {
      members += `\\${char}`;
    } else {
      members += char;
    }
    index++;
  }

  if (members.length === 0) {
    // '[]' never matches, '[^]' matches any single character
    return negated ? '[\\s\\S]' : '(?!)';
  }
  return `[${negated ? '^' : ''}${members}]`;
}
