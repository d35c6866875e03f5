import picomatch from 'picomatch';
import { VfsError } from './errors.js';

export type PathMatcher = (path: string) => boolean;

// Everything but `*`, `?` and classes reaches picomatch escaped, so braces,
// extglobs, regex groups and a leading `./` stay literal.
const MATCH_OPTIONS = {
  dot: true,
  nobrace: true,
  noextglob: true,
  noglobstar: true,
  nonegate: true,
  literalBrackets: false,
  strictSlashes: true,
  strictBrackets: true
};

const PUNCTUATION = /[!-.:-@[-^`{-~]/;

const never: PathMatcher = () => false;

/**
 * Compiles a shell pattern: `*` and `?` within one path segment, `[...]`
 * classes (negated by a leading `!` or `^`) and `\` escapes. A malformed
 * pattern raises `VFS_BAD_PATTERN` instead of matching nothing.
 */
export function compileGlob(pattern: string): PathMatcher {
  if (pattern === '') return never;
  const source = translate(pattern);
  let regex: RegExp;
  try {
    regex = picomatch.makeRe(source, MATCH_OPTIONS);
  } catch (err) {
    throw badPattern(pattern, 'rejected by matcher', err);
  }
  return (path) => regex.test(path);
}

export function hasMagic(pattern: string): boolean {
  return /[*?[\\]/.test(pattern);
}

function translate(pattern: string): string {
  let out = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern.charAt(i);
    if (ch === '*') {
      while (pattern.charAt(i) === '*') i += 1;
      out += '*';
      continue;
    }
    if (ch === '?') {
      out += '?';
      i += 1;
      continue;
    }
    if (ch === '[') {
      const [klass, next] = translateClass(pattern, i + 1);
      out += klass;
      i = next;
      continue;
    }
    if (ch === '\\') {
      if (i + 1 >= pattern.length) throw badPattern(pattern, 'trailing backslash');
      out += literal(pattern.charAt(i + 1));
      i += 2;
      continue;
    }
    out += ch === '/' ? ch : literal(ch);
    i += 1;
  }
  return out;
}

// `start` is just past the opening bracket; returns the class and the index past `]`.
function translateClass(pattern: string, start: number): [string, number] {
  let i = start;
  let out = '[';
  const first = pattern.charAt(i);
  if (first === '!' || first === '^') {
    out += '^';
    i += 1;
  }
  let ranges = 0;
  while (true) {
    if (i >= pattern.length) throw badPattern(pattern, 'unterminated character class');
    if (pattern.charAt(i) === ']' && ranges > 0) {
      return [`${out}]`, i + 1];
    }
    const [lo, afterLo] = classChar(pattern, i);
    out += literal(lo);
    i = afterLo;
    if (pattern.charAt(i) === '-') {
      const [hi, afterHi] = classChar(pattern, i + 1);
      out += `-${literal(hi)}`;
      i = afterHi;
    }
    ranges += 1;
  }
}

// One class member; an unescaped `-` or `]` cannot start a range.
function classChar(pattern: string, i: number): [string, number] {
  const ch = pattern.charAt(i);
  if (i >= pattern.length || ch === '-' || ch === ']') {
    throw badPattern(pattern, 'malformed character class');
  }
  if (ch !== '\\') return [ch, i + 1];
  if (i + 1 >= pattern.length) throw badPattern(pattern, 'trailing backslash');
  return [pattern.charAt(i + 1), i + 2];
}

function literal(ch: string): string {
  return PUNCTUATION.test(ch) ? `\\${ch}` : ch;
}

function badPattern(pattern: string, reason: string, cause?: unknown): VfsError {
  return new VfsError('VFS_BAD_PATTERN', 'glob', `Invalid glob pattern ${JSON.stringify(pattern)}: ${reason}`, {
    pattern,
    ...(cause !== undefined ? { cause } : {})
  });
}
