import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { asPosixPath, asWindowsPath, posixToWindows, windowsToPosix } from '../../../src/shell/path-translator.js';
import { joinPosixCommandLine } from '../../../src/shell/quoting.js';

const driveLetter = fc.constantFrom(...'abcdefghijklmnopqrstuvwxyz'.split(''));
const segment = fc.stringOf(
  fc.constantFrom(...'abcdefghijklmnopqrstuvwxyzABCXYZ0123456789_-.'.split('')),
  { minLength: 1, maxLength: 8 }
);
const segments = fc.array(segment, { minLength: 1, maxLength: 4 });

const posixDrivePath = fc
  .tuple(driveLetter, segments)
  .map(([d, segs]) => `/${d}/${segs.join('/')}`);

const windowsDrivePath = fc
  .tuple(driveLetter, segments)
  .map(([d, segs]) => `${d.toUpperCase()}:\\${segs.join('\\')}`);

/** Minimal POSIX word splitter: whitespace separates words, quotes group literally. */
function splitPosixWords(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: string | null = null;

  for (const c of line) {
    if (quote !== null) {
      if (c === quote) quote = null;
      else current += c;
      continue;
    }
    if (c === "'" || c === '"') {
      quote = c;
      inWord = true;
      continue;
    }
    if (c === ' ' || c === '\n' || c === '\t') {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
      continue;
    }
    current += c;
    inWord = true;
  }
  if (inWord) words.push(current);
  return words;
}

describe('path translation properties', () => {
  it('POSIX -> Windows -> POSIX returns the starting path', () => {
    fc.assert(
      fc.property(posixDrivePath, (p) => {
        expect(windowsToPosix(posixToWindows(asPosixPath(p)))).toBe(p);
      })
    );
  });

  it('Windows -> POSIX -> Windows returns the starting path', () => {
    fc.assert(
      fc.property(windowsDrivePath, (p) => {
        expect(posixToWindows(windowsToPosix(asWindowsPath(p)))).toBe(p);
      })
    );
  });

  it('round-trips path lists', () => {
    fc.assert(
      fc.property(fc.array(posixDrivePath, { minLength: 2, maxLength: 3 }), (paths) => {
        const list = paths.join(':');
        const windows = posixToWindows(asPosixPath(list));
        expect(windows.split(';')).toHaveLength(paths.length);
        expect(windowsToPosix(windows)).toBe(list);
      })
    );
  });

  it('posixToWindows is idempotent on its own output', () => {
    fc.assert(
      fc.property(fc.array(posixDrivePath, { minLength: 1, maxLength: 3 }), (paths) => {
        const once = posixToWindows(asPosixPath(paths.join(':')));
        expect(posixToWindows(asPosixPath(once))).toBe(once);
      })
    );
  });
});

describe('POSIX quoting properties', () => {
  const argChar = fc.constantFrom(...'abcXYZ019 -=\n"\''.split(''));
  const argument = fc
    .stringOf(argChar, { minLength: 1, maxLength: 10 })
    .filter((a) => !(a.includes('"') && a.includes("'")));

  it('word splitting recovers every argument', () => {
    fc.assert(
      fc.property(fc.array(argument, { minLength: 1, maxLength: 5 }), (args) => {
        expect(splitPosixWords(joinPosixCommandLine(args))).toEqual(args);
      })
    );
  });
});
