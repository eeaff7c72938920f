/**
 * Parent-aware glob matching
 *
 * A pattern matches a slash-separated path when it matches the full path, or any
 * ancestor directory path, or (unless anchored) the last segment of either. Anchored
 * patterns are written with a leading `/` and only match from the root.
 *
 * Glob syntax is single-segment path globbing: `*`, `?`, `[...]` classes and `\` escapes.
 * Braces, extglobs, globstars, negation and comments are literal text.
 */

import { Minimatch, type MinimatchOptions } from 'minimatch';
import { createUnpakError, UnpakErrorCode } from '../errors.ts';

export interface FilterPattern {
  /** Pattern as written, including any anchoring `/` */
  text: string;
  /** Glob with the anchoring `/` removed */
  glob: string;
  anchored: boolean;
}

const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  noglobstar: true,
  nocomment: true,
  nonegate: true,
  optimizationLevel: 0,
  platform: 'linux',
};

const compiled = new Map<string, Minimatch>();

function invalid(glob: string, reason: string): Error {
  return createUnpakError(`invalid glob ${JSON.stringify(glob)}: ${reason}`, UnpakErrorCode.PATTERN_INVALID);
}

/**
 * Reject syntax that the glob primitive would otherwise read as literal text
 */
export function validateGlob(glob: string): void {
  let i = 0;
  while (i < glob.length) {
    const c = glob[i];
    if (c === '\\') {
      if (i + 1 >= glob.length) throw invalid(glob, 'trailing escape');
      i += 2;
    } else if (c === '[') {
      i = validateClass(glob, i + 1);
    } else {
      i++;
    }
  }
}

// returns the index after the closing bracket
function validateClass(glob: string, start: number): number {
  let i = start;
  if (glob[i] === '^' || glob[i] === '!') i++;
  let count = 0;
  for (;;) {
    if (i >= glob.length) throw invalid(glob, 'unterminated character class');
    if (glob[i] === ']') {
      if (count === 0) throw invalid(glob, 'empty character class');
      return i + 1;
    }
    i = classChar(glob, i);
    if (glob[i] === '-' && glob[i + 1] !== undefined && glob[i + 1] !== ']') {
      i = classChar(glob, i + 1);
    } else if (glob[i] === '-' && glob[i + 1] === ']') {
      throw invalid(glob, 'incomplete range');
    }
    count++;
  }
}

// a class member or range bound; a literal - must be escaped
function classChar(glob: string, i: number): number {
  if (glob[i] === '-') throw invalid(glob, 'unescaped - in character class');
  if (glob[i] !== '\\') return i + 1;
  if (i + 1 >= glob.length) throw invalid(glob, 'trailing escape');
  return i + 2;
}

function compileGlob(glob: string): Minimatch {
  let mm = compiled.get(glob);
  if (mm) return mm;

  validateGlob(glob);
  mm = new Minimatch(glob, GLOB_OPTIONS);
  if (mm.makeRe() === false) throw invalid(glob, 'not a valid expression');
  compiled.set(glob, mm);
  return mm;
}

/**
 * Parse a pattern as written on the command line or in an ignore file.
 * Throws UNPAK_PATTERN_INVALID for invalid glob syntax.
 */
export function parsePattern(text: string): FilterPattern {
  const anchored = text.charAt(0) === '/';
  const glob = anchored ? text.slice(1) : text;
  compileGlob(glob);
  return { text, glob, anchored };
}

/**
 * Escape glob syntax so the text only matches itself
 */
export function escapeGlob(text: string): string {
  return text.replace(/[\\*?[\]]/g, '\\$&');
}

/**
 * Match a slash-separated path, its ancestors and (unless anchored) their base names.
 * Throws UNPAK_PATTERN_INVALID for invalid glob syntax.
 */
export default function matchGlobParents(glob: string, anchored: boolean, path: string): boolean {
  const mm = compileGlob(glob);

  let name = path;
  while (name !== '') {
    // full path
    if (mm.match(name)) return true;

    const slash = name.lastIndexOf('/');
    if (!anchored && mm.match(name.slice(slash + 1))) return true;

    // continue with the parent
    name = name.slice(0, slash + 1).replace(/\/+$/, '');
  }
  return false;
}
