/**
 * .pakignore - names to leave out when the tree is packed again
 *
 * One pattern per line, `#` starts a comment. Patterns use the filter glob syntax (leading `/`
 * anchors to the tree root); a leading `!` un-ignores. The last matching line wins.
 */

import matchGlobParents, { escapeGlob, type FilterPattern, parsePattern } from '../filter/matchGlobParents.ts';
import type { ArchiveEntry } from '../types.ts';

export interface IgnoreRule {
  pattern: FilterPattern;
  negate: boolean;
}

export const DEFAULT_IGNORES = ['.DS_Store', 'Thumbs.db', 'desktop.ini', '.git', '/.pakflags', '/.pakignore'];

export default class PakIgnore {
  rules: IgnoreRule[] = [];

  /**
   * Append one line. Throws UNPAK_PATTERN_INVALID for invalid glob syntax.
   */
  add(line: string): this {
    const negate = line.charAt(0) === '!';
    this.rules.push({ pattern: parsePattern(negate ? line.slice(1) : line), negate });
    return this;
  }

  addDefault(): this {
    for (let index = 0; index < DEFAULT_IGNORES.length; index++) this.add(DEFAULT_IGNORES[index]);
    return this;
  }

  /**
   * Keep archive entries that the current rules would otherwise ignore
   */
  addAutoExclusions(entries: readonly ArchiveEntry[]): this {
    for (let index = 0; index < entries.length; index++) {
      const path = entries[index].path;
      if (this.match(path)) this.add(`!/${escapeGlob(path)}`);
    }
    return this;
  }

  match(path: string): boolean {
    let ignored = false;
    for (let index = 0; index < this.rules.length; index++) {
      const rule = this.rules[index];
      if (matchGlobParents(rule.pattern.glob, rule.pattern.anchored, path)) ignored = !rule.negate;
    }
    return ignored;
  }

  toString(): string {
    const lines = ['# pakignore: one glob per line, / anchors to the root, ! keeps a match'];
    for (let index = 0; index < this.rules.length; index++) {
      const rule = this.rules[index];
      lines.push(`${rule.negate ? '!' : ''}${rule.pattern.text}`);
    }
    return `${lines.join('\n')}\n`;
  }
}
