/**
 * .pakflags - packing hints per directory and file
 *
 * Format, one rule per line:
 *   # comment
 *   <loadFlags> <textureFlags> <path>
 *
 * Paths start with `/`. A path ending in `/` is a directory rule covering everything beneath
 * it. The last rule covering a file decides its flags; a file no rule covers has `0 0`.
 */

import { createUnpakError, UnpakErrorCode } from '../errors.ts';
import type { ArchiveEntry } from '../types.ts';

export interface Flags {
  loadFlags: number;
  textureFlags: number;
}

export interface FlagsRule extends Flags {
  path: string;
}

interface DirNode {
  path: string;
  files: Map<string, Flags>;
  dirs: Map<string, DirNode>;
  value: Flags;
}

const HEADER = ['# pakflags: <loadFlags> <textureFlags> <path>', '# the last matching rule applies; directory rules end with /'];
const NO_FLAGS: Flags = { loadFlags: 0, textureFlags: 0 };

function sameFlags(a: Flags, b: Flags): boolean {
  return a.loadFlags === b.loadFlags && a.textureFlags === b.textureFlags;
}

function compareFlags(a: Flags, b: Flags): number {
  return a.loadFlags - b.loadFlags || a.textureFlags - b.textureFlags;
}

function byName<T>(map: Map<string, T>): [string, T][] {
  return Array.from(map.entries()).sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

function buildTree(entries: readonly ArchiveEntry[]): DirNode {
  const root: DirNode = { path: '/', files: new Map(), dirs: new Map(), value: NO_FLAGS };
  for (let index = 0; index < entries.length; index++) {
    const entry = entries[index];
    const segments = entry.path.split('/');
    let node = root;
    for (let s = 0; s < segments.length - 1; s++) {
      let child = node.dirs.get(segments[s]);
      if (!child) {
        child = { path: `${node.path}${segments[s]}/`, files: new Map(), dirs: new Map(), value: NO_FLAGS };
        node.dirs.set(segments[s], child);
      }
      node = child;
    }
    node.files.set(segments[segments.length - 1], { loadFlags: entry.loadFlags, textureFlags: entry.textureFlags });
  }
  return root;
}

// most common flags among files and sub-directory values, computed bottom up
function assignValues(node: DirNode): void {
  const counts = new Map<string, { flags: Flags; count: number }>();
  const vote = (flags: Flags): void => {
    const key = `${flags.loadFlags}:${flags.textureFlags}`;
    const current = counts.get(key);
    current ? current.count++ : counts.set(key, { flags, count: 1 });
  };
  node.dirs.forEach((child) => {
    assignValues(child);
    vote(child.value);
  });
  node.files.forEach(vote);

  let best: { flags: Flags; count: number } | null = null;
  for (const candidate of counts.values()) {
    if (!best || candidate.count > best.count || (candidate.count === best.count && compareFlags(candidate.flags, best.flags) < 0)) best = candidate;
  }
  node.value = best ? best.flags : NO_FLAGS;
}

export default class PakFlags {
  rules: FlagsRule[] = [];

  /**
   * Generate rules that let files inherit their directory's flags
   */
  generate(entries: readonly ArchiveEntry[]): this {
    const root = buildTree(entries);
    assignValues(root);

    const rules: FlagsRule[] = [];
    const emit = (node: DirNode, inherited: Flags | null): void => {
      if (!inherited || !sameFlags(node.value, inherited)) rules.push({ path: node.path, ...node.value });
      const files = byName(node.files);
      for (let index = 0; index < files.length; index++) {
        const [name, flags] = files[index];
        if (!sameFlags(flags, node.value)) rules.push({ path: `${node.path}${name}`, ...flags });
      }
      const dirs = byName(node.dirs);
      for (let index = 0; index < dirs.length; index++) emit(dirs[index][1], node.value);
    };
    emit(root, null);

    this.rules = rules;
    return this;
  }

  /**
   * Generate one rule per file, in listing order
   */
  generateExplicit(entries: readonly ArchiveEntry[]): this {
    this.rules = entries.map((entry) => ({ path: `/${entry.path}`, loadFlags: entry.loadFlags, textureFlags: entry.textureFlags }));
    return this;
  }

  resolve(path: string): Flags {
    const target = `/${path}`;
    let flags = NO_FLAGS;
    for (let index = 0; index < this.rules.length; index++) {
      const rule = this.rules[index];
      const dirRule = rule.path.charAt(rule.path.length - 1) === '/';
      if (dirRule ? target.indexOf(rule.path) === 0 : target === rule.path) flags = rule;
    }
    return { loadFlags: flags.loadFlags, textureFlags: flags.textureFlags };
  }

  /**
   * Check that the serialized rules resolve every entry to its own flags.
   * Throws UNPAK_INTERNAL_CONSISTENCY otherwise.
   */
  test(entries: readonly ArchiveEntry[]): void {
    let parsed: PakFlags;
    try {
      parsed = PakFlags.parse(this.toString());
    } catch (err) {
      throw createUnpakError('pakflags: parse generated rules', UnpakErrorCode.INTERNAL_CONSISTENCY, err);
    }

    for (let index = 0; index < entries.length; index++) {
      const entry = entries[index];
      const actual = parsed.resolve(entry.path);
      if (!sameFlags(actual, entry)) {
        throw createUnpakError(`pakflags: ${JSON.stringify(entry.path)} resolves to ${actual.loadFlags} ${actual.textureFlags}, expected ${entry.loadFlags} ${entry.textureFlags}`, UnpakErrorCode.INTERNAL_CONSISTENCY);
      }
    }
  }

  toString(): string {
    const lines = HEADER.slice();
    for (let index = 0; index < this.rules.length; index++) {
      const rule = this.rules[index];
      lines.push(`${rule.loadFlags} ${rule.textureFlags} ${rule.path}`);
    }
    return `${lines.join('\n')}\n`;
  }

  static parse(text: string): PakFlags {
    const flags = new PakFlags();
    const lines = text.split(/\r?\n/);
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];
      if (line.trim() === '' || line.charAt(0) === '#') continue;

      const match = /^(\d+) (\d+) (\/.*)$/.exec(line);
      if (!match) throw new Error(`line ${index + 1}: expected "<loadFlags> <textureFlags> /<path>", got ${JSON.stringify(line)}`);
      flags.rules.push({ loadFlags: Number(match[1]), textureFlags: Number(match[2]), path: match[3] });
    }
    return flags;
  }
}
