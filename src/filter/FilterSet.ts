import matchGlobParents, { type FilterPattern, parsePattern } from './matchGlobParents.ts';

/**
 * Exclude and include patterns evaluated per entry path.
 *
 * Every exclude pattern is evaluated and any match excludes the path; every include pattern
 * is then evaluated and any match rescues it. Pattern order does not change the result and
 * includes never select a path that no exclude matched.
 */
export default class FilterSet {
  readonly exclude: readonly FilterPattern[];
  readonly include: readonly FilterPattern[];

  /**
   * Throws UNPAK_PATTERN_INVALID for the first invalid pattern
   */
  constructor(exclude: readonly string[] = [], include: readonly string[] = []) {
    this.exclude = Object.freeze(exclude.map(parsePattern));
    this.include = Object.freeze(include.map(parsePattern));
  }

  get empty(): boolean {
    return this.exclude.length === 0 && this.include.length === 0;
  }

  isExcluded(path: string): boolean {
    let excluded = false;
    for (let index = 0; index < this.exclude.length; index++) {
      const pattern = this.exclude[index];
      if (matchGlobParents(pattern.glob, pattern.anchored, path)) excluded = true;
    }
    for (let index = 0; index < this.include.length; index++) {
      const pattern = this.include[index];
      if (matchGlobParents(pattern.glob, pattern.anchored, path)) excluded = false;
    }
    return excluded;
  }
}
