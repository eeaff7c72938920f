import type { ExtractStats } from '../types.ts';

/**
 * Counters for one extraction run
 */
export default class ProgressCounter {
  readonly total: number;
  private extracted = 0;
  private excluded = 0;

  constructor(total: number) {
    this.total = total;
  }

  get processed(): number {
    return this.extracted + this.excluded;
  }

  /** 1-based position of the entry being processed */
  get position(): number {
    return this.processed + 1;
  }

  extract(): void {
    this.extracted++;
  }

  exclude(): void {
    this.excluded++;
  }

  /**
   * `[   3/  12] path (detail)`
   */
  line(path: string, detail: string): string {
    return `[${String(this.position).padStart(4)}/${String(this.total).padStart(4)}] ${path} (${detail})\n`;
  }

  stats(): ExtractStats {
    return { processed: this.processed, extracted: this.extracted, excluded: this.excluded, total: this.total };
  }
}
