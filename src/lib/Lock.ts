import type { NoParamCallback } from '../types.ts';

/**
 * Reference count over a shared resource. The holder that creates the lock owns the first
 * reference; the destroy callback runs once the last reference is released.
 */
export default class Lock {
  private count = 1;

  onDestroy: ((callback: NoParamCallback) => void) | null = null;
  private waiting: NoParamCallback[] = [];

  get destroyed(): boolean {
    return this.count === 0;
  }

  retain(): void {
    if (this.count <= 0) throw new Error('Lock already destroyed');
    this.count++;
  }

  /**
   * The callback runs after the resource is destroyed when this is the last release, and
   * right away otherwise
   */
  release(callback?: NoParamCallback): void {
    if (this.count <= 0) throw new Error('Lock count is corrupted');
    this.count--;
    if (this.count > 0) {
      if (callback) callback();
      return;
    }
    if (callback) this.waiting.push(callback);
    this.__destroy();
  }

  private __destroy(): void {
    const onDestroy = this.onDestroy;
    this.onDestroy = null;
    const done = (err?: Error | null): void => {
      const waiting = this.waiting;
      this.waiting = [];
      for (let index = 0; index < waiting.length; index++) waiting[index](err);
    };
    onDestroy ? onDestroy(done) : done();
  }
}
