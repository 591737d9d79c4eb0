/**
 * Bounded render pool.
 *
 * A counting semaphore over render slots, sized independently of HTTP
 * concurrency. Acquisition never waits: a full pool fails immediately.
 */

export type ReleaseFn = () => void;

export interface RenderPoolStats {
  size: number;
  inUse: number;
  available: number;
}

export class RenderPool {
  private inUse = 0;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Render pool size must be a positive integer, got ${size}`);
    }
  }

  /**
   * Take a slot, or return null when none is free. The returned release
   * function is idempotent.
   */
  tryAcquire(): ReleaseFn | null {
    if (this.inUse >= this.size) return null;
    this.inUse++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.inUse--;
    };
  }

  stats(): RenderPoolStats {
    return { size: this.size, inUse: this.inUse, available: this.size - this.inUse };
  }
}
