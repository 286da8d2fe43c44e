/**
 * RefreshLock - single-permit lock gating status rebuilds.
 *
 * A refresh that finds the permit taken is dropped rather than queued.
 * Every granted permit carries a watchdog: if it is still held when the
 * timeout fires it is force-released so a stuck rebuild cannot block
 * refreshes forever. A force-released rebuild may still be running and can
 * race with the next one.
 */

import * as logger from '../utils/logger.js';

export const REFRESH_LOCK_TIMEOUT_MS = 10_000;

export class RefreshPermit {
  private released = false;
  private watchdog: ReturnType<typeof setTimeout> | null = null;

  constructor(
    readonly reason: string,
    private onRelease: (permit: RefreshPermit) => void
  ) {}

  /** @internal */
  arm(timeoutMs: number, onExpire: () => void): void {
    this.watchdog = setTimeout(onExpire, timeoutMs);
    this.watchdog.unref?.();
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Give the permit back. Calling it again, or after the watchdog fired,
   * does nothing.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    if (this.watchdog) {
      clearTimeout(this.watchdog);
      this.watchdog = null;
    }
    this.onRelease(this);
  }
}

export class RefreshLock {
  private holder: RefreshPermit | null = null;
  private waiters: (() => void)[] = [];

  constructor(private timeoutMs: number = REFRESH_LOCK_TIMEOUT_MS) {}

  /** Number of free permits: 1 or 0. */
  get available(): number {
    return this.holder ? 0 : 1;
  }

  isLocked(): boolean {
    return this.holder !== null;
  }

  /**
   * Run `callback` once the permit held now is released, or right away when
   * the lock is free.
   */
  whenFree(callback: () => void): void {
    if (!this.holder) {
      callback();
      return;
    }
    this.waiters.push(callback);
  }

  /**
   * Take the permit, or return null when a refresh is already running.
   */
  tryAcquire(reason: string): RefreshPermit | null {
    if (this.holder) {
      logger.debug(`Refresh (${reason}) dropped: ${this.holder.reason} still running`);
      return null;
    }

    const permit = new RefreshPermit(reason, (p) => {
      if (this.holder !== p) return;
      this.holder = null;
      const waiters = this.waiters;
      this.waiters = [];
      for (const waiter of waiters) waiter();
    });
    permit.arm(this.timeoutMs, () => {
      if (permit.isReleased) return;
      logger.warn(
        `Refresh lock for ${reason} expired after ${Math.round(this.timeoutMs / 1000)} seconds`
      );
      permit.release();
    });
    this.holder = permit;
    return permit;
  }
}
