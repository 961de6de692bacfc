/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Async counting semaphore with a barrier for "every permit returned".
 *
 * Usage:
 *   const sem = new Semaphore(4);
 *
 *   await sem.acquire();
 *   startWork().finally(() => sem.release());
 *   ...
 *   await sem.idle(); // all work finished
 */
export class Semaphore {
  private readonly capacity: number;
  private permits: number;
  private waiting: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  /**
   * @param permits Maximum number of concurrent acquisitions allowed
   */
  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error('Semaphore permits must be a positive integer');
    }
    this.capacity = permits;
    this.permits = permits;
  }

  /**
   * Resolves immediately if a permit is available, otherwise once one is
   * released. Waiters are served in FIFO order.
   */
  acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
      return;
    }
    if (this.permits >= this.capacity) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.permits++;
    if (this.permits === this.capacity) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  /**
   * Resolves once every permit has been released.
   */
  idle(): Promise<void> {
    if (this.permits === this.capacity) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  availablePermits(): number {
    return this.permits;
  }
}
