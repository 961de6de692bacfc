/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { beforeEach, describe, it } from 'node:test';

import { Semaphore } from './semaphore.js';

describe('Semaphore', () => {
  describe('constructor', () => {
    it('should create a semaphore with the specified permits', () => {
      const sem = new Semaphore(3);
      assert.equal(sem.availablePermits(), 3);
    });

    it('should throw if permits is not a positive integer', () => {
      assert.throws(() => new Semaphore(0), /positive integer/);
      assert.throws(() => new Semaphore(1.5), /positive integer/);
    });
  });

  describe('acquire and release', () => {
    let sem: Semaphore;

    beforeEach(() => {
      sem = new Semaphore(2);
    });

    it('should queue waiters when no permits are available', async () => {
      await sem.acquire();
      await sem.acquire();

      let resolved = false;
      const waiting = sem.acquire().then(() => {
        resolved = true;
      });
      await Promise.resolve();
      assert.equal(resolved, false);

      sem.release();
      await waiting;
      assert.equal(resolved, true);
      assert.equal(sem.availablePermits(), 0);
    });

    it('should serve waiters in FIFO order', async () => {
      await sem.acquire();
      await sem.acquire();

      const order: number[] = [];
      const first = sem.acquire().then(() => order.push(1));
      const second = sem.acquire().then(() => order.push(2));

      sem.release();
      sem.release();
      await Promise.all([first, second]);

      assert.deepEqual(order, [1, 2]);
    });

    it('should throw when released more than acquired', () => {
      assert.throws(() => sem.release(), /more times than acquired/);
    });
  });

  describe('idle', () => {
    it('should resolve immediately when nothing is held', async () => {
      await new Semaphore(1).idle();
    });

    it('should resolve once every permit is back', async () => {
      const sem = new Semaphore(2);
      await sem.acquire();
      await sem.acquire();

      let idle = false;
      const idlePromise = sem.idle().then(() => {
        idle = true;
      });

      sem.release();
      await Promise.resolve();
      assert.equal(idle, false);

      sem.release();
      await idlePromise;
      assert.equal(idle, true);
    });
  });
});
