/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { randomElement } from './random.js';

describe('randomElement', () => {
  const pool = ['8.8.8.8', '1.1.1.1', '9.9.9.9', '208.67.222.222'];

  it('should map the random value onto an index', () => {
    assert.equal(randomElement(pool, () => 0), '8.8.8.8');
    assert.equal(randomElement(pool, () => 0.5), '9.9.9.9');
    assert.equal(randomElement(pool, () => 0.999), '208.67.222.222');
  });

  it('should only return pool members', () => {
    for (let i = 0; i < 100; i++) {
      assert.ok(pool.includes(randomElement(pool)));
    }
  });

  it('should throw on an empty list', () => {
    assert.throws(() => randomElement([]), /empty list/);
  });
});
