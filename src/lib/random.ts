/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Picks one element uniformly at random.
 *
 * @param random - source of floats in [0, 1), replaceable for tests
 */
export function randomElement<T>(
  items: readonly T[],
  random: () => number = Math.random,
): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
