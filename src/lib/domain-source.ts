/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { open } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { Readable } from 'node:stream';

/**
 * Yields one domain per line, verbatim, up to the first blank line or the
 * end of the input.
 */
export async function* readDomainLines(input: Readable): AsyncGenerator<string> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      if (line === '') {
        return;
      }
      yield line;
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

/**
 * Opens the file before returning, so a missing or unreadable path rejects
 * here rather than part way through a run.
 */
export async function openDomainSource(
  path: string,
): Promise<AsyncGenerator<string>> {
  const handle = await open(path, 'r');
  return readDomainLines(handle.createReadStream({ encoding: 'utf8' }));
}
