/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { Writable } from 'node:stream';
import { describe, it } from 'node:test';

import { LineWriter } from './line-writer.js';

describe('LineWriter', () => {
  it('should terminate each line with a newline', async () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    const writer = new LineWriter(stream);

    await writer.writeLine('https://example.com/');
    await writer.writeLine('http://deadsite.test/');

    assert.deepEqual(chunks, ['https://example.com/\n', 'http://deadsite.test/\n']);
  });

  it('should reject when the stream fails the write', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });
    // the stream also emits 'error'
    stream.on('error', () => undefined);
    const writer = new LineWriter(stream);

    await assert.rejects(writer.writeLine('https://example.com/'), /EPIPE/);
  });
});
