/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Writable } from 'node:stream';

export interface LineSink {
  writeLine(line: string): Promise<void>;
}

/**
 * Writes whole lines to a stream. The returned promise settles when the
 * stream has accepted the line, so a slow consumer slows the writers.
 */
export class LineWriter implements LineSink {
  private stream: Writable;

  constructor(stream: Writable) {
    this.stream = stream;
  }

  writeLine(line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(`${line}\n`, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
