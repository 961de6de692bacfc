/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Writable } from 'node:stream';
import winston from 'winston';
import log from '../src/log.js';

/**
 * Create a logger for use in tests. Entries go to logs/test.log, tagged
 * with the suite name.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger({ suite: 'DnsResolver' });
 * ```
 */
export function createTestLogger(options?: {
  suite?: string;
  test?: string;
}): winston.Logger {
  const { suite, test } = options ?? {};

  return log.child({
    ...(suite !== undefined && { testSuite: suite }),
    ...(test !== undefined && { testCase: test }),
  });
}

export type CapturedEntry = Record<string, unknown>;

/**
 * Create a debug-level logger that keeps every entry in memory, for tests
 * that assert what was logged.
 */
export function createCapturingLogger(): {
  log: winston.Logger;
  entries: CapturedEntry[];
} {
  const entries: CapturedEntry[] = [];
  const stream = new Writable({
    objectMode: true,
    write(info, _encoding, callback) {
      entries.push({ ...info });
      callback();
    },
  });

  return {
    log: winston.createLogger({
      level: 'debug',
      transports: [new winston.transports.Stream({ stream })],
    }),
    entries,
  };
}

// Entries reach the transport stream asynchronously
export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
