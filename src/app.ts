#!/usr/bin/env node
/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { runCli } from './cli.js';
import * as config from './config.js';
import { openDomainSource } from './lib/domain-source.js';
import log, { enableDebugLogging } from './log.js';
import { createDomainDispatcher } from './system.js';

process.exitCode = await runCli(
  process.argv.slice(2),
  { concurrency: config.CONCURRENCY, debug: config.DEBUG },
  {
    stdout: process.stdout,
    stderr: process.stderr,
    log,
    enableDebugLogging,
    openSource: openDomainSource,
    createDispatcher: createDomainDispatcher,
  },
);
