/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';
import { ConfigurationError } from './lib/error.js';
import {
  DEFAULT_DNS_RESOLVERS,
  DEFAULT_PARKING_PATTERNS,
} from './constants.js';

//
// Workers
//

// Number of domains classified concurrently (also the queue capacity)
export const CONCURRENCY = env.positiveIntOrDefault('CONCURRENCY', 10);

// Emit per-domain failure diagnostics on stderr
export const DEBUG = env.flagOrDefault('DEBUG', false);

//
// DNS
//

// Resolvers to pick from (comma-separated IPv4 addresses)
export const DNS_RESOLVERS = env.listOrDefault(
  'DNS_RESOLVERS',
  DEFAULT_DNS_RESOLVERS,
);

if (DNS_RESOLVERS.length === 0) {
  throw new ConfigurationError('DNS_RESOLVERS must list at least one server');
}

// Attempts per lookup before giving up with a resolution timeout
export const DNS_MAX_ATTEMPTS = env.positiveIntOrDefault('DNS_MAX_ATTEMPTS', 5);

// Backoff step between attempts; attempt n sleeps n times this value
export const DNS_RETRY_BACKOFF_MS = env.positiveIntOrDefault(
  'DNS_RETRY_BACKOFF_MS',
  100,
);

// How long a single attempt waits for a reply
export const DNS_QUERY_TIMEOUT_MS = env.positiveIntOrDefault(
  'DNS_QUERY_TIMEOUT_MS',
  2000,
);

// Reject domains whose CNAME points at a parking service
export const PARKED_DETECTION_ENABLED = env.flagOrDefault(
  'PARKED_DETECTION_ENABLED',
  true,
);

export const PARKING_PATTERNS = env
  .listOrDefault('PARKING_PATTERNS', DEFAULT_PARKING_PATTERNS)
  .map((pattern) => pattern.toLowerCase());

//
// TLS
//

export const TLS_CONNECT_TIMEOUT_MS = env.positiveIntOrDefault(
  'TLS_CONNECT_TIMEOUT_MS',
  10_000,
);

export const TLS_PORT = env.positiveIntOrDefault('TLS_PORT', 443);
