/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

// Public recursive resolvers queried for A records, across four providers
export const DEFAULT_DNS_RESOLVERS: readonly string[] = [
  // Google
  '8.8.8.8',
  '8.8.4.4',
  // Cloudflare
  '1.1.1.1',
  '1.0.0.1',
  // Quad9
  '9.9.9.9',
  '149.112.112.112',
  // OpenDNS
  '208.67.222.222',
  '208.67.220.220',
];

// Substrings of CNAME targets that point at domain parking services
export const DEFAULT_PARKING_PATTERNS: readonly string[] = [
  'park',
  'namecheap',
  'namebright',
  'hdredirect',
];

export const DNS_PORT = 53;

// CNAME hops followed when looking for a parking target
export const MAX_CNAME_HOPS = 8;
