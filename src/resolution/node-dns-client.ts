/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  FORMERR,
  NODATA,
  NOTFOUND,
  NOTIMP,
  REFUSED,
  SERVFAIL,
  promises as dns,
} from 'node:dns';

import * as config from '../config.js';
import { DNS_PORT } from '../constants.js';
import { errorCode } from '../lib/error.js';
import { DnsClient, DnsRecordType, DnsReply } from '../types.js';

// Error codes c-ares reports when the server did reply
const NEGATIVE_REPLY_CODES = new Set<string>([
  NOTFOUND,
  SERVFAIL,
  REFUSED,
  FORMERR,
  NOTIMP,
]);

export function replyFromError(error: unknown): DnsReply | undefined {
  const code = errorCode(error);
  // c-ares reports an empty answer section as NODATA
  if (code === NODATA) {
    return { status: 'no-data' };
  }
  if (code !== undefined && NEGATIVE_REPLY_CODES.has(code)) {
    return { status: 'negative', code };
  }
  return undefined;
}

/**
 * Sends one question to one server per call. Each call gets its own
 * resolver so concurrent workers never share server or timeout settings.
 */
export class NodeDnsClient implements DnsClient {
  private port: number;
  private queryTimeoutMs: number;

  constructor({
    port = DNS_PORT,
    queryTimeoutMs = config.DNS_QUERY_TIMEOUT_MS,
  }: {
    port?: number;
    queryTimeoutMs?: number;
  } = {}) {
    this.port = port;
    this.queryTimeoutMs = queryTimeoutMs;
  }

  async query({
    server,
    name,
    type,
  }: {
    server: string;
    name: string;
    type: DnsRecordType;
  }): Promise<DnsReply> {
    const resolver = new dns.Resolver({
      timeout: this.queryTimeoutMs,
      tries: 1,
    });
    resolver.setServers([`${server}:${this.port}`]);

    try {
      const records =
        type === 'A'
          ? await resolver.resolve4(name)
          : await resolver.resolveCname(name);
      return { status: 'answered', records };
    } catch (error) {
      const reply = replyFromError(error);
      if (reply === undefined) {
        // No reply from the server: timeout, refused socket, bad response
        throw error;
      }
      return reply;
    }
  }
}
