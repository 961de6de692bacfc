/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as wait } from 'wait';
import * as winston from 'winston';

import * as config from '../config.js';
import { MAX_CNAME_HOPS } from '../constants.js';
import { ConfigurationError, errorMessage } from '../lib/error.js';
import { randomElement } from '../lib/random.js';
import {
  DnsClient,
  DnsReply,
  DomainResolver,
  ResolutionFailure,
  ResolutionResult,
  ServerSelector,
} from '../types.js';

export function matchesAnyPattern(
  patterns: readonly string[],
  target: string,
): boolean {
  const normalized = target.toLowerCase();
  return patterns.some((pattern) => normalized.includes(pattern));
}

export function describeResolutionFailure(failure: ResolutionFailure): string {
  switch (failure.kind) {
    case 'timeout':
      return `failed to resolve after ${failure.servers.length} attempts on [${failure.servers.join(', ')}]`;
    case 'empty-answer':
      return 'DNS reply contained no answers';
    case 'no-address-record':
      return 'DNS reply contained no A records';
    case 'parked':
      return `domain seems parked at CNAME ${failure.target}`;
  }
}

/**
 * Looks up A records against a pool of public resolvers, picking a server
 * per attempt and retrying with linear backoff until some server replies.
 */
export class DnsResolver implements DomainResolver {
  private log: winston.Logger;
  private client: DnsClient;
  private servers: readonly string[];
  private selectServer: ServerSelector;
  private maxAttempts: number;
  private retryBackoffMs: number;
  private parkingPatterns: readonly string[];
  private sleep: (ms: number) => Promise<unknown>;

  constructor({
    log,
    client,
    servers = config.DNS_RESOLVERS,
    selectServer = (pool) => randomElement(pool),
    maxAttempts = config.DNS_MAX_ATTEMPTS,
    retryBackoffMs = config.DNS_RETRY_BACKOFF_MS,
    parkingPatterns = config.PARKED_DETECTION_ENABLED
      ? config.PARKING_PATTERNS
      : [],
    sleep = wait,
  }: {
    log: winston.Logger;
    client: DnsClient;
    servers?: readonly string[];
    selectServer?: ServerSelector;
    maxAttempts?: number;
    retryBackoffMs?: number;
    parkingPatterns?: readonly string[];
    sleep?: (ms: number) => Promise<unknown>;
  }) {
    if (servers.length === 0) {
      throw new ConfigurationError('DNS server pool must not be empty');
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError(
        `DNS attempts must be a positive integer, got: ${maxAttempts}`,
      );
    }

    this.log = log.child({ class: this.constructor.name });
    this.client = client;
    this.servers = servers;
    this.selectServer = selectServer;
    this.maxAttempts = maxAttempts;
    this.retryBackoffMs = retryBackoffMs;
    this.parkingPatterns = parkingPatterns.map((pattern) =>
      pattern.toLowerCase(),
    );
    this.sleep = sleep;
  }

  async resolve(domain: string): Promise<ResolutionResult> {
    const log = this.log.child({ method: 'resolve', domain });

    const attempted: string[] = [];
    let reply: DnsReply | undefined;
    let server = '';

    while (reply === undefined && attempted.length < this.maxAttempts) {
      server = this.selectServer(this.servers);
      attempted.push(server);
      try {
        reply = await this.client.query({ server, name: domain, type: 'A' });
      } catch (error) {
        log.debug('DNS query got no reply', {
          server,
          attempt: attempted.length,
          message: errorMessage(error),
        });
        if (attempted.length < this.maxAttempts) {
          await this.sleep(this.retryBackoffMs * attempted.length);
        }
      }
    }

    if (reply === undefined) {
      return { kind: 'timeout', servers: attempted };
    }

    if (reply.status === 'negative') {
      log.debug('DNS server returned a negative reply', {
        server,
        code: reply.code,
      });
      return { kind: 'empty-answer' };
    }
    if (reply.status === 'no-data') {
      return { kind: 'empty-answer' };
    }

    if (reply.records.length === 0) {
      return { kind: 'no-address-record' };
    }

    const parkingTarget = await this.findParkingTarget(server, domain);
    if (parkingTarget !== undefined) {
      return { kind: 'parked', target: parkingTarget };
    }

    return { kind: 'resolved', addresses: reply.records };
  }

  // Walks the CNAME chain on one server, stopping at the first hop that
  // goes unanswered.
  private async findParkingTarget(
    server: string,
    domain: string,
  ): Promise<string | undefined> {
    if (this.parkingPatterns.length === 0) {
      return undefined;
    }

    const seen = new Set<string>();
    let name = domain;
    while (seen.size < MAX_CNAME_HOPS && !seen.has(name.toLowerCase())) {
      seen.add(name.toLowerCase());

      let reply: DnsReply;
      try {
        reply = await this.client.query({ server, name, type: 'CNAME' });
      } catch (error) {
        this.log.debug('CNAME lookup got no reply', {
          method: 'findParkingTarget',
          domain,
          name,
          server,
          message: errorMessage(error),
        });
        return undefined;
      }

      if (reply.status !== 'answered' || reply.records.length === 0) {
        return undefined;
      }
      const target = reply.records.find((record) =>
        matchesAnyPattern(this.parkingPatterns, record),
      );
      if (target !== undefined) {
        return target;
      }
      name = reply.records[0];
    }

    return undefined;
  }
}
