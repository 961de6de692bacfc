/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { HandshakeError } from './lib/error.js';

//
// DNS
//

export type DnsRecordType = 'A' | 'CNAME';

/**
 * What a server said in reply to one question. Transport failures (no
 * reply at all) are rejections of the query promise instead.
 */
export type DnsReply =
  // Empty records: the answer section only held other types (a CNAME chain)
  | { status: 'answered'; records: string[] }
  // NOERROR with an empty answer section
  | { status: 'no-data' }
  // NXDOMAIN, SERVFAIL, REFUSED and friends
  | { status: 'negative'; code: string };

export interface DnsClient {
  query(args: {
    server: string;
    name: string;
    type: DnsRecordType;
  }): Promise<DnsReply>;
}

export type ServerSelector = (servers: readonly string[]) => string;

export type ResolutionResult =
  | { kind: 'resolved'; addresses: string[] }
  | { kind: 'timeout'; servers: string[] }
  | { kind: 'empty-answer' }
  | { kind: 'no-address-record' }
  | { kind: 'parked'; target: string };

export type ResolutionFailure = Exclude<ResolutionResult, { kind: 'resolved' }>;

export interface DomainResolver {
  resolve(domain: string): Promise<ResolutionResult>;
}

//
// TLS
//

export interface TlsConnection {
  close(): Promise<void>;
}

export interface TlsDialer {
  dial(args: { address: string; serverName: string }): Promise<TlsConnection>;
}

export type ProbeOutcome =
  | { ok: true; address: string }
  | { ok: false; address: string | undefined; error: HandshakeError };

export interface ReachabilityProber {
  probe(args: {
    domain: string;
    addresses: readonly string[];
    dialer: TlsDialer;
  }): Promise<ProbeOutcome>;
}

//
// Classification
//

export type ProbeVariant = 'bare' | 'www';

export type ResultScheme = 'https' | 'http';

export interface ResultLine {
  domain: string;
  url: string;
  scheme: ResultScheme;
  variant: ProbeVariant | 'degraded';
}

export interface DomainClassifier {
  classify(domain: string, dialer: TlsDialer): Promise<ResultLine>;
}

export interface RunSummary {
  total: number;
  bare: number;
  www: number;
  degraded: number;
}
