/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { describeResolutionFailure } from '../resolution/dns-resolver.js';
import {
  DomainClassifier,
  DomainResolver,
  ProbeVariant,
  ReachabilityProber,
  ResultLine,
  TlsDialer,
} from '../types.js';

const VARIANTS: readonly ProbeVariant[] = ['bare', 'www'];

export function hostForVariant(domain: string, variant: ProbeVariant): string {
  return variant === 'www' ? `www.${domain}` : domain;
}

export function degradedResult(domain: string): ResultLine {
  return {
    domain,
    url: `http://${domain}/`,
    scheme: 'http',
    variant: 'degraded',
  };
}

/**
 * Decides the URL reported for a domain: HTTPS on the bare name, then
 * HTTPS on the www name, then an unverified plain HTTP guess.
 */
export class FallbackClassifier implements DomainClassifier {
  private log: winston.Logger;
  private resolver: DomainResolver;
  private prober: ReachabilityProber;

  constructor({
    log,
    resolver,
    prober,
  }: {
    log: winston.Logger;
    resolver: DomainResolver;
    prober: ReachabilityProber;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.resolver = resolver;
    this.prober = prober;
  }

  async classify(domain: string, dialer: TlsDialer): Promise<ResultLine> {
    const log = this.log.child({ method: 'classify', domain });

    for (const variant of VARIANTS) {
      const host = hostForVariant(domain, variant);

      const resolution = await this.resolver.resolve(host);
      if (resolution.kind !== 'resolved') {
        log.debug('Resolution failed', {
          variant,
          host,
          reason: resolution.kind,
          error: describeResolutionFailure(resolution),
        });
        continue;
      }

      const outcome = await this.prober.probe({
        domain: host,
        addresses: resolution.addresses,
        dialer,
      });
      if (!outcome.ok) {
        log.debug('TLS handshake failed', {
          variant,
          host,
          address: outcome.address,
          error: outcome.error.message,
        });
        continue;
      }

      return {
        domain,
        url: `https://${host}/`,
        scheme: 'https',
        variant,
      };
    }

    return degradedResult(domain);
  }
}
