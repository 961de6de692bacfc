/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { FallbackClassifier } from './classification/fallback-classifier.js';
import * as config from './config.js';
import { LineSink } from './lib/line-writer.js';
import { TlsProber } from './probing/tls-prober.js';
import { DnsResolver } from './resolution/dns-resolver.js';
import { NodeDnsClient } from './resolution/node-dns-client.js';
import { DomainDispatcher } from './workers/domain-dispatcher.js';

export function createDomainDispatcher({
  log,
  output,
  concurrency = config.CONCURRENCY,
}: {
  log: winston.Logger;
  output: LineSink;
  concurrency?: number;
}): DomainDispatcher {
  const resolver = new DnsResolver({
    log,
    client: new NodeDnsClient(),
  });
  const prober = new TlsProber({ log });
  const classifier = new FallbackClassifier({ log, resolver, prober });

  return new DomainDispatcher({
    log,
    classifier,
    output,
    concurrency,
  });
}
