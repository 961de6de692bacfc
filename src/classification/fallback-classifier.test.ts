/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import {
  createCapturingLogger,
  createTestLogger,
  flushLogs,
} from '../../test/test-logger.js';
import { StubDialer, StubResolver } from '../../test/stubs.js';
import { TlsProber } from '../probing/tls-prober.js';
import { ResolutionResult } from '../types.js';
import { FallbackClassifier, hostForVariant } from './fallback-classifier.js';

describe('FallbackClassifier', () => {
  const log = createTestLogger({ suite: 'FallbackClassifier' });
  const prober = new TlsProber({ log });

  function createClassifier(results: Record<string, ResolutionResult>) {
    const resolver = new StubResolver(results);
    const classifier = new FallbackClassifier({ log, resolver, prober });
    return { resolver, classifier };
  }

  it('should report the bare domain over HTTPS without probing www', async () => {
    const { resolver, classifier } = createClassifier({
      'example.com': { kind: 'resolved', addresses: ['198.51.100.1'] },
      'www.example.com': { kind: 'resolved', addresses: ['198.51.100.2'] },
    });
    const dialer = new StubDialer(['example.com@198.51.100.1']);

    const result = await classifier.classify('example.com', dialer);

    assert.deepEqual(result, {
      domain: 'example.com',
      url: 'https://example.com/',
      scheme: 'https',
      variant: 'bare',
    });
    assert.deepEqual(resolver.calls, ['example.com']);
    assert.equal(dialer.calls.length, 1);
  });

  it('should fall back to www when the bare domain does not resolve', async () => {
    const { resolver, classifier } = createClassifier({
      'example.org': { kind: 'no-address-record' },
      'www.example.org': { kind: 'resolved', addresses: ['198.51.100.5'] },
    });
    const dialer = new StubDialer(['www.example.org@198.51.100.5']);

    const result = await classifier.classify('example.org', dialer);

    assert.equal(result.url, 'https://www.example.org/');
    assert.equal(result.variant, 'www');
    assert.deepEqual(resolver.calls, ['example.org', 'www.example.org']);
  });

  it('should fall back to www when the bare handshake fails', async () => {
    const { classifier } = createClassifier({
      'example.net': { kind: 'resolved', addresses: ['198.51.100.1'] },
      'www.example.net': { kind: 'resolved', addresses: ['198.51.100.1'] },
    });
    const dialer = new StubDialer(['www.example.net@198.51.100.1']);

    const result = await classifier.classify('example.net', dialer);

    assert.equal(result.url, 'https://www.example.net/');
    assert.deepEqual(dialer.calls, [
      { address: '198.51.100.1', serverName: 'example.net' },
      { address: '198.51.100.1', serverName: 'www.example.net' },
    ]);
  });

  it('should degrade to plain HTTP when both handshakes fail', async () => {
    const { classifier } = createClassifier({
      'example.com': { kind: 'resolved', addresses: ['198.51.100.1'] },
      'www.example.com': { kind: 'resolved', addresses: ['198.51.100.2'] },
    });
    const dialer = new StubDialer();

    const result = await classifier.classify('example.com', dialer);

    assert.deepEqual(result, {
      domain: 'example.com',
      url: 'http://example.com/',
      scheme: 'http',
      variant: 'degraded',
    });
    assert.equal(dialer.calls.length, 2);
  });

  it('should degrade without dialing when neither name resolves', async () => {
    const { resolver, classifier } = createClassifier({
      'deadsite.test': { kind: 'timeout', servers: ['192.0.2.1'] },
      'www.deadsite.test': { kind: 'empty-answer' },
    });
    const dialer = new StubDialer();

    const result = await classifier.classify('deadsite.test', dialer);

    assert.equal(result.url, 'http://deadsite.test/');
    assert.deepEqual(resolver.calls, ['deadsite.test', 'www.deadsite.test']);
    assert.equal(dialer.calls.length, 0);
  });

  it('should treat a parked domain as unreachable', async () => {
    const { classifier } = createClassifier({
      'example.com': { kind: 'parked', target: 'example.com.parkingcrew.net' },
      'www.example.com': { kind: 'parked', target: 'example.com.parkingcrew.net' },
    });

    const result = await classifier.classify('example.com', new StubDialer());

    assert.equal(result.url, 'http://example.com/');
  });
});

describe('FallbackClassifier diagnostics', () => {
  const prober = new TlsProber({
    log: createTestLogger({ suite: 'FallbackClassifier diagnostics' }),
  });

  function classifierEntries(entries: Array<Record<string, unknown>>) {
    return entries
      .filter((entry) => entry.class === 'FallbackClassifier')
      .map(({ level, message, domain, variant, host, reason, error }) => ({
        level,
        message,
        domain,
        variant,
        host,
        reason,
        error,
      }));
  }

  it('should log one debug entry for each failed step', async () => {
    const { log, entries } = createCapturingLogger();
    const classifier = new FallbackClassifier({
      log,
      resolver: new StubResolver({
        'example.com': { kind: 'resolved', addresses: ['198.51.100.1'] },
        'www.example.com': { kind: 'no-address-record' },
      }),
      prober,
    });

    await classifier.classify('example.com', new StubDialer());
    await flushLogs();

    assert.deepEqual(classifierEntries(entries), [
      {
        level: 'debug',
        message: 'TLS handshake failed',
        domain: 'example.com',
        variant: 'bare',
        host: 'example.com',
        reason: undefined,
        error: 'connect ECONNREFUSED 198.51.100.1:443',
      },
      {
        level: 'debug',
        message: 'Resolution failed',
        domain: 'example.com',
        variant: 'www',
        host: 'www.example.com',
        reason: 'no-address-record',
        error: 'DNS reply contained no A records',
      },
    ]);
  });

  it('should log nothing when the bare domain is reachable', async () => {
    const { log, entries } = createCapturingLogger();
    const classifier = new FallbackClassifier({
      log,
      resolver: new StubResolver({
        'example.com': { kind: 'resolved', addresses: ['198.51.100.1'] },
      }),
      prober,
    });

    await classifier.classify(
      'example.com',
      new StubDialer(['example.com@198.51.100.1']),
    );
    await flushLogs();

    assert.deepEqual(classifierEntries(entries), []);
  });
});

describe('hostForVariant', () => {
  it('should prefix www for the www variant only', () => {
    assert.equal(hostForVariant('example.com', 'bare'), 'example.com');
    assert.equal(hostForVariant('example.com', 'www'), 'www.example.com');
  });
});
