/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as fastq } from 'fastq';
import type { queueAsPromised } from 'fastq';
import * as winston from 'winston';

import { degradedResult } from '../classification/fallback-classifier.js';
import * as config from '../config.js';
import { ConfigurationError, errorMessage } from '../lib/error.js';
import { LineSink } from '../lib/line-writer.js';
import { Semaphore } from '../lib/semaphore.js';
import { NodeTlsDialer } from '../probing/tls-dialer.js';
import {
  DomainClassifier,
  ResultLine,
  RunSummary,
  TlsDialer,
} from '../types.js';

interface DomainDispatcherQueueItem {
  domain: string;
  summary: RunSummary;
}

/**
 * Classifies a stream of domains with a fixed number of workers and writes
 * one result line per domain. Up to `concurrency` domains wait in the queue
 * while every worker is busy; beyond that the producer is held back.
 */
export class DomainDispatcher {
  // Dependencies
  private log: winston.Logger;
  private classifier: DomainClassifier;
  private output: LineSink;

  // Worker queue
  private concurrency: number;
  private queue: queueAsPromised<DomainDispatcherQueueItem, void>;
  private slots: Semaphore;
  private idleDialers: TlsDialer[];
  private createDialer: () => TlsDialer;

  constructor({
    log,
    classifier,
    output,
    concurrency = config.CONCURRENCY,
    createDialer = () => new NodeTlsDialer(),
  }: {
    log: winston.Logger;
    classifier: DomainClassifier;
    output: LineSink;
    concurrency?: number;
    createDialer?: () => TlsDialer;
  }) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(
        `Concurrency must be a positive integer, got: ${concurrency}`,
      );
    }

    this.log = log.child({ class: this.constructor.name });
    this.classifier = classifier;
    this.output = output;
    this.concurrency = concurrency;
    this.createDialer = createDialer;
    this.idleDialers = Array.from({ length: concurrency }, () =>
      createDialer(),
    );
    this.queue = fastq.promise(this.process.bind(this), concurrency);
    // Running workers plus queued domains
    this.slots = new Semaphore(concurrency * 2);
  }

  async run(
    domains: AsyncIterable<string> | Iterable<string>,
  ): Promise<RunSummary> {
    const log = this.log.child({ method: 'run' });
    const summary: RunSummary = { total: 0, bare: 0, www: 0, degraded: 0 };

    log.debug('Starting run', { concurrency: this.concurrency });
    try {
      for await (const domain of domains) {
        if (this.slots.availablePermits() === 0) {
          log.debug('Queue full, waiting for a worker', {
            domain,
            queued: this.queueDepth(),
          });
        }
        await this.slots.acquire();
        this.queue.push({ domain, summary }).catch((error: unknown) => {
          log.error('Failed to report result', {
            domain,
            message: errorMessage(error),
          });
        });
      }
    } finally {
      await this.slots.idle();
    }

    log.info('Run complete', { ...summary });
    return summary;
  }

  queueDepth(): number {
    return this.queue.length();
  }

  private async process({
    domain,
    summary,
  }: DomainDispatcherQueueItem): Promise<void> {
    const log = this.log.child({ method: 'process', domain });
    // fastq never runs more than `concurrency` items, so a dialer is free
    const dialer = this.idleDialers.pop() ?? this.createDialer();

    try {
      let result: ResultLine;
      try {
        result = await this.classifier.classify(domain, dialer);
      } catch (error) {
        log.error('Classification failed, reporting degraded URL', {
          message: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
        result = degradedResult(domain);
      }

      summary.total++;
      summary[result.variant]++;
      await this.output.writeLine(result.url);
    } finally {
      this.idleDialers.push(dialer);
      this.slots.release();
    }
  }
}
