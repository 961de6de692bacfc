/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Writable } from 'node:stream';
import * as winston from 'winston';

import { DetailedError, errorMessage } from './lib/error.js';
import { LineWriter } from './lib/line-writer.js';
import { DomainDispatcher } from './workers/domain-dispatcher.js';

export const USAGE = `Usage: reachable-domains domains <path> [options]

Reads a domain file and emits one clean URL per domain.

Options:
  --concurrency <n>  Concurrent resolvers (default: 10)
  --debug            Debugging output on stderr
  --help             Show this message`;

export class UsageError extends DetailedError {}

export type CliCommand =
  | { command: 'help' }
  | { command: 'domains'; path: string; concurrency: number; debug: boolean };

export function parseArguments(
  args: readonly string[],
  defaults: { concurrency: number; debug: boolean },
): CliCommand {
  if (args.includes('--help') || args.includes('-h')) {
    return { command: 'help' };
  }

  const [command, ...rest] = args;
  if (command !== 'domains') {
    throw new UsageError(
      command === undefined
        ? 'Missing command'
        : `Unknown command: ${command}`,
    );
  }

  const positional: string[] = [];
  let concurrency = defaults.concurrency;
  let debug = defaults.debug;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const nextArg = rest[i + 1];

    switch (arg) {
      case '--concurrency': {
        const value = Number(nextArg);
        if (nextArg === undefined || !Number.isInteger(value) || value < 1) {
          throw new UsageError('--concurrency requires a positive integer');
        }
        concurrency = value;
        i++;
        break;
      }

      case '--debug':
        debug = true;
        break;

      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError('usage: domains path');
  }

  return { command: 'domains', path: positional[0], concurrency, debug };
}

export interface CliIo {
  stdout: Writable;
  stderr: Writable;
  log: winston.Logger;
  enableDebugLogging: () => void;
  openSource: (
    path: string,
  ) => Promise<AsyncIterable<string> | Iterable<string>>;
  createDispatcher: (args: {
    log: winston.Logger;
    output: LineWriter;
    concurrency: number;
  }) => DomainDispatcher;
}

/**
 * Runs one command and returns the process exit code.
 */
export async function runCli(
  args: readonly string[],
  defaults: { concurrency: number; debug: boolean },
  io: CliIo,
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArguments(args, defaults);
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n\n${USAGE}\n`);
    return 1;
  }

  if (command.command === 'help') {
    io.stdout.write(`${USAGE}\n`);
    return 0;
  }

  if (command.debug) {
    io.enableDebugLogging();
  }

  let domains: AsyncIterable<string> | Iterable<string>;
  try {
    domains = await io.openSource(command.path);
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }

  const dispatcher = io.createDispatcher({
    log: io.log,
    output: new LineWriter(io.stdout),
    concurrency: command.concurrency,
  });

  try {
    await dispatcher.run(domains);
  } catch (error) {
    io.log.error('Run aborted', {
      message: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  }
  return 0;
}
