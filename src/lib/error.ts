/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  cause?: unknown;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      message: this.message,
      stack: this.stack,
      ...rest,
    };
  }
}

export class ConfigurationError extends DetailedError {}

/**
 * A TLS dial, handshake or connect timeout against one address.
 */
export class HandshakeError extends DetailedError {
  readonly address: string;
  readonly serverName: string;
  readonly code: string | undefined;

  constructor({
    message,
    address,
    serverName,
    code,
    cause,
  }: {
    message: string;
    address: string;
    serverName: string;
    code?: string;
    cause?: unknown;
  }) {
    super(message, { cause });
    this.address = address;
    this.serverName = serverName;
    this.code = code;
  }

  static fromCause({
    cause,
    address,
    serverName,
  }: {
    cause: unknown;
    address: string;
    serverName: string;
  }): HandshakeError {
    if (cause instanceof HandshakeError) {
      return cause;
    }
    const message = cause instanceof Error ? cause.message : String(cause);
    return new HandshakeError({
      message,
      address,
      serverName,
      code: errorCode(cause),
      cause,
    });
  }
}

export function errorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
