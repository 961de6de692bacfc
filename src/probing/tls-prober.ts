/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { HandshakeError, errorMessage } from '../lib/error.js';
import {
  ProbeOutcome,
  ReachabilityProber,
  TlsConnection,
  TlsDialer,
} from '../types.js';

export class TlsProber implements ReachabilityProber {
  private log: winston.Logger;

  constructor({ log }: { log: winston.Logger }) {
    this.log = log.child({ class: this.constructor.name });
  }

  /**
   * Tries a handshake against each address in order and stops at the first
   * one that completes. A failure carries the error of the last address.
   */
  async probe({
    domain,
    addresses,
    dialer,
  }: {
    domain: string;
    addresses: readonly string[];
    dialer: TlsDialer;
  }): Promise<ProbeOutcome> {
    const log = this.log.child({ method: 'probe', domain });

    let lastFailure: ProbeOutcome | undefined;

    for (const address of addresses) {
      let connection: TlsConnection;
      try {
        connection = await dialer.dial({ address, serverName: domain });
      } catch (error) {
        const handshakeError = HandshakeError.fromCause({
          cause: error,
          address,
          serverName: domain,
        });
        log.debug('TLS handshake failed', {
          address,
          message: handshakeError.message,
        });
        lastFailure = { ok: false, address, error: handshakeError };
        continue;
      }

      // Reachability is decided by the handshake alone
      try {
        await connection.close();
      } catch (error) {
        log.debug('Error closing TLS connection', {
          address,
          message: errorMessage(error),
        });
      }
      return { ok: true, address };
    }

    return (
      lastFailure ?? {
        ok: false,
        address: undefined,
        error: new HandshakeError({
          message: 'No addresses to probe',
          address: '',
          serverName: domain,
        }),
      }
    );
  }
}
