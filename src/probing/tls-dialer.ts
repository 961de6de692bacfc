/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as net from 'node:net';
import * as tls from 'node:tls';

import * as config from '../config.js';
import { HandshakeError } from '../lib/error.js';
import { TlsConnection, TlsDialer } from '../types.js';

class NodeTlsConnection implements TlsConnection {
  private socket: tls.TLSSocket;
  private error: Error | undefined;

  constructor(socket: tls.TLSSocket, rawSocket: net.Socket) {
    this.socket = socket;
    const recordError = (error: Error) => {
      this.error ??= error;
    };
    socket.on('error', recordError);
    rawSocket.on('error', recordError);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      const settle = () => {
        if (this.error !== undefined) {
          reject(this.error);
        } else {
          resolve();
        }
      };

      if (this.socket.destroyed) {
        settle();
        return;
      }
      this.socket.once('close', settle);
      this.socket.destroy();
    });
  }
}

/**
 * Dials address:port directly (no name lookup, no address family racing)
 * and completes a TLS handshake with the given server name. The timeout
 * covers the TCP connect and the handshake together.
 */
export class NodeTlsDialer implements TlsDialer {
  private port: number;
  private connectTimeoutMs: number;
  // Trusted certificates; Node's bundled roots when unset
  private ca: string | Buffer | undefined;

  constructor({
    port = config.TLS_PORT,
    connectTimeoutMs = config.TLS_CONNECT_TIMEOUT_MS,
    ca,
  }: {
    port?: number;
    connectTimeoutMs?: number;
    ca?: string | Buffer;
  } = {}) {
    this.port = port;
    this.connectTimeoutMs = connectTimeoutMs;
    this.ca = ca;
  }

  dial({
    address,
    serverName,
  }: {
    address: string;
    serverName: string;
  }): Promise<TlsConnection> {
    return new Promise((resolve, reject) => {
      const rawSocket = net.connect({
        host: address,
        port: this.port,
        autoSelectFamily: false,
      });
      const socket = tls.connect({
        socket: rawSocket,
        servername: serverName,
        ...(this.ca !== undefined && { ca: this.ca }),
      });

      let settled = false;

      const fail = (cause: unknown) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        rawSocket.destroy();
        reject(HandshakeError.fromCause({ cause, address, serverName }));
      };

      const timer = setTimeout(() => {
        fail(
          new HandshakeError({
            message: `TLS handshake timed out after ${this.connectTimeoutMs}ms`,
            address,
            serverName,
            code: 'ETIMEDOUT',
          }),
        );
      }, this.connectTimeoutMs);

      rawSocket.on('error', fail);
      socket.on('error', fail);
      socket.once('secureConnect', () => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        const connection = new NodeTlsConnection(socket, rawSocket);
        rawSocket.removeListener('error', fail);
        socket.removeListener('error', fail);
        resolve(connection);
      });
    });
  }
}
