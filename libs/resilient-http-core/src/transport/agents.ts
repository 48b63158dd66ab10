import http from 'node:http';
import https from 'node:https';
import type { Duplex } from 'node:stream';
import { TimeoutError } from '../errors';

export const CONNECT_TIMEOUT_CODE = 'ECONNECTTIMEOUT';

/**
 * Destroys `socket` unless it emits `connect` within `timeoutMs`. The timer is
 * dropped once the socket connects or closes. A `timeoutMs` of 0 arms nothing.
 */
export function armConnectTimeout(socket: Duplex, timeoutMs: number): void {
  if (timeoutMs <= 0) return;
  const timer = setTimeout(() => {
    socket.destroy(Object.assign(new TimeoutError(`Connect timed out after ${timeoutMs}ms`), { code: CONNECT_TIMEOUT_CODE }));
  }, timeoutMs);
  const clear = () => clearTimeout(timer);
  socket.once('connect', clear);
  socket.once('close', clear);
}

/** Keep-alive agent whose new sockets must connect within `connectTimeoutMs`. */
export class ConnectTimeoutHttpAgent extends http.Agent {
  constructor(
    options: http.AgentOptions,
    readonly connectTimeoutMs: number,
  ) {
    super(options);
  }

  createConnection(
    options: http.ClientRequestArgs,
    callback?: (err: Error | null, stream: Duplex) => void,
  ): Duplex | null | undefined {
    const socket = super.createConnection(options, callback);
    if (socket) armConnectTimeout(socket, this.connectTimeoutMs);
    return socket;
  }
}

export class ConnectTimeoutHttpsAgent extends https.Agent {
  constructor(
    options: https.AgentOptions,
    readonly connectTimeoutMs: number,
  ) {
    super(options);
  }

  createConnection(
    options: https.RequestOptions,
    callback?: (err: Error | null, stream: Duplex) => void,
  ): Duplex | null | undefined {
    const socket = super.createConnection(options, callback);
    if (socket) armConnectTimeout(socket, this.connectTimeoutMs);
    return socket;
  }
}
