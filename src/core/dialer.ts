/**
 * TCP connect probe
 *
 * One socket per probe, destroyed on every exit path:
 * - connect                 -> open
 * - ECONNREFUSED            -> closed
 * - timeout / other errors  -> filtered
 * - abort signal            -> filtered (the caller discards it)
 */

import { Socket } from 'net';
import type { Dialer, PortState } from './types.js';

export type SocketFactory = () => Socket;

const REFUSED_CODES = new Set(['ECONNREFUSED']);

/**
 * Build a dialer. `createSocket` exists so tests can hand in a socket that never answers.
 */
export function createTcpDialer(createSocket: SocketFactory = () => new Socket()): Dialer {
  return (host, port, { timeout, signal }) =>
    new Promise<PortState>((resolve) => {
      if (signal?.aborted) {
        resolve('filtered');
        return;
      }

      const socket = createSocket();
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finalize = (state: PortState) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        socket.destroy();
        resolve(state);
      };

      const onAbort = () => finalize('filtered');

      timer = setTimeout(() => finalize('filtered'), timeout);
      signal?.addEventListener('abort', onAbort, { once: true });

      socket.once('connect', () => finalize('open'));
      socket.on('error', (err: NodeJS.ErrnoException) => {
        const code = err.code ? String(err.code) : undefined;
        finalize(code && REFUSED_CODES.has(code) ? 'closed' : 'filtered');
      });

      socket.connect(port, host);
    });
}

/**
 * Default dialer backed by `net.Socket`
 */
export const tcpDialer: Dialer = createTcpDialer();
