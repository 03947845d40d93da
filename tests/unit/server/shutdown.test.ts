/**
 * Unit tests for ShutdownHandler
 *
 * Tests graceful shutdown including:
 * - Closing the HTTP server
 * - Waiting for in-flight turns to finish
 * - Giving up on in-flight turns after the timeout
 */

import * as http from 'http';
import type { AddressInfo } from 'net';
import { ShutdownHandler } from '../../../src/server/shutdown';
import { SessionStore } from '../../../src/session/store';
import { quietLogger } from '../../helpers/fakes';

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

describe('ShutdownHandler', () => {
  let server: http.Server;
  let sessions: SessionStore;

  beforeEach(async () => {
    server = http.createServer((_req, res) => {
      res.end('ok');
    });
    sessions = new SessionStore({ ttlMs: 60_000, maxHistory: 10 });
    await listen(server);
  });

  afterEach(() => {
    if (server.listening) {
      server.close();
    }
  });

  it('should close the server when nothing is in flight', async () => {
    const handler = new ShutdownHandler(server, sessions, quietLogger(), 1000);

    await handler.shutdown();

    expect(handler.isShuttingDown()).toBe(true);
    expect(server.listening).toBe(false);
  });

  it('should wait for an in-flight turn to finish', async () => {
    const handler = new ShutdownHandler(server, sessions, quietLogger(), 5000);
    let turnFinished = false;
    const turn = sessions.withSessionLock('session-1', async () => {
      await new Promise((resolve) => setTimeout(resolve, 150));
      turnFinished = true;
    });

    await handler.shutdown();

    expect(turnFinished).toBe(true);
    expect(server.listening).toBe(false);
    await turn;
  });

  it('should stop waiting once the timeout is reached', async () => {
    const handler = new ShutdownHandler(server, sessions, quietLogger(), 100);
    let release: () => void = () => undefined;
    const turn = sessions.withSessionLock('session-1', () => new Promise<void>((resolve) => (release = resolve)));

    const startedAt = Date.now();
    await handler.shutdown();

    expect(Date.now() - startedAt).toBeLessThan(2000);
    expect(server.listening).toBe(false);
    expect(sessions.locks.activeCount).toBe(1);

    release();
    await turn;
  });

  it('should expose the default timeout', () => {
    expect(ShutdownHandler.getShutdownTimeout()).toBe(30000);
  });
});
