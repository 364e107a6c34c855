import type { Server } from 'https';
import { SHUTDOWN_IDLE_SWEEP_MS, SHUTDOWN_TIMEOUT_MS } from '../constants/defaults.js';
import { debugServer } from '../utils/debug.js';

export type CloseOutcome = 'drained' | 'deadline';

/**
 * Stop accepting connections and wait for in-flight requests up to `timeoutMs`;
 * connections still open at the deadline are destroyed.
 *
 * Keep-alive connections are closed once they go idle.
 */
export async function closeGracefully(
  server: Server,
  timeoutMs = SHUTDOWN_TIMEOUT_MS,
): Promise<CloseOutcome> {
  const closed = new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  server.closeIdleConnections();
  const sweep = setInterval(() => server.closeIdleConnections(), SHUTDOWN_IDLE_SWEEP_MS);

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<CloseOutcome>((resolve) => {
    timer = setTimeout(() => resolve('deadline'), timeoutMs);
  });

  try {
    const outcome = await Promise.race([closed.then((): CloseOutcome => 'drained'), deadline]);
    if (outcome === 'deadline') {
      debugServer('shutdown deadline of %dms reached, dropping open connections', timeoutMs);
      server.closeAllConnections();
      await closed;
    }
    return outcome;
  } finally {
    clearTimeout(timer);
    clearInterval(sweep);
  }
}
