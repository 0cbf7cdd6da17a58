/**
 * SSH Queue - Per-host promise serialization
 *
 * Display probes run one ssh at a time per execution host, so listing many
 * sessions on the same node does not open a burst of connections to it.
 * Different hosts probe in parallel, and a failed probe does not block the next.
 */

import { log } from './logger';

const queues = new Map<string, Promise<void>>();

/**
 * Execute a function within the host's ssh queue
 * @returns Result of the function
 */
async function withHostQueue<T>(host: string, fn: () => Promise<T>): Promise<T> {
  const current = queues.get(host) || Promise.resolve();

  const next = current.then(async () => {
    log.debugFor('ssh', 'SSH queue executing', { host });
    return fn();
  });

  // Chain on a promise that always resolves; the caller still sees the rejection
  const release = (): void => {
    if (queues.get(host) === settled) queues.delete(host);
  };
  const settled: Promise<void> = next.then(release, (err: unknown) => {
    log.debugFor('ssh', 'SSH queue operation failed; continuing queue', {
      host,
      error: err instanceof Error ? err.message : String(err),
    });
    release();
  });
  queues.set(host, settled);

  return next;
}

/** Drop every pending chain */
function clearQueues(): void {
  queues.clear();
}

export { withHostQueue, clearQueues };
