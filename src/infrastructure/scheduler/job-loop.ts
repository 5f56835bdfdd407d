import type { BaseLogger } from 'pino';

export interface ScheduledJob {
  name: string;
  /** Next run strictly after the given instant. */
  next: (from: Date) => Date;
  run: () => Promise<void>;
}

export interface JobLoopOptions {
  log: BaseLogger;
  signal: AbortSignal;
  now?: () => Date;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleepUntilAborted(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(ms, 0));
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `job` at each scheduled occurrence until `signal` is aborted.
 *
 * A failed run is logged and the loop moves on to the next occurrence.
 */
export async function runJobLoop(job: ScheduledJob, options: JobLoopOptions): Promise<void> {
  const now = options.now ?? (() => new Date());
  const sleep = options.sleep ?? sleepUntilAborted;
  const { log, signal } = options;

  log.info({ job: job.name }, 'Scheduled job started');

  while (!signal.aborted) {
    const from = now();
    const runAt = job.next(from);
    log.info({ job: job.name, next_run: runAt.toISOString() }, 'Next run scheduled');

    await sleep(runAt.getTime() - from.getTime(), signal);
    if (signal.aborted) break;

    try {
      await job.run();
    } catch (err: unknown) {
      log.error({ err, job: job.name }, 'Scheduled job failed, waiting for next run');
    }
  }

  log.info({ job: job.name }, 'Scheduled job stopped');
}
