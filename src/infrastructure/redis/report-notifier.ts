import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import type { ReportFrozenListener, ReportFrozenNotice } from '../../application/report-lifecycle.js';

export const REPORT_FROZEN_CHANNEL = 'report_frozen';

/**
 * Publishes a freeze notice on the "report_frozen" Pub/Sub channel for the
 * delivery collaborator.
 *
 * Best-effort: publish failures are logged and never fail the freeze.
 */
export async function publishReportFrozen(
  redis: Redis,
  log: BaseLogger,
  notice: ReportFrozenNotice,
): Promise<void> {
  try {
    const receivers = await redis.publish(REPORT_FROZEN_CHANNEL, JSON.stringify(notice));
    log.debug(
      { channel: REPORT_FROZEN_CHANNEL, report_id: notice.report_id, receivers },
      'Published report frozen notice',
    );
  } catch (err: unknown) {
    log.warn({ err, report_id: notice.report_id }, 'Failed to publish report frozen notice');
  }
}

/** Adapts the publisher to the lifecycle engine's `onFrozen` hook. */
export function createReportFrozenPublisher(redis: Redis, log: BaseLogger): ReportFrozenListener {
  return (notice) => publishReportFrozen(redis, log, notice);
}
