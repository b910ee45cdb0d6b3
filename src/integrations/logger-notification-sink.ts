/**
 * NotificationSink that writes rollout events to a pino logger
 *
 * Failed or reverted rollouts log at warn, everything else at info.
 */

import type { Logger } from 'pino';
import type { NotificationSink, RolloutNotification } from '../types/integrations.js';

const WARN_EVENTS: ReadonlySet<RolloutNotification['type']> = new Set<RolloutNotification['type']>([
  'rollout.rolled_back',
  'rollout.aborted',
  'rollout.smoke_test_failed',
  'endpoint.delete_failed',
]);

export class LoggerNotificationSink implements NotificationSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'notifications' });
  }

  notify(event: RolloutNotification): void {
    if (WARN_EVENTS.has(event.type)) {
      this.logger.warn({ event }, `Rollout notification: ${event.type}`);
    } else {
      this.logger.info({ event }, `Rollout notification: ${event.type}`);
    }
  }
}
