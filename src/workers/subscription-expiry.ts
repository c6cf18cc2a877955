/**
 * Subscription Expiry Worker
 *
 * Periodically expires lapsed subscriptions and suspends those whose
 * period ended unpaid.
 * A tick is skipped while the previous one is still running.
 */

import { logger as defaultLogger } from '@/lib/logger.js';
import type { Logger } from '@/lib/logger.js';
import type {
  LapseSweep,
  SubscriptionService,
} from '@/services/subscription.service.js';
import { SYSTEM_ACTOR } from '@/types/index.js';

export interface SubscriptionExpiryWorker {
  start(): void;
  stop(): void;
  /**
   * Run one sweep now
   */
  runOnce(): Promise<LapseSweep>;
}

export function createSubscriptionExpiryWorker(deps: {
  subscriptionService: Pick<SubscriptionService, 'expireLapsedSubscriptions'>;
  intervalMs: number;
  logger?: Logger;
}): SubscriptionExpiryWorker {
  const { subscriptionService, intervalMs } = deps;
  const log = (deps.logger ?? defaultLogger).child({
    component: 'subscription-expiry',
  });

  let timer: NodeJS.Timeout | null = null;
  let running = false;

  async function runOnce(): Promise<LapseSweep> {
    const result = await subscriptionService.expireLapsedSubscriptions({
      ...SYSTEM_ACTOR,
      requestId: 'subscription-expiry',
    });
    if (!result.success) {
      throw new Error(`Expiry sweep failed: ${result.error.message}`);
    }
    const { expired, suspended } = result.data;
    if (expired.length > 0 || suspended.length > 0) {
      log.info({ expired, suspended }, 'Lapsed subscriptions swept');
    }
    return result.data;
  }

  function tick(): void {
    if (running) {
      return;
    }
    running = true;
    void runOnce()
      .catch((err: unknown) => {
        log.error({ err }, 'Expiry sweep failed');
      })
      .finally(() => {
        running = false;
      });
  }

  return {
    start() {
      if (timer !== null || intervalMs === 0) {
        return;
      }
      timer = setInterval(tick, intervalMs);
      timer.unref();
      log.info({ intervalMs }, 'Subscription expiry worker started');
    },

    stop() {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
        log.info('Subscription expiry worker stopped');
      }
    },

    runOnce,
  };
}
