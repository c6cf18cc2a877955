/**
 * Simulated Payment Gateway
 * Implementation of SubscriptionServiceGateway that approves every charge
 */

import { systemClock } from '@/lib/clock.js';
import type { Clock } from '@/lib/clock.js';

import type {
  ChargeRequest,
  ChargeResult,
  SubscriptionServiceGateway,
} from './subscription.service.js';

/**
 * Transaction ids look like TXN<paymentId>_<unix seconds>,
 * with a RETRY marker on retried charges
 */
export function simulatedTransactionId(
  request: Pick<ChargeRequest, 'paymentId' | 'attempt'>,
  now: Date
): string {
  const seconds = Math.floor(now.getTime() / 1000);
  const marker = request.attempt > 0 ? '_RETRY' : '';
  return `TXN${request.paymentId}${marker}_${seconds}`;
}

/**
 * Create the simulated gateway
 */
export function createSimulatedPaymentGateway(
  deps: { clock?: Clock } = {}
): SubscriptionServiceGateway {
  const clock = deps.clock ?? systemClock;

  return {
    async charge(request: ChargeRequest): Promise<ChargeResult> {
      return {
        ok: true,
        transactionId: simulatedTransactionId(request, clock.now()),
      };
    },
  };
}
