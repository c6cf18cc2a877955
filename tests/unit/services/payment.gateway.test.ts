/**
 * Simulated payment gateway tests
 */

import { describe, it, expect } from 'vitest';

import {
  createSimulatedPaymentGateway,
  simulatedTransactionId,
} from '@/services/payment.gateway.js';

import { T0 } from '../../fixtures/index.js';
import { createManualClock } from '../../helpers/in-memory-db.js';

describe('simulatedTransactionId', () => {
  it('should stamp the payment id and unix seconds', () => {
    expect(simulatedTransactionId({ paymentId: 'pay-1', attempt: 0 }, T0)).toBe(
      'TXNpay-1_1735689600'
    );
  });

  it('should mark retried charges', () => {
    expect(simulatedTransactionId({ paymentId: 'pay-1', attempt: 2 }, T0)).toBe(
      'TXNpay-1_RETRY_1735689600'
    );
  });
});

describe('createSimulatedPaymentGateway', () => {
  it('should approve every charge', async () => {
    const gateway = createSimulatedPaymentGateway({
      clock: createManualClock(T0),
    });

    const result = await gateway.charge({
      paymentId: 'pay-7',
      subscriptionId: 'sub-1',
      vendorId: 'vendor-1',
      amount: 99900,
      currency: 'INR',
      paymentMethod: 'upi',
      attempt: 1,
    });

    expect(result).toEqual({
      ok: true,
      transactionId: 'TXNpay-7_RETRY_1735689600',
    });
  });
});
