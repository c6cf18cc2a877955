/**
 * Billing Routes Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { adminActor, customerActor, vendorActor } from '../../fixtures/index.js';
import type { TestApp } from '../../helpers/test-utils.js';
import { createTestApp, jsonRequest } from '../../helpers/test-utils.js';

describe('Billing Routes', () => {
  let t: TestApp;

  async function chargeCurrentPeriod(body: Record<string, unknown> = {}) {
    return t.app.request('/api/v1/billing/payments', jsonRequest('POST', body));
  }

  beforeEach(async () => {
    t = createTestApp(vendorActor());
    await t.app.request(
      '/api/v1/subscriptions/subscribe/plan-basic',
      jsonRequest('POST', {})
    );
  });

  describe('POST /billing/payments', () => {
    it('should charge the current period and roll the subscription', async () => {
      const res = await chargeCurrentPeriod();

      expect(res.status).toBe(201);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: {
          payment: {
            id: 'pay-2',
            subscriptionId: 'sub-1',
            amount: '999.00',
            status: 'completed',
            paymentMethod: 'credit_card',
            transactionId: 'txn-1',
            billingPeriodStart: '2025-01-01T00:00:00.000Z',
            billingPeriodEnd: '2025-01-31T00:00:00.000Z',
          },
          subscription: {
            currentPeriodStart: '2025-01-31T00:00:00.000Z',
            currentPeriodEnd: '2025-03-02T00:00:00.000Z',
          },
        },
      });
    });

    it('should report a declined charge as a failed payment', async () => {
      t.gateway.declineNext('Card declined');

      const res = await chargeCurrentPeriod({ paymentMethod: 'upi' });

      expect(res.status).toBe(201);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: {
          payment: {
            status: 'failed',
            paymentMethod: 'upi',
            failureReason: 'Card declined',
          },
          subscription: { currentPeriodEnd: '2025-01-31T00:00:00.000Z' },
        },
      });
    });

    it('should reject an unknown payment method', async () => {
      const res = await chargeCurrentPeriod({ paymentMethod: 'cheque' });

      expect(res.status).toBe(400);
    });

    it('should refuse customers', async () => {
      t.actAs(customerActor());

      const res = await chargeCurrentPeriod();

      expect(res.status).toBe(403);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        error: { code: 'PERMISSION_DENIED', message: 'Not allowed to manage billing' },
      });
    });
  });

  describe('PUT /billing/payments/:id/retry', () => {
    it('should retry a failed payment of the caller', async () => {
      t.gateway.declineNext('Card declined');
      await chargeCurrentPeriod();

      const res = await t.app.request('/api/v1/billing/payments/pay-2/retry', {
        method: 'PUT',
      });

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: {
          payment: { id: 'pay-2', status: 'completed', retryCount: 1 },
          subscription: { currentPeriodStart: '2025-01-31T00:00:00.000Z' },
        },
      });
    });

    it("should answer 404 for another vendor's payment", async () => {
      t.gateway.declineNext('Card declined');
      await chargeCurrentPeriod();
      t.actAs(vendorActor({ userId: 'user-vendor-2', vendorId: 'vendor-2' }));

      const res = await t.app.request('/api/v1/billing/payments/pay-2/retry', {
        method: 'PUT',
      });

      expect(res.status).toBe(404);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        error: { code: 'NOT_FOUND', message: 'Payment not found: pay-2' },
      });
      expect(t.subscriptionDb.payments.get('pay-2')?.retryCount).toBe(0);
    });

    it('should answer 409 for a payment that did not fail', async () => {
      await chargeCurrentPeriod();

      const res = await t.app.request('/api/v1/billing/payments/pay-2/retry', {
        method: 'PUT',
      });

      expect(res.status).toBe(409);
    });
  });

  describe('PUT /billing/payments/:id/refund', () => {
    it('should let an admin refund a completed payment', async () => {
      await chargeCurrentPeriod();
      t.actAs(adminActor());

      const res = await t.app.request(
        '/api/v1/billing/payments/pay-2/refund',
        jsonRequest('PUT', { reason: 'Goodwill' })
      );

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ data: { id: 'pay-2', status: 'refunded' } });
    });

    it('should not let the vendor refund itself', async () => {
      await chargeCurrentPeriod();

      const res = await t.app.request('/api/v1/billing/payments/pay-2/refund', {
        method: 'PUT',
      });

      expect(res.status).toBe(403);
      expect(t.subscriptionDb.payments.get('pay-2')?.status).toBe('completed');
    });
  });

  describe('GET /billing/payments', () => {
    it('should list the caller payments newest first', async () => {
      t.gateway.declineNext('Card declined');
      await chargeCurrentPeriod();
      await chargeCurrentPeriod();

      const res = await t.app.request('/api/v1/billing/payments');

      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: [
          { id: 'pay-3', status: 'completed' },
          { id: 'pay-2', status: 'failed' },
        ],
      });
    });
  });
});
