/**
 * AuditService Unit Tests
 */

import pino from 'pino';
import { describe, it, expect, beforeEach, vi } from 'vitest';

import type { AuditService } from '@/services/audit.service.js';
import { createAuditService } from '@/services/audit.service.js';

import {
  T0,
  adminActor,
  systemActor,
  vendorActor,
} from '../../fixtures/index.js';
import type { InMemoryAuditDb } from '../../helpers/in-memory-db.js';
import {
  createInMemoryAuditDb,
  createManualClock,
} from '../../helpers/in-memory-db.js';

describe('AuditService', () => {
  let db: InMemoryAuditDb;
  let auditService: AuditService;

  beforeEach(() => {
    db = createInMemoryAuditDb(createManualClock(T0));
    auditService = createAuditService({ db, logger: pino({ level: 'silent' }) });
  });

  describe('log', () => {
    it('should record the actor and the event', async () => {
      const actor = vendorActor({ ip: '203.0.113.7', userAgent: 'vitest' });

      const result = await auditService.log(actor, {
        action: 'subscription.cancelled',
        resourceType: 'subscription',
        resourceId: 'sub-1',
        details: { immediate: false },
      });

      expect(result).toEqual({ success: true, data: undefined });
      expect(db.entries).toEqual([
        {
          actorId: 'user-vendor-1',
          actorType: 'user',
          action: 'subscription.cancelled',
          resourceType: 'subscription',
          resourceId: 'sub-1',
          details: { immediate: false },
          ipAddress: '203.0.113.7',
          userAgent: 'vitest',
          requestId: 'req-vendor',
        },
      ]);
    });

    it('should fill absent fields with nulls', async () => {
      await auditService.log(systemActor, {
        action: 'subscription.expired_batch',
        resourceType: 'subscription',
      });

      expect(db.entries[0]).toEqual({
        actorId: null,
        actorType: 'system',
        action: 'subscription.expired_batch',
        resourceType: 'subscription',
        resourceId: null,
        details: {},
        ipAddress: null,
        userAgent: null,
        requestId: 'req-system',
      });
    });

    it('should report a failed write', async () => {
      vi.spyOn(db, 'insertLog').mockRejectedValue(new Error('connection reset'));

      const result = await auditService.log(vendorActor(), {
        action: 'order.placed',
        resourceType: 'order',
        resourceId: 'order-1',
      });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'INTERNAL_ERROR',
          message: 'Failed to write audit log',
          details: { action: 'order.placed' },
        },
      });
    });
  });

  describe('getResourceHistory', () => {
    beforeEach(async () => {
      await auditService.log(vendorActor(), {
        action: 'subscription.created',
        resourceType: 'subscription',
        resourceId: 'sub-1',
      });
      await auditService.log(vendorActor(), {
        action: 'order.placed',
        resourceType: 'order',
        resourceId: 'order-1',
      });
      await auditService.log(adminActor(), {
        action: 'subscription.status_changed',
        resourceType: 'subscription',
        resourceId: 'sub-1',
      });
    });

    it('should return the history of one resource in order', async () => {
      const result = await auditService.getResourceHistory(
        adminActor(),
        'subscription',
        'sub-1'
      );

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.map((log) => [log.id, log.action])).toEqual([
          ['audit-1', 'subscription.created'],
          ['audit-3', 'subscription.status_changed'],
        ]);
        expect(result.data[0]?.timestamp).toEqual(T0);
      }
    });

    it('should require the admin capability', async () => {
      const result = await auditService.getResourceHistory(
        vendorActor(),
        'subscription',
        'sub-1'
      );

      expect(result).toEqual({
        success: false,
        error: {
          code: 'PERMISSION_DENIED',
          message: 'Actor cannot read audit history',
        },
      });
    });
  });
});
