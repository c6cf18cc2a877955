/**
 * AuditService Implementation
 *
 * Purpose: Immutable audit trail of every order and subscription mutation.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import { can } from '@/lib/authorization.js';
import { logger as defaultLogger } from '@/lib/logger.js';
import type { Logger } from '@/lib/logger.js';
import type {
  ActorContext,
  AuditEvent,
  AuditLog,
  Result,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';

/**
 * Row written for a single event
 */
export interface AuditLogEntry {
  actorId: string | null;
  actorType: ActorContext['type'];
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string | null;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
  getLogsByResource: (
    resourceType: string,
    resourceId: string
  ) => Promise<AuditLog[]>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
  getResourceHistory(
    actor: ActorContext,
    resourceType: string,
    resourceId: string
  ): Promise<Result<AuditLog[]>>;
}

/**
 * Build log entry from actor and event
 */
function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditLogEntry {
  return {
    actorId: actor.userId ?? null,
    actorType: actor.type,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    ipAddress: actor.ip ?? null,
    userAgent: actor.userAgent ?? null,
    requestId: actor.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: {
  db: AuditServiceDb;
  logger?: Logger;
}): AuditService {
  const { db } = deps;
  const log = deps.logger ?? defaultLogger;

  return {
    /**
     * Log an audit event
     * This is the ONLY way to write to audit_logs
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      const entry = buildLogEntry(actor, event);
      try {
        await db.insertLog(entry);
      } catch (err) {
        log.error(
          { err, action: event.action, requestId: actor.requestId },
          'Failed to write audit log'
        );
        return failure('INTERNAL_ERROR', 'Failed to write audit log', {
          action: event.action,
        });
      }
      log.info(
        {
          action: entry.action,
          resourceType: entry.resourceType,
          resourceId: entry.resourceId,
          actorId: entry.actorId,
          requestId: entry.requestId,
        },
        'audit'
      );
      return success(undefined);
    },

    /**
     * Full history for one resource, oldest first
     * Requires: 'subscription:admin' capability
     */
    async getResourceHistory(
      actor: ActorContext,
      resourceType: string,
      resourceId: string
    ): Promise<Result<AuditLog[]>> {
      if (!can(actor, 'subscription:admin')) {
        return failure('PERMISSION_DENIED', 'Actor cannot read audit history');
      }

      const logs = await db.getLogsByResource(resourceType, resourceId);
      return success(logs);
    },
  };
}
