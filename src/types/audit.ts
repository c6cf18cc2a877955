/**
 * Audit Types
 * Types for the AuditService
 */

/**
 * Actor types for audit logging
 */
export type AuditActorType = 'user' | 'admin' | 'system' | 'anonymous';

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g., 'order.status_changed', 'subscription.cancelled'
  resourceType: string; // e.g., 'order', 'subscription'
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Audit log entry (read model)
 */
export interface AuditLog {
  id: string;
  timestamp: Date;
  actorId: string | null;
  actorType: AuditActorType;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string | null;
}
