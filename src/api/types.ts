/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { Clock } from '@/lib/clock.js';
import type { AuditService } from '@/services/audit.service.js';
import type { OrderService } from '@/services/order.service.js';
import type { SubscriptionService } from '@/services/subscription.service.js';
import type { ActorContext, ErrorCode } from '@/types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Services the routes are built on
 */
export interface ApiServices {
  orderService: OrderService;
  subscriptionService: SubscriptionService;
  auditService: AuditService;
  clock: Clock;
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 402 | 403 | 404 | 409 | 410 | 500;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  INVALID_TRANSITION: 409,
  INVALID_STATE: 409,
  CONFLICT: 409,
  VERSION_CONFLICT: 409,
  EXPIRED: 410,
  LIMIT_EXCEEDED: 402,
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}
