/**
 * Admin Middleware
 * Checks for the subscription admin capability on protected routes
 */

import type { Context, Next } from 'hono';

import { can } from '@/lib/authorization.js';

import { apiError } from '../utils/response.js';

/**
 * Admin middleware - runs after auth, so an actor is always present
 */
export function createAdminMiddleware() {
  return async function adminMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const actor = c.get('actor');

    if (!can(actor, 'subscription:admin')) {
      return apiError(
        c,
        'PERMISSION_DENIED',
        'Admin access required',
        actor.requestId
      );
    }

    await next();
  };
}
