/**
 * Auth Middleware
 * Constructs ActorContext from a Supabase JWT
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import { capabilitiesForRole, isAdminRole } from '@/lib/authorization.js';
import { logger } from '@/lib/logger.js';
import type { Account, ActorContext } from '@/types/index.js';

import { apiError } from '../utils/response.js';

/**
 * The part of the Supabase client that verifies access tokens
 */
export interface TokenVerifier {
  auth: {
    getUser(jwt: string): Promise<{
      data: { user: { id: string } | null };
      error: { message: string } | null;
    }>;
  };
}

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  supabaseClient: TokenVerifier;
  resolveAccount: (userId: string) => Promise<Account | null>;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function clientInfo(c: Context): Pick<ActorContext, 'ip' | 'userAgent'> {
  const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
  const userAgent = c.req.header('user-agent');
  return {
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

/**
 * Build the actor for a resolved account
 */
export function buildActor(
  userId: string,
  account: Account,
  requestId: string,
  client: Pick<ActorContext, 'ip' | 'userAgent'> = {}
): ActorContext {
  return {
    type: isAdminRole(account.role) ? 'admin' : 'user',
    userId,
    role: account.role,
    ...(account.vendorId !== null && { vendorId: account.vendorId }),
    requestId,
    capabilities: capabilitiesForRole(account.role),
    ...client,
  };
}

/**
 * Create auth middleware for protected routes
 * Extracts JWT, verifies with Supabase, constructs ActorContext
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { supabaseClient, resolveAccount } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const authHeader = c.req.header('Authorization');
    const token = authHeader?.startsWith('Bearer ')
      ? authHeader.slice(7).trim()
      : '';
    if (token === '') {
      return apiError(
        c,
        'UNAUTHORIZED',
        'Missing or invalid authorization header',
        requestId
      );
    }

    const {
      data: { user },
      error,
    } = await supabaseClient.auth.getUser(token);
    if (error !== null || user === null) {
      return apiError(c, 'UNAUTHORIZED', 'Invalid or expired token', requestId);
    }

    const account = await resolveAccount(user.id);
    if (account === null) {
      logger.warn({ userId: user.id, requestId }, 'No account for user');
      return apiError(c, 'PERMISSION_DENIED', 'No account for user', requestId);
    }

    c.set('actor', buildActor(user.id, account, requestId, clientInfo(c)));
    c.set('requestId', requestId);

    return next();
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      capabilities: [],
      ...clientInfo(c),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
