/**
 * Actor and Capability Types
 *
 * Roles are resolved once by the auth middleware and mapped to a fixed
 * capability set; routes ask the authorization evaluator instead of
 * comparing role strings.
 */

/**
 * Account roles
 */
export const ROLES = [
  'customer',
  'vendor',
  'organization_member',
  'admin',
  'super_admin',
] as const;

export type Role = (typeof ROLES)[number];

/**
 * Role and vendor link of an authenticated user
 */
export interface Account {
  role: Role;
  vendorId: string | null;
}

/**
 * Capabilities checked by the API layer
 */
export type Capability =
  | 'order:place'
  | 'order:read'
  | 'order:fulfil'
  | 'order:pay'
  | 'order:cancel'
  | 'subscription:read'
  | 'subscription:manage'
  | 'subscription:admin'
  | 'billing:pay'
  | 'billing:refund'
  | 'usage:track'
  | '*';

/**
 * Actor Context - Who is performing the action
 * Every service method receives this context
 */
export interface ActorContext {
  type: 'user' | 'admin' | 'system' | 'anonymous';
  userId?: string;
  role?: Role;
  vendorId?: string;
  requestId: string;
  capabilities: Capability[];
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for background jobs and payment callbacks
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
  capabilities: ['*'],
};
