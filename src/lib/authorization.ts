/**
 * Authorization Evaluator
 *
 * The single place that turns roles into capabilities and answers
 * "may this actor do X" for the API layer.
 */

import type { ActorContext, Capability, Role } from '@/types/index.js';

const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
  customer: ['order:place', 'order:read', 'order:pay', 'order:cancel'],
  organization_member: [
    'order:place',
    'order:read',
    'order:pay',
    'order:cancel',
  ],
  vendor: [
    'order:read',
    'order:fulfil',
    'order:pay',
    'order:cancel',
    'subscription:read',
    'subscription:manage',
    'billing:pay',
    'usage:track',
  ],
  admin: [
    'order:read',
    'order:fulfil',
    'order:cancel',
    'subscription:read',
    'subscription:admin',
    'billing:refund',
  ],
  super_admin: ['*'],
};

const ADMIN_ROLES: readonly Role[] = ['admin', 'super_admin'];

export function capabilitiesForRole(role: Role): Capability[] {
  return [...ROLE_CAPABILITIES[role]];
}

export function isAdminRole(role: Role): boolean {
  return ADMIN_ROLES.includes(role);
}

/**
 * Check a capability, honouring the wildcard
 */
export function can(actor: ActorContext, capability: Capability): boolean {
  return (
    actor.capabilities.includes('*') ||
    actor.capabilities.includes(capability)
  );
}

/**
 * Admins see every order; otherwise only the customer who placed it
 * or the vendor fulfilling it
 */
export function canAccessOrder(
  actor: ActorContext,
  order: { customerId: string; vendorId: string }
): boolean {
  if (actor.type === 'system' || actor.type === 'admin') {
    return true;
  }
  if (actor.userId !== undefined && actor.userId === order.customerId) {
    return true;
  }
  return actor.vendorId !== undefined && actor.vendorId === order.vendorId;
}

/**
 * Only the fulfilling vendor (or an admin) moves an order through fulfilment
 */
export function isFulfillingVendor(
  actor: ActorContext,
  order: { vendorId: string }
): boolean {
  if (actor.type === 'system' || actor.type === 'admin') {
    return true;
  }
  return actor.vendorId !== undefined && actor.vendorId === order.vendorId;
}
