/**
 * Test Utilities
 * Common helpers for writing API tests
 */

import type { Hono, MiddlewareHandler } from 'hono';

import { createApp } from '@/api/app.js';
import type { ApiServices } from '@/api/types.js';
import { createAuditService } from '@/services/audit.service.js';
import { createOrderService } from '@/services/order.service.js';
import { createSubscriptionService } from '@/services/subscription.service.js';
import type { ActorContext } from '@/types/index.js';

import {
  T0,
  addresses,
  customerActor,
  plans,
  products,
  vendors,
} from '../fixtures/index.js';

import type {
  FakeGateway,
  InMemoryAuditDb,
  InMemoryOrderDb,
  InMemorySubscriptionDb,
  ManualClock,
} from './in-memory-db.js';
import {
  createFakeGateway,
  createInMemoryAuditDb,
  createInMemoryOrderDb,
  createInMemorySubscriptionDb,
  createManualClock,
} from './in-memory-db.js';

/**
 * Middleware that stands in for JWT auth and sets a fixed actor
 */
export function actorMiddleware(actor: ActorContext): MiddlewareHandler {
  return async (c, next) => {
    c.set('actor', actor);
    c.set('requestId', actor.requestId);
    await next();
  };
}

/**
 * JSON request init
 */
export function jsonRequest(
  method: 'POST' | 'PUT',
  body: unknown,
  headers: Record<string, string> = {}
): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

export interface TestApp {
  app: Hono;
  services: ApiServices;
  clock: ManualClock;
  orderDb: InMemoryOrderDb;
  subscriptionDb: InMemorySubscriptionDb;
  auditDb: InMemoryAuditDb;
  gateway: FakeGateway;
  /**
   * Switch the actor the stand-in auth middleware sets
   */
  actAs(actor: ActorContext): void;
}

/**
 * Full application over in-memory persistence
 */
export function createTestApp(initialActor: ActorContext = customerActor()): TestApp {
  let current = initialActor;
  const clock = createManualClock(T0);
  const orderDb = createInMemoryOrderDb({ vendors, products, addresses }, clock);
  const subscriptionDb = createInMemorySubscriptionDb(plans, vendors, clock);
  const auditDb = createInMemoryAuditDb(clock);
  const gateway = createFakeGateway();

  const auditService = createAuditService({ db: auditDb });
  let orderSequence = 0;
  const services: ApiServices = {
    auditService,
    clock,
    orderService: createOrderService({
      db: orderDb,
      auditService,
      clock,
      orderNumber: () => {
        orderSequence += 1;
        return `ORD-TEST${String(orderSequence).padStart(6, '0')}`;
      },
    }),
    subscriptionService: createSubscriptionService({
      db: subscriptionDb,
      auditService,
      gateway,
      clock,
    }),
  };

  const app = createApp({
    authMiddleware: async (c, next) => {
      c.set('actor', current);
      c.set('requestId', current.requestId);
      await next();
    },
    services,
  });

  return {
    app,
    services,
    clock,
    orderDb,
    subscriptionDb,
    auditDb,
    gateway,
    actAs(actor) {
      current = actor;
    },
  };
}
