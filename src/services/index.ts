/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// AuditService
export type { AuditService, AuditServiceDb } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// OrderService
export type {
  OrderService,
  OrderServiceDb,
  OrderServiceAudit,
} from './order.service.js';
export { createOrderService, generateOrderNumber } from './order.service.js';
export { createOrderServiceDb } from './order.db.js';

// SubscriptionService
export type {
  ChargeRequest,
  ChargeResult,
  LapseSweep,
  SubscriptionService,
  SubscriptionServiceDb,
  SubscriptionServiceAudit,
  SubscriptionServiceGateway,
} from './subscription.service.js';
export { createSubscriptionService } from './subscription.service.js';
export { createSubscriptionServiceDb } from './subscription.db.js';
export { createSimulatedPaymentGateway } from './payment.gateway.js';

// Accounts (auth middleware)
export { createAccountResolver } from './account.db.js';
