/**
 * Marketplace Core Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp, createAuthMiddleware } from './api/index.js';
import {
  createLocalEntityLock,
  createRedis,
  createRedisEntityLock,
  createSupabaseAdmin,
  createUpstashLockStore,
  loadConfig,
  logger,
  systemClock,
} from './lib/index.js';
import type { EntityLock } from './lib/index.js';
import {
  createAccountResolver,
  createAuditService,
  createAuditServiceDb,
  createOrderService,
  createOrderServiceDb,
  createSimulatedPaymentGateway,
  createSubscriptionService,
  createSubscriptionServiceDb,
} from './services/index.js';
import { createSubscriptionExpiryWorker } from './workers/index.js';

const config = loadConfig();
logger.level = config.LOG_LEVEL;

// Create Supabase client
const supabase = createSupabaseAdmin(config);

// Cross-instance locking when Redis is configured
let lock: EntityLock;
if (
  config.UPSTASH_REDIS_URL !== undefined &&
  config.UPSTASH_REDIS_TOKEN !== undefined
) {
  lock = createRedisEntityLock(
    createUpstashLockStore(
      createRedis(config.UPSTASH_REDIS_URL, config.UPSTASH_REDIS_TOKEN)
    )
  );
  logger.info('Using Redis entity lock');
} else {
  lock = createLocalEntityLock();
  logger.warn('UPSTASH_REDIS_URL not set; entity lock is process-local');
}

// Wire all services
const auditService = createAuditService({
  db: createAuditServiceDb(supabase),
});

const orderService = createOrderService({
  db: createOrderServiceDb(supabase),
  auditService,
  clock: systemClock,
  lock,
});

const subscriptionService = createSubscriptionService({
  db: createSubscriptionServiceDb(supabase),
  auditService,
  gateway: createSimulatedPaymentGateway({ clock: systemClock }),
  clock: systemClock,
  lock,
});

// Create the API application
const app = createApp({
  authMiddleware: createAuthMiddleware({
    supabaseClient: supabase,
    resolveAccount: createAccountResolver(supabase),
  }),
  services: {
    orderService,
    subscriptionService,
    auditService,
    clock: systemClock,
  },
  allowedOrigins: config.ALLOWED_ORIGINS,
});

const expiryWorker = createSubscriptionExpiryWorker({
  subscriptionService,
  intervalMs: config.SUBSCRIPTION_EXPIRY_INTERVAL_MS,
});

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
  },
  (info) => {
    logger.info({ port: info.port, env: config.NODE_ENV }, 'Server started');
    expiryWorker.start();
  }
);

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  expiryWorker.stop();
  server.close();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export { app };
