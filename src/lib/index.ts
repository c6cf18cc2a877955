/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { logger } from './logger.js';
export type { Logger } from './logger.js';
export { systemClock, addDays, daysUntil, MS_PER_DAY } from './clock.js';
export type { Clock } from './clock.js';
export {
  parseMoney,
  formatMoney,
  isValidAmount,
  multiplyMoney,
  sumMoney,
} from './money.js';
export { createLocalEntityLock } from './entity-lock.js';
export type { EntityLock } from './entity-lock.js';
export {
  createRedis,
  createUpstashLockStore,
  createRedisEntityLock,
} from './redis.js';
export type { LockStore, RedisLockOptions } from './redis.js';
export {
  createSupabaseAdmin,
  NOT_FOUND_CODE,
  parseEnum,
  toDateOrNull,
  toIsoOrNull,
} from './supabase.js';
export {
  can,
  canAccessOrder,
  capabilitiesForRole,
  isAdminRole,
  isFulfillingVendor,
} from './authorization.js';
