/**
 * Background Workers Exports
 */

export { createSubscriptionExpiryWorker } from './subscription-expiry.js';
export type { SubscriptionExpiryWorker } from './subscription-expiry.js';
