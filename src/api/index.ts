/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices, ErrorResponse, SuccessResponse } from './types.js';
export {
  buildActor,
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
export type { TokenVerifier } from './middleware/auth.js';
export { createAdminMiddleware } from './middleware/admin.js';
