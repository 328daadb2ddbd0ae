/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes } from './shell/rest/routes.js';

// Health checker factories
export {
  makeDbHealthChecker,
  makeStorageHealthChecker,
  makeUnconfiguredHealthChecker,
  type DbHealthCheckerOptions,
  type StorageHealthCheckerOptions,
} from './shell/checkers/index.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
