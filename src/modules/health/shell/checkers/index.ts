/**
 * Health checker factories
 */

export {
  makeDbHealthChecker,
  makeUnconfiguredHealthChecker,
  type DbHealthCheckerOptions,
} from './db-checker.js';
export { makeStorageHealthChecker, type StorageHealthCheckerOptions } from './storage-checker.js';
