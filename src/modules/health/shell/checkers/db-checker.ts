/**
 * Database health checker
 *
 * Executes a simple `SELECT 1` query to verify database connectivity.
 * Returns unhealthy if the query fails or times out.
 */

import { sql, type Kysely } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

/** Default timeout for database health check in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name to identify this database in health check results */
  name: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * Creates a health checker for a Kysely database client.
 *
 * @example
 * ```typescript
 * const dbChecker = makeDbHealthChecker(songsDb, { name: 'database' });
 * const result = await dbChecker();
 * // { name: 'database', status: 'healthy', latencyMs: 5, critical: true }
 * ```
 */
export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Database health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      await Promise.race([sql`SELECT 1`.execute(db), timeoutPromise]);

      return {
        name,
        status: 'healthy',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};

/**
 * Reports a dependency that was never configured.
 */
export const makeUnconfiguredHealthChecker = (name: string, message: string): HealthChecker => {
  return async (): Promise<HealthCheckResult> => ({
    name,
    status: 'unhealthy',
    message,
    critical: true,
  });
};
