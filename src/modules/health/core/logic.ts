import { type HealthCheckResult, type ReadinessStatus } from './types.js';

/**
 * Maps settled promises from health checkers to standardized HealthCheckResults.
 * A checker that throws is reported as a critical failure.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
      critical: true,
    };
  });
};

/**
 * Aggregates individual check results into a global status.
 * - Any critical unhealthy → "unhealthy" (503)
 * - Any non-critical unhealthy → "degraded" (200)
 * - All healthy → "ok" (200)
 *
 * Checks without a `critical` flag count as critical.
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  const unhealthy = checks.filter((c) => c.status === 'unhealthy');

  if (unhealthy.some((c) => c.critical !== false)) {
    return 'unhealthy';
  }

  return unhealthy.length > 0 ? 'degraded' : 'ok';
};
