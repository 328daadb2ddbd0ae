/**
 * Upload directory health checker
 *
 * Verifies the blob directory exists and is writable.
 */

import { constants } from 'node:fs';
import fs from 'node:fs/promises';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export interface StorageHealthCheckerOptions {
  name: string;
}

export const makeStorageHealthChecker = (
  directory: string,
  options: StorageHealthCheckerOptions
): HealthChecker => {
  const { name } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();

    try {
      await fs.access(directory, constants.W_OK);
      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical: true };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Upload directory not accessible',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    }
  };
};
