/**
 * CORS plugin for Fastify
 * Browsers may only call the API from configured origins (plus localhost in development)
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Builds the allow-list from ALLOWED_ORIGINS (comma-separated) and CLIENT_BASE_URL
 */
export function getAllowedOrigins(config: AppConfig): Set<string> {
  const origins = new Set<string>();
  const { allowedOrigins, clientBaseUrl } = config.cors;

  if (allowedOrigins !== undefined) {
    for (const origin of allowedOrigins.split(',')) {
      const trimmed = origin.trim();
      if (trimmed !== '') {
        origins.add(trimmed);
      }
    }
  }

  if (clientBaseUrl !== undefined && clientBaseUrl.trim() !== '') {
    origins.add(clientBaseUrl.trim());
  }

  return origins;
}

function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOrigins(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server and same-origin requests carry no Origin header
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(Object.assign(new Error('CORS origin not allowed'), { statusCode: 403 }), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'x-requested-with', 'accept'],
    // Browsers need these to show a download's size and file name
    exposedHeaders: ['content-length', 'content-disposition'],
  });
}
