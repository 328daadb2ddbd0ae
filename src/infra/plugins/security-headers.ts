/**
 * Security Headers Plugin
 *
 * Configures HTTP security headers using @fastify/helmet.
 * The API serves JSON and audio downloads only, so the CSP denies everything
 * except same-origin resources.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

const CSP_DIRECTIVES = {
  defaultSrc: ["'none'"],
  mediaSrc: ["'self'"],
  imgSrc: ["'self'", 'data:'],
  frameAncestors: ["'none'"],
  formAction: ["'self'"],
};

/** One year, subdomains included */
const HSTS_CONFIG = {
  maxAge: 31536000,
  includeSubDomains: true,
  preload: false,
};

// ─────────────────────────────────────────────────────────────────────────────
// Plugin
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Registers HTTP security headers plugin.
 * Skipped in the test environment.
 */
export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction, isTest } = config.server;

  if (isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  await fastify.register(helmet, {
    contentSecurityPolicy: { directives: CSP_DIRECTIVES },
    dnsPrefetchControl: { allow: false },
    frameguard: { action: 'deny' },
    hsts: isProduction ? HSTS_CONFIG : false,
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    xssFilter: false,
    hidePoweredBy: true,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    // Share links are opened from other sites; downloads must be embeddable there
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  fastify.log.info(
    { environment: isProduction ? 'production' : 'development' },
    'Security headers plugin registered'
  );
}
