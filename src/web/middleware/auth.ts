/**
 * @fileoverview Authentication and security middleware for the admin API.
 *
 * - Bearer-token auth, active only when a token is configured
 * - Rate limiting of failed attempts per client IP
 * - Security headers on every response
 */

import type { FastifyInstance } from 'fastify';
import { timingSafeEqual } from 'node:crypto';
import { ApiErrorCode, createErrorResponse } from '../../types.js';
import { ExpiringCounter } from '../../utils/index.js';

// Max failed auth attempts per IP before rate-limiting
const AUTH_FAILURE_MAX = 10;
// Failed auth attempt tracking window (15 minutes)
const AUTH_FAILURE_WINDOW_MS = 15 * 60 * 1000;

/** State returned from registerAuthMiddleware for disposal on server stop */
export interface AuthState {
  authFailures: ExpiringCounter<string> | null;
}

export interface AuthOptions {
  token?: string;
  clock?: () => number;
}

function tokensMatch(header: string | undefined, expected: string): boolean {
  const provided = Buffer.from(header ?? '');
  const wanted = Buffer.from(`Bearer ${expected}`);
  return provided.length === wanted.length && timingSafeEqual(provided, wanted);
}

/**
 * Require `Authorization: Bearer <token>` on every request.
 * Without a configured token the API is open (bound to localhost by default).
 */
export function registerAuthMiddleware(app: FastifyInstance, options: AuthOptions): AuthState {
  const state: AuthState = { authFailures: null };
  const token = options.token;
  if (!token) return state;

  const authFailures = new ExpiringCounter<string>({ windowMs: AUTH_FAILURE_WINDOW_MS, clock: options.clock });
  state.authFailures = authFailures;

  app.addHook('onRequest', (req, reply, done) => {
    const clientIp = req.ip;

    if (authFailures.get(clientIp) >= AUTH_FAILURE_MAX) {
      reply.code(429).send(createErrorResponse(ApiErrorCode.RATE_LIMITED, 'Too many failed attempts, try again later'));
      return;
    }

    if (tokensMatch(req.headers.authorization, token)) {
      authFailures.reset(clientIp);
      done();
      return;
    }

    authFailures.increment(clientIp);
    reply.header('WWW-Authenticate', 'Bearer realm="warden"');
    reply.code(401).send(createErrorResponse(ApiErrorCode.UNAUTHORIZED, 'Unauthorized'));
  });

  return state;
}

/**
 * Security headers on every response. The API serves JSON only.
 */
export function registerSecurityHeaders(app: FastifyInstance): void {
  app.addHook('onRequest', (_req, reply, done) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    reply.header('Cache-Control', 'no-store');
    done();
  });
}
