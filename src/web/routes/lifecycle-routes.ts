/**
 * @fileoverview Audit log routes.
 */

import type { FastifyInstance } from 'fastify';
import { ApiErrorCode, createErrorResponse } from '../../types.js';
import { LifecycleQuerySchema } from '../schemas.js';
import type { AuditPort } from '../ports/index.js';

export function registerLifecycleRoutes(app: FastifyInstance, ctx: AuditPort): void {
  app.get('/api/lifecycle', async (req) => {
    const result = LifecycleQuerySchema.safeParse(req.query);
    if (!result.success) {
      return createErrorResponse(ApiErrorCode.INVALID_INPUT, 'Invalid query parameters');
    }
    const entries = await ctx.queryLifecycle(result.data);
    return { success: true, data: entries };
  });
}
