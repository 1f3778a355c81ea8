/**
 * @fileoverview Scheduled action routes.
 *
 * Requests are queued on the command inbox and applied by the orchestration
 * loop on its next tick, so responses carry the enqueued command rather than
 * the resulting action.
 */

import type { FastifyInstance } from 'fastify';
import { ApiErrorCode, createErrorResponse } from '../../types.js';
import { ActionKindParamSchema, RequesterSchema, ScheduleActionSchema } from '../schemas.js';
import type { OrchestratorPort } from '../ports/index.js';

export function registerActionRoutes(app: FastifyInstance, ctx: OrchestratorPort): void {
  app.get('/api/actions', async () => {
    return { success: true, data: ctx.getSnapshot().actions };
  });

  app.post('/api/actions', async (req) => {
    const result = ScheduleActionSchema.safeParse(req.body);
    if (!result.success) {
      return createErrorResponse(ApiErrorCode.INVALID_INPUT, 'Invalid request body');
    }
    const { kind, delayMinutes, requestedBy, reason } = result.data;
    const command = ctx.commands.schedule(kind, delayMinutes, requestedBy, reason);
    console.log(`[API] Queued ${kind} in ${delayMinutes}m for ${requestedBy}`);
    return { success: true, data: command };
  });

  app.delete('/api/actions/:kind', async (req) => {
    const params = ActionKindParamSchema.safeParse(req.params);
    if (!params.success) {
      return createErrorResponse(ApiErrorCode.INVALID_INPUT, 'Unknown action kind');
    }
    const body = RequesterSchema.safeParse(req.body);
    if (!body.success) {
      return createErrorResponse(ApiErrorCode.INVALID_INPUT, 'Invalid request body');
    }

    const { kind } = params.data;
    if (!ctx.getSnapshot().actions.some((a) => a.kind === kind)) {
      return createErrorResponse(ApiErrorCode.NOT_FOUND, `No pending ${kind} action`);
    }

    const command = ctx.commands.cancel(kind, body.data.requestedBy);
    console.log(`[API] Queued cancel of ${kind} for ${body.data.requestedBy}`);
    return { success: true, data: command };
  });

  app.post('/api/periodic/skip', async (req) => {
    const body = RequesterSchema.safeParse(req.body);
    if (!body.success) {
      return createErrorResponse(ApiErrorCode.INVALID_INPUT, 'Invalid request body');
    }
    if (ctx.getSnapshot().periodic.nextRestartAt === null) {
      return createErrorResponse(ApiErrorCode.NOT_FOUND, 'No periodic restart configured');
    }

    const command = ctx.commands.skipPeriodic(body.data.requestedBy);
    return { success: true, data: command };
  });
}
