/**
 * @fileoverview Status routes.
 * Read-only view of the server status, pending work and recovery state.
 */

import type { FastifyInstance } from 'fastify';
import type { OrchestratorPort } from '../ports/index.js';

export function registerStatusRoutes(app: FastifyInstance, ctx: OrchestratorPort): void {
  app.get('/api/status', async () => {
    return { success: true, data: ctx.getSnapshot() };
  });

  // Liveness probe for service managers; no orchestrator state
  app.get('/api/health', async () => {
    return { success: true, data: { ok: true } };
  });
}
