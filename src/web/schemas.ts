/**
 * @fileoverview Zod validation schemas for API routes
 *
 * @module web/schemas
 */

import { z } from 'zod';
import { LIFECYCLE_EVENT_TYPES } from '../types/lifecycle.js';

export const ActionKindSchema = z.enum(['restart', 'stop', 'update']);

/** Who asked, shown in notifications and the audit log */
const requestedBySchema = z.string().min(1).max(64).default('api');

/** POST /api/actions */
export const ScheduleActionSchema = z.object({
  kind: ActionKindSchema,
  delayMinutes: z.number().nonnegative().max(7 * 24 * 60),
  requestedBy: requestedBySchema,
  reason: z.string().max(500).optional(),
});

/** DELETE /api/actions/:kind */
export const ActionKindParamSchema = z.object({
  kind: ActionKindSchema,
});

/** POST /api/periodic/skip and DELETE /api/actions/:kind bodies */
export const RequesterSchema = z
  .object({
    requestedBy: requestedBySchema,
  })
  .default({});

/** GET /api/lifecycle query string */
export const LifecycleQuerySchema = z.object({
  event: z.enum(LIFECYCLE_EVENT_TYPES).optional(),
  since: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});
