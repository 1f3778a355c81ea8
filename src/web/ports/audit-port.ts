/**
 * @fileoverview Audit port: read access to the lifecycle log.
 */

import type { LifecycleQuery } from '../../warden-lifecycle-log.js';
import type { LifecycleEntry } from '../../types/lifecycle.js';

export interface AuditPort {
  queryLifecycle(query: LifecycleQuery): Promise<LifecycleEntry[]>;
}
