/**
 * @fileoverview Warden lifecycle audit types
 */

/** Types of events recorded to the audit log */
export const LIFECYCLE_EVENT_TYPES = [
  'warden_started', // Orchestrator process started
  'warden_stopped', // Orchestrator shutting down
  'status_changed', // Server status transition accepted
  'action_scheduled', // Admin or update checker scheduled an action
  'action_cancelled', // Pending action cancelled before execution
  'action_executed', // Scheduled or periodic action ran (see `outcome`)
  'admin_stop', // Service stopped on purpose by the warden
  'recovery_attempt', // Auto-recovery started the service
  'intentional_stop', // Stop judged deliberate, recovery suspended
  'backup', // Backup finished (see `outcome`)
  'update_check', // Version check ran
] as const;

export type LifecycleEventType = (typeof LIFECYCLE_EVENT_TYPES)[number];

export type LifecycleOutcome = 'success' | 'failure' | 'skipped';

/** A single entry in the audit log */
export interface LifecycleEntry {
  ts: number;
  event: LifecycleEventType;
  serviceName: string;
  kind?: string;
  reason?: string;
  outcome?: LifecycleOutcome;
  extra?: Record<string, unknown>;
}
