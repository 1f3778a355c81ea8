/**
 * @fileoverview Shared types for the server warden.
 *
 * Holds the lifecycle data model (log events, server status, scheduled actions,
 * periodic and recovery state), the collaborator interfaces the orchestration
 * loop consumes, and the API error helpers used by the admin routes.
 *
 * @module types
 */

// ============================================================================
// Lifecycle Data Model
// ============================================================================

/**
 * Lifecycle state of the managed server.
 *
 * `unknown < offline < starting < loading < online` is a total order;
 * `shutting_down` sits outside it and always overrides.
 */
export type ServerStatusKind = 'unknown' | 'offline' | 'starting' | 'loading' | 'online' | 'shutting_down';

/** Kinds a parsed log line can carry (same vocabulary as the status) */
export type LogEventKind = ServerStatusKind;

/** FPS band a performance sample falls into */
export type PerformanceStatus = 'excellent' | 'good' | 'fair' | 'poor' | 'critical';

export interface EntityCounts {
  characters: number;
  zombies: number;
  vehicles: number;
}

/** Performance figures carried by the periodic "Global stats" log line */
export interface PerformanceSample {
  avgFps: number;
  minFps: number;
  maxFps: number;
  frameTimeMs: number;
  playerCount: number;
  entityCounts: EntityCounts;
}

/** A sample classified against the configured FPS thresholds */
export interface PerformanceSnapshot extends PerformanceSample {
  status: PerformanceStatus;
  sampledAt: number;
}

/** FPS lower bounds for each band; anything below `poor` is critical */
export interface PerformanceThresholds {
  excellent: number;
  good: number;
  fair: number;
  poor: number;
}

/** A lifecycle event parsed from one server log line */
export interface LogEvent {
  readonly timestamp: number;
  readonly kind: LogEventKind;
  readonly performance?: PerformanceSample;
  /** Sanitized source line */
  readonly line: string;
}

/** Canonical server status, owned by ServerStatusMachine */
export interface ServerStatus {
  kind: ServerStatusKind;
  /** Short human-readable phase label */
  phase: string;
  /** Timestamp of the last accepted event, null before any */
  lastActivityAt: number | null;
  isOnline: boolean;
  message: string;
  performance: PerformanceSnapshot | null;
  playerCount: number;
  /** Monotonic high-water mark; only an explicit reset lowers it */
  highestKindReached: ServerStatusKind;
}

/** Actions an administrator (or the update checker) can schedule */
export type ScheduledActionKind = 'restart' | 'stop' | 'update';

export interface ScheduledAction {
  id: string;
  kind: ScheduledActionKind;
  createdAt: number;
  scheduledAt: number;
  /** Warning thresholds (minutes) already sent for this instance */
  warningsSent: ReadonlySet<number>;
  requestedBy: string;
  reason?: string;
}

/** JSON-friendly view of a ScheduledAction */
export interface ScheduledActionView {
  id: string;
  kind: ScheduledActionKind;
  createdAt: number;
  scheduledAt: number;
  warningsSent: number[];
  thresholds: number[];
  requestedBy: string;
  reason?: string;
}

export interface PeriodicScheduleState {
  restartTimesOfDay: string[];
  /** Null when no restart times are configured */
  nextRestartAt: number | null;
  warningsSent: number[];
  lastPerformedAt: number | null;
  skipNext: boolean;
  lastBackupAt: number | null;
  lastUpdateCheckAt: number | null;
}

export interface RecoveryState {
  consecutiveAttempts: number;
  lastAttemptAt: number | null;
  cooldownMinutes: number;
  maxAttempts: number;
  intentionallyStopped: boolean;
  /** Set after a fatal service-control failure; cleared on online or admin action */
  blockedReason: string | null;
}

// ============================================================================
// Collaborator Interfaces
// ============================================================================

/** Controls the managed service (systemd unit, Windows service, ...) */
export interface ServiceController {
  isRunning(): Promise<boolean>;
  exists(): Promise<boolean>;
  start(context: string): Promise<boolean>;
  stop(reason: string): Promise<boolean>;
  restart(reason: string): Promise<boolean>;
}

export type NotificationAudience = 'admin' | 'player';

export type NotificationEvent =
  | 'status_changed'
  | 'action_scheduled'
  | 'action_cancelled'
  | 'action_warning'
  | 'action_completed'
  | 'action_failed'
  | 'action_superseded'
  | 'periodic_restart_warning'
  | 'periodic_restart_completed'
  | 'periodic_restart_failed'
  | 'periodic_restart_skipped'
  | 'periodic_restart_covered'
  | 'periodic_skip_armed'
  | 'backup_completed'
  | 'backup_failed'
  | 'update_available'
  | 'update_check_failed'
  | 'recovery_restart'
  | 'recovery_failed'
  | 'recovery_paused'
  | 'intentional_stop_detected'
  | 'startup_timeout'
  | 'service_missing'
  | 'command_rejected';

export type NotificationPayload = Record<string, string | number | boolean | null | undefined>;

/** Delivers notifications; the loop never waits on delivery */
export interface Notifier {
  send(audience: NotificationAudience, event: NotificationEvent, payload: NotificationPayload): Promise<void>;
}

/** Admin requests delivered through a CommandSource */
export type AdminCommand =
  | { seq: number; op: 'schedule'; kind: ScheduledActionKind; delayMinutes: number; requestedBy: string; reason?: string }
  | { seq: number; op: 'cancel'; kind: ScheduledActionKind; requestedBy: string }
  | { seq: number; op: 'skip_periodic'; requestedBy: string };

/** Polled for admin requests newer than the caller's cursor */
export interface CommandSource {
  poll(afterSeq: number): Promise<AdminCommand[]>;
}

export interface VersionCheckResult {
  installedBuild: string | null;
  latestBuild: string | null;
  available: boolean;
}

export interface OperationResult {
  success: boolean;
  error?: string;
}

export interface VersionService {
  checkAvailable(): Promise<VersionCheckResult>;
  update(): Promise<OperationResult>;
}

export interface BackupResult extends OperationResult {
  path?: string;
}

export interface BackupService {
  create(sourcePath: string): Promise<BackupResult>;
}

/** Decides whether a stop of the service looks deliberate */
export interface IntentionalStopEvidence {
  assess(serviceName: string, windowMinutes: number): Promise<boolean>;
}

/** Source of new server log lines */
export interface LogSource {
  readNewLines(): Promise<string[]>;
  readTail(maxLines: number): Promise<string[]>;
  seekToEnd(): Promise<void>;
}

// ============================================================================
// Resource Cleanup
// ============================================================================

export interface Disposable {
  dispose(): void;
  readonly isDisposed: boolean;
}

// ============================================================================
// API Responses
// ============================================================================

export enum ApiErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_INPUT = 'INVALID_INPUT',
  UNAUTHORIZED = 'UNAUTHORIZED',
  RATE_LIMITED = 'RATE_LIMITED',
  OPERATION_FAILED = 'OPERATION_FAILED',
}

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  errorCode?: ApiErrorCode;
}

export function createErrorResponse(code: ApiErrorCode, error: string): ApiResponse<never> {
  return { success: false, error, errorCode: code };
}

/**
 * Extract a readable message from an unknown thrown value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
