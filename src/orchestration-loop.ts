/**
 * @fileoverview OrchestrationLoop - the warden's single cooperative polling
 * cycle.
 *
 * Every tick runs the same steps in the same order:
 *
 * 1. Refresh the controller's running flag
 * 2. Fold new server log lines into the status machine
 * 3. Register admin commands received since the last cursor
 * 4. Send due action warnings and execute at most one due action
 * 5. Advance the periodic restart (warn, execute, skip, or covered)
 * 6. Evaluate auto-recovery, unless an action already ran
 * 7. Run a due backup and update check, unless an action already ran
 * 8. Pick the sleep before the next tick
 *
 * `actionTakenThisTick` is the only mutual exclusion: the managed process is
 * never targeted by two operations in one tick. Every external call is bounded
 * by withTimeout. Notifications go through the dispatcher queue and never
 * block a tick.
 *
 * @module orchestration-loop
 */

import { AutoRecoveryController } from './auto-recovery-controller.js';
import {
  MIN_LOOP_SLEEP_MS,
  PERIODIC_WARNING_TIERS,
  RECONCILE_TAIL_LINES,
  VERSION_CHECK_TIMEOUT_MS,
} from './config/orchestrator-timing.js';
import type { WardenConfig } from './config/warden-config.js';
import { ServiceControlError } from './errors.js';
import { parseLogLines } from './log-event-parser.js';
import { NotificationDispatcher } from './notifier.js';
import { PeriodicScheduler } from './periodic-scheduler.js';
import { ScheduledActionRegistry } from './scheduled-action-registry.js';
import { ServerStatusMachine } from './server-status-machine.js';
import type { StatusTransition } from './server-status-machine.js';
import { getErrorMessage } from './types.js';
import type {
  AdminCommand,
  BackupResult,
  BackupService,
  CommandSource,
  IntentionalStopEvidence,
  LogSource,
  Notifier,
  OperationResult,
  PeriodicScheduleState,
  RecoveryState,
  ScheduledAction,
  ScheduledActionKind,
  ScheduledActionView,
  ServerStatus,
  ServerStatusKind,
  ServiceController,
  VersionCheckResult,
  VersionService,
} from './types.js';
import type { LifecycleOutcome } from './types/lifecycle.js';
import { withTimeout } from './utils/async-timeout.js';
import { CleanupManager } from './utils/cleanup-manager.js';
import type { AuditLogWriter } from './warden-lifecycle-log.js';

const MINUTE_MS = 60_000;

/** Fast polling starts when an action or periodic restart is this close */
const FAST_POLL_HORIZON_MS = Math.max(...PERIODIC_WARNING_TIERS) * MINUTE_MS;

/** Transitions players hear about; the rest are admin-only */
const PLAYER_VISIBLE_KINDS: ReadonlySet<ServerStatusKind> = new Set<ServerStatusKind>([
  'starting',
  'online',
  'offline',
]);

const debugEnabled = process.env.WARDEN_DEBUG === '1';

// ============================================================================
// Context
// ============================================================================

/** The warden's collaborators, injected so tests can use in-process fakes */
export interface OrchestratorCollaborators {
  controller: ServiceController;
  logSource: LogSource;
  commands: CommandSource;
  notifiers: Notifier[];
  versionService: VersionService;
  backupService: BackupService;
  stopEvidence: IntentionalStopEvidence;
  auditLog: AuditLogWriter;
  clock?: () => number;
}

export interface StartupWatch {
  since: number;
  context: string;
}

/**
 * All orchestrator state. Created once per warden process.
 */
export interface OrchestratorContext {
  readonly config: WardenConfig;
  readonly clock: () => number;
  readonly startedAt: number;
  readonly controller: ServiceController;
  readonly logSource: LogSource;
  readonly commands: CommandSource;
  readonly versionService: VersionService;
  readonly backupService: BackupService;
  readonly auditLog: AuditLogWriter;
  readonly notifications: NotificationDispatcher;
  readonly status: ServerStatusMachine;
  readonly actions: ScheduledActionRegistry;
  readonly periodic: PeriodicScheduler;
  readonly recovery: AutoRecoveryController;
  /** Last known controller flag; null until the first successful query */
  controllerRunning: boolean | null;
  /** Highest command sequence handled */
  commandCursor: number;
  startupWatch: StartupWatch | null;
  tickCount: number;
}

export function createOrchestratorContext(config: WardenConfig, deps: OrchestratorCollaborators): OrchestratorContext {
  const clock = deps.clock ?? Date.now;
  const startedAt = clock();
  return {
    config,
    clock,
    startedAt,
    controller: deps.controller,
    logSource: deps.logSource,
    commands: deps.commands,
    versionService: deps.versionService,
    backupService: deps.backupService,
    auditLog: deps.auditLog,
    notifications: new NotificationDispatcher(deps.notifiers),
    status: new ServerStatusMachine({ thresholds: config.performanceThresholds, startedAt }),
    actions: new ScheduledActionRegistry(),
    periodic: new PeriodicScheduler({
      restartTimes: config.restartTimes,
      backupIntervalMinutes: config.backupIntervalMinutes,
      updateCheckIntervalMinutes: config.updateCheckIntervalMinutes,
      startedAt,
    }),
    recovery: new AutoRecoveryController({
      serviceName: config.serviceName,
      cooldownMinutes: config.autoRestartCooldownMinutes,
      maxAttempts: config.maxConsecutiveRestartAttempts,
      intentionalStopWindowMinutes: config.intentionalStopWindowMinutes,
      evidence: deps.stopEvidence,
      evidenceTimeoutMs: config.externalCallTimeoutMs,
    }),
    controllerRunning: null,
    commandCursor: 0,
    startupWatch: null,
    tickCount: 0,
  };
}

/** Read-only view served by the admin API */
export interface OrchestratorSnapshot {
  serviceName: string;
  startedAt: number;
  controllerRunning: boolean | null;
  status: ServerStatus;
  actions: ScheduledActionView[];
  periodic: PeriodicScheduleState;
  recovery: RecoveryState;
  startupWatch: StartupWatch | null;
  tickCount: number;
}

export function snapshotContext(ctx: OrchestratorContext): OrchestratorSnapshot {
  return {
    serviceName: ctx.config.serviceName,
    startedAt: ctx.startedAt,
    controllerRunning: ctx.controllerRunning,
    status: ctx.status.current,
    actions: ctx.actions.view(),
    periodic: ctx.periodic.getState(),
    recovery: ctx.recovery.getState(),
    startupWatch: ctx.startupWatch ? { ...ctx.startupWatch } : null,
    tickCount: ctx.tickCount,
  };
}

// ============================================================================
// Loop
// ============================================================================

/** What ran in a tick */
export type ExecutedOperation = ScheduledActionKind | 'periodic_restart' | 'recovery_restart';

export interface TickReport {
  actionTakenThisTick: boolean;
  executed: ExecutedOperation | null;
  sleepMs: number;
}

interface TickState {
  now: number;
  runningKnown: boolean;
  actionTakenThisTick: boolean;
  executed: ExecutedOperation | null;
}

export class OrchestrationLoop {
  private readonly ctx: OrchestratorContext;
  private readonly cleanup = new CleanupManager(debugEnabled);
  private loopPromise: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private initialized = false;

  constructor(ctx: OrchestratorContext) {
    this.ctx = ctx;
    ctx.status.on('highWaterReset', (reason: string) => this.debug(`Status high-water mark reset (${reason})`));
  }

  get context(): OrchestratorContext {
    return this.ctx;
  }

  get isRunning(): boolean {
    return this.loopPromise !== null && !this.cleanup.isStopped;
  }

  /**
   * Seed the status from the controller and the log tail, then start ticking.
   */
  async start(): Promise<void> {
    if (this.loopPromise) return;
    await this.initialize();
    this.loopPromise = this.runLoop();
  }

  /**
   * Stop after the current tick; an in-flight action runs to completion.
   */
  async stop(): Promise<void> {
    if (this.cleanup.isStopped) return;
    this.cleanup.dispose();
    this.wake?.();
    if (this.loopPromise) {
      await this.loopPromise;
    }
    this.ctx.auditLog.log({ event: 'warden_stopped', serviceName: this.ctx.config.serviceName });
    await this.ctx.notifications.flush();
    console.log('[OrchestrationLoop] Stopped');
  }

  /**
   * Startup reconciliation. Runs once, before the first tick.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;

    const { ctx } = this;
    const now = ctx.clock();

    try {
      if (!(await this.call(ctx.controller.exists(), 'exists'))) {
        const reason = `service ${ctx.config.serviceName} is not installed`;
        ctx.recovery.block(reason);
        ctx.notifications.notify('admin', 'service_missing', { serviceName: ctx.config.serviceName });
        console.error(`[OrchestrationLoop] ${reason}`);
      }
    } catch (err) {
      console.warn(`[OrchestrationLoop] Could not check that the service exists: ${getErrorMessage(err)}`);
    }

    let running: boolean | null = null;
    try {
      running = await this.call(ctx.controller.isRunning(), 'isRunning');
    } catch (err) {
      console.warn(`[OrchestrationLoop] Initial running check failed: ${getErrorMessage(err)}`);
    }

    let tail: string[] = [];
    try {
      await this.call(ctx.logSource.seekToEnd(), 'seekToEnd');
      tail = await this.call(ctx.logSource.readTail(RECONCILE_TAIL_LINES), 'readTail');
    } catch (err) {
      console.warn(`[OrchestrationLoop] Could not read the server log tail: ${getErrorMessage(err)}`);
    }

    // An unknown flag is not proof the process is dead, so let the log decide
    const reconciled = ctx.status.reconcile(tail, running ?? true, now);
    ctx.controllerRunning = running;

    ctx.auditLog.log({
      event: 'warden_started',
      serviceName: ctx.config.serviceName,
      kind: reconciled.current.kind,
      extra: { controllerRunning: running },
    });
    console.log(
      `[OrchestrationLoop] Watching ${ctx.config.serviceName}: status ${reconciled.current.kind}, ` +
        `running ${running === null ? 'unknown' : running}`
    );
  }

  /**
   * Run one tick. Exposed for tests and for the loop itself.
   */
  async tick(): Promise<TickReport> {
    const { ctx } = this;
    ctx.tickCount++;
    const tick: TickState = { now: ctx.clock(), runningKnown: false, actionTakenThisTick: false, executed: null };

    await this.refreshRunning(tick);
    await this.readLog(tick);
    await this.pollCommands(tick);
    await this.runScheduledActions(tick);
    await this.runPeriodicRestart(tick);
    if (!tick.actionTakenThisTick && tick.runningKnown) {
      await this.evaluateRecovery(tick);
    }
    if (!tick.actionTakenThisTick) {
      await this.runMaintenance(tick);
    }
    this.checkStartupWatch(ctx.clock());

    const sleepMs = this.computeSleepMs(ctx.clock());
    this.debug(`tick ${ctx.tickCount}: status=${ctx.status.kind} executed=${tick.executed ?? 'none'} sleep=${sleepMs}ms`);
    return { actionTakenThisTick: tick.actionTakenThisTick, executed: tick.executed, sleepMs };
  }

  /**
   * Sleep before the next tick: short while something is imminent.
   */
  computeSleepMs(now: number): number {
    const { ctx } = this;
    const horizon = now + FAST_POLL_HORIZON_MS;
    const nextAction = ctx.actions.nextDueAt();
    const nextRestart = ctx.periodic.nextRestart;
    const imminent =
      ctx.startupWatch !== null ||
      (nextAction !== null && nextAction <= horizon) ||
      (nextRestart !== null && nextRestart <= horizon);
    return Math.max(MIN_LOOP_SLEEP_MS, imminent ? ctx.config.logCheckIntervalMs : ctx.config.statusCheckIntervalMs);
  }

  // ========== Loop plumbing ==========

  private async runLoop(): Promise<void> {
    while (!this.cleanup.isStopped) {
      let sleepMs = this.ctx.config.statusCheckIntervalMs;
      try {
        sleepMs = (await this.tick()).sleepMs;
      } catch (err) {
        console.error(`[OrchestrationLoop] Tick ${this.ctx.tickCount} failed: ${getErrorMessage(err)}`);
      }
      if (this.cleanup.isStopped) break;
      await this.sleep(sleepMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake = resolve;
      this.cleanup.setTimeout(
        () => {
          this.wake = null;
          resolve();
        },
        ms,
        { description: 'loop sleep' }
      );
    });
  }

  private call<T>(promise: Promise<T>, operation: string, timeoutMs = this.ctx.config.externalCallTimeoutMs): Promise<T> {
    return withTimeout(promise, timeoutMs, operation);
  }

  private debug(message: string): void {
    if (debugEnabled) {
      console.log(`[OrchestrationLoop] ${message}`);
    }
  }

  // ========== Step 1: controller ==========

  private async refreshRunning(tick: TickState): Promise<void> {
    const { ctx } = this;
    let running: boolean;
    try {
      running = await this.call(ctx.controller.isRunning(), 'isRunning');
    } catch (err) {
      console.warn(`[OrchestrationLoop] Running check failed, keeping last value: ${getErrorMessage(err)}`);
      if (this.noteServiceError(err)) {
        ctx.notifications.notify('admin', 'recovery_paused', { reason: getErrorMessage(err) });
      }
      return;
    }

    const previous = ctx.controllerRunning;
    ctx.controllerRunning = running;
    tick.runningKnown = true;

    if (previous === false && running) {
      console.log('[OrchestrationLoop] New server process detected');
      ctx.status.resetHighWater('new process detected');
    } else if (!running && ctx.status.kind !== 'offline') {
      // A dead process is offline whatever the log last claimed
      console.log('[OrchestrationLoop] Controller reports the server stopped');
      this.handleTransition(ctx.status.markOfflineFromController(tick.now));
    }
  }

  // ========== Step 2: log ==========

  private async readLog(tick: TickState): Promise<void> {
    let lines: string[];
    try {
      lines = await this.call(this.ctx.logSource.readNewLines(), 'readNewLines');
    } catch (err) {
      console.warn(`[OrchestrationLoop] Reading the server log failed: ${getErrorMessage(err)}`);
      return;
    }
    for (const event of parseLogLines(lines, tick.now)) {
      this.handleTransition(this.ctx.status.apply(event, tick.now));
    }
  }

  private handleTransition(transition: StatusTransition): void {
    if (!transition.accepted || !transition.changed) return;
    const { ctx } = this;
    const { previous, current } = transition;

    ctx.auditLog.log({
      event: 'status_changed',
      serviceName: ctx.config.serviceName,
      kind: current.kind,
      extra: { from: previous.kind },
    });

    if (current.kind === 'online') {
      ctx.recovery.onOnline();
      ctx.startupWatch = null;
    } else if (current.kind === 'offline') {
      // Process exit closes the lifecycle; the next start is a new one
      ctx.status.resetHighWater('process exited');
    }

    if (!transition.notify) return;
    const payload = { from: previous.kind, to: current.kind, message: current.message };
    ctx.notifications.notify('admin', 'status_changed', payload);
    if (PLAYER_VISIBLE_KINDS.has(current.kind)) {
      ctx.notifications.notify('player', 'status_changed', payload);
    }
  }

  // ========== Step 3: commands ==========

  private async pollCommands(tick: TickState): Promise<void> {
    const { ctx } = this;
    let commands: AdminCommand[];
    try {
      commands = await this.call(ctx.commands.poll(ctx.commandCursor), 'poll commands');
    } catch (err) {
      console.warn(`[OrchestrationLoop] Command poll failed: ${getErrorMessage(err)}`);
      return;
    }

    for (const command of [...commands].sort((a, b) => a.seq - b.seq)) {
      if (command.seq <= ctx.commandCursor) continue;
      ctx.commandCursor = command.seq;
      this.applyCommand(command, tick.now);
    }
  }

  private applyCommand(command: AdminCommand, now: number): void {
    const { ctx } = this;
    const serviceName = ctx.config.serviceName;

    switch (command.op) {
      case 'schedule': {
        const replaced = ctx.actions.get(command.kind);
        let action: ScheduledAction;
        try {
          action = ctx.actions.schedule(command.kind, command.delayMinutes, now, command.requestedBy, command.reason);
        } catch (err) {
          ctx.notifications.notify('admin', 'command_rejected', { seq: command.seq, error: getErrorMessage(err) });
          return;
        }
        console.log(
          `[OrchestrationLoop] ${action.kind} scheduled in ${command.delayMinutes} min by ${action.requestedBy}` +
            (replaced ? ' (replacing the pending one)' : '')
        );
        ctx.auditLog.log({
          event: 'action_scheduled',
          serviceName,
          kind: action.kind,
          reason: action.reason,
          extra: { scheduledAt: action.scheduledAt, requestedBy: action.requestedBy, replaced: replaced?.id ?? null },
        });
        ctx.notifications.notify('admin', 'action_scheduled', {
          kind: action.kind,
          delayMinutes: command.delayMinutes,
          requestedBy: action.requestedBy,
          replaced: replaced !== null,
        });
        return;
      }
      case 'cancel': {
        const cancelled = ctx.actions.cancel(command.kind);
        if (!cancelled) {
          ctx.notifications.notify('admin', 'command_rejected', {
            seq: command.seq,
            error: `no pending ${command.kind} to cancel`,
          });
          return;
        }
        ctx.auditLog.log({
          event: 'action_cancelled',
          serviceName,
          kind: cancelled.kind,
          extra: { requestedBy: command.requestedBy },
        });
        ctx.notifications.notify('admin', 'action_cancelled', { kind: cancelled.kind, requestedBy: command.requestedBy });
        return;
      }
      case 'skip_periodic': {
        if (!ctx.periodic.skipNext()) {
          ctx.notifications.notify('admin', 'command_rejected', {
            seq: command.seq,
            error: 'no periodic restart is configured',
          });
          return;
        }
        ctx.notifications.notify('admin', 'periodic_skip_armed', {
          restartAt: ctx.periodic.nextRestart,
          requestedBy: command.requestedBy,
        });
        return;
      }
    }
  }

  // ========== Step 4: scheduled actions ==========

  private async runScheduledActions(tick: TickState): Promise<void> {
    const { ctx } = this;
    const { warnings, due } = ctx.actions.tick(tick.now);

    for (const { action, minutes } of warnings) {
      ctx.notifications.notify('player', 'action_warning', { kind: action.kind, minutes });
    }

    const [action, ...superseded] = due;
    if (!action) return;

    for (const dropped of superseded) {
      ctx.auditLog.log({
        event: 'action_executed',
        serviceName: ctx.config.serviceName,
        kind: dropped.kind,
        outcome: 'skipped',
        reason: `superseded by ${action.kind}`,
      });
      ctx.notifications.notify('admin', 'action_superseded', { kind: dropped.kind, by: action.kind });
    }

    tick.actionTakenThisTick = true;
    tick.executed = action.kind;
    const reason = action.reason ?? `${action.kind} requested by ${action.requestedBy}`;
    const result = await this.executeAction(action.kind, reason, tick.now);
    this.recordExecution(action.kind, reason, result);

    if (result.success) {
      ctx.notifications.notify('admin', 'action_completed', { kind: action.kind });
    } else {
      ctx.notifications.notify('admin', 'action_failed', { kind: action.kind, error: result.error });
    }
  }

  /**
   * Run a restart, stop or update against the controller.
   * Never throws; failures come back in the result.
   */
  private async executeAction(kind: ScheduledActionKind, reason: string, now: number): Promise<OperationResult> {
    const { ctx } = this;
    console.log(`[OrchestrationLoop] Executing ${kind}: ${reason}`);
    try {
      switch (kind) {
        case 'restart': {
          ctx.recovery.clearIntentionalStop();
          ctx.status.resetHighWater('restart');
          const ok = await this.call(ctx.controller.restart(reason), 'restart');
          if (!ok) return { success: false, error: 'controller reported restart failure' };
          ctx.startupWatch = { since: now, context: 'restart' };
          return { success: true };
        }
        case 'stop': {
          const ok = await this.call(ctx.controller.stop(reason), 'stop');
          if (!ok) return { success: false, error: 'controller reported stop failure' };
          ctx.recovery.markIntentionalStop();
          ctx.startupWatch = null;
          ctx.auditLog.log({ event: 'admin_stop', serviceName: ctx.config.serviceName, reason });
          return { success: true };
        }
        case 'update':
          ctx.recovery.clearIntentionalStop();
          return await this.performUpdate(reason, now);
      }
    } catch (err) {
      this.noteServiceError(err);
      return { success: false, error: getErrorMessage(err) };
    }
  }

  /**
   * Stop, update, start. The start is attempted whatever the update result.
   */
  private async performUpdate(reason: string, now: number): Promise<OperationResult> {
    const { ctx } = this;
    const stopped = await this.call(ctx.controller.stop(`update: ${reason}`), 'stop');
    if (!stopped) return { success: false, error: 'controller reported stop failure' };

    let update: OperationResult;
    try {
      update = await this.call(ctx.versionService.update(), 'update', ctx.config.updateTimeoutMinutes * MINUTE_MS);
    } catch (err) {
      update = { success: false, error: getErrorMessage(err) };
    }
    if (!update.success) {
      console.error(`[OrchestrationLoop] Update failed: ${update.error ?? 'unknown error'}`);
    }

    ctx.status.resetHighWater('update');
    let started: boolean;
    try {
      started = await this.call(ctx.controller.start('after update'), 'start');
    } catch (err) {
      this.noteServiceError(err);
      const startError = getErrorMessage(err);
      return { success: false, error: update.success ? startError : `${update.error}; ${startError}` };
    }
    if (started) {
      ctx.startupWatch = { since: now, context: 'update' };
    }

    if (!update.success) {
      return { success: false, error: `${update.error ?? 'update failed'} (server restarted on the installed build)` };
    }
    return started ? { success: true } : { success: false, error: 'controller reported start failure' };
  }

  private recordExecution(kind: string, reason: string, result: OperationResult): void {
    const outcome: LifecycleOutcome = result.success ? 'success' : 'failure';
    this.ctx.auditLog.log({
      event: 'action_executed',
      serviceName: this.ctx.config.serviceName,
      kind,
      reason: result.error ? `${reason}: ${result.error}` : reason,
      outcome,
    });
  }

  /**
   * Block auto-recovery on fatal controller errors.
   * @returns True when this error newly blocked recovery
   */
  private noteServiceError(err: unknown): boolean {
    if (!(err instanceof ServiceControlError) || !err.isFatal) return false;
    const alreadyBlocked = this.ctx.recovery.getState().blockedReason !== null;
    this.ctx.recovery.block(err.message);
    console.error(`[OrchestrationLoop] Fatal service error, auto-recovery blocked: ${err.message}`);
    return !alreadyBlocked;
  }

  // ========== Step 5: periodic restart ==========

  private async runPeriodicRestart(tick: TickState): Promise<void> {
    const { ctx } = this;
    const outcome = ctx.periodic.tick(tick.now);
    const serviceName = ctx.config.serviceName;

    switch (outcome.type) {
      case 'idle':
        return;
      case 'warning':
        ctx.notifications.notify('player', 'periodic_restart_warning', {
          minutes: outcome.minutes,
          restartAt: outcome.restartAt,
        });
        return;
      case 'skipped':
        ctx.auditLog.log({ event: 'action_executed', serviceName, kind: 'periodic_restart', outcome: 'skipped', reason: 'skip requested' });
        ctx.notifications.notify('admin', 'periodic_restart_skipped', { restartAt: outcome.restartAt });
        return;
      case 'execute':
        break;
    }

    if (tick.actionTakenThisTick) {
      ctx.auditLog.log({
        event: 'action_executed',
        serviceName,
        kind: 'periodic_restart',
        outcome: 'skipped',
        reason: `covered by ${tick.executed ?? 'another action'}`,
      });
      ctx.notifications.notify('admin', 'periodic_restart_covered', {
        restartAt: outcome.restartAt,
        by: tick.executed,
      });
      return;
    }

    if (ctx.controllerRunning === false && ctx.recovery.getState().intentionallyStopped) {
      ctx.auditLog.log({
        event: 'action_executed',
        serviceName,
        kind: 'periodic_restart',
        outcome: 'skipped',
        reason: 'server stopped on purpose',
      });
      ctx.notifications.notify('admin', 'periodic_restart_skipped', {
        restartAt: outcome.restartAt,
        reason: 'server stopped on purpose',
      });
      return;
    }

    tick.actionTakenThisTick = true;
    tick.executed = 'periodic_restart';
    await this.runBackup(tick.now);
    const result = await this.executeAction('restart', 'periodic restart', tick.now);
    this.recordExecution('periodic_restart', 'periodic restart', result);
    if (result.success) {
      ctx.notifications.notify('admin', 'periodic_restart_completed', { restartAt: outcome.restartAt });
    } else {
      ctx.notifications.notify('admin', 'periodic_restart_failed', { restartAt: outcome.restartAt, error: result.error });
    }
  }

  // ========== Step 6: recovery ==========

  private async evaluateRecovery(tick: TickState): Promise<void> {
    const { ctx } = this;
    const running = ctx.controllerRunning;
    if (running === null) return;

    const decision = await ctx.recovery.tick(tick.now, running, ctx.status.current);
    const serviceName = ctx.config.serviceName;

    if (decision.reason === 'intentional_stop_detected') {
      ctx.auditLog.log({ event: 'intentional_stop', serviceName, reason: 'explicit stop evidence' });
      ctx.notifications.notify('admin', 'intentional_stop_detected', { serviceName });
      return;
    }
    if (decision.reason === 'exhausted' && decision.alert) {
      const state = ctx.recovery.getState();
      ctx.notifications.notify('admin', 'recovery_paused', {
        reason: 'restart attempts exhausted',
        attempts: state.consecutiveAttempts,
      });
      return;
    }
    if (decision.action !== 'restart') return;

    tick.actionTakenThisTick = true;
    tick.executed = 'recovery_restart';
    const { consecutiveAttempts, maxAttempts } = ctx.recovery.getState();
    console.log(`[OrchestrationLoop] Server down, recovery attempt ${consecutiveAttempts}/${maxAttempts}`);

    ctx.status.resetHighWater('recovery restart');
    let result: OperationResult;
    try {
      const ok = await this.call(ctx.controller.start(`auto-recovery attempt ${consecutiveAttempts}`), 'start');
      result = ok ? { success: true } : { success: false, error: 'controller reported start failure' };
    } catch (err) {
      this.noteServiceError(err);
      result = { success: false, error: getErrorMessage(err) };
    }

    ctx.auditLog.log({
      event: 'recovery_attempt',
      serviceName,
      outcome: result.success ? 'success' : 'failure',
      reason: result.error,
      extra: { attempt: consecutiveAttempts, maxAttempts },
    });
    if (result.success) {
      ctx.startupWatch = { since: tick.now, context: 'recovery' };
      ctx.notifications.notify('admin', 'recovery_restart', { attempt: consecutiveAttempts, maxAttempts });
    } else {
      ctx.notifications.notify('admin', 'recovery_failed', {
        attempt: consecutiveAttempts,
        maxAttempts,
        error: result.error,
      });
    }
  }

  // ========== Step 7: maintenance ==========

  private async runMaintenance(tick: TickState): Promise<void> {
    if (this.ctx.periodic.isBackupDue(tick.now)) {
      await this.runBackup(tick.now);
    }
    if (this.ctx.periodic.isUpdateCheckDue(tick.now)) {
      await this.checkForUpdate(tick.now);
    }
  }

  private async runBackup(now: number): Promise<BackupResult> {
    const { ctx } = this;
    let result: BackupResult;
    try {
      result = await this.call(
        ctx.backupService.create(ctx.config.serverDataPath),
        'backup',
        ctx.config.backupTimeoutMinutes * MINUTE_MS
      );
    } catch (err) {
      result = { success: false, error: getErrorMessage(err) };
    }
    ctx.periodic.markBackupPerformed(now);

    ctx.auditLog.log({
      event: 'backup',
      serviceName: ctx.config.serviceName,
      outcome: result.success ? 'success' : 'failure',
      reason: result.error,
      extra: result.path ? { path: result.path } : undefined,
    });
    if (result.success) {
      ctx.notifications.notify('admin', 'backup_completed', { path: result.path });
    } else {
      console.error(`[OrchestrationLoop] Backup failed: ${result.error ?? 'unknown error'}`);
      ctx.notifications.notify('admin', 'backup_failed', { error: result.error });
    }
    return result;
  }

  private async checkForUpdate(now: number): Promise<void> {
    const { ctx } = this;
    const serviceName = ctx.config.serviceName;
    ctx.periodic.markUpdateChecked(now);

    let check: VersionCheckResult;
    try {
      check = await this.call(ctx.versionService.checkAvailable(), 'version check', VERSION_CHECK_TIMEOUT_MS);
    } catch (err) {
      const error = getErrorMessage(err);
      console.warn(`[OrchestrationLoop] Update check failed: ${error}`);
      ctx.auditLog.log({ event: 'update_check', serviceName, outcome: 'failure', reason: error });
      ctx.notifications.notify('admin', 'update_check_failed', { error });
      return;
    }

    ctx.auditLog.log({
      event: 'update_check',
      serviceName,
      outcome: 'success',
      extra: { installedBuild: check.installedBuild, latestBuild: check.latestBuild, available: check.available },
    });
    if (!check.available || ctx.actions.has('update')) return;

    const status = ctx.status.current;
    const delayMinutes = status.isOnline && status.playerCount > 0 ? ctx.config.updateDelayMinutes : 0;
    const action = ctx.actions.schedule(
      'update',
      delayMinutes,
      now,
      'update-checker',
      `build ${check.installedBuild ?? '?'} -> ${check.latestBuild ?? '?'}`
    );
    ctx.auditLog.log({
      event: 'action_scheduled',
      serviceName,
      kind: 'update',
      reason: action.reason,
      extra: { scheduledAt: action.scheduledAt, requestedBy: action.requestedBy },
    });
    ctx.notifications.notify('admin', 'update_available', {
      installedBuild: check.installedBuild,
      latestBuild: check.latestBuild,
      delayMinutes,
    });
  }

  // ========== Startup watch ==========

  private checkStartupWatch(now: number): void {
    const { ctx } = this;
    const watch = ctx.startupWatch;
    if (!watch) return;
    if (ctx.status.kind === 'online') {
      ctx.startupWatch = null;
      return;
    }
    const limitMs = ctx.config.serverStartupTimeoutMinutes * MINUTE_MS;
    if (now - watch.since >= limitMs) {
      ctx.startupWatch = null;
      console.warn(`[OrchestrationLoop] Server did not reach online within ${ctx.config.serverStartupTimeoutMinutes} min`);
      ctx.notifications.notify('admin', 'startup_timeout', {
        minutes: ctx.config.serverStartupTimeoutMinutes,
        context: watch.context,
      });
    }
  }
}
