import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OrchestrationLoop, createOrchestratorContext, snapshotContext } from '../src/orchestration-loop.js';
import { ServiceControlError } from '../src/errors.js';
import type { WardenConfigInput } from '../src/config/warden-config.js';
import type { AdminCommandInput } from '../src/command-inbox.js';
import {
  FakeBackupService,
  FakeClock,
  FakeCommandSource,
  FakeLogSource,
  FakeServiceController,
  FakeStopEvidence,
  FakeVersionService,
  MemoryAuditLog,
  RecordingNotifier,
  createTestConfig,
} from './mocks/index.js';

/**
 * OrchestrationLoop Tests
 *
 * Drives single ticks against in-process fakes with a manual clock and
 * asserts on controller calls, notifications and audit entries.
 */

const MINUTE = 60_000;

interface HarnessOptions {
  config?: Partial<WardenConfigInput>;
  running?: boolean;
  tail?: string[];
  installed?: boolean;
  start?: number;
}

function createHarness(options: HarnessOptions = {}) {
  const clock = new FakeClock(options.start ?? new Date(2026, 9, 18, 12, 0).getTime());
  const controller = new FakeServiceController();
  controller.running = options.running ?? true;
  controller.installed = options.installed ?? true;
  const logSource = new FakeLogSource();
  logSource.tail = options.tail ?? [];
  const commands = new FakeCommandSource();
  const notifier = new RecordingNotifier();
  const versionService = new FakeVersionService();
  const backupService = new FakeBackupService();
  const stopEvidence = new FakeStopEvidence();
  const auditLog = new MemoryAuditLog(clock.read);

  const ctx = createOrchestratorContext(createTestConfig(options.config), {
    controller,
    logSource,
    commands,
    notifiers: [notifier],
    versionService,
    backupService,
    stopEvidence,
    auditLog,
    clock: clock.read,
  });
  const loop = new OrchestrationLoop(ctx);

  let seq = 0;
  const command = (input: AdminCommandInput): void => {
    commands.commands.push({ ...input, seq: ++seq });
  };

  /** Run one tick and wait for its notifications */
  const tick = async () => {
    const report = await loop.tick();
    await ctx.notifications.flush();
    return report;
  };

  return { clock, controller, logSource, commands, notifier, versionService, backupService, stopEvidence, auditLog, ctx, loop, command, tick };
}

describe('OrchestrationLoop', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('initialize()', () => {
    it('should seed offline when the controller reports the process stopped', async () => {
      const h = createHarness({ running: false, tail: ['*** SERVER STARTED ***'] });
      await h.loop.initialize();

      expect(h.ctx.status.kind).toBe('offline');
      expect(h.ctx.controllerRunning).toBe(false);
      expect(h.auditLog.entries[0]).toMatchObject({ event: 'warden_started', kind: 'offline' });
    });

    it('should seed from the log tail when the process is running', async () => {
      const h = createHarness({ tail: ['versionNumber=41.78', '*** SERVER STARTED ***'] });
      await h.loop.initialize();
      await h.ctx.notifications.flush();

      expect(h.ctx.status.kind).toBe('online');
      expect(h.notifier.sent).toEqual([]);
    });

    it('should block recovery when the service is not installed', async () => {
      const h = createHarness({ installed: false, running: false });
      await h.loop.initialize();
      await h.tick();

      expect(h.notifier.events('admin')).toEqual(['service_missing']);
      expect(h.ctx.recovery.getState().blockedReason).toBe('service game-server is not installed');
      expect(h.controller.calls).toEqual([]);
    });
  });

  describe('auto-recovery', () => {
    it('should start a stopped server and follow it back online', async () => {
      const h = createHarness({ running: false });
      await h.loop.initialize();

      const first = await h.tick();
      expect(first.executed).toBe('recovery_restart');
      expect(h.controller.calls).toEqual(['start:auto-recovery attempt 1']);
      expect(h.ctx.startupWatch).toEqual({ since: h.clock.now, context: 'recovery' });
      expect(h.notifier.sent[0]).toEqual({
        audience: 'admin',
        event: 'recovery_restart',
        payload: { attempt: 1, maxAttempts: 3 },
      });

      h.notifier.clear();
      h.clock.advance(30_000);
      h.logSource.push('versionNumber=41.78', 'Loading world', 'Global stats: fps=28 players=0');
      await h.tick();

      expect(h.ctx.status.kind).toBe('online');
      expect(h.ctx.status.current.performance?.status).toBe('good');
      expect(h.ctx.startupWatch).toBeNull();
      expect(h.notifier.events('admin')).toEqual(['status_changed', 'status_changed', 'status_changed']);
      expect(h.notifier.sent.filter((n) => n.audience === 'player').map((n) => n.payload.to)).toEqual([
        'starting',
        'online',
      ]);
      expect(h.ctx.recovery.getState().consecutiveAttempts).toBe(0);
    });

    it('should restart a crashed server', async () => {
      const h = createHarness({ tail: ['*** SERVER STARTED ***'] });
      await h.loop.initialize();
      h.controller.running = false;

      await h.tick();

      expect(h.controller.calls).toEqual(['start:auto-recovery attempt 1']);
      expect(h.auditLog.events()).toContain('recovery_attempt');
      expect(h.notifier.sent.find((n) => n.audience === 'player')?.payload).toMatchObject({
        from: 'online',
        to: 'offline',
      });
    });

    it('should mark the server offline once the controller answers after a failed first check', async () => {
      const h = createHarness({ tail: ['*** SERVER STARTED ***'] });
      h.controller.isRunningError = new Error('timed out');
      await h.loop.initialize();
      expect(h.ctx.status.kind).toBe('online');
      expect(h.ctx.controllerRunning).toBeNull();

      h.controller.isRunningError = null;
      h.controller.running = false;
      await h.tick();

      expect(h.ctx.controllerRunning).toBe(false);
      expect(h.notifier.sent.find((n) => n.audience === 'admin' && n.event === 'status_changed')?.payload).toMatchObject({
        from: 'online',
        to: 'offline',
      });
      expect(h.controller.calls).toEqual(['start:auto-recovery attempt 1']);
      expect(h.ctx.recovery.getState().consecutiveAttempts).toBe(1);
    });

    it('should follow a restart made outside the warden between two polls', async () => {
      const h = createHarness({ tail: ['versionNumber=41.78', '*** SERVER STARTED ***'] });
      await h.loop.initialize();

      h.logSource.push('Server exited', 'versionNumber=41.78');
      await h.tick();

      expect(h.ctx.status.kind).toBe('starting');
      expect(h.controller.calls).toEqual([]);
    });

    it('should leave a deliberately stopped server down', async () => {
      const h = createHarness({ tail: ['*** SERVER STARTED ***'] });
      await h.loop.initialize();
      h.controller.running = false;
      h.stopEvidence.intentional = true;

      await h.tick();

      expect(h.controller.calls).toEqual([]);
      expect(h.notifier.events('admin')).toEqual(['status_changed', 'intentional_stop_detected']);
      expect(h.auditLog.events()).toContain('intentional_stop');
    });

    it('should pause once on a fatal controller error', async () => {
      const h = createHarness();
      await h.loop.initialize();
      h.controller.isRunningError = new ServiceControlError('isRunning', 'fatal', 'access is denied');

      await h.tick();
      h.clock.advance(5000);
      await h.tick();

      expect(h.notifier.sent).toEqual([
        { audience: 'admin', event: 'recovery_paused', payload: { reason: 'isRunning failed: access is denied' } },
      ]);
      expect(h.ctx.recovery.getState().blockedReason).toBe('isRunning failed: access is denied');
      // The last known flag is kept
      expect(h.ctx.controllerRunning).toBe(true);
    });
  });

  describe('admin commands', () => {
    it('should warn players and then run a scheduled restart', async () => {
      const h = createHarness();
      await h.loop.initialize();
      h.command({ op: 'schedule', kind: 'restart', delayMinutes: 20, requestedBy: 'admin' });

      await h.tick();
      expect(h.notifier.events('admin')).toEqual(['action_scheduled']);
      expect(h.auditLog.events()).toContain('action_scheduled:restart');

      h.clock.advance(10 * MINUTE);
      await h.tick();
      expect(h.notifier.sent.filter((n) => n.audience === 'player')).toEqual([
        { audience: 'player', event: 'action_warning', payload: { kind: 'restart', minutes: 10 } },
      ]);

      h.clock.advance(10 * MINUTE);
      const report = await h.tick();

      expect(report.executed).toBe('restart');
      expect(h.controller.calls).toEqual(['restart:restart requested by admin']);
      expect(h.notifier.events('admin').at(-1)).toBe('action_completed');
      expect(h.auditLog.entries.at(-1)).toMatchObject({ event: 'action_executed', kind: 'restart', outcome: 'success' });
      expect(h.ctx.startupWatch?.context).toBe('restart');
    });

    it('should apply each command once even if the source repeats it', async () => {
      const h = createHarness();
      h.commands.honourCursor = false;
      await h.loop.initialize();
      h.command({ op: 'schedule', kind: 'restart', delayMinutes: 30, requestedBy: 'admin' });

      await h.tick();
      await h.tick();

      expect(h.notifier.events('admin')).toEqual(['action_scheduled']);
      expect(h.ctx.commandCursor).toBe(1);
    });

    it('should reject cancelling an action that is not pending', async () => {
      const h = createHarness();
      await h.loop.initialize();
      h.command({ op: 'cancel', kind: 'update', requestedBy: 'admin' });

      await h.tick();

      expect(h.notifier.sent).toEqual([
        { audience: 'admin', event: 'command_rejected', payload: { seq: 1, error: 'no pending update to cancel' } },
      ]);
    });

    it('should cancel a pending action', async () => {
      const h = createHarness();
      await h.loop.initialize();
      h.command({ op: 'schedule', kind: 'stop', delayMinutes: 10, requestedBy: 'admin' });
      h.command({ op: 'cancel', kind: 'stop', requestedBy: 'admin' });

      await h.tick();

      expect(h.notifier.events('admin')).toEqual(['action_scheduled', 'action_cancelled']);
      expect(h.ctx.actions.size).toBe(0);
    });

    it('should keep the server down after an admin stop', async () => {
      const h = createHarness({ tail: ['*** SERVER STARTED ***'] });
      await h.loop.initialize();
      h.command({ op: 'schedule', kind: 'stop', delayMinutes: 0, requestedBy: 'admin' });

      await h.tick();
      h.clock.advance(5 * MINUTE);
      await h.tick();

      expect(h.controller.calls).toEqual(['stop:stop requested by admin']);
      expect(h.ctx.status.kind).toBe('offline');
      expect(h.auditLog.events()).toContain('admin_stop');
      expect(h.ctx.recovery.getState().intentionallyStopped).toBe(true);
    });

    it('should run only the highest-priority action when several fall due', async () => {
      const h = createHarness();
      await h.loop.initialize();
      h.command({ op: 'schedule', kind: 'restart', delayMinutes: 1, requestedBy: 'admin' });
      h.command({ op: 'schedule', kind: 'stop', delayMinutes: 1, requestedBy: 'admin' });
      await h.tick();

      h.clock.advance(MINUTE);
      await h.tick();

      expect(h.controller.calls).toEqual(['stop:stop requested by admin']);
      expect(h.notifier.sent).toContainEqual({
        audience: 'admin',
        event: 'action_superseded',
        payload: { kind: 'restart', by: 'stop' },
      });
    });

    it('should report a startup that never reaches online once', async () => {
      const h = createHarness();
      await h.loop.initialize();
      h.command({ op: 'schedule', kind: 'restart', delayMinutes: 0, requestedBy: 'admin' });
      await h.tick();

      h.clock.advance(10 * MINUTE);
      await h.tick();
      h.clock.advance(MINUTE);
      await h.tick();

      const timeouts = h.notifier.sent.filter((n) => n.event === 'startup_timeout');
      expect(timeouts).toEqual([
        { audience: 'admin', event: 'startup_timeout', payload: { minutes: 10, context: 'restart' } },
      ]);
    });
  });

  describe('periodic restart', () => {
    const start = new Date(2026, 9, 18, 13, 59).getTime();

    it('should back up, then restart at the configured time', async () => {
      const h = createHarness({ start, config: { restartTimes: ['14:00'] } });
      await h.loop.initialize();

      await h.tick();
      expect(h.notifier.sent).toContainEqual({
        audience: 'player',
        event: 'periodic_restart_warning',
        payload: { minutes: 1, restartAt: start + MINUTE },
      });

      h.clock.advance(MINUTE);
      const report = await h.tick();

      expect(report.executed).toBe('periodic_restart');
      expect(h.backupService.sources).toEqual(['/srv/game/data']);
      expect(h.controller.calls).toEqual(['restart:periodic restart']);
      expect(h.notifier.events('admin')).toEqual(['backup_completed', 'periodic_restart_completed']);
    });

    it('should count a scheduled restart in the same tick as the periodic one', async () => {
      const h = createHarness({ start, config: { restartTimes: ['14:00'] } });
      await h.loop.initialize();
      h.command({ op: 'schedule', kind: 'restart', delayMinutes: 1, requestedBy: 'admin' });
      await h.tick();

      h.clock.advance(MINUTE);
      await h.tick();

      expect(h.controller.calls).toEqual(['restart:restart requested by admin']);
      expect(h.backupService.sources).toEqual([]);
      expect(h.notifier.sent).toContainEqual({
        audience: 'admin',
        event: 'periodic_restart_covered',
        payload: { restartAt: start + MINUTE, by: 'restart' },
      });
    });

    it('should skip one occurrence on request', async () => {
      const h = createHarness({ start, config: { restartTimes: ['14:00'] } });
      await h.loop.initialize();
      h.command({ op: 'skip_periodic', requestedBy: 'admin' });
      await h.tick();

      h.clock.advance(MINUTE);
      await h.tick();

      expect(h.controller.calls).toEqual([]);
      expect(h.notifier.events('player')).toEqual([]);
      expect(h.notifier.events('admin')).toEqual(['periodic_skip_armed', 'periodic_restart_skipped']);
    });

    it('should not start a server that was stopped on purpose', async () => {
      const h = createHarness({ start, running: false, config: { restartTimes: ['14:00'] } });
      await h.loop.initialize();
      h.ctx.recovery.markIntentionalStop();

      h.clock.advance(MINUTE);
      await h.tick();

      expect(h.controller.calls).toEqual([]);
      expect(h.notifier.sent).toContainEqual({
        audience: 'admin',
        event: 'periodic_restart_skipped',
        payload: { restartAt: start + MINUTE, reason: 'server stopped on purpose' },
      });
    });
  });

  describe('maintenance', () => {
    it('should schedule a delayed update while players are online', async () => {
      const h = createHarness({ tail: ['*** SERVER STARTED ***'], config: { updateCheckIntervalMinutes: 30 } });
      h.versionService.check = { installedBuild: '100', latestBuild: '101', available: true };
      await h.loop.initialize();
      h.logSource.push('Global stats: fps=30 players=2');

      await h.tick();

      expect(h.notifier.sent).toContainEqual({
        audience: 'admin',
        event: 'update_available',
        payload: { installedBuild: '100', latestBuild: '101', delayMinutes: 15 },
      });
      expect(h.ctx.actions.get('update')?.requestedBy).toBe('update-checker');

      h.clock.advance(15 * MINUTE);
      await h.tick();

      expect(h.controller.calls).toEqual(['stop:update: build 100 -> 101', 'start:after update']);
      expect(h.versionService.updates).toBe(1);
      expect(h.notifier.events('admin').at(-1)).toBe('action_completed');
    });

    it('should restart on the installed build when the update fails', async () => {
      const h = createHarness({ config: { updateCheckIntervalMinutes: 30 } });
      h.versionService.check = { installedBuild: '100', latestBuild: '101', available: true };
      h.versionService.updateResult = { success: false, error: 'steamcmd exit 8' };
      await h.loop.initialize();

      await h.tick();
      expect(h.notifier.sent).toContainEqual({
        audience: 'admin',
        event: 'update_available',
        payload: { installedBuild: '100', latestBuild: '101', delayMinutes: 0 },
      });

      h.clock.advance(1000);
      await h.tick();

      expect(h.controller.calls).toEqual(['stop:update: build 100 -> 101', 'start:after update']);
      expect(h.notifier.sent.at(-1)).toEqual({
        audience: 'admin',
        event: 'action_failed',
        payload: { kind: 'update', error: 'steamcmd exit 8 (server restarted on the installed build)' },
      });
    });

    it('should not schedule a second update while one is pending', async () => {
      const h = createHarness({ config: { updateCheckIntervalMinutes: 1, updateDelayMinutes: 60 } });
      h.versionService.check = { installedBuild: '100', latestBuild: '101', available: true };
      await h.loop.initialize();
      h.logSource.push('*** SERVER STARTED ***', 'Global stats: fps=30 players=5');
      await h.tick();

      h.clock.advance(MINUTE);
      await h.tick();

      expect(h.versionService.checks).toBe(2);
      expect(h.notifier.events('admin').filter((e) => e === 'update_available')).toHaveLength(1);
    });

    it('should report a failed update check and mark it done', async () => {
      const h = createHarness({ config: { updateCheckIntervalMinutes: 30 } });
      h.versionService.check = new Error('steamcmd not found');
      await h.loop.initialize();

      await h.tick();
      h.clock.advance(MINUTE);
      await h.tick();

      expect(h.versionService.checks).toBe(1);
      expect(h.notifier.sent).toEqual([
        { audience: 'admin', event: 'update_check_failed', payload: { error: 'steamcmd not found' } },
      ]);
    });

    it('should run a backup once the interval has passed', async () => {
      const h = createHarness({ config: { backupIntervalMinutes: 60 } });
      await h.loop.initialize();

      await h.tick();
      expect(h.backupService.sources).toEqual([]);

      h.clock.advance(60 * MINUTE);
      await h.tick();

      expect(h.backupService.sources).toEqual(['/srv/game/data']);
      expect(h.ctx.periodic.getState().lastBackupAt).toBe(h.clock.now);
      expect(h.auditLog.entries.at(-1)).toMatchObject({ event: 'backup', outcome: 'success' });
    });
  });

  describe('computeSleepMs()', () => {
    it('should poll slowly when nothing is imminent and fast otherwise', async () => {
      const h = createHarness();
      await h.loop.initialize();
      expect(h.loop.computeSleepMs(h.clock.now)).toBe(5000);

      h.ctx.actions.schedule('restart', 10, h.clock.now, 'admin');
      expect(h.loop.computeSleepMs(h.clock.now)).toBe(500);
    });
  });

  describe('start() and stop()', () => {
    it('should run until stopped and record the stop', async () => {
      const h = createHarness();
      await h.loop.start();
      expect(h.loop.isRunning).toBe(true);

      await h.loop.stop();

      expect(h.loop.isRunning).toBe(false);
      expect(h.auditLog.events()).toEqual(['warden_started:unknown', 'warden_stopped']);
    });
  });

  describe('snapshotContext()', () => {
    it('should expose a copy of the live state', async () => {
      const h = createHarness({ config: { restartTimes: ['04:00'] } });
      await h.loop.initialize();

      const snapshot = snapshotContext(h.ctx);

      expect(snapshot.serviceName).toBe('game-server');
      expect(snapshot.controllerRunning).toBe(true);
      expect(snapshot.periodic.restartTimesOfDay).toEqual(['04:00']);
      expect(snapshot.actions).toEqual([]);
    });
  });
});
