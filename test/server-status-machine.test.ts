import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ServerStatusMachine, statusPriority } from '../src/server-status-machine.js';
import { parseLogLine } from '../src/log-event-parser.js';
import type { LogEvent, LogEventKind } from '../src/types.js';

/**
 * ServerStatusMachine Tests
 *
 * Status flow: unknown → starting → loading → online, with shutdown and
 * offline accepted from anywhere and stale lower-ranked evidence ignored.
 */

const THRESHOLDS = { excellent: 30, good: 20, fair: 15, poor: 10 };
const T0 = new Date(2026, 9, 18, 12, 0, 0).getTime();
const MINUTE = 60_000;

function event(kind: LogEventKind, timestamp = T0): LogEvent {
  return { timestamp, kind, line: kind };
}

function statsEvent(line: string, timestamp = T0): LogEvent {
  const parsed = parseLogLine(line, timestamp);
  if (!parsed) throw new Error(`not an event: ${line}`);
  return parsed;
}

describe('ServerStatusMachine', () => {
  let machine: ServerStatusMachine;

  beforeEach(() => {
    machine = new ServerStatusMachine({ thresholds: THRESHOLDS, startedAt: T0 });
  });

  describe('Initialization', () => {
    it('should start unknown with no activity', () => {
      const status = machine.current;
      expect(status.kind).toBe('unknown');
      expect(status.lastActivityAt).toBeNull();
      expect(status.isOnline).toBe(false);
      expect(status.highestKindReached).toBe('unknown');
    });
  });

  describe('Forward progression', () => {
    it('should walk starting, loading, online and announce each step', () => {
      const kinds = [
        machine.apply(event('starting'), T0 + 10 * MINUTE),
        machine.apply(event('loading'), T0 + 10 * MINUTE),
        machine.apply(statsEvent('Global stats: fps=28 players=3'), T0 + 10 * MINUTE),
      ];

      expect(kinds.map((t) => t.current.kind)).toEqual(['starting', 'loading', 'online']);
      expect(kinds.map((t) => t.notify)).toEqual([true, true, true]);

      const status = machine.current;
      expect(status.isOnline).toBe(true);
      expect(status.performance?.status).toBe('good');
      expect(status.performance?.avgFps).toBe(28);
      expect(status.playerCount).toBe(3);
      expect(status.message).toBe('Server is online (3 players, 28 fps)');
      expect(status.highestKindReached).toBe('online');
    });

    it('should refresh performance without announcing on repeated stats lines', () => {
      machine.apply(event('starting'), T0);
      machine.apply(statsEvent('Global stats: fps=28'), T0);
      const again = machine.apply(statsEvent('Global stats: fps=12 players=1', T0 + MINUTE), T0 + MINUTE);

      expect(again.accepted).toBe(true);
      expect(again.changed).toBe(false);
      expect(again.notify).toBe(false);
      expect(machine.current.performance?.status).toBe('poor');
      expect(machine.current.lastActivityAt).toBe(T0 + MINUTE);
    });

    it('should emit statusChanged only for announced transitions', () => {
      const listener = vi.fn();
      machine.on('statusChanged', listener);

      machine.apply(event('starting'), T0);
      machine.apply(event('starting'), T0);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0].current.kind).toBe('starting');
    });
  });

  describe('Monotonic high-water mark', () => {
    it('should ignore stale lower-ranked events', () => {
      machine.apply(event('starting'), T0);
      machine.apply(event('online'), T0);

      const stale = machine.apply(event('loading'), T0);

      expect(stale.accepted).toBe(false);
      expect(stale.notify).toBe(false);
      expect(machine.kind).toBe('online');
    });

    it('should never accept the unknown kind', () => {
      machine.apply(event('starting'), T0);
      expect(machine.apply(event('unknown'), T0).accepted).toBe(false);
      expect(machine.kind).toBe('starting');
    });

    it('should accept shutdown and offline from any status', () => {
      machine.apply(event('online'), T0);

      expect(machine.apply(event('shutting_down'), T0).current.kind).toBe('shutting_down');
      const offline = machine.apply(event('offline'), T0);

      expect(offline.current.kind).toBe('offline');
      expect(offline.current.performance).toBeNull();
      expect(offline.current.playerCount).toBe(0);
      // Overrides do not lower the mark
      expect(offline.current.highestKindReached).toBe('online');
    });

    it('should reject a new start until the mark is reset', () => {
      machine.apply(event('online'), T0);
      machine.apply(event('offline'), T0);

      expect(machine.apply(event('starting'), T0).accepted).toBe(false);

      const reset = vi.fn();
      machine.on('highWaterReset', reset);
      machine.resetHighWater('restart');
      expect(reset).toHaveBeenCalledWith('restart');
      expect(machine.current.highestKindReached).toBe('offline');
      expect(machine.apply(event('starting'), T0).accepted).toBe(true);
      expect(machine.kind).toBe('starting');
    });

    it('should keep the mark at unknown when reset before any activity', () => {
      machine.resetHighWater('startup');
      expect(machine.current.highestKindReached).toBe('unknown');
    });

    it('should rank shutting_down like offline', () => {
      expect(statusPriority('shutting_down')).toBe(statusPriority('offline'));
    });
  });

  describe('reconcile()', () => {
    it('should force offline when the controller reports the process stopped', () => {
      const reconciled = vi.fn();
      machine.on('reconciled', reconciled);

      const result = machine.reconcile(['*** SERVER STARTED ***'], false, T0);

      expect(result.current.kind).toBe('offline');
      expect(result.current.highestKindReached).toBe('offline');
      expect(result.current.lastActivityAt).toBe(T0);
      expect(result.notify).toBe(false);
      expect(reconciled).toHaveBeenCalledWith(result.current);
    });

    it('should replay the tail from the most recent start marker', () => {
      const tail = [
        '*** SERVER STARTED ***',
        'Server exited with code 0',
        'versionNumber=41.78',
        'Loading world',
      ];

      const result = machine.reconcile(tail, true, T0);

      expect(result.current.kind).toBe('loading');
      expect(result.current.highestKindReached).toBe('loading');
      expect(result.notify).toBe(false);
    });

    it('should not announce the first online inside the grace window', () => {
      machine.reconcile(['versionNumber=41.78', 'Loading world'], true, T0);

      const online = machine.apply(event('online', T0 + 30_000), T0 + 30_000);

      expect(online.changed).toBe(true);
      expect(online.notify).toBe(false);
    });

    it('should announce the first online after the grace window', () => {
      machine.reconcile(['versionNumber=41.78'], true, T0);

      expect(machine.apply(event('online'), T0 + 5 * MINUTE).notify).toBe(true);
    });

    it('should leave an empty tail unknown', () => {
      expect(machine.reconcile([], true, T0).current.kind).toBe('unknown');
    });
  });

  describe('markOfflineFromController()', () => {
    it('should apply an announced offline override', () => {
      machine.apply(event('online'), T0);
      const result = machine.markOfflineFromController(T0 + MINUTE);

      expect(result.accepted).toBe(true);
      expect(result.notify).toBe(true);
      expect(result.current.kind).toBe('offline');
      expect(result.current.lastActivityAt).toBe(T0 + MINUTE);
    });
  });
});
