import { describe, it, expect } from 'vitest';
import {
  classifyPerformance,
  detectEventKind,
  extractTimestamp,
  parseLogLine,
  parseLogLines,
  parsePerformanceSample,
  sanitizeLogLine,
} from '../src/log-event-parser.js';

/**
 * LogEventParser Tests
 *
 * Lifecycle markers, timestamp prefixes and the "Global stats" performance line.
 */

const THRESHOLDS = { excellent: 30, good: 20, fair: 15, poor: 10 };
const NOW = new Date(2026, 9, 18, 12, 0, 0).getTime();

describe('extractTimestamp', () => {
  it('should parse the bracketed day-month-year console prefix as local time', () => {
    expect(extractTimestamp('[18-10-26 14:03:21.123] LOG : General')).toBe(
      new Date(2026, 9, 18, 14, 3, 21, 123).getTime()
    );
  });

  it('should accept a four-digit year and no fraction', () => {
    expect(extractTimestamp('[18-10-2026 14:03:21] boot')).toBe(new Date(2026, 9, 18, 14, 3, 21, 0).getTime());
  });

  it('should parse ISO timestamps with a zone', () => {
    expect(extractTimestamp('2026-10-18T14:03:21.5Z hello')).toBe(Date.UTC(2026, 9, 18, 14, 3, 21, 500));
    expect(extractTimestamp('[2026-10-18 14:03:21+02:00] hello')).toBe(Date.UTC(2026, 9, 18, 12, 3, 21, 0));
  });

  it('should parse ISO timestamps without a zone as local time', () => {
    expect(extractTimestamp('2026-10-18 14:03:21 hello')).toBe(new Date(2026, 9, 18, 14, 3, 21).getTime());
  });

  it('should find an epoch-millisecond marker', () => {
    expect(extractTimestamp('General     , 1792332201123> SERVER STARTED')).toBe(1792332201123);
  });

  it('should reject impossible dates', () => {
    expect(extractTimestamp('[31-02-26 10:00:00] bad')).toBeNull();
    expect(extractTimestamp('[01-13-26 10:00:00] bad')).toBeNull();
  });

  it('should return null when no prefix is present', () => {
    expect(extractTimestamp('just some text')).toBeNull();
  });
});

describe('detectEventKind', () => {
  it('should recognize each lifecycle marker', () => {
    expect(detectEventKind('versionNumber=41.78.16 demo=false')).toBe('starting');
    expect(detectEventKind('Starting dedicated server')).toBe('starting');
    expect(detectEventKind('Loading world...')).toBe('loading');
    expect(detectEventKind('*** SERVER STARTED ***')).toBe('online');
    expect(detectEventKind('Server is now online')).toBe('online');
    expect(detectEventKind('Global stats: fps=30')).toBe('online');
    expect(detectEventKind('SServerQuit requested')).toBe('shutting_down');
    expect(detectEventKind('Server exited with code 0')).toBe('offline');
  });

  it('should prefer shutdown over online words on the same line', () => {
    expect(detectEventKind('server is online, shutting down now')).toBe('shutting_down');
    expect(detectEventKind('Global stats: fps=12 shutting down')).toBe('shutting_down');
  });

  it('should prefer exit over shutdown', () => {
    expect(detectEventKind('interrupted: process exited with code 1')).toBe('offline');
  });

  it('should only read interrupted as the server message itself', () => {
    expect(detectEventKind('Interrupted')).toBe('shutting_down');
    expect(detectEventKind('[18-10-26 14:03:21.000] Server interrupted')).toBe('shutting_down');
    expect(detectEventKind('[18-10-26 14:03:21.000] Chat: Alice: sorry, got interrupted')).toBeNull();
    expect(detectEventKind('[18-10-26 14:03:21.000] Connection interrupted, retrying')).toBeNull();
  });

  it('should return null for unrelated lines', () => {
    expect(detectEventKind('Player Alice connected')).toBeNull();
  });
});

describe('parsePerformanceSample', () => {
  it('should read fps, players and entity counts', () => {
    const sample = parsePerformanceSample(
      'Global stats: avgFps=28.5 minFps=20 maxFps=31 frameTime=35.1 players=4 characters=12 zombies=340 vehicles=7'
    );
    expect(sample).toEqual({
      avgFps: 28.5,
      minFps: 20,
      maxFps: 31,
      frameTimeMs: 35.1,
      playerCount: 4,
      entityCounts: { characters: 12, zombies: 340, vehicles: 7 },
    });
  });

  it('should derive frame time from fps', () => {
    const sample = parsePerformanceSample('Global stats: fps=25');
    expect(sample.avgFps).toBe(25);
    expect(sample.frameTimeMs).toBe(40);
  });

  it('should derive fps from frame time', () => {
    const sample = parsePerformanceSample('Global stats: frametime: 50');
    expect(sample.avgFps).toBe(20);
  });

  it('should ignore negative values and unknown keys', () => {
    const sample = parsePerformanceSample('Global stats: fps=-3 ping=40 players=2');
    expect(sample.avgFps).toBe(0);
    expect(sample.playerCount).toBe(2);
  });
});

describe('classifyPerformance', () => {
  it('should map fps onto the configured bands', () => {
    expect(classifyPerformance(30, THRESHOLDS)).toBe('excellent');
    expect(classifyPerformance(28, THRESHOLDS)).toBe('good');
    expect(classifyPerformance(15, THRESHOLDS)).toBe('fair');
    expect(classifyPerformance(10, THRESHOLDS)).toBe('poor');
    expect(classifyPerformance(9.9, THRESHOLDS)).toBe('critical');
  });
});

describe('sanitizeLogLine', () => {
  it('should drop control characters and replacement characters', () => {
    expect(sanitizeLogLine('\u0000Loading� world\u0007  ')).toBe('Loading world');
  });
});

describe('parseLogLine', () => {
  it('should return null for empty and unrelated lines', () => {
    expect(parseLogLine('', NOW)).toBeNull();
    expect(parseLogLine('\u0000\u0001', NOW)).toBeNull();
    expect(parseLogLine('chat: hello', NOW)).toBeNull();
  });

  it('should fall back to the supplied time when the line has no prefix', () => {
    expect(parseLogLine('Loading world', NOW)).toEqual({ timestamp: NOW, kind: 'loading', line: 'Loading world' });
  });

  it('should attach a performance sample to stats lines only', () => {
    const stats = parseLogLine('[18-10-26 14:00:00] Global stats: fps=28 players=3', NOW);
    expect(stats?.kind).toBe('online');
    expect(stats?.performance?.avgFps).toBe(28);
    expect(stats?.performance?.playerCount).toBe(3);
    expect(stats?.timestamp).toBe(new Date(2026, 9, 18, 14, 0, 0).getTime());

    const started = parseLogLine('*** SERVER STARTED ***', NOW);
    expect(started?.performance).toBeUndefined();
  });
});

describe('parseLogLines', () => {
  it('should keep only lines that announce events, in order', () => {
    const events = parseLogLines(['noise', 'versionNumber=41.78', 'chat', 'Loading world', '*** SERVER STARTED ***'], NOW);
    expect(events.map((e) => e.kind)).toEqual(['starting', 'loading', 'online']);
  });
});
