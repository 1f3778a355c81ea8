/**
 * @fileoverview Pure functions turning server log lines into lifecycle events.
 *
 * Recognizes the dedicated server's lifecycle markers (process start, world
 * loading, server started, the periodic "Global stats" line, shutdown and exit)
 * and extracts the timestamp prefix when one is present. Parsing never throws:
 * unrecognized, empty or garbled lines simply produce no event.
 *
 * @module log-event-parser
 */

import { MAX_PARSED_LINE_LENGTH } from './config/log-limits.js';
import type {
  LogEvent,
  LogEventKind,
  PerformanceSample,
  PerformanceStatus,
  PerformanceThresholds,
} from './types.js';

// ========== Markers ==========

/** `interrupted` counts only as the server's own message, right after the line prefix */
const INTERRUPT_PATTERN = /(?:^|\]\s*|>\s*)(?:server\s+)?interrupted\b/i;

const SHUTDOWN_PATTERNS = [/\bshutting down\b/i, /\bSServerQuit\b/, INTERRUPT_PATTERN];

/**
 * Lifecycle markers, checked top to bottom. Exit and shutdown come first so a
 * shutdown line that mentions the world or the server is never read as a start.
 */
const LIFECYCLE_MARKERS: ReadonlyArray<{ kind: LogEventKind; patterns: RegExp[] }> = [
  {
    kind: 'offline',
    patterns: [/\bserver exited\b/i, /\bprocess exited with code\b/i],
  },
  {
    kind: 'shutting_down',
    patterns: SHUTDOWN_PATTERNS,
  },
  {
    kind: 'online',
    patterns: [/\*{3}\s*SERVER STARTED\s*\*{3}/i, /\bserver is (?:now )?online\b/i],
  },
  {
    kind: 'loading',
    patterns: [/\bloading (?:world|map)\b/i],
  },
  {
    kind: 'starting',
    patterns: [/\bversionNumber=\S+/, /\bstarting (?:dedicated )?server\b/i],
  },
];

/** The periodic stats line; also proves the server is online */
const GLOBAL_STATS_PATTERN = /\bglobal stats\b/i;

/** `key=value` (or `key: value`) pairs on the stats line */
const STAT_PAIR_PATTERN = /([A-Za-z]+)\s*[=:]\s*(-?\d+(?:\.\d+)?)/g;

/** Stats keys (lower-cased) mapped to sample fields */
const STAT_ALIASES: Record<string, keyof Omit<PerformanceSample, 'entityCounts'> | 'characters' | 'zombies' | 'vehicles'> = {
  fps: 'avgFps',
  avgfps: 'avgFps',
  avg: 'avgFps',
  minfps: 'minFps',
  min: 'minFps',
  maxfps: 'maxFps',
  max: 'maxFps',
  frametime: 'frameTimeMs',
  frametimems: 'frameTimeMs',
  players: 'playerCount',
  playercount: 'playerCount',
  characters: 'characters',
  zombies: 'zombies',
  vehicles: 'vehicles',
};

/** Control characters and the UTF-8 replacement character left by invalid bytes */
const NOISE_PATTERN = /[\u0000-\u0008\u000B-\u001F\u007F\uFFFD]/g;

// ========== Timestamps ==========

/** `[18-10-26 14:03:21.123]`, day-month-year as written by the server console */
const BRACKET_TIMESTAMP = /^\s*\[(\d{2})-(\d{2})-(\d{2}|\d{4})\s+(\d{2}):(\d{2}):(\d{2})(?:[.,](\d{1,3}))?\]/;

/** `2026-10-18T14:03:21.123Z`, optionally bracketed, zone optional */
const ISO_TIMESTAMP =
  /^\s*\[?(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:[.,](\d{1,3}))?(Z|[+-]\d{2}:?\d{2})?\]?/;

/** Epoch milliseconds followed by `>`, as in `General , 1729260201123>` */
const EPOCH_MS_TIMESTAMP = /(?:^|[\s,])(\d{13})>/;

function buildLocalDate(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number,
  millis: number
): number | null {
  const date = new Date(year, month - 1, day, hours, minutes, seconds, millis);
  // Reject rolled-over values such as month 13 or 31 February
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hours ||
    date.getMinutes() !== minutes
  ) {
    return null;
  }
  return date.getTime();
}

function parseMillis(fraction: string | undefined): number {
  if (!fraction) return 0;
  return Number(fraction.padEnd(3, '0'));
}

/**
 * Extract the timestamp prefix of a log line.
 *
 * @returns Epoch milliseconds, or null when absent or malformed
 */
export function extractTimestamp(line: string): number | null {
  const bracket = line.match(BRACKET_TIMESTAMP);
  if (bracket) {
    const rawYear = Number(bracket[3]);
    const year = bracket[3].length === 2 ? 2000 + rawYear : rawYear;
    return buildLocalDate(
      year,
      Number(bracket[2]),
      Number(bracket[1]),
      Number(bracket[4]),
      Number(bracket[5]),
      Number(bracket[6]),
      parseMillis(bracket[7])
    );
  }

  const iso = line.match(ISO_TIMESTAMP);
  if (iso) {
    const [, year, month, day, hours, minutes, seconds, fraction, zone] = iso;
    if (zone) {
      const normalizedZone = zone === 'Z' ? 'Z' : `${zone.slice(0, 3)}:${zone.slice(-2)}`;
      const millis = String(parseMillis(fraction)).padStart(3, '0');
      const parsed = Date.parse(`${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${millis}${normalizedZone}`);
      return Number.isNaN(parsed) ? null : parsed;
    }
    return buildLocalDate(
      Number(year),
      Number(month),
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds),
      parseMillis(fraction)
    );
  }

  const epoch = line.slice(0, 120).match(EPOCH_MS_TIMESTAMP);
  if (epoch) {
    return Number(epoch[1]);
  }

  return null;
}

// ========== Performance ==========

/**
 * Parse the numeric fields of a "Global stats" line.
 * Missing fields default to 0; fps and frame time are derived from each other
 * when only one is present.
 */
export function parsePerformanceSample(line: string): PerformanceSample {
  const sample: PerformanceSample = {
    avgFps: 0,
    minFps: 0,
    maxFps: 0,
    frameTimeMs: 0,
    playerCount: 0,
    entityCounts: { characters: 0, zombies: 0, vehicles: 0 },
  };

  for (const match of line.matchAll(STAT_PAIR_PATTERN)) {
    const field = STAT_ALIASES[match[1].toLowerCase()];
    if (!field) continue;
    const value = Number(match[2]);
    if (!Number.isFinite(value) || value < 0) continue;

    if (field === 'characters' || field === 'zombies' || field === 'vehicles') {
      sample.entityCounts[field] = Math.round(value);
    } else if (field === 'playerCount') {
      sample.playerCount = Math.round(value);
    } else {
      sample[field] = value;
    }
  }

  if (sample.avgFps === 0 && sample.frameTimeMs > 0) {
    sample.avgFps = Math.round((1000 / sample.frameTimeMs) * 10) / 10;
  } else if (sample.frameTimeMs === 0 && sample.avgFps > 0) {
    sample.frameTimeMs = Math.round((1000 / sample.avgFps) * 10) / 10;
  }

  return sample;
}

/**
 * Classify an average FPS against the configured bands.
 */
export function classifyPerformance(avgFps: number, thresholds: PerformanceThresholds): PerformanceStatus {
  if (avgFps >= thresholds.excellent) return 'excellent';
  if (avgFps >= thresholds.good) return 'good';
  if (avgFps >= thresholds.fair) return 'fair';
  if (avgFps >= thresholds.poor) return 'poor';
  return 'critical';
}

// ========== Parsing ==========

/**
 * Strip byte noise and control characters, and bound the length.
 */
export function sanitizeLogLine(line: string): string {
  const cleaned = line.replace(NOISE_PATTERN, '').trim();
  return cleaned.length > MAX_PARSED_LINE_LENGTH ? cleaned.slice(0, MAX_PARSED_LINE_LENGTH) : cleaned;
}

/**
 * Detect the lifecycle kind a line announces, if any.
 */
export function detectEventKind(line: string): LogEventKind | null {
  if (GLOBAL_STATS_PATTERN.test(line)) {
    // A stats line that also reports a shutdown is still a shutdown
    return SHUTDOWN_PATTERNS.some((p) => p.test(line)) ? 'shutting_down' : 'online';
  }
  for (const marker of LIFECYCLE_MARKERS) {
    if (marker.patterns.some((pattern) => pattern.test(line))) {
      return marker.kind;
    }
  }
  return null;
}

/**
 * Parse a single log line.
 *
 * @param line - Raw line (may be partial or contain invalid bytes)
 * @param now - Fallback timestamp when the line carries none
 * @returns The lifecycle event, or null when the line announces nothing
 */
export function parseLogLine(line: string, now: number = Date.now()): LogEvent | null {
  if (typeof line !== 'string' || line.length === 0) return null;

  const cleaned = sanitizeLogLine(line);
  if (cleaned.length === 0) return null;

  const kind = detectEventKind(cleaned);
  if (!kind) return null;

  const timestamp = extractTimestamp(cleaned) ?? now;

  if (kind === 'online' && GLOBAL_STATS_PATTERN.test(cleaned)) {
    return { timestamp, kind, performance: parsePerformanceSample(cleaned), line: cleaned };
  }
  return { timestamp, kind, line: cleaned };
}

/**
 * Parse a batch of lines, dropping those that carry no event.
 */
export function parseLogLines(lines: readonly string[], now: number = Date.now()): LogEvent[] {
  const events: LogEvent[] = [];
  for (const line of lines) {
    const event = parseLogLine(line, now);
    if (event) events.push(event);
  }
  return events;
}
