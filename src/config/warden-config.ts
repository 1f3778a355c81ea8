/**
 * @fileoverview Warden configuration schema and loader.
 *
 * The configuration is a JSON file (default `~/.warden/config.json`, or the
 * path in `WARDEN_CONFIG`) validated with zod. Every option has a default so a
 * minimal file only names the service and its paths.
 *
 * @module config/warden-config
 */

import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { DEFAULT_EXTERNAL_CALL_TIMEOUT_MS } from './orchestrator-timing.js';

/** `HH:mm`, 24-hour clock */
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const timeOfDaySchema = z.string().regex(TIME_OF_DAY_PATTERN, { message: 'must be HH:mm (24-hour)' });

const performanceThresholdsSchema = z
  .object({
    excellent: z.number().nonnegative().default(30),
    good: z.number().nonnegative().default(20),
    fair: z.number().nonnegative().default(15),
    poor: z.number().nonnegative().default(10),
  })
  .default({})
  .refine((t) => t.excellent >= t.good && t.good >= t.fair && t.fair >= t.poor, {
    message: 'thresholds must be ordered excellent >= good >= fair >= poor',
  });

const apiSchema = z
  .object({
    enabled: z.boolean().default(true),
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(1).max(65535).default(8720),
    token: z.string().min(8).optional(),
  })
  .default({});

const webhookSchema = z.object({
  /** Player-facing channel; also receives admin messages when adminUrl is unset */
  url: z.string().url(),
  adminUrl: z.string().url().optional(),
  username: z.string().max(80).default('Server Warden'),
});

const updaterSchema = z
  .object({
    steamCmdPath: z.string().default('steamcmd'),
    appId: z.string().regex(/^\d+$/).default('380870'),
    installDir: z.string().default(''),
    branch: z.string().default('public'),
  })
  .default({});

export const WardenConfigSchema = z.object({
  serviceName: z.string().min(1),
  serverLogPath: z.string().min(1),
  serverDataPath: z.string().min(1),
  backupDir: z.string().default(join(homedir(), '.warden', 'backups')),
  restartTimes: z.array(timeOfDaySchema).default([]),
  backupIntervalMinutes: z.number().int().nonnegative().default(60),
  updateCheckIntervalMinutes: z.number().int().nonnegative().default(30),
  updateDelayMinutes: z.number().int().nonnegative().default(15),
  maxBackups: z.number().int().positive().default(10),
  compressBackups: z.boolean().default(true),
  autoRestartCooldownMinutes: z.number().nonnegative().default(2),
  maxConsecutiveRestartAttempts: z.number().int().positive().default(3),
  serverStartupTimeoutMinutes: z.number().positive().default(10),
  intentionalStopWindowMinutes: z.number().positive().default(10),
  performanceThresholds: performanceThresholdsSchema,
  logCheckIntervalMs: z.number().int().positive().default(500),
  statusCheckIntervalMs: z.number().int().positive().default(5000),
  externalCallTimeoutMs: z.number().int().positive().default(DEFAULT_EXTERNAL_CALL_TIMEOUT_MS),
  updateTimeoutMinutes: z.number().positive().default(30),
  backupTimeoutMinutes: z.number().positive().default(20),
  auditLogPath: z.string().default(join(homedir(), '.warden', 'lifecycle.jsonl')),
  webhook: webhookSchema.optional(),
  api: apiSchema,
  updater: updaterSchema,
});

export type WardenConfig = z.infer<typeof WardenConfigSchema>;

/** Input shape accepted by parseConfig (defaults still unapplied) */
export type WardenConfigInput = z.input<typeof WardenConfigSchema>;

/**
 * Default config path, honouring `WARDEN_CONFIG`.
 */
export function defaultConfigPath(): string {
  return process.env.WARDEN_CONFIG || join(homedir(), '.warden', 'config.json');
}

/**
 * Validate a raw config object and apply defaults.
 * Restart times are sorted and de-duplicated.
 */
export function parseConfig(raw: unknown): WardenConfig {
  const result = WardenConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }
  const config = result.data;
  config.restartTimes = [...new Set(config.restartTimes)].sort();
  return config;
}

/**
 * Read and validate the config file.
 */
export function loadConfig(filePath: string = defaultConfigPath()): WardenConfig {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    throw new ConfigError([`${filePath}: cannot read config file (${code ?? 'unknown error'})`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigError([`${filePath}: not valid JSON`]);
  }
  return parseConfig(raw);
}
