/**
 * @fileoverview ServiceController implementations for systemd and Windows
 * services.
 *
 * Both shell out with execFile under a timeout. A command that exits non-zero
 * raises a ServiceControlError whose severity comes from the tool's output:
 * permission and missing-service failures are fatal, everything else
 * (timeouts included) is transient.
 *
 * @module service-controller
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { SERVICE_EXEC_TIMEOUT_MS } from './config/orchestrator-timing.js';
import { ServiceControlError } from './errors.js';
import type { ServiceErrorSeverity } from './errors.js';
import type { ServiceController } from './types.js';

const execFileAsync = promisify(execFile);

/** Result of one controller command; runners never reject */
export interface CommandOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the binary could not be spawned at all */
  spawnError?: string;
}

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<CommandOutput>;

/**
 * Default runner: execFile with a timeout, failures folded into the output.
 */
export const execFileRunner: CommandRunner = async (file, args, timeoutMs) => {
  try {
    const { stdout, stderr } = await execFileAsync(file, args, { timeout: timeoutMs, windowsHide: true });
    return { exitCode: 0, stdout, stderr, timedOut: false };
  } catch (err) {
    if (!(err instanceof Error)) {
      return { exitCode: null, stdout: '', stderr: String(err), timedOut: false };
    }
    const code = 'code' in err ? err.code : undefined;
    const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : '';
    const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
    const killed = 'killed' in err && err.killed === true;
    if (typeof code === 'string') {
      return { exitCode: null, stdout, stderr, timedOut: false, spawnError: `${code}: ${err.message}` };
    }
    return { exitCode: typeof code === 'number' ? code : null, stdout, stderr, timedOut: killed };
  }
};

// ========== Output Parsing ==========

const FATAL_PATTERNS = [
  /access is denied/i,
  /permission denied/i,
  /interactive authentication required/i,
  /\bFAILED 5\b/,
  /does not exist as an installed service/i,
  /\bFAILED 1060\b/,
  /unit [^\s]+ (?:not found|could not be found)/i,
  /\bnot-found\b/,
];

/**
 * Decide whether a failed command is worth retrying.
 */
export function classifyServiceError(output: CommandOutput): ServiceErrorSeverity {
  if (output.timedOut) return 'transient';
  if (output.spawnError?.startsWith('ENOENT')) return 'fatal';
  const text = `${output.stdout}\n${output.stderr}`;
  return FATAL_PATTERNS.some((p) => p.test(text)) ? 'fatal' : 'transient';
}

/**
 * Extract the state name from `sc query` output.
 *
 * @example parseScQueryState('        STATE              : 4  RUNNING') // 'RUNNING'
 */
export function parseScQueryState(output: string): string | null {
  const match = /^\s*STATE\s*:\s*\d+\s+([A-Z_]+)/m.exec(output);
  return match ? match[1] : null;
}

function describeFailure(output: CommandOutput): string {
  if (output.timedOut) return 'timed out';
  if (output.spawnError) return output.spawnError;
  const detail = (output.stderr || output.stdout).trim().split(/\r?\n/).slice(-1)[0] ?? '';
  return `exit ${output.exitCode ?? 'unknown'}${detail ? `: ${detail}` : ''}`;
}

// ========== Controllers ==========

export interface ServiceControllerOptions {
  runner?: CommandRunner;
  timeoutMs?: number;
}

abstract class CommandServiceController implements ServiceController {
  protected readonly serviceName: string;
  protected readonly runner: CommandRunner;
  protected readonly timeoutMs: number;

  constructor(serviceName: string, options: ServiceControllerOptions = {}) {
    this.serviceName = serviceName;
    this.runner = options.runner ?? execFileRunner;
    this.timeoutMs = options.timeoutMs ?? SERVICE_EXEC_TIMEOUT_MS;
  }

  abstract isRunning(): Promise<boolean>;
  abstract exists(): Promise<boolean>;
  abstract start(context: string): Promise<boolean>;
  abstract stop(reason: string): Promise<boolean>;
  abstract restart(reason: string): Promise<boolean>;

  protected run(file: string, args: string[]): Promise<CommandOutput> {
    return this.runner(file, args, this.timeoutMs);
  }

  /** Throws unless the command succeeded or matches `tolerated` */
  protected async runChecked(operation: string, file: string, args: string[], tolerated?: RegExp): Promise<CommandOutput> {
    const output = await this.run(file, args);
    if (output.exitCode === 0) return output;
    if (tolerated && tolerated.test(`${output.stdout}\n${output.stderr}`)) return output;
    throw new ServiceControlError(operation, classifyServiceError(output), describeFailure(output));
  }
}

/**
 * systemd unit controlled through `systemctl`.
 */
export class SystemdServiceController extends CommandServiceController {
  async isRunning(): Promise<boolean> {
    const output = await this.run('systemctl', ['is-active', this.serviceName]);
    if (output.spawnError || output.timedOut) {
      throw new ServiceControlError('isRunning', classifyServiceError(output), describeFailure(output));
    }
    const state = output.stdout.trim();
    return state === 'active' || state === 'activating' || state === 'reloading';
  }

  async exists(): Promise<boolean> {
    const output = await this.runChecked('exists', 'systemctl', ['show', '-p', 'LoadState', '--value', this.serviceName]);
    return output.stdout.trim() === 'loaded';
  }

  async start(context: string): Promise<boolean> {
    console.log(`[ServiceController] Starting ${this.serviceName} (${context})`);
    await this.runChecked('start', 'systemctl', ['start', this.serviceName]);
    return true;
  }

  async stop(reason: string): Promise<boolean> {
    console.log(`[ServiceController] Stopping ${this.serviceName} (${reason})`);
    await this.runChecked('stop', 'systemctl', ['stop', this.serviceName]);
    return true;
  }

  async restart(reason: string): Promise<boolean> {
    console.log(`[ServiceController] Restarting ${this.serviceName} (${reason})`);
    await this.runChecked('restart', 'systemctl', ['restart', this.serviceName]);
    return true;
  }
}

/** `sc stop` on a stopped service: 1062 */
const SC_NOT_STARTED = /\b1062\b/;
/** `sc start` on a running service: 1056 */
const SC_ALREADY_RUNNING = /\b1056\b/;

/**
 * Windows service controlled through `sc.exe`.
 * `sc` has no restart verb, so restart waits for STOPPED before starting.
 */
export class WindowsServiceController extends CommandServiceController {
  private readonly pollIntervalMs: number;

  constructor(serviceName: string, options: ServiceControllerOptions & { pollIntervalMs?: number } = {}) {
    super(serviceName, options);
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
  }

  async isRunning(): Promise<boolean> {
    const state = await this.queryState();
    return state === 'RUNNING' || state === 'START_PENDING' || state === 'CONTINUE_PENDING';
  }

  async exists(): Promise<boolean> {
    const output = await this.run('sc.exe', ['query', this.serviceName]);
    if (output.exitCode === 0) return true;
    if (/\b1060\b/.test(`${output.stdout}\n${output.stderr}`)) return false;
    throw new ServiceControlError('exists', classifyServiceError(output), describeFailure(output));
  }

  async start(context: string): Promise<boolean> {
    console.log(`[ServiceController] Starting ${this.serviceName} (${context})`);
    await this.runChecked('start', 'sc.exe', ['start', this.serviceName], SC_ALREADY_RUNNING);
    return true;
  }

  async stop(reason: string): Promise<boolean> {
    console.log(`[ServiceController] Stopping ${this.serviceName} (${reason})`);
    await this.runChecked('stop', 'sc.exe', ['stop', this.serviceName], SC_NOT_STARTED);
    return true;
  }

  async restart(reason: string): Promise<boolean> {
    await this.stop(reason);
    const deadline = Date.now() + this.timeoutMs;
    while ((await this.queryState()) !== 'STOPPED') {
      if (Date.now() >= deadline) {
        throw new ServiceControlError('restart', 'transient', `${this.serviceName} did not stop in time`);
      }
      await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
    }
    return this.start(reason);
  }

  private async queryState(): Promise<string | null> {
    const output = await this.runChecked('query', 'sc.exe', ['query', this.serviceName]);
    return parseScQueryState(output.stdout);
  }
}

/**
 * Pick the controller for the host platform.
 */
export function createServiceController(
  serviceName: string,
  platform: NodeJS.Platform = process.platform,
  options: ServiceControllerOptions = {}
): ServiceController {
  return platform === 'win32'
    ? new WindowsServiceController(serviceName, options)
    : new SystemdServiceController(serviceName, options);
}
