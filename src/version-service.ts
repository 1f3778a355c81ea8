/**
 * @fileoverview SteamCMD-backed VersionService.
 *
 * The installed build comes from the app manifest in the install directory;
 * the latest build for the configured branch comes from `app_info_print`.
 *
 * @module version-service
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { execFileRunner } from './service-controller.js';
import type { CommandOutput, CommandRunner } from './service-controller.js';
import { ActionExecutionError } from './errors.js';
import { getErrorMessage } from './types.js';
import type { OperationResult, VersionCheckResult, VersionService } from './types.js';

/**
 * `"buildid"  "123456"` from an appmanifest_<id>.acf file.
 */
export function parseManifestBuildId(manifest: string): string | null {
  const match = /"buildid"\s+"(\d+)"/i.exec(manifest);
  return match ? match[1] : null;
}

/**
 * Build id of `branch` in `app_info_print` output.
 * Looks for the branch block inside `"branches"` and takes its first buildid.
 */
export function parseLatestBuildId(appInfo: string, branch = 'public'): string | null {
  const branchesAt = appInfo.search(/"branches"\s*\{/i);
  if (branchesAt < 0) return null;
  const afterBranches = appInfo.slice(branchesAt);

  const escaped = branch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const branchAt = afterBranches.search(new RegExp(`"${escaped}"\\s*\\{`, 'i'));
  if (branchAt < 0) return null;

  const block = afterBranches.slice(branchAt);
  const end = block.indexOf('}');
  const body = end >= 0 ? block.slice(0, end) : block;
  const match = /"buildid"\s+"(\d+)"/i.exec(body);
  return match ? match[1] : null;
}

export interface SteamCmdVersionServiceOptions {
  steamCmdPath: string;
  appId: string;
  installDir: string;
  branch: string;
  /** Budget for `app_info_print` (ms) */
  checkTimeoutMs: number;
  /** Budget for `app_update` (ms) */
  updateTimeoutMs: number;
  runner?: CommandRunner;
}

export class SteamCmdVersionService implements VersionService {
  private readonly options: SteamCmdVersionServiceOptions;
  private readonly runner: CommandRunner;

  constructor(options: SteamCmdVersionServiceOptions) {
    this.options = options;
    this.runner = options.runner ?? execFileRunner;
  }

  get manifestPath(): string {
    return join(this.options.installDir, 'steamapps', `appmanifest_${this.options.appId}.acf`);
  }

  async checkAvailable(): Promise<VersionCheckResult> {
    const installedBuild = await this.readInstalledBuild();
    const output = await this.runner(
      this.options.steamCmdPath,
      ['+login', 'anonymous', '+app_info_update', '1', '+app_info_print', this.options.appId, '+quit'],
      this.options.checkTimeoutMs
    );
    if (output.exitCode !== 0) {
      throw new ActionExecutionError('update', `app_info_print failed: ${this.describe(output)}`);
    }

    const latestBuild = parseLatestBuildId(output.stdout, this.options.branch);
    return {
      installedBuild,
      latestBuild,
      available: installedBuild !== null && latestBuild !== null && installedBuild !== latestBuild,
    };
  }

  async update(): Promise<OperationResult> {
    const args = ['+force_install_dir', this.options.installDir, '+login', 'anonymous', '+app_update', this.options.appId];
    if (this.options.branch !== 'public') {
      args.push('-beta', this.options.branch);
    }
    args.push('validate', '+quit');

    const output = await this.runner(this.options.steamCmdPath, args, this.options.updateTimeoutMs);
    if (output.exitCode === 0 && !/\bError!/.test(output.stdout)) {
      return { success: true };
    }
    return { success: false, error: this.describe(output) };
  }

  private async readInstalledBuild(): Promise<string | null> {
    try {
      return parseManifestBuildId(await readFile(this.manifestPath, 'utf-8'));
    } catch (err) {
      console.warn(`[VersionService] Cannot read ${this.manifestPath}: ${getErrorMessage(err)}`);
      return null;
    }
  }

  private describe(output: CommandOutput): string {
    if (output.timedOut) return 'timed out';
    if (output.spawnError) return output.spawnError;
    const errorLine = output.stdout.split(/\r?\n/).find((line) => /\bError!/.test(line));
    return errorLine?.trim() ?? `exit ${output.exitCode ?? 'unknown'}`;
  }
}
