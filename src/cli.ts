/**
 * @fileoverview Command-line interface.
 *
 * - `warden run` starts the orchestration loop and the admin API
 * - `warden check-config` validates the configuration file
 * - `warden next-restart` prints the next periodic restart
 *
 * @module cli
 */

import { Command } from 'commander';
import { ConfigError } from './errors.js';
import { getErrorMessage, type Notifier } from './types.js';
import { defaultConfigPath, loadConfig, type WardenConfig } from './config/warden-config.js';
import { LIFECYCLE_TRIM_INTERVAL_MS, SERVICE_EXEC_TIMEOUT_MS, VERSION_CHECK_TIMEOUT_MS } from './config/orchestrator-timing.js';
import { createServiceController } from './service-controller.js';
import { LogTailer } from './log-tailer.js';
import { CommandInbox } from './command-inbox.js';
import { ConsoleNotifier, WebhookNotifier } from './notifier.js';
import { SteamCmdVersionService } from './version-service.js';
import { DirectoryBackupService } from './backup-service.js';
import { AuditLogStopEvidence } from './intentional-stop-evidence.js';
import { WardenLifecycleLog } from './warden-lifecycle-log.js';
import { nextOccurrence } from './periodic-scheduler.js';
import { OrchestrationLoop, createOrchestratorContext, snapshotContext } from './orchestration-loop.js';
import { WebServer } from './web/server.js';
import { CleanupManager } from './utils/index.js';

export interface Warden {
  loop: OrchestrationLoop;
  web: WebServer | null;
  lifecycleLog: WardenLifecycleLog;
  commands: CommandInbox;
}

/**
 * Wire the production adapters around an orchestration loop.
 */
export function buildWarden(config: WardenConfig, options: { api: boolean }): Warden {
  const lifecycleLog = new WardenLifecycleLog(config.auditLogPath);
  const logSource = new LogTailer(config.serverLogPath);
  const commands = new CommandInbox();

  const notifiers: Notifier[] = [new ConsoleNotifier()];
  if (config.webhook) {
    notifiers.push(new WebhookNotifier(config.webhook));
  }

  const ctx = createOrchestratorContext(config, {
    controller: createServiceController(config.serviceName, process.platform, { timeoutMs: SERVICE_EXEC_TIMEOUT_MS }),
    logSource,
    commands,
    notifiers,
    versionService: new SteamCmdVersionService({
      steamCmdPath: config.updater.steamCmdPath,
      appId: config.updater.appId,
      installDir: config.updater.installDir || config.serverDataPath,
      branch: config.updater.branch,
      checkTimeoutMs: VERSION_CHECK_TIMEOUT_MS,
      updateTimeoutMs: config.updateTimeoutMinutes * 60_000,
    }),
    backupService: new DirectoryBackupService({
      backupDir: config.backupDir,
      maxBackups: config.maxBackups,
      compress: config.compressBackups,
    }),
    stopEvidence: new AuditLogStopEvidence(lifecycleLog, logSource),
    auditLog: lifecycleLog,
  });
  const loop = new OrchestrationLoop(ctx);

  const web =
    options.api && config.api.enabled
      ? new WebServer(
          { host: config.api.host, port: config.api.port, token: config.api.token },
          { commands, snapshot: () => snapshotContext(ctx), auditLog: lifecycleLog }
        )
      : null;

  return { loop, web, lifecycleLog, commands };
}

/**
 * One line describing the next periodic restart.
 */
export function describeNextRestart(config: Pick<WardenConfig, 'restartTimes'>, now: number): string {
  const next = nextOccurrence(config.restartTimes, now);
  if (next === null) return 'No periodic restarts configured';
  const minutes = Math.round((next - now) / 60_000);
  const when = new Date(next);
  const hh = String(when.getHours()).padStart(2, '0');
  const mm = String(when.getMinutes()).padStart(2, '0');
  const day = when.getDate() === new Date(now).getDate() ? 'today' : 'tomorrow';
  return `Next restart at ${hh}:${mm} ${day} (in ${minutes} minute${minutes === 1 ? '' : 's'})`;
}

function loadConfigOrExit(path: string): WardenConfig {
  try {
    return loadConfig(path);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error(`Failed to load config: ${getErrorMessage(err)}`);
    }
    process.exit(1);
  }
}

async function runWarden(configPath: string, api: boolean): Promise<void> {
  const config = loadConfigOrExit(configPath);
  const warden = buildWarden(config, { api });
  const cleanup = new CleanupManager();

  await warden.lifecycleLog.trimIfNeeded();
  cleanup.setInterval(
    () => {
      warden.lifecycleLog.trimIfNeeded().catch((err) => {
        console.error(`[Warden] Audit log trim failed: ${getErrorMessage(err)}`);
      });
    },
    LIFECYCLE_TRIM_INTERVAL_MS,
    { description: 'audit log trim' }
  );

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    console.log(`[Warden] Received ${signal}, shutting down`);
    cleanup.dispose();
    Promise.all([warden.loop.stop(), warden.web?.stop()])
      .then(() => warden.lifecycleLog.flush())
      .then(() => process.exit(0))
      .catch((err) => {
        console.error(`[Warden] Shutdown failed: ${getErrorMessage(err)}`);
        process.exit(1);
      });
  };
  const onSigint = (): void => shutdown('SIGINT');
  const onSigterm = (): void => shutdown('SIGTERM');
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);
  cleanup.registerListener(process, 'SIGINT', onSigint, 'SIGINT handler');
  cleanup.registerListener(process, 'SIGTERM', onSigterm, 'SIGTERM handler');

  if (warden.web) {
    await warden.web.start();
  }
  await warden.loop.start();
}

export const program = new Command();

program
  .name('warden')
  .description('Keeps a dedicated game server running, updated and backed up')
  .version('0.3.0');

program
  .command('run')
  .description('Start the orchestration loop')
  .option('-c, --config <path>', 'Config file', defaultConfigPath())
  .option('--no-api', 'Do not start the admin HTTP API')
  .action(async (opts: { config: string; api: boolean }) => {
    await runWarden(opts.config, opts.api);
  });

program
  .command('check-config')
  .description('Validate the configuration file')
  .option('-c, --config <path>', 'Config file', defaultConfigPath())
  .action((opts: { config: string }) => {
    const config = loadConfigOrExit(opts.config);
    console.log(`Config OK: ${opts.config}`);
    console.log(`  service:        ${config.serviceName}`);
    console.log(`  server log:     ${config.serverLogPath}`);
    console.log(`  restart times:  ${config.restartTimes.length > 0 ? config.restartTimes.join(', ') : '(none)'}`);
    console.log(`  backups:        every ${config.backupIntervalMinutes}m to ${config.backupDir}, keep ${config.maxBackups}`);
    console.log(`  update checks:  every ${config.updateCheckIntervalMinutes}m`);
    console.log(`  admin API:      ${config.api.enabled ? `${config.api.host}:${config.api.port}` : 'disabled'}`);
  });

program
  .command('next-restart')
  .description('Print the next periodic restart time')
  .option('-c, --config <path>', 'Config file', defaultConfigPath())
  .action((opts: { config: string }) => {
    const config = loadConfigOrExit(opts.config);
    console.log(describeNextRestart(config, Date.now()));
  });
