/**
 * @fileoverview Notification delivery.
 *
 * The orchestration loop hands notifications to a NotificationDispatcher,
 * which delivers them one at a time on a chained promise queue so a slow chat
 * webhook never holds up a tick. Sinks implement the Notifier interface:
 * ConsoleNotifier writes to the log, WebhookNotifier posts chat-webhook
 * messages with axios.
 *
 * @module notifier
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { WEBHOOK_TIMEOUT_MS } from './config/orchestrator-timing.js';
import { getErrorMessage } from './types.js';
import type { NotificationAudience, NotificationEvent, NotificationPayload, Notifier } from './types.js';

// ========== Message Templates ==========

function str(value: NotificationPayload[string], fallback = ''): string {
  return value === undefined || value === null ? fallback : String(value);
}

function timeOf(value: NotificationPayload[string]): string {
  if (typeof value !== 'number') return str(value, 'unknown time');
  const date = new Date(value);
  return `${String(date.getHours()).padStart(2, '0')}:${String(date.getMinutes()).padStart(2, '0')}`;
}

function plural(n: NotificationPayload[string], unit: string): string {
  return `${str(n, '0')} ${unit}${n === 1 ? '' : 's'}`;
}

const TEMPLATES: Record<NotificationEvent, (p: NotificationPayload) => string> = {
  status_changed: (p) => `Server status: ${str(p.from, 'unknown')} -> ${str(p.to, 'unknown')}. ${str(p.message)}`.trim(),
  action_scheduled: (p) =>
    `${str(p.kind)} scheduled in ${plural(p.delayMinutes, 'minute')} by ${str(p.requestedBy, 'unknown')}` +
    (p.replaced ? ' (replaces the previous request)' : ''),
  action_cancelled: (p) => `Scheduled ${str(p.kind)} cancelled by ${str(p.requestedBy, 'unknown')}`,
  action_warning: (p) => `Server ${str(p.kind)} in ${plural(p.minutes, 'minute')}`,
  action_completed: (p) => `Scheduled ${str(p.kind)} completed`,
  action_failed: (p) => `Scheduled ${str(p.kind)} failed: ${str(p.error, 'unknown error')}`,
  action_superseded: (p) => `Scheduled ${str(p.kind)} dropped: ${str(p.by)} ran in the same window`,
  periodic_restart_warning: (p) => `Scheduled restart in ${plural(p.minutes, 'minute')} (at ${timeOf(p.restartAt)})`,
  periodic_restart_completed: () => 'Scheduled restart completed',
  periodic_restart_failed: (p) => `Scheduled restart failed: ${str(p.error, 'unknown error')}`,
  periodic_restart_skipped: (p) => `Scheduled restart at ${timeOf(p.restartAt)} skipped`,
  periodic_restart_covered: (p) => `Scheduled restart at ${timeOf(p.restartAt)} covered by ${str(p.by)}`,
  periodic_skip_armed: (p) => `Next scheduled restart (${timeOf(p.restartAt)}) will be skipped`,
  backup_completed: (p) => `Backup completed${p.path ? `: ${str(p.path)}` : ''}`,
  backup_failed: (p) => `Backup failed: ${str(p.error, 'unknown error')}`,
  update_available: (p) =>
    `Update available (build ${str(p.installedBuild, '?')} -> ${str(p.latestBuild, '?')}), ` +
    `updating in ${plural(p.delayMinutes, 'minute')}`,
  update_check_failed: (p) => `Update check failed: ${str(p.error, 'unknown error')}`,
  recovery_restart: (p) => `Server not running, restart attempt ${str(p.attempt)}/${str(p.maxAttempts)}`,
  recovery_failed: (p) => `Recovery restart failed: ${str(p.error, 'unknown error')}`,
  recovery_paused: (p) =>
    `Auto-recovery paused: ${str(p.reason)}` + (p.attempts !== undefined ? ` after ${plural(p.attempts, 'attempt')}` : ''),
  intentional_stop_detected: () => 'Server stop looks intentional, auto-recovery suspended',
  startup_timeout: (p) => `Server did not come online within ${plural(p.minutes, 'minute')}`,
  service_missing: (p) => `Service ${str(p.serviceName)} is not installed`,
  command_rejected: (p) => `Command rejected: ${str(p.error, 'invalid command')}`,
};

/**
 * Render a notification as a single chat line.
 */
export function formatNotification(event: NotificationEvent, payload: NotificationPayload): string {
  return TEMPLATES[event](payload);
}

// ========== Sinks ==========

export class ConsoleNotifier implements Notifier {
  async send(audience: NotificationAudience, event: NotificationEvent, payload: NotificationPayload): Promise<void> {
    console.log(`[Notify:${audience}] ${formatNotification(event, payload)}`);
  }
}

export interface WebhookNotifierOptions {
  url: string;
  adminUrl?: string;
  username: string;
  timeoutMs?: number;
  /** Injected for tests */
  client?: AxiosInstance;
}

/**
 * Posts `{username, content}` chat-webhook messages.
 */
export class WebhookNotifier implements Notifier {
  private readonly client: AxiosInstance;
  private readonly options: WebhookNotifierOptions;

  constructor(options: WebhookNotifierOptions) {
    this.options = options;
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs ?? WEBHOOK_TIMEOUT_MS,
        headers: { 'Content-Type': 'application/json', 'User-Agent': 'ServerWarden-Webhook/1.0' },
      });
  }

  async send(audience: NotificationAudience, event: NotificationEvent, payload: NotificationPayload): Promise<void> {
    const url = audience === 'admin' ? (this.options.adminUrl ?? this.options.url) : this.options.url;
    const prefix = audience === 'admin' && !this.options.adminUrl ? '[admin] ' : '';
    await this.client.post(url, {
      username: this.options.username,
      content: prefix + formatNotification(event, payload),
    });
  }
}

// ========== Dispatcher ==========

export interface DispatchedNotification {
  audience: NotificationAudience;
  event: NotificationEvent;
  payload: NotificationPayload;
}

/**
 * Fans notifications out to every sink on a serialized queue.
 * `notify()` never throws and never blocks; delivery failures are logged.
 */
export class NotificationDispatcher {
  private readonly sinks: Notifier[];
  private queue: Promise<void> = Promise.resolve();
  private delivered = 0;
  private failed = 0;

  constructor(sinks: Notifier[]) {
    this.sinks = sinks;
  }

  notify(audience: NotificationAudience, event: NotificationEvent, payload: NotificationPayload = {}): void {
    this.queue = this.queue.then(() => this.deliver({ audience, event, payload }));
  }

  /** Resolves once everything queued so far has been attempted */
  flush(): Promise<void> {
    return this.queue;
  }

  get stats(): { delivered: number; failed: number } {
    return { delivered: this.delivered, failed: this.failed };
  }

  private async deliver(notification: DispatchedNotification): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.send(notification.audience, notification.event, notification.payload);
        this.delivered++;
      } catch (err) {
        this.failed++;
        console.error(`[Notifier] Failed to deliver ${notification.event}: ${getErrorMessage(err)}`);
      }
    }
  }
}
