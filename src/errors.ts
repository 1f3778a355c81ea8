/**
 * @fileoverview Error types raised by the warden and its collaborators.
 *
 * @module errors
 */

import type { ScheduledActionKind } from './types.js';

/**
 * How a service-control failure should be treated.
 * - `transient`: eligible for retry on a later tick
 * - `fatal`: permission or missing-service problems; surfaced to admins and
 *   not retried automatically
 */
export type ServiceErrorSeverity = 'transient' | 'fatal';

export class ServiceControlError extends Error {
  readonly operation: string;
  readonly severity: ServiceErrorSeverity;

  constructor(operation: string, severity: ServiceErrorSeverity, message: string) {
    super(`${operation} failed: ${message}`);
    this.name = 'ServiceControlError';
    this.operation = operation;
    this.severity = severity;
  }

  get isFatal(): boolean {
    return this.severity === 'fatal';
  }
}

/** An update, update check or backup that did not complete */
export class ActionExecutionError extends Error {
  readonly action: ScheduledActionKind | 'backup';

  constructor(action: ScheduledActionKind | 'backup', message: string) {
    super(message);
    this.name = 'ActionExecutionError';
    this.action = action;
  }
}

/** Invalid or unreadable configuration; `issues` lists every problem found */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
