#!/usr/bin/env node
/**
 * @fileoverview Warden CLI entry point
 *
 * Sets up global error handlers and invokes the CLI parser.
 *
 * @module index
 */

import { program } from './cli.js';
import { ERROR_RESET_MS, MAX_CONSECUTIVE_ERRORS } from './config/orchestrator-timing.js';

// `run` is long-lived: log and continue on stray errors instead of exiting
const isDaemonMode = process.argv.includes('run');

// Track consecutive unhandled errors in daemon mode; exit after too many
let consecutiveErrors = 0;
let errorResetTimer: ReturnType<typeof setTimeout> | null = null;

function trackError(): void {
  consecutiveErrors++;
  if (errorResetTimer) clearTimeout(errorResetTimer);
  errorResetTimer = setTimeout(() => {
    consecutiveErrors = 0;
  }, ERROR_RESET_MS);
  errorResetTimer.unref();

  if (consecutiveErrors >= MAX_CONSECUTIVE_ERRORS) {
    console.error(`[FATAL] ${MAX_CONSECUTIVE_ERRORS} consecutive unhandled errors, exiting for the service manager to restart`);
    process.exit(1);
  }
}

process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err.message);
  if (isDaemonMode) {
    console.error('[RECOVERED] Warden continuing after uncaught exception:', err.stack);
    trackError();
  } else {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  if (isDaemonMode) {
    console.error('[RECOVERED] Warden continuing after unhandled rejection');
    trackError();
  } else {
    process.exit(1);
  }
});

program.parseAsync().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exit(1);
});
