/**
 * @fileoverview Admin HTTP API for the warden.
 *
 * A small Fastify server exposing the orchestrator snapshot, the scheduled
 * action surface backed by the command inbox, and the audit log. The server
 * implements every port itself; route modules receive it as their context.
 *
 * @module web/server
 */

import Fastify, { type FastifyInstance } from 'fastify';
import { ApiErrorCode, createErrorResponse, getErrorMessage } from '../types.js';
import type { CommandInbox } from '../command-inbox.js';
import type { OrchestratorSnapshot } from '../orchestration-loop.js';
import type { LifecycleQuery } from '../warden-lifecycle-log.js';
import type { AuditLogReader } from '../intentional-stop-evidence.js';
import type { LifecycleEntry } from '../types/lifecycle.js';
import { registerAuthMiddleware, registerSecurityHeaders, type AuthState } from './middleware/auth.js';
import { registerActionRoutes, registerLifecycleRoutes, registerStatusRoutes } from './routes/index.js';
import type { AuditPort, OrchestratorPort } from './ports/index.js';

export interface WebServerOptions {
  host: string;
  port: number;
  /** Bearer token; the API is unauthenticated without one */
  token?: string;
}

export interface WebServerDeps {
  commands: CommandInbox;
  snapshot: () => OrchestratorSnapshot;
  auditLog: AuditLogReader;
}

export class WebServer implements OrchestratorPort, AuditPort {
  private readonly app: FastifyInstance;
  private readonly options: WebServerOptions;
  private readonly deps: WebServerDeps;
  private authState: AuthState = { authFailures: null };
  private routesReady = false;
  private listening = false;

  constructor(options: WebServerOptions, deps: WebServerDeps) {
    this.options = options;
    this.deps = deps;
    this.app = Fastify({ logger: false });
  }

  get commands(): CommandInbox {
    return this.deps.commands;
  }

  get fastify(): FastifyInstance {
    return this.app;
  }

  getSnapshot(): OrchestratorSnapshot {
    return this.deps.snapshot();
  }

  queryLifecycle(query: LifecycleQuery): Promise<LifecycleEntry[]> {
    return this.deps.auditLog.query(query);
  }

  /** Register hooks and routes. Idempotent; start() calls it. */
  async setupRoutes(): Promise<void> {
    if (this.routesReady) return;
    this.routesReady = true;

    registerSecurityHeaders(this.app);
    this.authState = registerAuthMiddleware(this.app, { token: this.options.token });

    this.app.setErrorHandler((error, _req, reply) => {
      const statusCode = error.statusCode ?? 500;
      console.error(`[WebServer] Request failed (${statusCode}): ${getErrorMessage(error)}`);
      const code = statusCode < 500 ? ApiErrorCode.INVALID_INPUT : ApiErrorCode.OPERATION_FAILED;
      reply.code(statusCode).send(createErrorResponse(code, getErrorMessage(error)));
    });

    registerStatusRoutes(this.app, this);
    registerActionRoutes(this.app, this);
    registerLifecycleRoutes(this.app, this);
    await this.app.ready();
  }

  async start(): Promise<void> {
    await this.setupRoutes();
    await this.app.listen({ port: this.options.port, host: this.options.host });
    this.listening = true;
    console.log(`[WebServer] Admin API listening on http://${this.options.host}:${this.options.port}`);

    const loopback = this.options.host === '127.0.0.1' || this.options.host === 'localhost' || this.options.host === '::1';
    if (!this.options.token && !loopback) {
      console.warn(`[WebServer] WARNING: no api.token set and bound to ${this.options.host}; anyone on the network can schedule actions`);
    }
  }

  async stop(): Promise<void> {
    this.authState.authFailures?.dispose();
    this.authState = { authFailures: null };
    await this.app.close();
    if (this.listening) {
      this.listening = false;
      console.log('[WebServer] Admin API stopped');
    }
  }
}
