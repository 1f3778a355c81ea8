/**
 * @fileoverview Barrel export for all port interfaces.
 *
 * Ports define the capabilities that route modules can depend on.
 * WebServer implements all ports; route modules declare only what they need
 * via TypeScript intersection types (e.g., OrchestratorPort & AuditPort).
 */

export type { OrchestratorPort } from './orchestrator-port.js';
export type { AuditPort } from './audit-port.js';
