/**
 * @fileoverview Orchestrator port: live state and the admin command inbox.
 */

import type { CommandInbox } from '../../command-inbox.js';
import type { OrchestratorSnapshot } from '../../orchestration-loop.js';

export interface OrchestratorPort {
  readonly commands: CommandInbox;
  getSnapshot(): OrchestratorSnapshot;
}
