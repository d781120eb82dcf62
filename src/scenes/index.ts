/**
 * Scene configuration repair engine
 */

import { BackupManager } from './backup-manager.js';
import { SceneDocumentStore } from './document-store.js';
import { RepairPipeline, type RepairPipelineDeps } from './pipeline.js';
import { getConfig } from '../config/index.js';
import { log } from '../utils/telemetry.js';

export * from './types.js';
export * from './schema.js';
export { SceneDocumentStore } from './document-store.js';
export { BackupManager, backupPathFor, formatBackupTimestamp } from './backup-manager.js';
export { findDuplicateIds, findEmptyAttributes, countEmptyAttributes, detect, detectAll } from './detector.js';
export { resolveDuplicateIds, stripEmptyAttributes, applyRepair, type RepairOptions } from './repairer.js';
export { PathLock, sharedPathLock } from './path-lock.js';
export { RepairPipeline, type RepairPipelineDeps } from './pipeline.js';
export * from './issues.js';
export * from '../utils/errors.js';

/**
 * Pipeline wired from environment configuration. Explicit deps win.
 */
export function createRepairPipeline(deps: RepairPipelineDeps = {}): RepairPipeline {
  const config = getConfig();
  const logger = deps.logger ?? log;

  return new RepairPipeline({
    ...deps,
    logger,
    store: deps.store ?? new SceneDocumentStore({ logger }),
    backups: deps.backups ?? new BackupManager({ logger, maxAttempts: config.repair.backupMaxAttempts }),
    repairOptions: { maxIdAttempts: config.repair.maxIdAttempts, ...deps.repairOptions },
    verifyContent: deps.verifyContent ?? config.repair.verifyContent,
  });
}
