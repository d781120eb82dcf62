/**
 * Scene repair types
 */

import type { SceneDocument, SceneRecord } from './schema.js';

export type { SceneDocument, SceneRecord };

/**
 * Defect classes the engine can detect and repair
 */
export const DEFECT_CLASSES = ['duplicate_ids', 'empty_attributes'] as const;
export type DefectClass = (typeof DEFECT_CLASSES)[number];

export function isDefectClass(value: string): value is DefectClass {
  return DEFECT_CLASSES.some((defectClass) => defectClass === value);
}

/**
 * Records sharing one id, in document order
 */
export interface DuplicateIdFinding {
  readonly kind: 'duplicate_id';
  readonly id: string;
  readonly records: readonly SceneRecord[];
}

/**
 * A record holding `count` null or empty attribute values across its entities
 */
export interface EmptyAttributesFinding {
  readonly kind: 'empty_attributes';
  readonly record: SceneRecord;
  readonly count: number;
}

export type Finding = DuplicateIdFinding | EmptyAttributesFinding;

/**
 * Findings of every class for one document
 */
export interface DetectionReport {
  duplicateIds: DuplicateIdFinding[];
  emptyAttributes: EmptyAttributesFinding[];
}

/**
 * Recovery artifact for one repair attempt
 */
export interface BackupHandle {
  readonly originalPath: string;
  readonly backupPath: string;
  readonly createdAt: Date;
}

/**
 * Repair pipeline states
 */
export type PipelineState =
  | 'idle'
  | 'detecting'
  | 'done'
  | 'backing_up'
  | 'repairing'
  | 'writing'
  | 'verifying'
  | 'committed'
  | 'rolling_back'
  | 'rolled_back'
  | 'failed';

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
  at: Date;
}

/**
 * Successful pipeline result. Failures are thrown as SceneRepairError.
 */
export interface RepairOutcome {
  status: 'done' | 'committed';
  path: string;
  defectClass: DefectClass;
  /** Findings confirmed on the fresh load that preceded the repair */
  findings: Finding[];
  backup?: BackupHandle;
  transitions: StateTransition[];
  /** The signal fired after writing began; honoured once the run finished */
  cancellationDeferred: boolean;
}

export interface RepairRunOptions {
  signal?: AbortSignal;
  onTransition?: (transition: StateTransition) => void;
}

/**
 * Host collaborator told to reload whatever consumes the repaired file
 */
export interface ReloadNotifier {
  requestReload(path: string, defectClass: DefectClass): void | Promise<void>;
}
