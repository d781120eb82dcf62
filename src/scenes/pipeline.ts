/**
 * Scene Repair Pipeline
 *
 * detecting → (done) | backing_up → repairing → writing → verifying →
 * committed, or rolling_back → rolled_back | failed.
 *
 * The whole run holds the per-path lock. Detection always runs on a
 * fresh load, never on findings from an earlier scan. Once writing has
 * begun the run is not cancellable: it ends committed or rolled back.
 */

import { isDeepStrictEqual } from 'node:util';
import { BackupManager } from './backup-manager.js';
import { SceneDocumentStore } from './document-store.js';
import { detect, detectAll } from './detector.js';
import { PathLock, sharedPathLock } from './path-lock.js';
import { applyRepair, type RepairOptions } from './repairer.js';
import { SceneDocumentSchema, type SceneDocument } from './schema.js';
import type {
  BackupHandle,
  DefectClass,
  DetectionReport,
  PipelineState,
  ReloadNotifier,
  RepairOutcome,
  RepairRunOptions,
  StateTransition,
} from './types.js';
import {
  ParseError,
  RepairCancelledError,
  RollbackFailure,
  SceneRepairError,
  VerificationError,
  describeCause,
} from '../utils/errors.js';
import { emit, log, TelemetryEvents, type Logger } from '../utils/telemetry.js';

export interface RepairPipelineDeps {
  store?: SceneDocumentStore;
  backups?: BackupManager;
  /** Defaults to the process-wide lock */
  lock?: PathLock;
  notifier?: ReloadNotifier;
  logger?: Logger;
  repairOptions?: RepairOptions;
  /** Also require the reloaded document to equal the repaired one */
  verifyContent?: boolean;
  clock?: () => Date;
}

/**
 * State tracking for a single run
 */
class RepairRun {
  state: PipelineState = 'idle';
  writeStarted = false;
  readonly transitions: StateTransition[] = [];

  constructor(
    readonly path: string,
    readonly defectClass: DefectClass,
    private readonly options: RepairRunOptions,
    private readonly logger: Logger,
    private readonly clock: () => Date
  ) {}

  transition(to: PipelineState): void {
    const transition: StateTransition = { from: this.state, to, at: this.clock() };
    this.state = to;
    this.transitions.push(transition);
    if (to === 'writing') {
      this.writeStarted = true;
    }

    this.logger.debug(
      { path: this.path, defect_class: this.defectClass, from: transition.from, to },
      'Repair state transition'
    );

    if (this.options.onTransition) {
      try {
        this.options.onTransition(transition);
      } catch (error) {
        this.logger.warn({ error, path: this.path, to }, 'Transition observer threw');
      }
    }
  }

  /**
   * Abort point; only used before writing
   */
  checkCancelled(nextStage: PipelineState): void {
    if (this.options.signal?.aborted) {
      throw new RepairCancelledError(this.path, nextStage);
    }
  }

  get cancellationDeferred(): boolean {
    return this.writeStarted && Boolean(this.options.signal?.aborted);
  }
}

export class RepairPipeline {
  private readonly store: SceneDocumentStore;
  private readonly backups: BackupManager;
  private readonly lock: PathLock;
  private readonly notifier?: ReloadNotifier;
  private readonly logger: Logger;
  private readonly repairOptions: RepairOptions;
  private readonly verifyContent: boolean;
  private readonly clock: () => Date;

  constructor(deps: RepairPipelineDeps = {}) {
    this.logger = deps.logger ?? log;
    this.store = deps.store ?? new SceneDocumentStore({ logger: this.logger });
    this.backups = deps.backups ?? new BackupManager({ logger: this.logger });
    this.lock = deps.lock ?? sharedPathLock;
    this.notifier = deps.notifier;
    this.repairOptions = deps.repairOptions ?? {};
    this.verifyContent = deps.verifyContent ?? true;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Detection trigger for records already loaded by the host.
   * @throws ParseError when the records do not match the scene schema
   */
  detect(records: unknown): DetectionReport {
    const parsed = SceneDocumentSchema.safeParse(records);
    if (!parsed.success) {
      throw new ParseError(`Invalid scene records: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`, undefined, parsed.error);
    }

    const report = detectAll(parsed.data);
    if (report.duplicateIds.length > 0) {
      this.logger.warn({ count: report.duplicateIds.length }, 'Found scenes with duplicate IDs');
      emit(TelemetryEvents.IssuesDetected, { defect_class: 'duplicate_ids', count: report.duplicateIds.length });
    }
    if (report.emptyAttributes.length > 0) {
      this.logger.warn({ count: report.emptyAttributes.length }, 'Found scenes with empty attributes');
      emit(TelemetryEvents.IssuesDetected, { defect_class: 'empty_attributes', count: report.emptyAttributes.length });
    }
    return report;
  }

  /**
   * Repair trigger. Resolves when the file is clean (`done`) or the repair
   * was written and verified (`committed`); otherwise rejects with a
   * SceneRepairError.
   */
  async repair(path: string, defectClass: DefectClass, options: RepairRunOptions = {}): Promise<RepairOutcome> {
    return this.lock.run(path, () => this.execute(path, defectClass, options));
  }

  private async execute(path: string, defectClass: DefectClass, options: RepairRunOptions): Promise<RepairOutcome> {
    const run = new RepairRun(path, defectClass, options, this.logger, this.clock);
    const startedAt = Date.now();
    emit(TelemetryEvents.RepairStarted, { path, defect_class: defectClass });

    try {
      run.checkCancelled('detecting');
      run.transition('detecting');
      const doc = await this.store.load(path);
      const findings = detect(doc, defectClass);

      if (findings.length === 0) {
        run.transition('done');
        emit(TelemetryEvents.RepairNoop, { path, defect_class: defectClass, duration_ms: Date.now() - startedAt });
        return { status: 'done', path, defectClass, findings, transitions: run.transitions, cancellationDeferred: false };
      }

      run.checkCancelled('backing_up');
      run.transition('backing_up');
      const backup = await this.backups.backup(path);

      run.checkCancelled('repairing');
      run.transition('repairing');
      const repaired = applyRepair(doc, defectClass, this.repairOptions);

      run.checkCancelled('writing');
      await this.writeAndVerify(run, backup, repaired);

      run.transition('committed');
      await this.notifyReload(path, defectClass);

      if (run.cancellationDeferred) {
        this.logger.info({ path, defect_class: defectClass }, 'Cancellation requested during write; honoured after commit');
      }
      emit(TelemetryEvents.RepairCommitted, {
        path,
        defect_class: defectClass,
        findings: findings.length,
        backup_path: backup.backupPath,
        duration_ms: Date.now() - startedAt,
      });

      return {
        status: 'committed',
        path,
        defectClass,
        findings,
        backup,
        transitions: run.transitions,
        cancellationDeferred: run.cancellationDeferred,
      };
    } catch (error) {
      if (error instanceof RepairCancelledError) {
        this.logger.info({ path, defect_class: defectClass, state: run.state }, 'Repair cancelled');
        emit(TelemetryEvents.RepairCancelled, { path, defect_class: defectClass, duration_ms: Date.now() - startedAt });
        throw error;
      }

      this.logger.error(
        {
          path,
          defect_class: defectClass,
          state: run.state,
          code: error instanceof SceneRepairError ? error.code : 'INTERNAL',
          error: describeCause(error),
        },
        'Scene repair failed'
      );
      emit(TelemetryEvents.RepairFailed, {
        path,
        defect_class: defectClass,
        state: run.state,
        error_code: error instanceof SceneRepairError ? error.code : 'INTERNAL',
        duration_ms: Date.now() - startedAt,
      });
      throw error;
    }
  }

  /**
   * Write, then reload to verify. Any failure here restores the backup.
   */
  private async writeAndVerify(run: RepairRun, backup: BackupHandle, repaired: SceneDocument): Promise<void> {
    try {
      run.transition('writing');
      await this.store.write(run.path, repaired);

      run.transition('verifying');
      await this.verify(run, repaired);
    } catch (error) {
      const cause =
        error instanceof SceneRepairError
          ? error
          : new VerificationError(`Repair of ${run.path} failed: ${describeCause(error)}`, run.path, error);
      await this.rollback(run, backup, cause);
    }
  }

  private async verify(run: RepairRun, expected: SceneDocument): Promise<void> {
    let reloaded: SceneDocument;
    try {
      reloaded = await this.store.load(run.path);
    } catch (error) {
      throw new VerificationError(`Repaired ${run.path} failed to reload: ${describeCause(error)}`, run.path, error);
    }

    if (!this.verifyContent) {
      return;
    }

    if (!isDeepStrictEqual(reloaded, expected)) {
      throw new VerificationError(`Reloaded ${run.path} differs from the repaired document`, run.path);
    }

    const remaining = detect(reloaded, run.defectClass);
    if (remaining.length > 0) {
      throw new VerificationError(
        `${remaining.length} ${run.defectClass} finding(s) remain in ${run.path} after repair`,
        run.path
      );
    }
  }

  private async rollback(run: RepairRun, backup: BackupHandle, cause: SceneRepairError): Promise<never> {
    run.transition('rolling_back');
    this.logger.warn(
      { path: run.path, backup_path: backup.backupPath, error: cause.message },
      'Repair did not verify, restoring backup'
    );

    try {
      await this.backups.restore(backup);
    } catch (restoreError) {
      run.transition('failed');
      throw new RollbackFailure(run.path, backup.backupPath, cause, restoreError);
    }

    run.transition('rolled_back');
    emit(TelemetryEvents.RepairRolledBack, {
      path: run.path,
      defect_class: run.defectClass,
      backup_path: backup.backupPath,
      error_code: cause.code,
    });
    throw cause;
  }

  private async notifyReload(path: string, defectClass: DefectClass): Promise<void> {
    if (!this.notifier) {
      return;
    }

    try {
      await this.notifier.requestReload(path, defectClass);
    } catch (error) {
      this.logger.warn({ error, path, defect_class: defectClass }, 'Reload notification failed');
      emit(TelemetryEvents.ReloadNotifyFailed, { path, defect_class: defectClass, error: describeCause(error) });
    }
  }
}
