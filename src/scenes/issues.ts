/**
 * Repair issue payloads.
 *
 * Shapes findings into the fields a host's issue notifier renders:
 * `{name, id}` per duplicate and `{name, id, empty_count}` per record
 * with empty attributes.
 */

import { sceneId, sceneName } from './schema.js';
import type { DefectClass, DetectionReport, DuplicateIdFinding, EmptyAttributesFinding } from './types.js';
import { RepairError } from '../utils/errors.js';

export const REPAIR_DUPLICATE_SCENE_IDS = 'duplicate_scene_ids';
export const REPAIR_EMPTY_SCENE_ATTRIBUTES = 'empty_scene_attributes';

export type RepairIssueId = typeof REPAIR_DUPLICATE_SCENE_IDS | typeof REPAIR_EMPTY_SCENE_ATTRIBUTES;

export interface DuplicateIdEntry {
  name: string;
  id: string;
}

export interface EmptyAttributeEntry {
  name: string;
  id: string;
  empty_count: number;
}

export interface RepairIssue {
  issue_id: RepairIssueId;
  defect_class: DefectClass;
  severity: 'error' | 'warning';
  is_fixable: true;
  translation_key: RepairIssueId;
  placeholders: {
    scene_count: string;
    scene_list: string;
  };
}

/**
 * Flattened duplicate entries, group by group
 */
export function toDuplicateIdEntries(findings: readonly DuplicateIdFinding[]): DuplicateIdEntry[] {
  return findings.flatMap((finding) =>
    finding.records.map((record) => ({ name: sceneName(record), id: sceneId(record) }))
  );
}

export function toEmptyAttributeEntries(findings: readonly EmptyAttributesFinding[]): EmptyAttributeEntry[] {
  return findings.map((finding) => ({
    name: sceneName(finding.record),
    id: sceneId(finding.record),
    empty_count: finding.count,
  }));
}

export function buildRepairIssues(report: DetectionReport): RepairIssue[] {
  const issues: RepairIssue[] = [];

  const duplicates = toDuplicateIdEntries(report.duplicateIds);
  if (duplicates.length > 0) {
    issues.push({
      issue_id: REPAIR_DUPLICATE_SCENE_IDS,
      defect_class: 'duplicate_ids',
      severity: 'error',
      is_fixable: true,
      translation_key: REPAIR_DUPLICATE_SCENE_IDS,
      placeholders: {
        scene_count: String(duplicates.length),
        scene_list: duplicates.map((entry) => `- ${entry.name} (ID: ${entry.id})`).join('\n'),
      },
    });
  }

  const empty = toEmptyAttributeEntries(report.emptyAttributes);
  if (empty.length > 0) {
    issues.push({
      issue_id: REPAIR_EMPTY_SCENE_ATTRIBUTES,
      defect_class: 'empty_attributes',
      severity: 'warning',
      is_fixable: true,
      translation_key: REPAIR_EMPTY_SCENE_ATTRIBUTES,
      placeholders: {
        scene_count: String(empty.length),
        scene_list: empty.map((entry) => `- ${entry.name} has ${entry.empty_count} empty attributes`).join('\n'),
      },
    });
  }

  return issues;
}

/**
 * Map a fix request for an issue back to the defect class to repair
 * @throws RepairError for unknown issue ids
 */
export function issueIdToDefectClass(issueId: string): DefectClass {
  switch (issueId) {
    case REPAIR_DUPLICATE_SCENE_IDS:
      return 'duplicate_ids';
    case REPAIR_EMPTY_SCENE_ATTRIBUTES:
      return 'empty_attributes';
    default:
      throw new RepairError(`Unknown repair issue ${issueId}`);
  }
}
