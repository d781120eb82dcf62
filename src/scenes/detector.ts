/**
 * Scene defect detection. Pure and deterministic; no I/O.
 */

import {
  isAttributeMap,
  isEmptyAttributeValue,
  sceneEntities,
  sceneId,
  type SceneDocument,
  type SceneRecord,
} from './schema.js';
import type {
  DefectClass,
  DetectionReport,
  DuplicateIdFinding,
  EmptyAttributesFinding,
  Finding,
} from './types.js';

/**
 * One finding per id held by more than one record. Records missing an id
 * group under "". Groups are ordered by first occurrence, members by
 * document order.
 */
export function findDuplicateIds(doc: SceneDocument): DuplicateIdFinding[] {
  const groups = new Map<string, SceneRecord[]>();

  for (const record of doc) {
    const id = sceneId(record);
    const group = groups.get(id);
    if (group) {
      group.push(record);
    } else {
      groups.set(id, [record]);
    }
  }

  const findings: DuplicateIdFinding[] = [];
  for (const [id, records] of groups) {
    if (records.length > 1) {
      const finding: DuplicateIdFinding = { kind: 'duplicate_id', id, records: Object.freeze(records) };
      findings.push(Object.freeze(finding));
    }
  }
  return findings;
}

export function countEmptyAttributes(record: SceneRecord): number {
  let count = 0;
  for (const [, config] of sceneEntities(record)) {
    if (!isAttributeMap(config)) continue;
    for (const value of Object.values(config)) {
      if (isEmptyAttributeValue(value)) count++;
    }
  }
  return count;
}

/**
 * One finding per record with at least one null or "" attribute value,
 * counted across all of its entities.
 */
export function findEmptyAttributes(doc: SceneDocument): EmptyAttributesFinding[] {
  const findings: EmptyAttributesFinding[] = [];
  for (const record of doc) {
    const count = countEmptyAttributes(record);
    if (count > 0) {
      const finding: EmptyAttributesFinding = { kind: 'empty_attributes', record, count };
      findings.push(Object.freeze(finding));
    }
  }
  return findings;
}

export function detect(doc: SceneDocument, defectClass: DefectClass): Finding[] {
  switch (defectClass) {
    case 'duplicate_ids':
      return findDuplicateIds(doc);
    case 'empty_attributes':
      return findEmptyAttributes(doc);
  }
}

export function detectAll(doc: SceneDocument): DetectionReport {
  return {
    duplicateIds: findDuplicateIds(doc),
    emptyAttributes: findEmptyAttributes(doc),
  };
}
