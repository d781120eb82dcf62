/**
 * Scene repair transforms.
 *
 * Both transforms work on a deep copy and return it; the input document
 * is left as loaded so the pipeline keeps it for diagnostics.
 */

import { isAttributeMap, isEmptyAttributeValue, sceneId, type SceneDocument } from './schema.js';
import type { DefectClass } from './types.js';
import { RepairError } from '../utils/errors.js';

export interface RepairOptions {
  /** Millisecond clock seeding the id suffix sequence */
  now?: () => number;
  /** Candidate ids tried per duplicate before giving up */
  maxIdAttempts?: number;
}

const DEFAULT_MAX_ID_ATTEMPTS = 1000;

/**
 * Keep the first holder of each id; rename later holders to
 * `{id}_{suffix}`. Suffixes increase monotonically from the clock, and a
 * candidate already used anywhere in the document is skipped.
 * @throws RepairError when no free id is found within maxIdAttempts
 */
export function resolveDuplicateIds(doc: SceneDocument, options: RepairOptions = {}): SceneDocument {
  const maxAttempts = options.maxIdAttempts ?? DEFAULT_MAX_ID_ATTEMPTS;
  const repaired = structuredClone(doc);

  // Every original id is taken, including ones that appear later in the file
  const reserved = new Set(repaired.map(sceneId));
  const seen = new Set<string>();
  let suffix = (options.now ?? Date.now)();

  for (const record of repaired) {
    const id = sceneId(record);
    if (!seen.has(id)) {
      seen.add(id);
      continue;
    }

    let candidate = `${id}_${suffix}`;
    let attempts = 1;
    while (reserved.has(candidate)) {
      if (attempts >= maxAttempts) {
        throw new RepairError(`No free id for duplicate '${id}' after ${attempts} attempts`);
      }
      suffix++;
      attempts++;
      candidate = `${id}_${suffix}`;
    }
    suffix++;

    record.id = candidate;
    reserved.add(candidate);
    seen.add(candidate);
  }

  return repaired;
}

/**
 * Drop null and "" attribute values. Entities left with no attributes
 * stay as `{}`; no entity or record is removed.
 */
export function stripEmptyAttributes(doc: SceneDocument): SceneDocument {
  const repaired = structuredClone(doc);

  for (const record of repaired) {
    for (const config of Object.values(record.entities ?? {})) {
      if (!isAttributeMap(config)) continue;
      for (const [attribute, value] of Object.entries(config)) {
        if (isEmptyAttributeValue(value)) {
          delete config[attribute];
        }
      }
    }
  }

  return repaired;
}

export function applyRepair(doc: SceneDocument, defectClass: DefectClass, options: RepairOptions = {}): SceneDocument {
  switch (defectClass) {
    case 'duplicate_ids':
      return resolveDuplicateIds(doc, options);
    case 'empty_attributes':
      return stripEmptyAttributes(doc);
  }
}
