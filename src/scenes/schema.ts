/**
 * Scene Configuration Schema
 *
 * Shape of a scene configuration document: a YAML sequence of scene
 * records, each mapping entity ids to the attributes a scene applies.
 */

import { z } from 'zod';

/**
 * Attribute value. Most are scalars; colour and position attributes
 * are lists (`rgb_color: [255, 0, 0]`) and some integrations nest maps.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(AttributeValueSchema),
    z.record(AttributeValueSchema),
  ])
);

export const AttributeMapSchema = z.record(AttributeValueSchema);
export type AttributeMap = z.infer<typeof AttributeMapSchema>;

/**
 * Per-entity scene config: an attribute map, or a bare target
 * state (`light.porch: "on"`) which carries no attributes.
 */
export const EntityConfigSchema = z.union([AttributeMapSchema, z.string()]);
export type EntityConfig = z.infer<typeof EntityConfigSchema>;

/**
 * Scene record. Unknown keys (icon, metadata, ...) pass through untouched
 * so a repair never drops user data. Numeric ids load as strings.
 */
export const SceneRecordSchema = z
  .object({
    id: z
      .union([z.string(), z.number()])
      .transform((value) => String(value))
      .optional(),
    name: z.string().optional(),
    entities: z.record(EntityConfigSchema).nullable().optional(),
  })
  .passthrough();
export type SceneRecord = z.infer<typeof SceneRecordSchema>;

/**
 * Whole document. An empty file parses to null and loads as no scenes.
 */
export const SceneDocumentSchema = z
  .array(SceneRecordSchema)
  .nullable()
  .transform((records) => records ?? []);
export type SceneDocument = z.infer<typeof SceneDocumentSchema>;

export function isAttributeMap(config: EntityConfig): config is AttributeMap {
  return typeof config !== 'string';
}

/**
 * Id used for grouping; a record without one groups under "".
 */
export function sceneId(record: SceneRecord): string {
  return record.id ?? '';
}

export function sceneName(record: SceneRecord): string {
  return record.name ?? 'Unknown';
}

export function sceneEntities(record: SceneRecord): Array<[string, EntityConfig]> {
  return Object.entries(record.entities ?? {});
}

export function isEmptyAttributeValue(value: AttributeValue): boolean {
  return value === null || value === '';
}
