/**
 * Scene Document Store
 *
 * Loads and writes the YAML scene configuration. Writes go to a temp
 * sibling that is renamed over the target, so a reader sees either the
 * previous or the new content.
 */

import { chmod, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import YAML, { isMap, isScalar, isSeq, type Document, type ScalarTag } from 'yaml';
import { SceneDocumentSchema, sceneId, type SceneDocument } from './schema.js';
import { IOError, NotFoundError, ParseError, errnoCode, describeCause } from '../utils/errors.js';
import { log, type Logger } from '../utils/telemetry.js';

export interface DocumentStoreOptions {
  logger?: Logger;
}

let tempCounter = 0;

/**
 * Unique temp name in the target's directory (rename must not cross devices)
 */
export function tempSiblingPath(path: string): string {
  tempCounter += 1;
  return join(dirname(path), `.${basename(path)}.tmp-${process.pid}-${Date.now()}-${tempCounter}`);
}

const TIMESTAMP_TAG = 'tag:yaml.org,2002:timestamp';

/**
 * Scene files are read by their host as YAML 1.1, where `on`, `off`, `yes`
 * and `no` are booleans. Dates are left as text rather than resolved.
 */
function withoutTimestamps<T extends string | { tag: string }>(tags: T[]): T[] {
  return tags.filter((tag) => (typeof tag === 'string' ? tag !== 'timestamp' : tag.tag !== TIMESTAMP_TAG));
}

/** Id written back exactly as it was read, unquoted */
class PlainIdText {
  constructor(readonly text: string) {}
}

const plainIdTag: ScalarTag = {
  tag: 'tag:yaml.org,2002:int',
  default: true,
  identify: (value) => value instanceof PlainIdText,
  resolve: (source) => source,
  stringify: (item) => (item.value instanceof PlainIdText ? item.value.text : String(item.value)),
};

/**
 * Replace numeric `id` scalars with their source text, so large or
 * zero-padded ids keep every digit. Returns the ids that were rewritten.
 */
function keepIdSource(document: Document): Set<string> {
  const plainIds = new Set<string>();
  if (!isSeq(document.contents)) {
    return plainIds;
  }
  for (const item of document.contents.items) {
    if (!isMap(item)) continue;
    const node = item.get('id', true);
    if (isScalar(node) && typeof node.value === 'number' && node.source !== undefined) {
      node.value = node.source;
      plainIds.add(node.source);
    }
  }
  return plainIds;
}

export class SceneDocumentStore {
  private readonly logger: Logger;
  /** Ids held as plain numbers in the last load of each path */
  private readonly plainIds = new Map<string, Set<string>>();

  constructor(options: DocumentStoreOptions = {}) {
    this.logger = options.logger ?? log;
  }

  /**
   * Parse YAML text into a validated document.
   * @throws ParseError on malformed YAML or schema mismatch
   */
  parse(text: string, path?: string): SceneDocument {
    const document = YAML.parseDocument(text, { version: '1.1', customTags: withoutTimestamps });
    const [syntaxError] = document.errors;
    if (syntaxError) {
      throw new ParseError(`Malformed YAML${path ? ` in ${path}` : ''}: ${syntaxError.message}`, path, syntaxError);
    }
    const plainIds = keepIdSource(document);
    const raw: unknown = document.toJS();

    const result = SceneDocumentSchema.safeParse(raw ?? null);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ParseError(
        `Invalid scene configuration${path ? ` in ${path}` : ''}${where}: ${issue?.message ?? 'schema mismatch'}`,
        path,
        result.error
      );
    }
    if (path !== undefined) {
      this.plainIds.set(resolve(path), plainIds);
    }
    return result.data;
  }

  /**
   * YAML 1.1 text. Ids listed in `plainIds` are written unquoted,
   * every other string that 1.1 would read as another type is quoted.
   */
  serialize(doc: SceneDocument, plainIds: ReadonlySet<string> = new Set()): string {
    const records = doc.map((record) =>
      record.id !== undefined && plainIds.has(sceneId(record)) ? { ...record, id: new PlainIdText(record.id) } : record
    );
    return YAML.stringify(records, {
      version: '1.1',
      customTags: (tags) => [...withoutTimestamps(tags), plainIdTag],
    });
  }

  /**
   * @throws NotFoundError when the file is missing
   * @throws IOError on any other read failure
   * @throws ParseError on malformed content
   */
  async load(path: string): Promise<SceneDocument> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new NotFoundError(path, error);
      }
      throw new IOError(`Failed to read ${path}: ${describeCause(error)}`, path, error);
    }

    const doc = this.parse(text, path);
    this.logger.debug({ path, scenes: doc.length }, 'Scene configuration loaded');
    return doc;
  }

  /**
   * Write with temp file + rename. The target keeps its file mode.
   * @throws IOError on any failure; the temp file is cleaned up
   */
  async write(path: string, doc: SceneDocument): Promise<void> {
    const content = this.serialize(doc, this.plainIds.get(resolve(path)));
    const tempPath = tempSiblingPath(path);

    try {
      const mode = await this.currentMode(path);
      await writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx' });
      if (mode !== undefined) {
        await chmod(tempPath, mode);
      }
      await rename(tempPath, path);
    } catch (error) {
      await this.discardTemp(tempPath);
      throw new IOError(`Failed to write ${path}: ${describeCause(error)}`, path, error);
    }

    this.logger.debug({ path, scenes: doc.length, bytes: Buffer.byteLength(content) }, 'Scene configuration written');
  }

  private async currentMode(path: string): Promise<number | undefined> {
    try {
      return (await stat(path)).mode & 0o7777;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  private async discardTemp(tempPath: string): Promise<void> {
    try {
      await unlink(tempPath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.warn({ error, path: tempPath }, 'Failed to remove temp file after write failure');
      }
    }
  }
}
