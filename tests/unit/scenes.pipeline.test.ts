/**
 * Scene repair pipeline tests
 *
 * Runs the pipeline against real files in a temp directory. Failure
 * modes are injected through store and backup manager subclasses.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { BackupManager } from "../../src/scenes/backup-manager.js";
import { SceneDocumentStore } from "../../src/scenes/document-store.js";
import { RepairPipeline } from "../../src/scenes/pipeline.js";
import type { SceneDocument } from "../../src/scenes/schema.js";
import type { BackupHandle, PipelineState, ReloadNotifier } from "../../src/scenes/types.js";
import {
  IOError,
  NotFoundError,
  ParseError,
  RepairCancelledError,
  RollbackFailure,
  VerificationError,
} from "../../src/utils/errors.js";
import { setTestSink, type TelemetryShape } from "../../src/utils/telemetry.js";
import {
  CLEAN_YAML,
  DUPLICATE_YAML,
  EMPTY_ATTRIBUTES_YAML,
  createTestLogger,
  makeTempDir,
  removeTempDir,
  writeScenes,
  type TestLogger,
} from "../helpers/scene-fixtures.js";

const FIXED_TIME = new Date(2026, 9, 19, 8, 0, 0);

/** Writes bytes that are not valid YAML instead of the repaired document */
class CorruptingStore extends SceneDocumentStore {
  async write(path: string, _doc: SceneDocument): Promise<void> {
    await writeFile(path, "- id: [unterminated\n", "utf-8");
  }
}

/** Writes a document other than the one it was given */
class DriftingStore extends SceneDocumentStore {
  async write(path: string, doc: SceneDocument): Promise<void> {
    await super.write(path, [...doc, { id: "extra", name: "Extra" }]);
  }
}

class FailingWriteStore extends SceneDocumentStore {
  async write(path: string): Promise<void> {
    throw new IOError(`disk full writing ${path}`, path);
  }
}

class BrokenRestoreBackups extends BackupManager {
  async restore(handle: BackupHandle): Promise<void> {
    throw new IOError(`cannot restore ${handle.originalPath}`, handle.originalPath);
  }
}

function pathStates(transitions: Array<{ to: PipelineState }>): PipelineState[] {
  return transitions.map((t) => t.to);
}

describe("RepairPipeline", () => {
  let dir: string;
  let logger: TestLogger;
  let notifier: ReloadNotifier & { requestReload: Mock };
  let events: Array<{ name: string; data: TelemetryShape }>;

  function createPipeline(overrides: {
    store?: SceneDocumentStore;
    backups?: BackupManager;
    verifyContent?: boolean;
  } = {}): RepairPipeline {
    return new RepairPipeline({
      logger,
      notifier,
      store: overrides.store ?? new SceneDocumentStore({ logger }),
      backups: overrides.backups ?? new BackupManager({ logger, now: () => FIXED_TIME }),
      repairOptions: { now: () => 1000 },
      verifyContent: overrides.verifyContent,
    });
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    logger = createTestLogger();
    notifier = { requestReload: vi.fn() };
    events = [];
    setTestSink((name, data) => events.push({ name, data }));
  });

  afterEach(async () => {
    setTestSink(null);
    await removeTempDir(dir);
  });

  describe("detect", () => {
    it("returns findings for in-memory records", () => {
      const report = createPipeline().detect([
        { id: "s1", name: "A", entities: { "light.x": { brightness: null, color: "" } } },
        { id: "s1", name: "B" },
      ]);

      expect(report.duplicateIds).toHaveLength(1);
      expect(report.emptyAttributes.map((f) => f.count)).toEqual([2]);
      expect(events.map((e) => e.name)).toEqual(["scene.issues.detected", "scene.issues.detected"]);
    });

    it("rejects records that are not scenes", () => {
      expect(() => createPipeline().detect({ not: "a list" })).toThrow(ParseError);
    });
  });

  describe("repair", () => {
    it("does nothing when the defect is no longer present", async () => {
      const path = await writeScenes(dir, CLEAN_YAML);

      const outcome = await createPipeline().repair(path, "duplicate_ids");

      expect(outcome.status).toBe("done");
      expect(outcome.backup).toBeUndefined();
      expect(pathStates(outcome.transitions)).toEqual(["detecting", "done"]);
      expect(await readFile(path, "utf-8")).toBe(CLEAN_YAML);
      expect(await readdir(dir)).toEqual(["scenes.yaml"]);
      expect(notifier.requestReload).not.toHaveBeenCalled();
    });

    it("renames duplicate ids, keeps a backup and requests a reload", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);

      const outcome = await createPipeline().repair(path, "duplicate_ids");

      expect(outcome.status).toBe("committed");
      expect(outcome.findings).toHaveLength(1);
      expect(pathStates(outcome.transitions)).toEqual([
        "detecting",
        "backing_up",
        "repairing",
        "writing",
        "verifying",
        "committed",
      ]);
      expect(outcome.cancellationDeferred).toBe(false);

      const reloaded = await new SceneDocumentStore({ logger }).load(path);
      expect(reloaded.map((r) => r.id)).toEqual(["s1", "s1_1000", "s2"]);
      expect(reloaded.map((r) => r.name)).toEqual(["A", "B", "C"]);

      expect(outcome.backup?.backupPath).toBe(join(dir, "scenes.yaml.backup_20261019_080000"));
      expect(await readFile(join(dir, "scenes.yaml.backup_20261019_080000"), "utf-8")).toBe(DUPLICATE_YAML);
      expect(notifier.requestReload).toHaveBeenCalledWith(path, "duplicate_ids");
      expect(events.map((e) => e.name)).toContain("scene.repair.committed");
    });

    it("strips empty attributes and keeps emptied entities", async () => {
      const path = await writeScenes(dir, EMPTY_ATTRIBUTES_YAML);

      const outcome = await createPipeline().repair(path, "empty_attributes");

      expect(outcome.status).toBe("committed");
      const reloaded = await new SceneDocumentStore({ logger }).load(path);
      expect(reloaded).toEqual([
        {
          id: "movie",
          name: "Movie night",
          icon: "mdi:movie",
          entities: { "light.x": {}, "media_player.tv": "on" },
        },
      ]);
    });

    it("rolls back and reports VerificationError when the written file does not parse", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);
      const before = await readFile(path);
      const states: PipelineState[] = [];

      const error = await createPipeline({ store: new CorruptingStore({ logger }) })
        .repair(path, "duplicate_ids", { onTransition: (t) => states.push(t.to) })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VerificationError);
      expect(error).toMatchObject({ cause: expect.any(ParseError) });
      expect((await readFile(path)).equals(before)).toBe(true);
      expect(states).toEqual([
        "detecting",
        "backing_up",
        "repairing",
        "writing",
        "verifying",
        "rolling_back",
        "rolled_back",
      ]);
      expect(notifier.requestReload).not.toHaveBeenCalled();
      expect(events.map((e) => e.name)).toEqual([
        "scene.repair.started",
        "scene.backup.created",
        "scene.backup.restored",
        "scene.repair.rolled_back",
        "scene.repair.failed",
      ]);
    });

    it("rolls back when the reloaded document differs from the repair", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);

      await expect(
        createPipeline({ store: new DriftingStore({ logger }) }).repair(path, "duplicate_ids")
      ).rejects.toBeInstanceOf(VerificationError);

      expect(await readFile(path, "utf-8")).toBe(DUPLICATE_YAML);
    });

    it("accepts a drifted document when content verification is off", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);

      const outcome = await createPipeline({ store: new DriftingStore({ logger }), verifyContent: false }).repair(
        path,
        "duplicate_ids"
      );

      expect(outcome.status).toBe("committed");
      const reloaded = await new SceneDocumentStore({ logger }).load(path);
      expect(reloaded.map((r) => r.id)).toEqual(["s1", "s1_1000", "s2", "extra"]);
    });

    it("rolls back and surfaces the IOError when the write fails", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);

      const error = await createPipeline({ store: new FailingWriteStore({ logger }) })
        .repair(path, "duplicate_ids")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IOError);
      expect(error).toMatchObject({ message: `disk full writing ${path}` });
      expect(await readFile(path, "utf-8")).toBe(DUPLICATE_YAML);
    });

    it("raises RollbackFailure when the restore itself fails", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);
      const states: PipelineState[] = [];

      const error = await createPipeline({
        store: new CorruptingStore({ logger }),
        backups: new BrokenRestoreBackups({ logger, now: () => FIXED_TIME }),
      })
        .repair(path, "duplicate_ids", { onTransition: (t) => states.push(t.to) })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RollbackFailure);
      expect(error).toMatchObject({
        code: "ROLLBACK_FAILED",
        backupPath: join(dir, "scenes.yaml.backup_20261019_080000"),
        triggeredBy: expect.any(VerificationError),
      });
      expect(states.slice(-2)).toEqual(["rolling_back", "failed"]);
      expect(await readFile(join(dir, "scenes.yaml.backup_20261019_080000"), "utf-8")).toBe(DUPLICATE_YAML);
    });

    it("surfaces NotFoundError without writing anything", async () => {
      const path = join(dir, "scenes.yaml");

      await expect(createPipeline().repair(path, "empty_attributes")).rejects.toBeInstanceOf(NotFoundError);
      expect(await readdir(dir)).toEqual([]);
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ path, defect_class: "empty_attributes", state: "detecting", code: "NOT_FOUND" }),
        "Scene repair failed"
      );
    });

    it("leaves a malformed file untouched", async () => {
      const path = await writeScenes(dir, "- id: [broken\n");

      await expect(createPipeline().repair(path, "duplicate_ids")).rejects.toBeInstanceOf(ParseError);
      expect(await readdir(dir)).toEqual(["scenes.yaml"]);
    });

    it("fails before mutating when the backup cannot be created", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);
      const backups = new BackupManager({ logger, now: () => FIXED_TIME, maxAttempts: 1 });
      await writeFile(join(dir, "scenes.yaml.backup_20261019_080000"), "taken", "utf-8");

      await expect(createPipeline({ backups }).repair(path, "duplicate_ids")).rejects.toBeInstanceOf(IOError);
      expect(await readFile(path, "utf-8")).toBe(DUPLICATE_YAML);
    });

    it("commits even when the reload notification fails", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);
      notifier.requestReload.mockRejectedValueOnce(new Error("host offline"));

      const outcome = await createPipeline().repair(path, "duplicate_ids");

      expect(outcome.status).toBe("committed");
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ path, defect_class: "duplicate_ids" }),
        "Reload notification failed"
      );
      expect(events.map((e) => e.name)).toContain("scene.reload.notify_failed");
    });
  });

  describe("cancellation", () => {
    it("aborts with no side effects when cancelled before starting", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);
      const controller = new AbortController();
      controller.abort();

      await expect(
        createPipeline().repair(path, "duplicate_ids", { signal: controller.signal })
      ).rejects.toBeInstanceOf(RepairCancelledError);
      expect(await readdir(dir)).toEqual(["scenes.yaml"]);
    });

    it("aborts before writing when cancelled during the backup", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);
      const controller = new AbortController();

      await expect(
        createPipeline().repair(path, "duplicate_ids", {
          signal: controller.signal,
          onTransition: (t) => {
            if (t.to === "backing_up") controller.abort();
          },
        })
      ).rejects.toBeInstanceOf(RepairCancelledError);
      expect(await readFile(path, "utf-8")).toBe(DUPLICATE_YAML);
    });

    it("defers cancellation that arrives after writing began", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);
      const controller = new AbortController();

      const outcome = await createPipeline().repair(path, "duplicate_ids", {
        signal: controller.signal,
        onTransition: (t) => {
          if (t.to === "writing") controller.abort();
        },
      });

      expect(outcome.status).toBe("committed");
      expect(outcome.cancellationDeferred).toBe(true);
      const reloaded = await new SceneDocumentStore({ logger }).load(path);
      expect(reloaded.map((r) => r.id)).toEqual(["s1", "s1_1000", "s2"]);
    });
  });

  describe("concurrency", () => {
    it("serialises runs on the same path so the second sees the first's commit", async () => {
      const path = await writeScenes(dir, DUPLICATE_YAML);
      const pipeline = createPipeline();

      const [first, second] = await Promise.all([
        pipeline.repair(path, "duplicate_ids"),
        pipeline.repair(path, "duplicate_ids"),
      ]);

      expect(first.status).toBe("committed");
      expect(second.status).toBe("done");
      expect((await readdir(dir)).sort()).toEqual(["scenes.yaml", "scenes.yaml.backup_20261019_080000"]);
    });

    it("serialises different defect classes on the same path without lost updates", async () => {
      const path = await writeScenes(
        dir,
        "- id: s1\n  name: A\n  entities:\n    light.x:\n      brightness: null\n- id: s1\n  name: B\n"
      );
      const pipeline = createPipeline();

      const results = await Promise.all([
        pipeline.repair(path, "duplicate_ids"),
        pipeline.repair(path, "empty_attributes"),
      ]);

      expect(results.map((r) => r.status)).toEqual(["committed", "committed"]);
      const reloaded = await new SceneDocumentStore({ logger }).load(path);
      expect(reloaded).toEqual([
        { id: "s1", name: "A", entities: { "light.x": {} } },
        { id: "s1_1000", name: "B" },
      ]);
    });

    it("runs different paths independently", async () => {
      const first = await writeScenes(dir, DUPLICATE_YAML, "a.yaml");
      const second = await writeScenes(dir, EMPTY_ATTRIBUTES_YAML, "b.yaml");
      const pipeline = createPipeline();

      const results = await Promise.all([
        pipeline.repair(first, "duplicate_ids"),
        pipeline.repair(second, "empty_attributes"),
      ]);

      expect(results.map((r) => r.status)).toEqual(["committed", "committed"]);
    });
  });
});
