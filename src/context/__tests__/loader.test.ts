/**
 * Cache-load pass tests.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadContextPartitions } from "../loader.js";
import { isContextCacheError } from "../../errors/index.js";
import { EventLogger } from "../../events/logger.js";
import { RecordingLoader, RejectingLoader, contextPartition } from "../../testing/fakes.js";
import { readEventLogEntries } from "../../testing/event-log-reader.js";

describe("loadContextPartitions", () => {
  let tmpDir: string;
  let modelPath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "qnn-ctx-loader-test-"));
    modelPath = join(tmpDir, "model_ctx.json");
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  const twoSessions = () => [
    contextPartition(0, { name: "A", main: true, payload: "blob-a", scratch: 100 }),
    contextPartition(1, { name: "A_1", main: false }),
    contextPartition(2, { name: "B", main: true, payload: "blob-b", scratch: 300 }),
  ];

  it("loads the largest scratch consumer first, each with the session maximum", async () => {
    const loader = new RecordingLoader();
    const result = await loadContextPartitions(twoSessions(), modelPath, { backend: loader });

    expect(result).toEqual({ mainIndices: [2, 0], maxSpillFillSize: 300, loaded: ["B", "A"] });
    expect(loader.loads).toEqual([
      { name: "B", payload: "blob-b", maxSpillFillSize: 300 },
      { name: "A", payload: "blob-a", maxSpillFillSize: 300 },
    ]);
  });

  it("flags more than one main in the event log", async () => {
    const eventsDir = join(tmpDir, "events");
    await loadContextPartitions(twoSessions(), modelPath, {
      backend: new RecordingLoader(),
      logger: new EventLogger(eventsDir),
    });

    const events = await readEventLogEntries(eventsDir);
    expect(events[0]?.type).toBe("context.main.multiple");
    expect(events[0]?.payload).toEqual({ modelPath, mainIndices: [0, 2] });
  });

  it("resolves external blobs against the model's directory", async () => {
    const modelDir = join(tmpDir, "models");
    await mkdir(modelDir);
    await writeFile(join(modelDir, "model_ctx_QNN_0.bin"), "on-disk");
    const loader = new RecordingLoader();

    await loadContextPartitions(
      [contextPartition(0, { name: "QNN_0", main: true, embed: false, payload: "model_ctx_QNN_0.bin" })],
      join(modelDir, "model_ctx.json"),
      { backend: loader },
    );
    expect(loader.loads[0]?.payload).toBe("on-disk");
  });

  it("re-signals decode failures as InvalidGraph and logs them", async () => {
    const eventsDir = join(tmpDir, "events");
    const partitions = [contextPartition(0, { name: "evil", main: true, embed: false, payload: "../x.bin" })];

    const err: unknown = await loadContextPartitions(partitions, modelPath, {
      backend: new RecordingLoader(),
      logger: new EventLogger(eventsDir),
    }).catch((e: unknown) => e);

    if (!isContextCacheError(err)) throw new Error("expected a ContextCacheError");
    expect(err.code).toBe("InvalidGraph");
    expect(err.cause).toMatchObject({ code: "PathTraversal" });

    const events = await readEventLogEntries(eventsDir);
    expect(events.map(e => e.type)).toEqual(["context.load.failed"]);
    expect(events[0]?.payload).toMatchObject({ partition: "evil", code: "PathTraversal" });
  });

  it("does not wrap a backend rejection twice", async () => {
    const partitions = [contextPartition(0, { name: "stale", main: true, payload: "x" })];
    const err: unknown = await loadContextPartitions(partitions, modelPath, {
      backend: new RejectingLoader(),
    }).catch((e: unknown) => e);

    if (!isContextCacheError(err)) throw new Error("expected a ContextCacheError");
    expect(err.code).toBe("InvalidGraph");
    expect(err.cause).toMatchObject({ code: "BackendLoadFailed" });
  });

  it("propagates structural errors unchanged", async () => {
    const partitions = [contextPartition(0, { name: "a", main: false, payload: "x" })];
    await expect(
      loadContextPartitions(partitions, modelPath, { backend: new RecordingLoader() }),
    ).rejects.toMatchObject({ code: "NoMainContext" });
  });
});
