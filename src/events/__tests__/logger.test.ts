/**
 * Tests for the JSONL event logger.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { EventLogger, type ContextEvent } from "../logger.js";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { readEventLogEntries } from "../../testing/event-log-reader.js";

const FIXED = new Date("2026-03-04T10:00:00.000Z");

describe("EventLogger", () => {
  let tmpDir: string;
  let eventsDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "qnn-ctx-events-test-"));
    eventsDir = join(tmpDir, "events");
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("appends one JSON line per event to the day's file", async () => {
    const logger = new EventLogger(eventsDir, { now: () => FIXED });
    await logger.log("context.decoded", "decoder", { node: "ctx0", byteLength: 16 });

    const content = await readFile(join(eventsDir, "2026-03-04.jsonl"), "utf-8");
    expect(JSON.parse(content.trim())).toEqual({
      eventId: 1,
      type: "context.decoded",
      timestamp: "2026-03-04T10:00:00.000Z",
      actor: "decoder",
      payload: { node: "ctx0", byteLength: 16 },
    });
  });

  it("defaults the payload to an empty object", async () => {
    const logger = new EventLogger(eventsDir, { now: () => FIXED });
    const event = await logger.log("context.share.cleared", "encoder");
    expect(event.payload).toEqual({});
  });

  it("keeps eventIds monotonic under concurrent writes", async () => {
    const logger = new EventLogger(eventsDir, { now: () => FIXED });
    await Promise.all(
      Array.from({ length: 20 }, (_, i) => logger.log("context.blob.written", "encoder", { i })),
    );

    const entries = await readEventLogEntries(eventsDir);
    expect(entries.map(e => e.eventId)).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
    expect(entries.map(e => e.payload["i"])).toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  it("notifies the callback and records the last event time", async () => {
    const seen: ContextEvent[] = [];
    const onEvent = vi.fn((event: ContextEvent) => {
      seen.push(event);
    });
    const logger = new EventLogger(eventsDir, { now: () => FIXED, onEvent });

    expect(logger.lastEventAt).toBe(0);
    await logger.log("context.encoded", "encoder", { partitions: ["a"] });

    expect(onEvent).toHaveBeenCalledTimes(1);
    expect(seen[0]?.type).toBe("context.encoded");
    expect(logger.lastEventAt).toBe(FIXED.getTime());
  });

  it("names files by UTC day", () => {
    const logger = new EventLogger(eventsDir);
    expect(logger.filePathFor(new Date("2026-12-31T23:59:59.000Z"))).toBe(join(eventsDir, "2026-12-31.jsonl"));
  });

  it("surfaces write failures without blocking later writes", async () => {
    const blocked = join(tmpDir, "not-a-dir");
    await writeFile(blocked, "", "utf-8");
    const logger = new EventLogger(blocked, { now: () => FIXED });

    await expect(logger.log("context.load.failed", "loader")).rejects.toThrow();
    await expect(logger.log("context.load.failed", "loader")).rejects.toThrow();
  });
});
