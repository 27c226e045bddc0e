/**
 * Context model file I/O tests.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  fromContextModelFile,
  partitionContextModel,
  readContextModel,
  toContextModelFile,
  writeContextModel,
} from "../io.js";
import { ModelGraph } from "../model-graph.js";
import { bytesAttr, intAttr, stringAttr } from "../attributes.js";

function sampleGraph(): ModelGraph {
  const graph = new ModelGraph();
  graph.getOrCreateValueInfo("x", { elemType: "float16", shape: [1, 3, 224, 224] });
  graph.addNode({ name: "pre", opType: "Cast", inputs: ["x"], outputs: ["x16"] });
  graph.addNode({
    name: "ctx0",
    opType: "EPContext",
    domain: "com.microsoft",
    inputs: ["x16"],
    outputs: ["y"],
    attributes: {
      embed_mode: intAttr(1),
      cache_payload: bytesAttr(new Uint8Array([0x41, 0x00, 0xff])),
      sdk_version: stringAttr("2.28.0"),
    },
  });
  return graph;
}

describe("context model documents", () => {
  it("encodes bytes as base64 and leaves other attributes as JSON", () => {
    const doc = toContextModelFile(sampleGraph());
    expect(doc.format).toBe("qnn-context-model");
    expect(doc.version).toBe(1);
    expect(doc.valueInfo).toEqual([{ name: "x", elemType: "float16", shape: [1, 3, 224, 224] }]);
    expect(doc.nodes[1]?.attributes).toEqual({
      embed_mode: { type: "int", value: 1 },
      cache_payload: { type: "bytes", value: "QQD/" },
      sdk_version: { type: "string", value: "2.28.0" },
    });
  });

  it("rebuilds the same graph from its document", () => {
    const graph = fromContextModelFile(JSON.parse(JSON.stringify(toContextModelFile(sampleGraph()))));
    expect(graph.nodes.map(n => n.name)).toEqual(["pre", "ctx0"]);
    const payload = graph.nodes[1]?.attributes["cache_payload"];
    expect(payload?.type).toBe("bytes");
    if (payload?.type === "bytes") {
      expect(Array.from(payload.value)).toEqual([0x41, 0x00, 0xff]);
    }
    expect(graph.getValueInfo("x")).toEqual({ elemType: "float16", shape: [1, 3, 224, 224] });
  });

  it("fills node defaults", () => {
    const graph = fromContextModelFile({
      format: "qnn-context-model",
      version: 1,
      nodes: [{ name: "n", opType: "EPContext" }],
    });
    expect(graph.nodes[0]).toEqual({
      name: "n",
      opType: "EPContext",
      domain: "",
      description: "",
      inputs: [],
      outputs: [],
      attributes: {},
    });
  });

  it("rejects documents that do not match the schema", () => {
    expect(() => fromContextModelFile({ format: "other", version: 1, nodes: [] })).toThrow(/Invalid context model: format/);
    expect(() =>
      fromContextModelFile({
        format: "qnn-context-model",
        version: 1,
        nodes: [{ name: "n", opType: "EPContext", attributes: { a: { type: "bytes", value: "%%%" } } }],
      }),
    ).toThrow("Invalid context model: nodes.0.attributes.a.value: expected base64");
  });
});

describe("context model files", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "qnn-ctx-io-test-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("writes pretty JSON and reads it back", async () => {
    const path = join(tmpDir, "model.json");
    await writeContextModel(path, sampleGraph());

    const text = await readFile(path, "utf-8");
    expect(text.endsWith("}\n")).toBe(true);
    const graph = await readContextModel(path);
    expect(graph.nodes).toHaveLength(2);
  });

  it("fails with IoError for a missing file", async () => {
    await expect(readContextModel(join(tmpDir, "missing.json"))).rejects.toMatchObject({ code: "IoError" });
  });

  it("fails with InvalidModelFile for malformed JSON", async () => {
    const path = join(tmpDir, "broken.json");
    await writeFile(path, "{ not json", "utf-8");
    await expect(readContextModel(path)).rejects.toMatchObject({ code: "InvalidModelFile" });
  });
});

describe("partitionContextModel", () => {
  it("gives each context node its own single-node partition", () => {
    const graph = sampleGraph();
    graph.addNode({ name: "ctx1", opType: "EPContext", inputs: ["y"], outputs: ["z"] });

    const partitions = partitionContextModel(graph);
    expect(partitions.map(p => ({ index: p.index, name: p.name, inputs: p.inputs, outputs: p.outputs }))).toEqual([
      { index: 0, name: "ctx0", inputs: ["x16"], outputs: ["y"] },
      { index: 1, name: "ctx1", inputs: ["y"], outputs: ["z"] },
    ]);
    expect(partitions.every(p => p.nodes.length === 1)).toBe(true);
  });
});
