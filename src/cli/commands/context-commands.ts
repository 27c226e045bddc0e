/**
 * Context model commands: inspect, extract, verify.
 */

import { mkdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Command } from "commander";
import writeFileAtomic from "write-file-atomic";
import { CollectingLoader } from "../../context/collecting-loader.js";
import { loadContextPartitions } from "../../context/loader.js";
import { errorMessage, isContextCacheError } from "../../errors/index.js";
import { AttributeReader } from "../../graph/attributes.js";
import { partitionContextModel, readContextModel } from "../../graph/io.js";
import type { FusedPartition } from "../../graph/types.js";
import { findMainPartitions, isMainContextNode, soleContextNode } from "../../partition/scanner.js";
import { selectMaxSpillFill } from "../../partition/spill-fill.js";
import { ContextAttr } from "../../schemas/context-node.js";
import { eventLoggerOf } from "../options.js";

function reportError(err: unknown): void {
  const code = isContextCacheError(err) ? err.code : "Error";
  console.error(`❌ ${code}: ${errorMessage(err)}`);
  process.exitCode = 1;
}

/** One line per partition: flags and payload kind. */
export function describePartition(partition: FusedPartition): string {
  const node = soleContextNode(partition);
  const attrs = new AttributeReader(node);
  const main = isMainContextNode(node);
  const embed = attrs.getBool(ContextAttr.EMBED_MODE, true);
  const parts = [`[${partition.index}] ${partition.name}`, `main=${main ? "yes" : "no"}`, `embed=${embed ? "yes" : "no"}`];

  if (main) {
    parts.push(`scratch=${attrs.getInt(ContextAttr.MAX_SCRATCH_SIZE, 0)}`);
    if (embed) {
      parts.push(`payload=inline:${attrs.getBytes(ContextAttr.CACHE_PAYLOAD)?.byteLength ?? 0}B`);
    } else {
      parts.push(`payload=file:${attrs.getString(ContextAttr.CACHE_PAYLOAD, "")}`);
    }
  }
  return parts.join("  ");
}

/** File-system-safe name for an extracted blob. */
function blobOutputName(nodeName: string): string {
  return `${nodeName.replace(/[\\/:]/g, "_")}.bin`;
}

/**
 * Register context model commands with the Commander program.
 */
export function registerContextCommands(program: Command): void {
  // --- inspect ---
  program
    .command("inspect <model>")
    .description("List context partitions, main load order and scratch size")
    .action(async (model: string) => {
      try {
        const graph = await readContextModel(model);
        const partitions = partitionContextModel(graph);
        if (partitions.length === 0) {
          console.log(`No context nodes found in ${model}`);
          process.exitCode = 1;
          return;
        }

        console.log(`Context model: ${model}`);
        console.log(`Partitions: ${partitions.length}`);
        for (const partition of partitions) {
          console.log(`  ${describePartition(partition)}`);
        }

        const { maxSpillFillSize, mainIndices } = selectMaxSpillFill(partitions, findMainPartitions(partitions));
        console.log(`Main load order: ${mainIndices.join(", ")}`);
        console.log(`Max spill-fill size: ${maxSpillFillSize}`);
      } catch (err) {
        reportError(err);
      }
    });

  // --- extract ---
  program
    .command("extract <model>")
    .description("Write every main context blob to <out>/<node>.bin")
    .requiredOption("--out <dir>", "Output directory")
    .action(async (model: string, opts: { out: string }) => {
      try {
        const graph = await readContextModel(model);
        const loader = new CollectingLoader();
        const logger = await eventLoggerOf(program);
        await loadContextPartitions(partitionContextModel(graph), model, { backend: loader, logger });

        const outDir = resolve(opts.out);
        await mkdir(outDir, { recursive: true });
        for (const request of loader.requests) {
          const path = join(outDir, blobOutputName(request.name));
          const bytes = request.blob.take();
          await writeFileAtomic(path, Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
          console.log(`✅ ${request.name} → ${path} (${bytes.byteLength} bytes)`);
        }
      } catch (err) {
        reportError(err);
      }
    });

  // --- verify ---
  program
    .command("verify <model>")
    .description("Run the cache-load pass without a device")
    .action(async (model: string) => {
      try {
        const graph = await readContextModel(model);
        const loader = new CollectingLoader();
        const logger = await eventLoggerOf(program);
        const result = await loadContextPartitions(partitionContextModel(graph), model, { backend: loader, logger });
        console.log(`✅ Loaded ${result.loaded.length} context(s): ${result.loaded.join(", ")}`);
        console.log(`  Max spill-fill size: ${result.maxSpillFillSize}`);
      } catch (err) {
        reportError(err);
      }
    });
}
