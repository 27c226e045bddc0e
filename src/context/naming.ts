import { parse } from "node:path";
import { DEFAULT_SOURCE_TAG } from "../schemas/context-node.js";

/**
 * Default blob file name for a partition:
 * `<output model stem>_<partition name without source tag>.bin`.
 *
 * Only the first occurrence of the tag is removed. The separator is not
 * doubled when the remaining name already starts with "_".
 */
export function deriveBlobFileName(
  outputModelPath: string,
  partitionName: string,
  sourceTag: string = DEFAULT_SOURCE_TAG,
): string {
  const stem = parse(outputModelPath).name;
  let suffix = sourceTag.length > 0 ? partitionName.replace(sourceTag, "") : partitionName;
  if (!suffix.startsWith("_")) suffix = `_${suffix}`;
  return `${stem}${suffix}.bin`;
}
