import { z } from "zod";

/** Element data types a tensor declaration may carry. */
export const TensorElementType = z.enum([
  "float32",
  "float16",
  "bfloat16",
  "int8",
  "uint8",
  "int16",
  "uint16",
  "int32",
  "uint32",
  "int64",
  "uint64",
  "bool",
]);
export type TensorElementType = z.infer<typeof TensorElementType>;

/** Element type plus ordered dimension sizes. */
export const TensorInfo = z.object({
  elemType: TensorElementType,
  shape: z.array(z.number().int().nonnegative()),
});
export type TensorInfo = z.infer<typeof TensorInfo>;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Attribute as stored in a context model file.
 * Bytes travel base64-encoded; everything else is plain JSON.
 */
export const SerializedAttribute = z.discriminatedUnion("type", [
  z.object({ type: z.literal("int"), value: z.number().int() }),
  z.object({ type: z.literal("float"), value: z.number() }),
  z.object({ type: z.literal("string"), value: z.string() }),
  z.object({ type: z.literal("bytes"), value: z.string().regex(BASE64, "expected base64") }),
]);
export type SerializedAttribute = z.infer<typeof SerializedAttribute>;

export const SerializedValueInfo = z.object({
  name: z.string().min(1),
  elemType: TensorElementType,
  shape: z.array(z.number().int().nonnegative()),
});
export type SerializedValueInfo = z.infer<typeof SerializedValueInfo>;

export const SerializedNode = z.object({
  name: z.string(),
  opType: z.string().min(1),
  domain: z.string().default(""),
  description: z.string().default(""),
  inputs: z.array(z.string()).default([]),
  outputs: z.array(z.string()).default([]),
  attributes: z.record(z.string(), SerializedAttribute).default({}),
});
export type SerializedNode = z.infer<typeof SerializedNode>;

export const CONTEXT_MODEL_FORMAT = "qnn-context-model";

/**
 * Context model file. Location: next to the .bin files it references.
 */
export const ContextModelFile = z.object({
  format: z.literal(CONTEXT_MODEL_FORMAT),
  version: z.literal(1),
  valueInfo: z.array(SerializedValueInfo).default([]),
  nodes: z.array(SerializedNode),
});
export type ContextModelFile = z.infer<typeof ContextModelFile>;
