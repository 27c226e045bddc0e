/**
 * Typed attribute access with defaults.
 */

import type { AttributeValue, GraphNode } from "./types.js";

export class AttributeReader {
  private readonly attributes: Record<string, AttributeValue>;

  constructor(node: Pick<GraphNode, "attributes">) {
    this.attributes = node.attributes;
  }

  getInt(key: string, fallback: number): number {
    const attr = this.attributes[key];
    return attr?.type === "int" ? attr.value : fallback;
  }

  /** Ints read as booleans: any non-zero value is true. */
  getBool(key: string, fallback: boolean): boolean {
    const attr = this.attributes[key];
    return attr?.type === "int" ? attr.value !== 0 : fallback;
  }

  getString(key: string, fallback: string): string {
    const attr = this.attributes[key];
    return attr?.type === "string" ? attr.value : fallback;
  }

  /**
   * Raw payload bytes. A string attribute is read back as the bytes it was
   * built from (latin1), so blobs stored either way decode identically.
   */
  getBytes(key: string): Uint8Array | undefined {
    const attr = this.attributes[key];
    if (attr?.type === "bytes") return attr.value;
    if (attr?.type === "string") return Buffer.from(attr.value, "latin1");
    return undefined;
  }
}

export function intAttr(value: number): AttributeValue {
  return { type: "int", value };
}

export function stringAttr(value: string): AttributeValue {
  return { type: "string", value };
}

export function bytesAttr(value: Uint8Array): AttributeValue {
  return { type: "bytes", value };
}
