import { SchemaDecodeError, expectRecord, readFloat, requiredField, type Decoder, type JsonValue } from "./decode.js";
import { readWindowId, type WindowId } from "./ids.js";
import { readVariant, tagged } from "./tagged.js";
import { decodeSplitDirection, encodeSplitDirection, type SplitDirection } from "./types.js";

/**
 * Recursive binary split tree. A split exclusively owns both children; each
 * window id appears in at most one leaf of a tree.
 */
export type LayoutNode =
  | { type: "leaf"; windowId: WindowId }
  | {
      type: "split";
      direction: SplitDirection;
      /** First child's share of the split axis, in [0, 1]. */
      ratio: number;
      first: LayoutNode;
      second: LayoutNode;
    };

const LAYOUT_UNIT_TAGS: ReadonlySet<string> = new Set();
const LAYOUT_PAYLOAD_TAGS: ReadonlySet<string> = new Set(["Leaf", "Split"]);

export function leaf(windowId: WindowId): LayoutNode {
  return { type: "leaf", windowId };
}

export function split(direction: SplitDirection, ratio: number, first: LayoutNode, second: LayoutNode): LayoutNode {
  return { type: "split", direction, ratio, first, second };
}

export function encodeLayoutNode(node: LayoutNode, path = "$"): JsonValue {
  if (node.type === "leaf") return tagged("Leaf", node.windowId);
  return tagged("Split", {
    direction: encodeSplitDirection(node.direction),
    ratio: readFloat(node.ratio, `${path}.Split.ratio`),
    first: encodeLayoutNode(node.first, `${path}.Split.first`),
    second: encodeLayoutNode(node.second, `${path}.Split.second`),
  });
}

function decodeNode(value: unknown, path: string, seen: Set<WindowId>): LayoutNode {
  const v = readVariant(value, path, LAYOUT_UNIT_TAGS, LAYOUT_PAYLOAD_TAGS, "LayoutNode");
  if (v.tag === "Leaf") {
    const windowId = readWindowId(v.payload, `${path}.Leaf`);
    if (seen.has(windowId)) {
      throw new SchemaDecodeError("duplicate_identifier", `${path}.Leaf`, `window ${windowId} appears in more than one leaf`);
    }
    seen.add(windowId);
    return { type: "leaf", windowId };
  }
  const p = `${path}.Split`;
  const rec = expectRecord(v.payload, p);
  return {
    type: "split",
    direction: requiredField(rec, "direction", p, decodeSplitDirection),
    ratio: requiredField(rec, "ratio", p, readFloat),
    first: requiredField(rec, "first", p, (child, childPath) => decodeNode(child, childPath, seen)),
    second: requiredField(rec, "second", p, (child, childPath) => decodeNode(child, childPath, seen)),
  };
}

export const decodeLayoutNode: Decoder<LayoutNode> = (value, path) => decodeNode(value, path, new Set());
