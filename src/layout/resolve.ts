import type { WindowId } from "../protocol/ids.js";
import type { LayoutNode } from "../protocol/layout.js";

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type ResolvedWindow = {
  windowId: WindowId;
  rect: Rect;
};

/**
 * Partitions `rect` along the tree. Horizontal splits divide the width,
 * vertical splits the height; the first child takes the `ratio` share.
 * Output order is a left-to-right preorder walk of the leaves.
 *
 * Ratios are used as given: 0 or 1 yields a zero-sized region for one child.
 */
export function resolveLayout(node: LayoutNode, rect: Rect): ResolvedWindow[] {
  const out: ResolvedWindow[] = [];
  walk(node, rect, out);
  return out;
}

function walk(node: LayoutNode, rect: Rect, out: ResolvedWindow[]): void {
  if (node.type === "leaf") {
    out.push({ windowId: node.windowId, rect });
    return;
  }
  if (node.direction === "horizontal") {
    const firstWidth = rect.width * node.ratio;
    walk(node.first, { x: rect.x, y: rect.y, width: firstWidth, height: rect.height }, out);
    walk(node.second, { x: rect.x + firstWidth, y: rect.y, width: rect.width - firstWidth, height: rect.height }, out);
  } else {
    const firstHeight = rect.height * node.ratio;
    walk(node.first, { x: rect.x, y: rect.y, width: rect.width, height: firstHeight }, out);
    walk(node.second, { x: rect.x, y: rect.y + firstHeight, width: rect.width, height: rect.height - firstHeight }, out);
  }
}

export function collectWindowIds(node: LayoutNode): WindowId[] {
  if (node.type === "leaf") return [node.windowId];
  return [...collectWindowIds(node.first), ...collectWindowIds(node.second)];
}

/** Windows in `previous` that no longer appear in `next`, in `previous` order. */
export function removedWindowIds(previous: LayoutNode, next: LayoutNode): WindowId[] {
  const kept = new Set(collectWindowIds(next));
  return collectWindowIds(previous).filter((id) => !kept.has(id));
}
