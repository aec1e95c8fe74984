import type { Canvas, GraphicNode } from "../schema/document.js";
import type { NamedShape } from "../schema/slice.js";
import { NODE_CHILD_KEYS } from "../constants.js";

/**
 * Top-level graphics of a canvas: `ExportShapes` when it has entries,
 * otherwise `GraphicsList`. The two are never merged.
 */
export function canvasRoots(canvas: Canvas): GraphicNode[] {
  if (canvas.ExportShapes && canvas.ExportShapes.length > 0) {
    return canvas.ExportShapes;
  }
  return canvas.GraphicsList ?? [];
}

/** Collect every named node under the canvas, at any depth */
export function collectNamedShapes(canvas: Canvas): NamedShape[] {
  const shapes: NamedShape[] = [];
  const stack = [...canvasRoots(canvas)].reverse();

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.Name !== undefined) {
      shapes.push({ name: node.Name, bounds: node.Bounds, id: node.ID });
    }
    // Push in reverse so children come off the stack in document order
    for (const key of [...NODE_CHILD_KEYS].reverse()) {
      const children = node[key];
      if (children) {
        for (let i = children.length - 1; i >= 0; i--) {
          const child = children[i];
          if (child) stack.push(child);
        }
      }
    }
  }
  return shapes;
}
