import type { Canvas, DiagramDocument } from "../schema/document.js";
import { SliceError } from "../errors.js";

export interface CanvasSummary {
  index: number;
  title: string;
  current: boolean;
}

/** Pick a canvas by exact title, or the document's current canvas */
export function selectCanvas(doc: DiagramDocument, title?: string): Canvas {
  if (title !== undefined) {
    const found = doc.Sheets.find((c) => c.SheetTitle === title);
    if (!found) {
      throw new SliceError("structural", `Canvas "${title}" not found`);
    }
    return found;
  }
  const canvas = doc.Sheets[doc.CurrentSheet];
  if (!canvas) {
    throw new SliceError(
      "structural",
      `Current canvas index ${doc.CurrentSheet} is out of range (document has ${doc.Sheets.length} canvases)`
    );
  }
  return canvas;
}

export function listCanvases(doc: DiagramDocument): CanvasSummary[] {
  return doc.Sheets.map((c, index) => ({
    index,
    title: c.SheetTitle,
    current: index === doc.CurrentSheet,
  }));
}
