import { z } from "zod";
import { SliceError } from "../errors.js";

/** A node of a canvas's graphic tree */
export interface GraphicNode {
  ID?: number | string;
  Name?: string;
  Bounds?: string;
  Graphics?: GraphicNode[];
  GraphicsList?: GraphicNode[];
}

export const GraphicNodeSchema: z.ZodType<GraphicNode> = z.lazy(() =>
  z.object({
    ID: z.union([z.number(), z.string()]).optional(),
    Name: z.string().optional(),
    Bounds: z.string().optional(),
    Graphics: z.array(GraphicNodeSchema).optional(),
    GraphicsList: z.array(GraphicNodeSchema).optional(),
  })
);

export const CanvasSchema = z.object({
  SheetTitle: z.string(),
  ExportShapes: z.array(GraphicNodeSchema).optional(),
  GraphicsList: z.array(GraphicNodeSchema).optional(),
});
export type Canvas = z.infer<typeof CanvasSchema>;

export const DiagramDocumentSchema = z.object({
  Sheets: z.array(CanvasSchema),
  CurrentSheet: z.number().int().min(0).default(0),
});
export type DiagramDocument = z.infer<typeof DiagramDocumentSchema>;

/**
 * Parse and validate a converted diagram document.
 * Throws a structural SliceError listing every schema issue.
 */
export function parseDocument(data: unknown): DiagramDocument {
  const result = DiagramDocumentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
    );
    throw new SliceError("structural", `Invalid document:\n  ${issues.join("\n  ")}`);
  }
  return result.data;
}
