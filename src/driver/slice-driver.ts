import type { Canvas, DiagramDocument } from "../schema/document.js";
import type { CropPlan } from "../schema/slice.js";
import type { Cropper } from "../slicer/cropper.js";
import { selectCanvas } from "../shapes/select-canvas.js";
import { collectNamedShapes } from "../shapes/walk-shapes.js";
import { validateShapeNames } from "../shapes/validate-names.js";
import { assertScaleFactor, planCrop } from "../planner/crop-planner.js";
import { executeSlice } from "../slicer/slice-executor.js";
import {
  assertDirectoryOrAbsent,
  assertFile,
  ensureDirectory,
} from "../utils/fs-helpers.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { DEFAULT_SCALE } from "../constants.js";

export interface PlanOptions {
  /** Canvas title; defaults to the document's current canvas */
  canvasTitle?: string;
  /** Defaults to the canvas title */
  outputDir?: string;
  scale?: number;
  logger?: Logger;
}

export interface SliceOptions extends PlanOptions {
  /** Full-canvas raster rendered at `scale` */
  sourceImage: string;
  cropper: Cropper;
}

export interface PlanResult {
  canvas: Canvas;
  outputDir: string;
  plans: CropPlan[];
}

export interface SliceResult extends PlanResult {
  /** Paths written, in processing order */
  written: string[];
}

function planShapes(
  canvas: Canvas,
  outputDir: string,
  scale: number,
  logger: Logger
): CropPlan[] {
  const shapes = validateShapeNames(collectNamedShapes(canvas));
  return shapes.map((shape) => planCrop(shape, scale, outputDir, logger));
}

/**
 * Walk, validate and plan every named shape of a canvas. Writes nothing;
 * any structural or validation error surfaces here.
 */
export function planCanvas(doc: DiagramDocument, options: PlanOptions = {}): PlanResult {
  const scale = options.scale ?? DEFAULT_SCALE;
  const logger = options.logger ?? silentLogger;
  assertScaleFactor(scale);

  const canvas = selectCanvas(doc, options.canvasTitle);
  const outputDir = options.outputDir ?? canvas.SheetTitle;
  return { canvas, outputDir, plans: planShapes(canvas, outputDir, scale, logger) };
}

/**
 * Export every named shape of a canvas as its own PNG.
 *
 * Slices run one after another in name order; the first failure aborts
 * the run and leaves earlier slices on disk.
 */
export async function sliceCanvas(
  doc: DiagramDocument,
  options: SliceOptions
): Promise<SliceResult> {
  const scale = options.scale ?? DEFAULT_SCALE;
  const logger = options.logger ?? silentLogger;
  assertScaleFactor(scale);

  const canvas = selectCanvas(doc, options.canvasTitle);
  const outputDir = options.outputDir ?? canvas.SheetTitle;

  // Preconditions, before any processing
  await assertDirectoryOrAbsent(outputDir);
  await assertFile(options.sourceImage, "Source image");
  await options.cropper.ensureAvailable();

  const plans = planShapes(canvas, outputDir, scale, logger);
  await ensureDirectory(outputDir);

  const written: string[] = [];
  for (const plan of plans) {
    written.push(await executeSlice(plan, options.sourceImage, options.cropper, logger));
  }
  logger.info(`Exported ${written.length} slice(s) from "${canvas.SheetTitle}" to ${outputDir}`);
  return { canvas, outputDir, plans, written };
}
