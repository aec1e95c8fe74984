import * as path from "node:path";
import type { CropPlan, NamedShape, PixelRect, Rect } from "../schema/slice.js";
import { parseBounds } from "../geometry/parse-bounds.js";
import { SliceError } from "../errors.js";
import type { Logger } from "../utils/logger.js";
import { SLICE_EXT } from "../constants.js";

/** Throw unless `scale` is a positive integer */
export function assertScaleFactor(scale: number): void {
  if (!Number.isInteger(scale) || scale < 1) {
    throw new SliceError("precondition", `Scale factor must be a positive integer, got ${scale}`);
  }
}

/** Scale a rect into source-raster pixels, truncating toward zero */
export function scaleToPixels(r: Rect, scale: number): PixelRect {
  return {
    x: Math.trunc(r.x * scale),
    y: Math.trunc(r.y * scale),
    width: Math.trunc(r.w * scale),
    height: Math.trunc(r.h * scale),
  };
}

/** `<outputDir>/<name>.png`; the name is not sanitized */
export function slicePath(outputDir: string, name: string): string {
  return path.join(outputDir, `${name}${SLICE_EXT}`);
}

/** Plan the slice of one named shape */
export function planCrop(
  shape: NamedShape,
  scale: number,
  outputDir: string,
  logger: Logger
): CropPlan {
  assertScaleFactor(scale);
  const bounds = parseBounds(shape.bounds, shape.name, logger);
  const crop = scaleToPixels(bounds, scale);
  // ImageMagick reads a zero dimension as "the whole image"
  if (crop.width === 0 || crop.height === 0) {
    throw new SliceError(
      "structural",
      `Shape "${shape.name}" has an empty crop (${formatGeometry(crop)})`
    );
  }
  return {
    name: shape.name,
    bounds,
    crop,
    outputPath: slicePath(outputDir, shape.name),
  };
}

/** ImageMagick-style geometry: `WxH+X+Y` */
export function formatGeometry(r: PixelRect): string {
  return `${r.width}x${r.height}+${r.x}+${r.y}`;
}
