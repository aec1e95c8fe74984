// Constants
export {
  SLICE_EXT,
  DEFAULT_SCALE,
  DEFAULT_MAGICK_BINARY,
  MAGICK_PATH_ENV,
  NODE_CHILD_KEYS,
} from "./constants.js";

// Errors
export { SliceError, errorMessage } from "./errors.js";
export type { SliceErrorKind, SliceErrorOptions } from "./errors.js";

// Schema types
export type { GraphicNode, Canvas, DiagramDocument } from "./schema/document.js";
export {
  parseDocument,
  DiagramDocumentSchema,
  CanvasSchema,
  GraphicNodeSchema,
} from "./schema/document.js";
export type {
  Rect,
  PixelRect,
  NamedShape,
  CropPlan,
  CropRequest,
} from "./schema/slice.js";

// Core pipeline
export { parseBounds } from "./geometry/parse-bounds.js";
export { canvasRoots, collectNamedShapes } from "./shapes/walk-shapes.js";
export {
  validateShapeNames,
  findDuplicateNames,
  compareNames,
} from "./shapes/validate-names.js";
export { selectCanvas, listCanvases } from "./shapes/select-canvas.js";
export type { CanvasSummary } from "./shapes/select-canvas.js";
export {
  planCrop,
  scaleToPixels,
  slicePath,
  formatGeometry,
  assertScaleFactor,
} from "./planner/crop-planner.js";
export { executeSlice } from "./slicer/slice-executor.js";
export type { Cropper } from "./slicer/cropper.js";
export {
  createMagickCropper,
  buildCropArgs,
  magickBinary,
} from "./slicer/magick.js";
export type { ExecFn, MagickOptions } from "./slicer/magick.js";

// Driver
export { planCanvas, sliceCanvas } from "./driver/slice-driver.js";
export type {
  PlanOptions,
  SliceOptions,
  PlanResult,
  SliceResult,
} from "./driver/slice-driver.js";

// Logging
export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger, LoggerOptions, LineSink } from "./utils/logger.js";

// FS helpers
export {
  readJSON,
  assertDirectoryOrAbsent,
  assertFile,
  ensureDirectory,
} from "./utils/fs-helpers.js";
