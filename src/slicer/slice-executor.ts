import type { CropPlan } from "../schema/slice.js";
import type { Cropper } from "./cropper.js";
import { SliceError, errorMessage } from "../errors.js";
import type { Logger } from "../utils/logger.js";

/**
 * Produce the slice for one plan from the full-canvas raster.
 * A crop failure is an execution error for that shape; there is no retry.
 */
export async function executeSlice(
  plan: CropPlan,
  sourceImage: string,
  cropper: Cropper,
  logger: Logger
): Promise<string> {
  logger.info(`Exporting ${plan.name}`);
  try {
    await cropper.crop({
      source: sourceImage,
      region: plan.crop,
      destination: plan.outputPath,
    });
  } catch (err) {
    throw new SliceError(
      "execution",
      `Cropping "${plan.name}" with ${cropper.name} failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }
  return plan.outputPath;
}
