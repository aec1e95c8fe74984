import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { CropRequest } from "../schema/slice.js";
import type { Cropper } from "./cropper.js";
import { formatGeometry } from "../planner/crop-planner.js";
import { SliceError, errorMessage } from "../errors.js";
import { DEFAULT_MAGICK_BINARY, MAGICK_PATH_ENV } from "../constants.js";

/** Runs a binary with arguments, no shell */
export type ExecFn = (
  file: string,
  args: string[]
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const defaultExec: ExecFn = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, { encoding: "utf8" });
  return { stdout, stderr };
};

export interface MagickOptions {
  /** Binary to run; falls back to $SLICER_MAGICK_PATH, then `magick` */
  binary?: string;
  exec?: ExecFn;
}

/** Arguments for one crop; `+repage` drops the virtual canvas offset */
export function buildCropArgs(request: CropRequest): string[] {
  return [
    request.source,
    "-crop",
    formatGeometry(request.region),
    "+repage",
    request.destination,
  ];
}

/** Resolve the ImageMagick binary from options and environment */
export function magickBinary(binary?: string): string {
  return binary ?? process.env[MAGICK_PATH_ENV] ?? DEFAULT_MAGICK_BINARY;
}

/**
 * Crop with ImageMagick.
 *
 * Set SLICER_MAGICK_PATH=convert on hosts with only ImageMagick 6.
 */
export function createMagickCropper(options: MagickOptions = {}): Cropper {
  const binary = magickBinary(options.binary);
  const exec = options.exec ?? defaultExec;

  return {
    name: binary,

    async ensureAvailable() {
      try {
        await exec(binary, ["-version"]);
      } catch (err) {
        throw new SliceError(
          "precondition",
          `ImageMagick not found (tried "${binary}"); install it or set ${MAGICK_PATH_ENV}: ${errorMessage(err)}`,
          { cause: err }
        );
      }
    },

    async crop(request) {
      await exec(binary, buildCropArgs(request));
    },
  };
}
