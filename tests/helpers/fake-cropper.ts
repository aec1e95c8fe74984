import * as fs from "node:fs/promises";
import type { Cropper } from "../../src/slicer/cropper.js";
import type { CropRequest } from "../../src/schema/slice.js";
import { formatGeometry } from "../../src/planner/crop-planner.js";

/**
 * In-process stand-in for ImageMagick. Records each request and writes the
 * crop geometry as the destination file's contents.
 */
export class FakeCropper implements Cropper {
  readonly name = "fake";
  readonly requests: CropRequest[] = [];
  available = true;
  /** Destination basename (e.g. "b.png") whose crop fails */
  failOn?: string;

  async ensureAvailable(): Promise<void> {
    if (!this.available) throw new Error("fake cropper unavailable");
  }

  async crop(request: CropRequest): Promise<void> {
    this.requests.push(request);
    if (this.failOn && request.destination.endsWith(this.failOn)) {
      throw new Error("exit code 1");
    }
    await fs.writeFile(request.destination, formatGeometry(request.region));
  }
}
