import type { CropRequest } from "../schema/slice.js";

/** An external crop operation */
export interface Cropper {
  /** Tool name used in messages */
  readonly name: string;
  /** Reject when the tool cannot run in this environment */
  ensureAvailable(): Promise<void>;
  /** Write `request.region` of `request.source` to `request.destination`, overwriting it */
  crop(request: CropRequest): Promise<void>;
}
