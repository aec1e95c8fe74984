import type { Rect } from "../schema/slice.js";
import { SliceError } from "../errors.js";
import type { Logger } from "../utils/logger.js";

const NUM = String.raw`\s*(\d+(?:\.\d+)?)\s*`;
const BOUNDS_RE = new RegExp(String.raw`^\s*\{\s*\{${NUM},${NUM}\}\s*,\s*\{${NUM},${NUM}\}\s*\}\s*$`);

/**
 * Parse a `{{x, y}, {w, h}}` bounds string.
 *
 * Origin is returned as written; a fractional origin only warns, since the
 * crop will be offset by the truncated remainder. A fractional size is
 * rounded up so the slice never clips content.
 */
export function parseBounds(
  bounds: string | undefined,
  shapeName: string,
  logger: Logger
): Rect {
  if (bounds === undefined) {
    throw new SliceError("structural", `Shape "${shapeName}" has no Bounds`);
  }
  const m = BOUNDS_RE.exec(bounds);
  if (!m) {
    throw new SliceError(
      "structural",
      `Shape "${shapeName}" has unparseable Bounds: ${JSON.stringify(bounds)}`
    );
  }
  const x = Number(m[1]);
  const y = Number(m[2]);
  const w = Number(m[3]);
  const h = Number(m[4]);

  if (!Number.isInteger(x) || !Number.isInteger(y)) {
    logger.warn(
      `"${shapeName}" origin (${x}, ${y}) is not on whole units; the slice may look blurry`
    );
  }
  if (!Number.isInteger(w) || !Number.isInteger(h)) {
    const rw = Math.ceil(w);
    const rh = Math.ceil(h);
    logger.warn(`"${shapeName}" size ${w}x${h} is not whole; exporting as ${rw}x${rh}`);
    return { x, y, w: rw, h: rh };
  }
  return { x, y, w, h };
}
