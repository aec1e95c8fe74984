#!/usr/bin/env npx tsx
/**
 * slice.ts — Export every named shape of a canvas as its own PNG.
 *
 * Usage:
 *   npx tsx scripts/slice.ts <document.json> <canvas.png> [options]
 *   npx tsx scripts/slice.ts <document.json> --list
 *
 * <document.json> is the converted diagram document; <canvas.png> is the
 * whole canvas already rendered at --scale.
 *
 * Options:
 *   --canvas <title>  Canvas to export (default: the current canvas)
 *   --scale <n>       Positive integer scale of <canvas.png> (default: 1)
 *   --outdir <dir>    Output directory (default: the canvas title)
 *   --timestamps      Prefix log lines with a timestamp
 *   --quiet           Only print warnings and errors
 *   --dry-run         Print the crop plan, write nothing
 *   --list            List canvases and exit
 *
 * Environment:
 *   SLICER_MAGICK_PATH  ImageMagick binary (default: magick)
 *
 * Exit codes:
 *   0 — success
 *   2 — usage error or export failure
 */

import { resolve } from "node:path";
import {
  readJSON,
  parseDocument,
  listCanvases,
  planCanvas,
  sliceCanvas,
  formatGeometry,
  DEFAULT_SCALE,
  createLogger,
  createMagickCropper,
  errorMessage,
} from "../src/index.js";

// ── Parse args ──
const args = process.argv.slice(2);
const positional: string[] = [];
let canvasTitle: string | undefined;
let outputDir: string | undefined;
let scaleArg: string | undefined;
let timestamps = false;
let quiet = false;
let dryRun = false;
let list = false;

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  const next = args[i + 1];
  if (arg === "--canvas" && next !== undefined) {
    canvasTitle = next;
    i++;
  } else if (arg === "--outdir" && next !== undefined) {
    outputDir = next;
    i++;
  } else if (arg === "--scale" && next !== undefined) {
    scaleArg = next;
    i++;
  } else if (arg === "--timestamps") {
    timestamps = true;
  } else if (arg === "--quiet") {
    quiet = true;
  } else if (arg === "--dry-run") {
    dryRun = true;
  } else if (arg === "--list") {
    list = true;
  } else if (arg !== undefined) {
    positional.push(arg);
  }
}

const [documentPath, sourceImage] = positional;
const needsImage = !list && !dryRun;

if (!documentPath || (needsImage && !sourceImage)) {
  const prog = process.argv[1];
  console.error(`Usage: ${prog} <document.json> <canvas.png> [--canvas <title>] [--scale <n>] [--outdir <dir>]`);
  console.error(`       ${prog} <document.json> --dry-run [--canvas <title>] [--scale <n>]`);
  console.error(`       ${prog} <document.json> --list`);
  process.exit(2);
}

// Digits only: Number() would also take "0x10", "1e1" and " 2 "
const scale =
  scaleArg === undefined ? DEFAULT_SCALE : /^\d+$/.test(scaleArg) ? Number(scaleArg) : Number.NaN;
if (!Number.isInteger(scale) || scale < 1) {
  console.error(`Error: --scale must be a positive integer, got "${scaleArg}"`);
  process.exit(2);
}

// ── Run ──
async function main(docPath: string) {
  const logger = createLogger({ timestamps, quiet });
  const doc = parseDocument(await readJSON(resolve(docPath)));

  if (list) {
    for (const c of listCanvases(doc)) {
      console.log(`${c.index}\t${c.title}${c.current ? "\t(current)" : ""}`);
    }
    return;
  }

  if (dryRun) {
    const { plans } = planCanvas(doc, { canvasTitle, outputDir, scale, logger });
    for (const p of plans) {
      console.log(`${p.name}\t${formatGeometry(p.crop)}\t${p.outputPath}`);
    }
    return;
  }

  if (!sourceImage) return;
  await sliceCanvas(doc, {
    canvasTitle,
    outputDir,
    scale,
    logger,
    sourceImage: resolve(sourceImage),
    cropper: createMagickCropper(),
  });
}

main(documentPath).catch((err) => {
  console.error("Error:", errorMessage(err));
  process.exit(2);
});
