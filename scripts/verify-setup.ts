/**
 * verify-setup.ts — Quick smoke test for a new machine.
 * Validates that the modules load, the pipeline plans a synthetic canvas,
 * and ImageMagick can be launched.
 *
 * Usage: npx tsx scripts/verify-setup.ts
 * Exit code 0 = all good, non-zero = setup broken.
 */

import { parseDocument } from "../src/schema/document.js";
import { planCanvas } from "../src/driver/slice-driver.js";
import { createMagickCropper } from "../src/slicer/magick.js";

async function verify() {
  const checks: string[] = [];

  // 1. Schema parsing
  const doc = parseDocument({
    Sheets: [
      {
        SheetTitle: "Setup Test",
        GraphicsList: [
          { ID: 1, Name: "box", Bounds: "{{4, 4}, {16, 16}}" },
          { ID: 2, Graphics: [{ ID: 3, Name: "dot", Bounds: "{{0, 0}, {2, 2}}" }] },
        ],
      },
    ],
  });
  checks.push("document parsing");

  // 2. Planning
  const { plans } = planCanvas(doc, { scale: 2 });
  if (plans.length !== 2) throw new Error(`Expected 2 plans, got ${plans.length}`);
  if (plans[0]?.crop.width !== 32) throw new Error("planCanvas scaled box incorrectly");
  checks.push("crop planning");

  // 3. ImageMagick
  const cropper = createMagickCropper();
  await cropper.ensureAvailable();
  checks.push(`ImageMagick (${cropper.name})`);

  console.log(`  All checks passed: ${checks.join(", ")}`);
}

verify().catch((err) => {
  console.error("Setup verification FAILED:", err);
  process.exit(1);
});
