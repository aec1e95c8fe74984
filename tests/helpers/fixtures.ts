import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

/** Load a JSON fixture from tests/fixtures */
export function loadFixture(name: string): unknown {
  const file = fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
  return JSON.parse(readFileSync(file, "utf-8"));
}
