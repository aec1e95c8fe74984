import type { NamedShape } from "../schema/slice.js";
import { SliceError } from "../errors.js";

/** Names occurring more than once, each listed once, in sorted order */
export function findDuplicateNames(shapes: NamedShape[]): string[] {
  const seen = new Set<string>();
  const dups = new Set<string>();
  for (const { name } of shapes) {
    if (seen.has(name)) dups.add(name);
    seen.add(name);
  }
  return [...dups].sort(compareNames);
}

/** Code-unit order, case-sensitive */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Reject duplicate names, then return the shapes sorted by name.
 * Throws a validation SliceError naming each duplicate once.
 */
export function validateShapeNames(shapes: NamedShape[]): NamedShape[] {
  const dups = findDuplicateNames(shapes);
  if (dups.length > 0) {
    throw new SliceError(
      "validation",
      `Duplicate shape names: ${dups.map((n) => `"${n}"`).join(", ")}`,
      { names: dups }
    );
  }
  return [...shapes].sort((a, b) => compareNames(a.name, b.name));
}
