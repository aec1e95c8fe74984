import { describe, it, expect, vi } from "vitest";
import { parseBounds } from "../../src/geometry/parse-bounds.js";
import { SliceError } from "../../src/errors.js";

function recordingLogger() {
  return { info: vi.fn(), warn: vi.fn() };
}

describe("parseBounds", () => {
  it("parses whole-unit bounds without warnings", () => {
    const logger = recordingLogger();
    const r = parseBounds("{{10, 20}, {64, 48}}", "logo", logger);
    expect(r).toEqual({ x: 10, y: 20, w: 64, h: 48 });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("accepts bounds without spaces", () => {
    const r = parseBounds("{{0,0},{10,10}}", "a", recordingLogger());
    expect(r).toEqual({ x: 0, y: 0, w: 10, h: 10 });
  });

  it("keeps origin as written and rounds size up", () => {
    const cases: Array<[string, { x: number; y: number; w: number; h: number }]> = [
      ["{{0.25, 7}, {3.01, 4}}", { x: 0.25, y: 7, w: 4, h: 4 }],
      ["{{12, 0.5}, {1, 1.99}}", { x: 12, y: 0.5, w: 1, h: 2 }],
      ["{{3.75, 9.125}, {0.5, 20}}", { x: 3.75, y: 9.125, w: 1, h: 20 }],
    ];
    for (const [bounds, expected] of cases) {
      expect(parseBounds(bounds, "s", recordingLogger())).toEqual(expected);
    }
  });

  it("warns about a fractional origin and a fractional size", () => {
    const logger = recordingLogger();
    const r = parseBounds("{{1.5, 2}, {10, 10.4}}", "icon", logger);
    expect(r).toEqual({ x: 1.5, y: 2, w: 10, h: 11 });
    expect(logger.warn.mock.calls).toEqual([
      ['"icon" origin (1.5, 2) is not on whole units; the slice may look blurry'],
      ['"icon" size 10x10.4 is not whole; exporting as 10x11'],
    ]);
  });

  it("rejects missing bounds", () => {
    expect(() => parseBounds(undefined, "icon", recordingLogger())).toThrow(
      'Shape "icon" has no Bounds'
    );
  });

  it("rejects malformed bounds as structural errors", () => {
    for (const bad of ["garbage", "{{1, 2}, {3}}", "{{-1, 0}, {4, 4}}", "{1, 2, 3, 4}", ""]) {
      let caught: unknown;
      try {
        parseBounds(bad, "icon", recordingLogger());
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(SliceError);
      expect(caught).toMatchObject({
        kind: "structural",
        message: `Shape "icon" has unparseable Bounds: ${JSON.stringify(bad)}`,
      });
    }
  });
});
