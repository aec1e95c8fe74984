import { describe, it, expect } from "vitest";
import { parseDocument } from "../../src/schema/document.js";
import { SliceError } from "../../src/errors.js";
import { loadFixture } from "../helpers/fixtures.js";

describe("Document Schema", () => {
  it("parses a valid document", () => {
    const doc = parseDocument(loadFixture("sample-document.json"));
    expect(doc.CurrentSheet).toBe(1);
    expect(doc.Sheets.map((s) => s.SheetTitle)).toEqual(["Cover", "Icons"]);
  });

  it("drops keys it does not use", () => {
    const doc = parseDocument({
      Sheets: [{ SheetTitle: "c", GraphicsList: [{ ID: 1, Class: "Group", Graphics: [] }] }],
    });
    expect(doc.Sheets[0]?.GraphicsList).toEqual([{ ID: 1, Graphics: [] }]);
  });

  it("defaults the current canvas to the first one", () => {
    const doc = parseDocument({ Sheets: [{ SheetTitle: "only" }] });
    expect(doc.CurrentSheet).toBe(0);
  });

  it("rejects a document without canvases", () => {
    expect(() => parseDocument({ CurrentSheet: 0 })).toThrow("Sheets: Required");
  });

  it("rejects a negative current index", () => {
    expect(() => parseDocument({ Sheets: [], CurrentSheet: -1 })).toThrow("CurrentSheet:");
  });

  it("reports the path of a malformed nested node", () => {
    expect(() =>
      parseDocument({
        Sheets: [
          { SheetTitle: "c", GraphicsList: [{ ID: 1, Graphics: "not a list" }] },
        ],
      })
    ).toThrow("Sheets.0.GraphicsList.0.Graphics: Expected array, received string");
  });

  it("reports structural errors as SliceError", () => {
    let caught: unknown;
    try {
      parseDocument(null);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SliceError);
    expect(caught).toMatchObject({
      kind: "structural",
      message: "Invalid document:\n  (root): Expected object, received null",
    });
  });
});
