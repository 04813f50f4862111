import { describe, expect, it } from "vitest";

import { decodeSelectionState, decodeSelectionStateWithIssue } from "../decoder";
import { EMPTY_SELECTION_SNAPSHOT, areSelectionSnapshotsEqual } from "../selectionState";

describe("decodeSelectionState", () => {
  it.each([
    ["", "empty"],
    ["   ", "empty"],
    ["{not json", "malformed"],
    ["[1, 2]", "not-object"],
    ["42", "not-object"],
    ["null", "not-object"]
  ] as const)("falls back to the empty state for %j", (payload, issue) => {
    const result = decodeSelectionStateWithIssue(payload);
    expect(result.issue).toBe(issue);
    expect(result.snapshot).toEqual(EMPTY_SELECTION_SNAPSHOT);
  });

  it("treats non-string payloads as empty", () => {
    expect(decodeSelectionStateWithIssue(undefined).issue).toBe("empty");
    expect(decodeSelectionStateWithIssue({ valid: true }).issue).toBe("empty");
  });

  it("clears every field when the payload is not valid", () => {
    const snapshot = decodeSelectionState(
      JSON.stringify({ valid: false, bold: true, href: "https://example.com", rows: 3, style: "H2" })
    );
    expect(snapshot).toEqual(EMPTY_SELECTION_SNAPSHOT);
  });

  it("takes valid verbatim and ignores truthy non-booleans", () => {
    const snapshot = decodeSelectionState(JSON.stringify({ valid: "true", bold: 1 }));
    expect(snapshot.valid).toBe(false);
    expect(snapshot.bold).toBe(false);
  });

  it("applies documented defaults to missing fields", () => {
    const snapshot = decodeSelectionState("{\"valid\":true}");
    expect(snapshot.valid).toBe(true);
    expect(snapshot.selection).toBeNull();
    expect(snapshot.href).toBeNull();
    expect(snapshot.border).toBe("cell");
    expect(snapshot.style).toBe("Undefined");
    expect(snapshot.list).toBe("Undefined");
    expect(snapshot.rows).toBe(0);
    expect(snapshot.col).toBe(0);
    expect(snapshot.bold).toBe(false);
  });

  it("populates the selection rectangle when selected text is present", () => {
    const snapshot = decodeSelectionState(
      JSON.stringify({
        valid: true,
        selection: "hello",
        selrect: { x: 10, y: 20, width: 30.5, height: 12 }
      })
    );
    expect(snapshot.selection).toBe("hello");
    expect(snapshot.selrect).toEqual({ x: 10, y: 20, width: 30.5, height: 12 });
  });

  it("leaves the rectangle null when selrect is missing or incomplete", () => {
    expect(decodeSelectionState(JSON.stringify({ valid: true, selection: "hello" })).selrect).toBeNull();
    expect(
      decodeSelectionState(
        JSON.stringify({ valid: true, selection: "hello", selrect: { x: 1, y: 2, width: 3 } })
      ).selrect
    ).toBeNull();
  });

  it("treats an empty selection string as no selection", () => {
    const snapshot = decodeSelectionState(
      JSON.stringify({ valid: true, selection: "", selrect: { x: 1, y: 2, width: 3, height: 4 } })
    );
    expect(snapshot.selection).toBeNull();
    expect(snapshot.selrect).toBeNull();
  });

  it("keeps image dimensions only as a pair", () => {
    const partial = decodeSelectionState(
      JSON.stringify({ valid: true, src: "cat.png", alt: "A cat", width: 40, scale: 100 })
    );
    expect(partial.src).toBe("cat.png");
    expect(partial.alt).toBe("A cat");
    expect(partial.width).toBeNull();
    expect(partial.height).toBeNull();
    expect(partial.scale).toBe(100);

    const complete = decodeSelectionState(JSON.stringify({ valid: true, src: "cat.png", width: 40, height: 30 }));
    expect(complete.width).toBe(40);
    expect(complete.height).toBe(30);
  });

  it("maps unknown enum values to their sentinels", () => {
    const snapshot = decodeSelectionState(
      JSON.stringify({ valid: true, style: "H9", list: "DL", border: "dotted" })
    );
    expect(snapshot.style).toBe("Undefined");
    expect(snapshot.list).toBe("Undefined");
    expect(snapshot.border).toBe("cell");
  });

  it("reads table and style context", () => {
    const snapshot = decodeSelectionState(
      JSON.stringify({
        valid: true,
        table: true,
        thead: true,
        header: true,
        colspan: true,
        border: "outer",
        rows: 3,
        cols: 2,
        row: 1,
        col: 0,
        style: "H2",
        list: "OL",
        li: true,
        quote: true,
        sub: true
      })
    );
    expect(snapshot.table).toBe(true);
    expect(snapshot.thead).toBe(true);
    expect(snapshot.tbody).toBe(false);
    expect(snapshot.border).toBe("outer");
    expect(snapshot.rows).toBe(3);
    expect(snapshot.cols).toBe(2);
    expect(snapshot.row).toBe(1);
    expect(snapshot.style).toBe("H2");
    expect(snapshot.list).toBe("OL");
    expect(snapshot.li).toBe(true);
    expect(snapshot.quote).toBe(true);
    expect(snapshot.sub).toBe(true);
    expect(snapshot.sup).toBe(false);
  });

  it("decodes the same payload to identical states", () => {
    const payload = JSON.stringify({
      valid: true,
      selection: "word",
      selrect: { x: 1, y: 2, width: 3, height: 4 },
      bold: true,
      style: "P"
    });
    const first = decodeSelectionState(payload);
    const second = decodeSelectionState(payload);
    expect(second).toEqual(first);
    expect(areSelectionSnapshotsEqual(first, second)).toBe(true);
  });
});
