import { afterEach, describe, expect, it, vi } from "vitest";

import {
  EMPTY_SELECTION_SNAPSHOT,
  areSelectionSnapshotsEqual,
  createSelectionStateStore
} from "../selectionState";
import type { SelectionSnapshot } from "../types";

const snapshot = (overrides: Partial<SelectionSnapshot> = {}): SelectionSnapshot => ({
  ...EMPTY_SELECTION_SNAPSHOT,
  valid: true,
  ...overrides
});

describe("selection state store", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts empty and denies every action", () => {
    const store = createSelectionStateStore();
    expect(store.getSnapshot()).toEqual(EMPTY_SELECTION_SNAPSHOT);
    expect(Object.values(store.getCapabilityTable()).some(Boolean)).toBe(false);
  });

  it("copies another store field for field", () => {
    const source = createSelectionStateStore(
      snapshot({
        selection: "text",
        selrect: { x: 4, y: 8, width: 15, height: 16 },
        href: "https://example.com",
        style: "H3",
        italic: true,
        rows: 2
      })
    );
    const target = createSelectionStateStore();

    target.reset(source);

    expect(target.getSnapshot()).toEqual(source.getSnapshot());
    expect(areSelectionSnapshotsEqual(target.getSnapshot(), source.getSnapshot())).toBe(true);
    expect(target.getCapabilityTable()).toEqual(source.getCapabilityTable());
  });

  it("replaces the whole snapshot rather than merging", () => {
    const store = createSelectionStateStore(snapshot({ bold: true, href: "https://example.com" }));
    store.reset(snapshot({ italic: true }));
    expect(store.getSnapshot().bold).toBe(false);
    expect(store.getSnapshot().href).toBeNull();
    expect(store.getSnapshot().italic).toBe(true);
  });

  it("notifies only when the snapshot changes", () => {
    const store = createSelectionStateStore();
    const listener = vi.fn();
    store.subscribe(listener);

    store.reset(snapshot({ bold: true }));
    store.reset(snapshot({ bold: true }));
    expect(listener).toHaveBeenCalledTimes(1);

    store.reset();
    expect(listener).toHaveBeenCalledTimes(2);
    expect(store.getSnapshot()).toEqual(EMPTY_SELECTION_SNAPSHOT);
  });

  it("compares rectangles by value", () => {
    const store = createSelectionStateStore(
      snapshot({ selection: "a", selrect: { x: 1, y: 1, width: 1, height: 1 } })
    );
    const listener = vi.fn();
    store.subscribe(listener);
    store.reset(snapshot({ selection: "a", selrect: { x: 1, y: 1, width: 1, height: 1 } }));
    expect(listener).not.toHaveBeenCalled();
  });

  it("normalises invalid snapshots to empty", () => {
    const store = createSelectionStateStore();
    store.reset({ ...EMPTY_SELECTION_SNAPSHOT, bold: true });
    expect(store.getSnapshot().bold).toBe(false);
  });

  it("stops notifying after unsubscribe", () => {
    const store = createSelectionStateStore();
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);
    unsubscribe();
    store.reset(snapshot());
    expect(listener).not.toHaveBeenCalled();
  });

  it("keeps notifying when a listener throws", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const store = createSelectionStateStore();
    const healthy = vi.fn();
    store.subscribe(() => {
      throw new Error("listener failed");
    });
    store.subscribe(healthy);

    store.reset(snapshot());

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(consoleError).toHaveBeenCalledWith("[selection-state] listener error", expect.any(Error));
  });
});
