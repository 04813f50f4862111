import {
  computeCapabilities,
  createCapabilityTable,
  type CapabilityTable,
  type SelectionCapabilities
} from "./capabilities";
import {
  DEFAULT_TABLE_BORDER,
  type SelectionRect,
  type SelectionSnapshot
} from "./types";

export const EMPTY_SELECTION_SNAPSHOT: SelectionSnapshot = Object.freeze({
  valid: false,
  selection: null,
  selrect: null,
  href: null,
  link: null,
  src: null,
  alt: null,
  width: null,
  height: null,
  scale: null,
  table: false,
  thead: false,
  tbody: false,
  header: false,
  colspan: false,
  border: DEFAULT_TABLE_BORDER,
  rows: 0,
  cols: 0,
  row: 0,
  col: 0,
  style: "Undefined",
  list: "Undefined",
  li: false,
  quote: false,
  bold: false,
  italic: false,
  underline: false,
  strike: false,
  sub: false,
  sup: false,
  code: false
});

const SELECTION_SNAPSHOT_KEYS: ReadonlyArray<keyof SelectionSnapshot> = [
  "valid",
  "selection",
  "selrect",
  "href",
  "link",
  "src",
  "alt",
  "width",
  "height",
  "scale",
  "table",
  "thead",
  "tbody",
  "header",
  "colspan",
  "border",
  "rows",
  "cols",
  "row",
  "col",
  "style",
  "list",
  "li",
  "quote",
  "bold",
  "italic",
  "underline",
  "strike",
  "sub",
  "sup",
  "code"
];

export const createEmptySelectionSnapshot = (): SelectionSnapshot => ({ ...EMPTY_SELECTION_SNAPSHOT });

const cloneRect = (rect: SelectionRect | null): SelectionRect | null =>
  rect ? { x: rect.x, y: rect.y, width: rect.width, height: rect.height } : null;

/**
 * Applies the snapshot invariants: an invalid selection carries no context at all, the selection
 * rectangle only exists alongside selected text, and image width/height travel as a pair.
 */
export const normaliseSelectionSnapshot = (snapshot: SelectionSnapshot): SelectionSnapshot => {
  if (!snapshot.valid) {
    return createEmptySelectionSnapshot();
  }
  const selection = snapshot.selection !== null && snapshot.selection.length > 0 ? snapshot.selection : null;
  const hasDimensions = snapshot.width !== null && snapshot.height !== null;
  return {
    ...snapshot,
    selection,
    selrect: selection === null ? null : cloneRect(snapshot.selrect),
    width: hasDimensions ? snapshot.width : null,
    height: hasDimensions ? snapshot.height : null
  };
};

const areRectsEqual = (left: SelectionRect | null, right: SelectionRect | null): boolean => {
  if (left === right) {
    return true;
  }
  if (!left || !right) {
    return false;
  }
  return (
    left.x === right.x
    && left.y === right.y
    && left.width === right.width
    && left.height === right.height
  );
};

export const areSelectionSnapshotsEqual = (left: SelectionSnapshot, right: SelectionSnapshot): boolean => {
  if (left === right) {
    return true;
  }
  return SELECTION_SNAPSHOT_KEYS.every((key) => {
    if (key === "selrect") {
      return areRectsEqual(left.selrect, right.selrect);
    }
    return left[key] === right[key];
  });
};

export interface SelectionStateStore {
  getSnapshot(): SelectionSnapshot;
  getCapabilities(): SelectionCapabilities;
  getCapabilityTable(): CapabilityTable;
  /**
   * Replaces the whole snapshot. Passing another store copies its current snapshot; passing
   * nothing clears the selection.
   */
  reset(from?: SelectionSnapshot | SelectionStateStore): void;
  subscribe(listener: () => void): () => void;
}

const isSelectionStateStore = (
  value: SelectionSnapshot | SelectionStateStore
): value is SelectionStateStore => "getSnapshot" in value;

export const createSelectionStateStore = (
  initial: SelectionSnapshot = EMPTY_SELECTION_SNAPSHOT
): SelectionStateStore => {
  let snapshot = normaliseSelectionSnapshot(initial);
  let capabilities = computeCapabilities(snapshot);
  let capabilityTable = createCapabilityTable(snapshot, capabilities);
  const listeners = new Set<() => void>();

  const notify = () => {
    listeners.forEach((listener) => {
      try {
        listener();
      } catch (error) {
        if (typeof console !== "undefined" && typeof console.error === "function") {
          console.error("[selection-state] listener error", error);
        }
      }
    });
  };

  const reset = (from?: SelectionSnapshot | SelectionStateStore): void => {
    const source = from === undefined
      ? EMPTY_SELECTION_SNAPSHOT
      : isSelectionStateStore(from)
        ? from.getSnapshot()
        : from;
    const next = normaliseSelectionSnapshot(source);
    if (areSelectionSnapshotsEqual(next, snapshot)) {
      return;
    }
    snapshot = next;
    capabilities = computeCapabilities(snapshot);
    capabilityTable = createCapabilityTable(snapshot, capabilities);
    notify();
  };

  const subscribe = (listener: () => void): (() => void) => {
    listeners.add(listener);
    return () => listeners.delete(listener);
  };

  return {
    getSnapshot: () => snapshot,
    getCapabilities: () => capabilities,
    getCapabilityTable: () => capabilityTable,
    reset,
    subscribe
  };
};
