/**
 * Decodes the engine's `getSelectionState()` reply. The wire payload is loosely typed JSON, so
 * every field is read through a default-and-coerce rule and the decoder never throws: anything it
 * cannot make sense of becomes the empty, invalid selection.
 */
import { createEmptySelectionSnapshot, normaliseSelectionSnapshot } from "./selectionState";
import {
  DEFAULT_TABLE_BORDER,
  isListContext,
  isStyleContext,
  isTableBorder,
  type ListContext,
  type SelectionRect,
  type SelectionSnapshot,
  type StyleContext,
  type TableBorder
} from "./types";

export type SelectionDecodeIssue = "empty" | "malformed" | "not-object";

export interface SelectionDecodeResult {
  readonly snapshot: SelectionSnapshot;
  readonly issue: SelectionDecodeIssue | null;
}

type StateRecord = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is StateRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readBoolean = (record: StateRecord, key: string): boolean => record[key] === true;

const readString = (record: StateRecord, key: string): string | null => {
  const value = record[key];
  return typeof value === "string" ? value : null;
};

const readInteger = (record: StateRecord, key: string): number | null => {
  const value = record[key];
  return typeof value === "number" && Number.isInteger(value) ? value : null;
};

const readCount = (record: StateRecord, key: string): number => readInteger(record, key) ?? 0;

const readFiniteNumber = (record: StateRecord, key: string): number | null => {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
};

const readRect = (value: unknown): SelectionRect | null => {
  if (!isRecord(value)) {
    return null;
  }
  const x = readFiniteNumber(value, "x");
  const y = readFiniteNumber(value, "y");
  const width = readFiniteNumber(value, "width");
  const height = readFiniteNumber(value, "height");
  if (x === null || y === null || width === null || height === null) {
    return null;
  }
  return { x, y, width, height };
};

const readStyle = (record: StateRecord): StyleContext => {
  const value = record.style;
  return isStyleContext(value) ? value : "Undefined";
};

const readList = (record: StateRecord): ListContext => {
  const value = record.list;
  return isListContext(value) ? value : "Undefined";
};

const readBorder = (record: StateRecord): TableBorder => {
  const value = record.border;
  return isTableBorder(value) ? value : DEFAULT_TABLE_BORDER;
};

const snapshotFromRecord = (record: StateRecord): SelectionSnapshot => {
  const selectedText = readString(record, "selection");
  const selection = selectedText !== null && selectedText.length > 0 ? selectedText : null;
  const width = readInteger(record, "width");
  const height = readInteger(record, "height");
  const hasDimensions = width !== null && height !== null;

  return normaliseSelectionSnapshot({
    valid: readBoolean(record, "valid"),
    selection,
    selrect: selection === null ? null : readRect(record.selrect),
    href: readString(record, "href"),
    link: readString(record, "link"),
    src: readString(record, "src"),
    alt: readString(record, "alt"),
    width: hasDimensions ? width : null,
    height: hasDimensions ? height : null,
    scale: readInteger(record, "scale"),
    table: readBoolean(record, "table"),
    thead: readBoolean(record, "thead"),
    tbody: readBoolean(record, "tbody"),
    header: readBoolean(record, "header"),
    colspan: readBoolean(record, "colspan"),
    border: readBorder(record),
    rows: readCount(record, "rows"),
    cols: readCount(record, "cols"),
    row: readCount(record, "row"),
    col: readCount(record, "col"),
    style: readStyle(record),
    list: readList(record),
    li: readBoolean(record, "li"),
    quote: readBoolean(record, "quote"),
    bold: readBoolean(record, "bold"),
    italic: readBoolean(record, "italic"),
    underline: readBoolean(record, "underline"),
    strike: readBoolean(record, "strike"),
    sub: readBoolean(record, "sub"),
    sup: readBoolean(record, "sup"),
    code: readBoolean(record, "code")
  });
};

export const decodeSelectionStateWithIssue = (payload: unknown): SelectionDecodeResult => {
  if (typeof payload !== "string" || payload.trim().length === 0) {
    return { snapshot: createEmptySelectionSnapshot(), issue: "empty" };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (_error) {
    return { snapshot: createEmptySelectionSnapshot(), issue: "malformed" };
  }
  if (!isRecord(parsed)) {
    return { snapshot: createEmptySelectionSnapshot(), issue: "not-object" };
  }
  return { snapshot: snapshotFromRecord(parsed), issue: null };
};

export const decodeSelectionState = (payload: unknown): SelectionSnapshot =>
  decodeSelectionStateWithIssue(payload).snapshot;
