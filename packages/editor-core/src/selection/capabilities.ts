/**
 * Capability predicates derived from a selection snapshot. The table is computed once per state
 * update and then queried by action id, so toolbar and menu adapters agree on what is enabled.
 */
import type { SelectionRect, SelectionSnapshot } from "./types";

export interface SelectionCapabilities {
  readonly isInImage: boolean;
  readonly isInTable: boolean;
  readonly isLinked: boolean;
  readonly canCopyCut: boolean;
  readonly canIndent: boolean;
  readonly canOutdent: boolean;
  readonly canList: boolean;
  readonly canStyle: boolean;
  readonly canFormat: boolean;
  readonly canInsert: boolean;
  readonly canInsertTable: boolean;
  /**
   * `selrect` with a zero width or height raised to 1 so popovers have an area to anchor to.
   * Null when the engine reported no rectangle, as for a collapsed caret.
   */
  readonly sourceRect: SelectionRect | null;
}

export type SelectionAction =
  | "undo"
  | "redo"
  | "select"
  | "selectAll"
  | "copy"
  | "cut"
  | "paste"
  | "pasteAndMatchStyle"
  | "indent"
  | "outdent"
  | "bullets"
  | "numbers"
  | "pStyle"
  | "h1Style"
  | "h2Style"
  | "h3Style"
  | "h4Style"
  | "h5Style"
  | "h6Style"
  | "bold"
  | "italic"
  | "underline"
  | "code"
  | "strike"
  | "subscript"
  | "superscript"
  | "showLinkPopover"
  | "showImagePopover"
  | "showTablePopover";

export type CapabilityTable = Readonly<Record<SelectionAction, boolean>>;

export interface ActionContext {
  /** Whether the clipboard holds anything pasteable; supplied by clipboard classification. */
  readonly pasteable: boolean;
}

const toSourceRect = (rect: SelectionRect | null): SelectionRect | null => {
  if (!rect) {
    return null;
  }
  return {
    x: rect.x,
    y: rect.y,
    width: Math.max(1, rect.width),
    height: Math.max(1, rect.height)
  };
};

export const computeCapabilities = (snapshot: SelectionSnapshot): SelectionCapabilities => {
  const { valid } = snapshot;
  const isInImage = valid && snapshot.src !== null;
  const editable = valid && !isInImage;
  const canInsert = editable;
  return {
    isInImage,
    isInTable: valid && snapshot.table,
    isLinked: valid && snapshot.href !== null,
    canCopyCut: valid && (snapshot.selection !== null || isInImage),
    canIndent: editable,
    canOutdent: editable && (snapshot.li || snapshot.quote),
    canList: editable,
    canStyle: editable,
    canFormat: editable,
    canInsert,
    canInsertTable: canInsert && !snapshot.table,
    sourceRect: valid ? toSourceRect(snapshot.selrect) : null
  };
};

const PASTE_ACTIONS: ReadonlySet<SelectionAction> = new Set<SelectionAction>(["paste", "pasteAndMatchStyle"]);

export const createCapabilityTable = (
  snapshot: SelectionSnapshot,
  capabilities: SelectionCapabilities = computeCapabilities(snapshot)
): CapabilityTable => {
  const { valid } = snapshot;
  const styleEnabled = capabilities.canStyle;
  const formatEnabled = capabilities.canFormat;
  return {
    undo: valid,
    redo: valid,
    select: valid,
    selectAll: valid,
    copy: capabilities.canCopyCut,
    cut: capabilities.canCopyCut,
    // Paste depends on the clipboard; see isActionEnabled.
    paste: valid,
    pasteAndMatchStyle: valid,
    indent: capabilities.canIndent,
    outdent: capabilities.canOutdent,
    bullets: capabilities.canList,
    numbers: capabilities.canList,
    pStyle: styleEnabled,
    h1Style: styleEnabled,
    h2Style: styleEnabled,
    h3Style: styleEnabled,
    h4Style: styleEnabled,
    h5Style: styleEnabled,
    h6Style: styleEnabled,
    bold: formatEnabled,
    italic: formatEnabled,
    underline: formatEnabled,
    code: formatEnabled,
    strike: formatEnabled,
    subscript: formatEnabled,
    superscript: formatEnabled,
    showLinkPopover: valid,
    showImagePopover: valid,
    showTablePopover: valid
  };
};

export const isActionEnabled = (
  table: CapabilityTable,
  action: SelectionAction,
  context: ActionContext = { pasteable: false }
): boolean => {
  if (PASTE_ACTIONS.has(action)) {
    return table[action] && context.pasteable;
  }
  return table[action];
};
