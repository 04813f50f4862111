import type { SelectionAction, SelectionSnapshot, StyleContext } from "@richedit/editor-core";
import type { CommandDispatcher } from "@richedit/editor-bridge";

export type ToolbarActionType = "history" | "style" | "format" | "list" | "indent";

export interface ToolbarActionDefinition {
  readonly id: SelectionAction;
  readonly toolbarLabel: string;
  readonly ariaLabel: string;
  readonly ariaKeyShortcut?: string;
  readonly shortcutHint?: string;
  readonly type: ToolbarActionType;
  /** Toggles reflect the selection through `aria-pressed`. */
  readonly isToggle: boolean;
  /** Groups are separated by a divider in the toolbar. */
  readonly group: number;
}

const TOOLBAR_DEFINITIONS: readonly ToolbarActionDefinition[] = [
  {
    id: "undo",
    toolbarLabel: "Undo",
    ariaLabel: "Undo",
    ariaKeyShortcut: "Meta+Z",
    shortcutHint: "Cmd+Z",
    type: "history",
    isToggle: false,
    group: 0
  },
  {
    id: "redo",
    toolbarLabel: "Redo",
    ariaLabel: "Redo",
    ariaKeyShortcut: "Meta+Shift+Z",
    shortcutHint: "Cmd+Shift+Z",
    type: "history",
    isToggle: false,
    group: 0
  },
  { id: "pStyle", toolbarLabel: "P", ariaLabel: "Paragraph", type: "style", isToggle: true, group: 1 },
  { id: "h1Style", toolbarLabel: "H1", ariaLabel: "Heading 1", type: "style", isToggle: true, group: 1 },
  { id: "h2Style", toolbarLabel: "H2", ariaLabel: "Heading 2", type: "style", isToggle: true, group: 1 },
  { id: "h3Style", toolbarLabel: "H3", ariaLabel: "Heading 3", type: "style", isToggle: true, group: 1 },
  {
    id: "bold",
    toolbarLabel: "B",
    ariaLabel: "Bold",
    ariaKeyShortcut: "Meta+B",
    shortcutHint: "Cmd+B",
    type: "format",
    isToggle: true,
    group: 2
  },
  {
    id: "italic",
    toolbarLabel: "I",
    ariaLabel: "Italic",
    ariaKeyShortcut: "Meta+I",
    shortcutHint: "Cmd+I",
    type: "format",
    isToggle: true,
    group: 2
  },
  {
    id: "underline",
    toolbarLabel: "U",
    ariaLabel: "Underline",
    ariaKeyShortcut: "Meta+U",
    shortcutHint: "Cmd+U",
    type: "format",
    isToggle: true,
    group: 2
  },
  { id: "strike", toolbarLabel: "S", ariaLabel: "Strikethrough", type: "format", isToggle: true, group: 2 },
  { id: "code", toolbarLabel: "</>", ariaLabel: "Code", type: "format", isToggle: true, group: 2 },
  { id: "subscript", toolbarLabel: "Sub", ariaLabel: "Subscript", type: "format", isToggle: true, group: 2 },
  { id: "superscript", toolbarLabel: "Sup", ariaLabel: "Superscript", type: "format", isToggle: true, group: 2 },
  { id: "bullets", toolbarLabel: "•", ariaLabel: "Bulleted list", type: "list", isToggle: true, group: 3 },
  { id: "numbers", toolbarLabel: "1.", ariaLabel: "Numbered list", type: "list", isToggle: true, group: 3 },
  {
    id: "indent",
    toolbarLabel: "→",
    ariaLabel: "Indent",
    ariaKeyShortcut: "Meta+]",
    shortcutHint: "Cmd+]",
    type: "indent",
    isToggle: false,
    group: 4
  },
  {
    id: "outdent",
    toolbarLabel: "←",
    ariaLabel: "Outdent",
    ariaKeyShortcut: "Meta+[",
    shortcutHint: "Cmd+[",
    type: "indent",
    isToggle: false,
    group: 4
  }
];

export const getToolbarActionDefinitions = (): readonly ToolbarActionDefinition[] => TOOLBAR_DEFINITIONS;

const STYLE_FOR_ACTION: Partial<Record<SelectionAction, StyleContext>> = {
  pStyle: "P",
  h1Style: "H1",
  h2Style: "H2",
  h3Style: "H3",
  h4Style: "H4",
  h5Style: "H5",
  h6Style: "H6"
};

export const isToolbarActionActive = (id: SelectionAction, snapshot: SelectionSnapshot): boolean => {
  if (!snapshot.valid) {
    return false;
  }
  const style = STYLE_FOR_ACTION[id];
  if (style) {
    return snapshot.style === style;
  }
  switch (id) {
    case "bold":
      return snapshot.bold;
    case "italic":
      return snapshot.italic;
    case "underline":
      return snapshot.underline;
    case "strike":
      return snapshot.strike;
    case "code":
      return snapshot.code;
    case "subscript":
      return snapshot.sub;
    case "superscript":
      return snapshot.sup;
    case "bullets":
      return snapshot.list === "UL";
    case "numbers":
      return snapshot.list === "OL";
    default:
      return false;
  }
};

/** Runs a toolbar action on the active editor; resolves false when it was not dispatched. */
export const runToolbarAction = (id: SelectionAction, dispatcher: CommandDispatcher): Promise<boolean> => {
  const style = STYLE_FOR_ACTION[id];
  if (style) {
    return dispatcher.replaceStyle(style);
  }
  switch (id) {
    case "undo":
      return dispatcher.undo();
    case "redo":
      return dispatcher.redo();
    case "bold":
      return dispatcher.toggleFormat("bold");
    case "italic":
      return dispatcher.toggleFormat("italic");
    case "underline":
      return dispatcher.toggleFormat("underline");
    case "strike":
      return dispatcher.toggleFormat("strike");
    case "code":
      return dispatcher.toggleFormat("code");
    case "subscript":
      return dispatcher.toggleFormat("subscript");
    case "superscript":
      return dispatcher.toggleFormat("superscript");
    case "bullets":
      return dispatcher.toggleList("UL");
    case "numbers":
      return dispatcher.toggleList("OL");
    case "indent":
      return dispatcher.indent();
    case "outdent":
      return dispatcher.outdent();
    case "cut":
      return dispatcher.cut();
    case "paste":
      return dispatcher.paste();
    case "pasteAndMatchStyle":
      return dispatcher.pasteAndMatchStyle();
    default:
      return Promise.resolve(false);
  }
};
