/**
 * Command grammar for the document engine. A command is `<namespace>.<function>(<args>)` where
 * strings are single-quoted and escaped so no argument can close the call and start another
 * statement. Building a command with a value the grammar cannot carry is a caller bug and
 * throws `EditorBridgeError` before anything reaches the engine.
 */
import { DEFAULT_COMMAND_NAMESPACE } from "../config";
import { EditorBridgeError } from "../errors";
import type { ListContext, StyleContext, TableBorder } from "../selection/types";

export type EngineCommand = string;

export type EngineArgument = string | number | boolean | null;

export type EngineValue = string | number | boolean | null;

export type TableDirection = "BEFORE" | "AFTER";

export type FindDirection = "forward" | "backward";

export type FormatCommand =
  | "bold"
  | "italic"
  | "underline"
  | "strike"
  | "subscript"
  | "superscript"
  | "code";

const FORMAT_FUNCTIONS: Readonly<Record<FormatCommand, string>> = {
  bold: "toggleBold",
  italic: "toggleItalic",
  underline: "toggleUnderline",
  strike: "toggleStrike",
  subscript: "toggleSubscript",
  superscript: "toggleSuperscript",
  code: "toggleCode"
};

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

const ESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\\\",
  "'": "\\'",
  "\"": "\\\"",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\u2028": "\\u2028",
  "\u2029": "\\u2029"
};

export const escapeEngineString = (value: string): string =>
  value.replace(/[\\'"\n\r\t\u2028\u2029]/g, (character) => ESCAPES[character] ?? character);

export const formatEngineArgument = (argument: EngineArgument): string => {
  if (argument === null) {
    return "null";
  }
  if (typeof argument === "boolean") {
    return argument ? "true" : "false";
  }
  if (typeof argument === "number") {
    if (!Number.isFinite(argument)) {
      throw new EditorBridgeError(`Engine arguments must be finite numbers, received ${String(argument)}`);
    }
    return String(argument);
  }
  return `'${escapeEngineString(argument)}'`;
};

export const buildEngineCommand = (
  namespace: string,
  functionName: string,
  args: ReadonlyArray<EngineArgument> = []
): EngineCommand => {
  if (!IDENTIFIER_PATTERN.test(functionName)) {
    throw new EditorBridgeError(`Invalid engine function name "${functionName}"`);
  }
  return `${namespace}.${functionName}(${args.map(formatEngineArgument).join(", ")})`;
};

/**
 * Text typed into native search fields picks up smart quotes. The engine expects the HTML entity
 * forms and swaps them back before searching.
 */
export const patchSearchText = (text: string): string =>
  text
    .replace(/['\u2018\u2019]/g, "&apos;")
    .replace(/["\u201c\u201d]/g, "&quot;");

const requireCount = (label: string, value: number): number => {
  if (!Number.isInteger(value) || value < 1) {
    throw new EditorBridgeError(`${label} must be a positive integer, received ${String(value)}`);
  }
  return value;
};

const requireOffset = (label: string, value: number): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new EditorBridgeError(`${label} must be a non-negative integer, received ${String(value)}`);
  }
  return value;
};

export interface SetRangeOptions {
  readonly startId: string;
  readonly startOffset: number;
  readonly endId: string;
  readonly endOffset: number;
  readonly startChildNodeIndex?: number | null;
  readonly endChildNodeIndex?: number | null;
}

export interface EngineCommandSet {
  readonly namespace: string;
  toggleFormat(format: FormatCommand): EngineCommand;
  toggleBold(): EngineCommand;
  toggleItalic(): EngineCommand;
  toggleUnderline(): EngineCommand;
  toggleStrike(): EngineCommand;
  toggleSubscript(): EngineCommand;
  toggleSuperscript(): EngineCommand;
  toggleCode(): EngineCommand;
  indent(): EngineCommand;
  outdent(): EngineCommand;
  toggleListItem(type: Exclude<ListContext, "Undefined">): EngineCommand;
  replaceStyle(oldStyle: StyleContext | null, newStyle: StyleContext): EngineCommand;
  insertLink(href: string): EngineCommand;
  deleteLink(): EngineCommand;
  insertImage(src: string, alt?: string | null): EngineCommand;
  modifyImage(src: string | null, alt?: string | null): EngineCommand;
  cutImage(): EngineCommand;
  insertTable(rows: number, cols: number): EngineCommand;
  addRow(direction: TableDirection): EngineCommand;
  deleteRow(): EngineCommand;
  addCol(direction: TableDirection): EngineCommand;
  deleteCol(): EngineCommand;
  addHeader(colspan: boolean): EngineCommand;
  deleteTable(): EngineCommand;
  borderTable(border: TableBorder): EngineCommand;
  nextCell(): EngineCommand;
  prevCell(): EngineCommand;
  pasteText(text: string): EngineCommand;
  pasteHTML(html: string): EngineCommand;
  undo(): EngineCommand;
  redo(): EngineCommand;
  searchFor(text: string, direction: FindDirection, activate: boolean): EngineCommand;
  deactivateSearch(): EngineCommand;
  cancelSearch(): EngineCommand;
  getSelectionState(): EngineCommand;
  setRange(options: SetRangeOptions): EngineCommand;
  resetSelection(): EngineCommand;
  setHTML(html: string, selectAfterLoad?: boolean): EngineCommand;
  getHTML(pretty: boolean, clean: boolean): EngineCommand;
  startModalInput(): EngineCommand;
  endModalInput(): EngineCommand;
  focus(): EngineCommand;
  setPlaceholder(text: string): EngineCommand;
  emptyDocument(): EngineCommand;
  getHeight(): EngineCommand;
  padBottom(height: number): EngineCommand;
  cleanUpHTML(): EngineCommand;
  loadUserFiles(scriptFile: string | null, cssFile: string | null): EngineCommand;
  setTopLevelAttributes(attributesJson: string): EngineCommand;
}

export const createEngineCommands = (namespace: string = DEFAULT_COMMAND_NAMESPACE): EngineCommandSet => {
  const call = (functionName: string, ...args: EngineArgument[]): EngineCommand =>
    buildEngineCommand(namespace, functionName, args);

  return {
    namespace,
    toggleFormat: (format) => call(FORMAT_FUNCTIONS[format]),
    toggleBold: () => call("toggleBold"),
    toggleItalic: () => call("toggleItalic"),
    toggleUnderline: () => call("toggleUnderline"),
    toggleStrike: () => call("toggleStrike"),
    toggleSubscript: () => call("toggleSubscript"),
    toggleSuperscript: () => call("toggleSuperscript"),
    toggleCode: () => call("toggleCode"),
    indent: () => call("indent"),
    outdent: () => call("outdent"),
    toggleListItem: (type) => call("toggleListItem", type),
    replaceStyle: (oldStyle, newStyle) => call("replaceStyle", oldStyle, newStyle),
    insertLink: (href) => call("insertLink", href),
    deleteLink: () => call("deleteLink"),
    insertImage: (src, alt) => (alt === undefined || alt === null
      ? call("insertImage", src)
      : call("insertImage", src, alt)),
    // No arguments removes the selected image.
    modifyImage: (src, alt) => (src === null
      ? call("modifyImage")
      : call("modifyImage", src, alt ?? null)),
    cutImage: () => call("cutImage"),
    insertTable: (rows, cols) => call("insertTable", requireCount("rows", rows), requireCount("cols", cols)),
    addRow: (direction) => call("addRow", direction),
    deleteRow: () => call("deleteRow"),
    addCol: (direction) => call("addCol", direction),
    deleteCol: () => call("deleteCol"),
    addHeader: (colspan) => call("addHeader", colspan),
    deleteTable: () => call("deleteTable"),
    borderTable: (border) => call("borderTable", border),
    nextCell: () => call("nextCell"),
    prevCell: () => call("prevCell"),
    pasteText: (text) => call("pasteText", text),
    pasteHTML: (html) => call("pasteHTML", html),
    undo: () => call("undo"),
    redo: () => call("redo"),
    searchFor: (text, direction, activate) => call("searchFor", patchSearchText(text), direction, activate),
    deactivateSearch: () => call("deactivateSearch"),
    cancelSearch: () => call("cancelSearch"),
    getSelectionState: () => call("getSelectionState"),
    setRange: (options) => call(
      "setRange",
      options.startId,
      requireOffset("startOffset", options.startOffset),
      options.endId,
      requireOffset("endOffset", options.endOffset),
      options.startChildNodeIndex ?? null,
      options.endChildNodeIndex ?? null
    ),
    resetSelection: () => call("resetSelection"),
    setHTML: (html, selectAfterLoad) => (selectAfterLoad === undefined
      ? call("setHTML", html)
      : call("setHTML", html, selectAfterLoad)),
    getHTML: (pretty, clean) => call("getHTML", pretty, clean),
    startModalInput: () => call("startModalInput"),
    endModalInput: () => call("endModalInput"),
    focus: () => call("focus"),
    setPlaceholder: (text) => call("setPlaceholder", text),
    emptyDocument: () => call("emptyDocument"),
    getHeight: () => call("getHeight"),
    padBottom: (height) => call("padBottom", height),
    cleanUpHTML: () => call("cleanUpHTML"),
    loadUserFiles: (scriptFile, cssFile) => call("loadUserFiles", scriptFile, cssFile),
    setTopLevelAttributes: (attributesJson) => call("setTopLevelAttributes", attributesJson)
  };
};
