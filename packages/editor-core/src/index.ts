/**
 * editor-core holds the transport-free half of the bridge: the selection snapshot model and its
 * capability table, the state decoder, the engine command grammar, clipboard classification, and
 * the shared logging, error and configuration primitives.
 */
export {
  DEFAULT_TABLE_BORDER,
  FORMAT_FLAGS,
  LIST_CONTEXTS,
  STYLE_CONTEXTS,
  TABLE_BORDERS,
  isListContext,
  isStyleContext,
  isTableBorder
} from "./selection/types";
export type {
  FormatFlag,
  ListContext,
  SelectionRect,
  SelectionSnapshot,
  StyleContext,
  TableBorder
} from "./selection/types";
export {
  computeCapabilities,
  createCapabilityTable,
  isActionEnabled
} from "./selection/capabilities";
export type {
  ActionContext,
  CapabilityTable,
  SelectionAction,
  SelectionCapabilities
} from "./selection/capabilities";
export {
  EMPTY_SELECTION_SNAPSHOT,
  areSelectionSnapshotsEqual,
  createEmptySelectionSnapshot,
  createSelectionStateStore,
  normaliseSelectionSnapshot
} from "./selection/selectionState";
export type { SelectionStateStore } from "./selection/selectionState";
export { decodeSelectionState, decodeSelectionStateWithIssue } from "./selection/decoder";
export type { SelectionDecodeIssue, SelectionDecodeResult } from "./selection/decoder";

export {
  buildEngineCommand,
  createEngineCommands,
  escapeEngineString,
  formatEngineArgument,
  patchSearchText
} from "./commands/engineCommands";
export type {
  EngineArgument,
  EngineCommand,
  EngineCommandSet,
  EngineValue,
  FindDirection,
  FormatCommand,
  SetRangeOptions,
  TableDirection
} from "./commands/engineCommands";

export {
  HTML_CLIPBOARD_TYPE,
  LOCAL_IMAGE_CLIPBOARD_TYPE,
  MemoryClipboard,
  RTF_CLIPBOARD_TYPE,
  classifyClipboard,
  isPasteable
} from "./paste/pasteClassification";
export type {
  ClipboardImage,
  ClipboardReader,
  ClipboardWriter,
  MemoryClipboardContents,
  PasteableType
} from "./paste/pasteClassification";
export { isFileUrl, isImageUrl, parseUrl } from "./paste/imageUrl";

export { createConsoleLogger, createNoopLogger } from "./logger";
export type { ConsoleLoggerOptions, Logger } from "./logger";
export {
  EditorBridgeError,
  EngineTransportError,
  createCommandChannelError
} from "./errors";
export type {
  CommandChannelError,
  CommandChannelErrorCode,
  EditorErrorReport,
  EditorErrorReporter
} from "./errors";
export {
  DEFAULT_CLIENT_HEIGHT_PAD,
  DEFAULT_COMMAND_NAMESPACE,
  DEFAULT_TOP_LEVEL_ATTRIBUTES,
  defaultEditorConfig,
  editorConfigFromEnv,
  resolveEditorConfig
} from "./config";
export type { EditorConfig, EditorConfigInput, TopLevelAttributes } from "./config";
export { createEditorId, createRequestId } from "./ids";
export type { EditorId, RequestId } from "./ids";
