/**
 * editor-bridge connects editor surfaces to their document engines: the FIFO command channel and
 * its transports, the active-editor registry, per-editor surfaces and the command dispatcher that
 * toolbars drive.
 */
export { createCommandChannel } from "./channel/commandChannel";
export type {
  CommandChannel,
  CommandChannelOptions,
  CommandCompletion,
  CommandOutcome,
  EngineTransport
} from "./channel/commandChannel";
export { createMessageTransport, parseEngineMessage } from "./channel/messageTransport";
export type {
  EngineToHostMessage,
  ErrorMessage,
  EvaluateMessage,
  EventMessage,
  HostToEngineMessage,
  MessageEndpoint,
  MessageTransport,
  MessageTransportOptions,
  ReadyMessage,
  ResultMessage
} from "./channel/messageTransport";

export { parseEngineEvent } from "./engine/engineEvents";
export type { EngineEvent, EngineEventListener } from "./engine/engineEvents";
export { ScriptedEngine } from "./engine/scriptedEngine";
export type {
  CommandMatcher,
  ScriptedEngineOptions,
  ScriptedResponder,
  ScriptedResponse
} from "./engine/scriptedEngine";

export { createActiveEditorRegistry } from "./registry/activeEditorRegistry";
export type {
  ActiveEditorListener,
  ActiveEditorRegistry,
  ActiveEditorRegistryOptions,
  RegisteredEditor
} from "./registry/activeEditorRegistry";

export { createEditorSurface } from "./surface/editorSurface";
export type {
  EditorSurface,
  EditorSurfaceDelegate,
  EditorSurfaceOptions,
  GetHtmlOptions
} from "./surface/editorSurface";
export {
  DEFAULT_IMAGE_BASE_URL,
  createMemoryImageStore,
  extensionForMimeType
} from "./surface/imageStore";
export type { ImageStore, MemoryImageStoreOptions } from "./surface/imageStore";
export { buildImageHtml, escapeHtmlAttribute, prepareImageCopy } from "./surface/clipboardImage";
export type { ImageCopyRequest, ImageCopyResult } from "./surface/clipboardImage";

export { createCommandDispatcher } from "./dispatcher/commandDispatcher";
export type {
  CommandDispatcher,
  CommandDispatcherOptions,
  DialogPresenter,
  ImageDialogRequest,
  ImageDialogResult,
  KeyModifiers,
  LinkDialogRequest,
  LinkDialogResult,
  ModalInputKind,
  ModalInputState,
  TableDialogRequest,
  TableDialogResult
} from "./dispatcher/commandDispatcher";
