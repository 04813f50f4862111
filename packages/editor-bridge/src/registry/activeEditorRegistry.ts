/**
 * Arbitrates which editor surface is the active one. The registry is injected into every surface
 * rather than held as a module global, so tests and hosts with several editor groups can keep
 * isolated registries.
 *
 * Notification is synchronous. A focus request or release made by an observer while a
 * notification round is running is queued and applied once that round finishes, so observers
 * always see changes one at a time and in request order.
 */
import {
  EditorBridgeError,
  createNoopLogger,
  createSelectionStateStore,
  type EditorId,
  type Logger,
  type SelectionSnapshot,
  type SelectionStateStore
} from "@richedit/editor-core";

export interface RegisteredEditor {
  readonly id: EditorId;
  /** True once the editor's engine has finished its initial load. */
  isReady(): boolean;
}

export type ActiveEditorListener = (editorId: EditorId | null) => void;

export interface ActiveEditorRegistry {
  /** Selection of whichever editor is active; empty while none is. */
  readonly activeSelection: SelectionStateStore;
  register(editor: RegisteredEditor): () => void;
  /** Returns false without changing anything when the editor is unknown or not ready. */
  requestFocus(editorId: EditorId): boolean;
  release(editorId: EditorId): void;
  getActiveEditorId(): EditorId | null;
  isRegistered(editorId: EditorId): boolean;
  /** Writes the shared selection only when `editorId` holds focus. */
  publishSelection(editorId: EditorId, snapshot: SelectionSnapshot): boolean;
  subscribe(listener: ActiveEditorListener): () => void;
}

export interface ActiveEditorRegistryOptions {
  readonly logger?: Logger;
}

type RegistryChange =
  | { readonly kind: "focus"; readonly editorId: EditorId }
  | { readonly kind: "release"; readonly editorId: EditorId };

export const createActiveEditorRegistry = (
  options: ActiveEditorRegistryOptions = {}
): ActiveEditorRegistry => {
  const logger = options.logger ?? createNoopLogger();
  const editors = new Map<EditorId, RegisteredEditor>();
  const listeners = new Set<ActiveEditorListener>();
  const queue: RegistryChange[] = [];
  const activeSelection = createSelectionStateStore();
  let activeEditorId: EditorId | null = null;
  let notifying = false;

  const notify = (editorId: EditorId | null) => {
    Array.from(listeners).forEach((listener) => {
      try {
        listener(editorId);
      } catch (error) {
        logger.error("Active editor listener threw", {
          editorId,
          message: error instanceof Error ? error.message : String(error)
        });
      }
    });
  };

  const apply = (change: RegistryChange) => {
    if (change.kind === "focus") {
      if (!editors.has(change.editorId)) {
        return;
      }
      if (activeEditorId !== change.editorId) {
        activeSelection.reset();
      }
      activeEditorId = change.editorId;
      notify(change.editorId);
      return;
    }
    if (activeEditorId !== change.editorId) {
      return;
    }
    activeEditorId = null;
    activeSelection.reset();
    notify(null);
  };

  const drain = () => {
    notifying = true;
    try {
      for (let change = queue.shift(); change !== undefined; change = queue.shift()) {
        apply(change);
      }
    } finally {
      notifying = false;
    }
  };

  const enqueue = (change: RegistryChange) => {
    queue.push(change);
    if (!notifying) {
      drain();
    }
  };

  const requestFocus = (editorId: EditorId): boolean => {
    const editor = editors.get(editorId);
    if (!editor || !editor.isReady()) {
      logger.debug("Ignoring focus request", { editorId, registered: editor !== undefined });
      return false;
    }
    enqueue({ kind: "focus", editorId });
    return true;
  };

  const release = (editorId: EditorId) => {
    enqueue({ kind: "release", editorId });
  };

  const register = (editor: RegisteredEditor): (() => void) => {
    if (editors.has(editor.id)) {
      throw new EditorBridgeError(`Editor ${editor.id} is already registered`);
    }
    editors.set(editor.id, editor);
    return () => {
      if (editors.get(editor.id) !== editor) {
        return;
      }
      release(editor.id);
      editors.delete(editor.id);
    };
  };

  const publishSelection = (editorId: EditorId, snapshot: SelectionSnapshot): boolean => {
    if (activeEditorId !== editorId) {
      return false;
    }
    activeSelection.reset(snapshot);
    return true;
  };

  return {
    activeSelection,
    register,
    requestFocus,
    release,
    getActiveEditorId: () => activeEditorId,
    isRegistered: (editorId) => editors.has(editorId),
    publishSelection,
    subscribe(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    }
  };
};
