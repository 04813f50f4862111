/**
 * Translates toolbar, menu and hot-key actions into engine commands for whichever surface is
 * active. Toggles are fire-and-refresh; dialogs and search are bracketed with modal input so the
 * engine keeps the selection while native UI has focus; pastes go through the surface guard.
 */
import {
  HTML_CLIPBOARD_TYPE,
  LOCAL_IMAGE_CLIPBOARD_TYPE,
  RTF_CLIPBOARD_TYPE,
  classifyClipboard,
  computeCapabilities,
  createNoopLogger,
  isActionEnabled,
  isPasteable,
  type ClipboardReader,
  type ClipboardWriter,
  type EditorId,
  type EngineCommand,
  type EngineCommandSet,
  type FindDirection,
  type FormatCommand,
  type ListContext,
  type Logger,
  type SelectionAction,
  type SelectionSnapshot,
  type StyleContext,
  type TableBorder,
  type TableDirection
} from "@richedit/editor-core";

import type { ActiveEditorRegistry } from "../registry/activeEditorRegistry";
import type { EditorSurface } from "../surface/editorSurface";

export type ModalInputState = "idle" | "modal-pending" | "modal-active";

export type ModalInputKind = "link" | "image" | "table" | "search";

export interface LinkDialogRequest {
  readonly snapshot: SelectionSnapshot;
  readonly href: string | null;
}

/** `href: null` removes the link under the selection. */
export interface LinkDialogResult {
  readonly href: string | null;
}

export interface ImageDialogRequest {
  readonly snapshot: SelectionSnapshot;
  readonly src: string | null;
  readonly alt: string | null;
}

/** `src: null` removes the selected image. */
export interface ImageDialogResult {
  readonly src: string | null;
  readonly alt: string | null;
}

export interface TableDialogRequest {
  readonly snapshot: SelectionSnapshot;
}

export interface TableDialogResult {
  readonly rows: number;
  readonly cols: number;
}

/** Shows a native dialog; resolves null when the user dismisses it without a result. */
export type DialogPresenter<Request, Result> = (request: Request) => Promise<Result | null>;

export interface KeyModifiers {
  readonly shiftKey?: boolean;
}

export interface CommandDispatcherOptions {
  readonly registry: ActiveEditorRegistry;
  readonly clipboard?: ClipboardReader;
  /** Re-query and publish the selection after toggles and dialog edits. Defaults to true. */
  readonly refreshAfterCommand?: boolean;
  readonly logger?: Logger;
}

export interface CommandDispatcher {
  addSurface(surface: EditorSurface): () => void;
  getActiveSurface(): EditorSurface | null;
  getModalState(): ModalInputState;
  getModalKind(): ModalInputKind | null;
  isSearchActive(): boolean;
  subscribe(listener: () => void): () => void;

  toggleFormat(format: FormatCommand): Promise<boolean>;
  indent(): Promise<boolean>;
  outdent(): Promise<boolean>;
  toggleList(type: Exclude<ListContext, "Undefined">): Promise<boolean>;
  replaceStyle(newStyle: StyleContext): Promise<boolean>;
  undo(): Promise<boolean>;
  redo(): Promise<boolean>;
  deleteLink(): Promise<boolean>;
  removeImage(): Promise<boolean>;

  insertTable(rows: number, cols: number): Promise<boolean>;
  addRow(direction: TableDirection): Promise<boolean>;
  deleteRow(): Promise<boolean>;
  addCol(direction: TableDirection): Promise<boolean>;
  deleteCol(): Promise<boolean>;
  addHeader(colspan?: boolean): Promise<boolean>;
  deleteTable(): Promise<boolean>;
  borderTable(border: TableBorder): Promise<boolean>;
  nextCell(): Promise<boolean>;
  prevCell(): Promise<boolean>;

  /**
   * Brackets `present` with modal input on the active surface. Resolves null without presenting
   * when no surface is active or another modal input is pending or active.
   */
  runModalInput<T>(kind: ModalInputKind, present: (surface: EditorSurface) => Promise<T>): Promise<T | null>;
  insertLinkWithDialog(present: DialogPresenter<LinkDialogRequest, LinkDialogResult>): Promise<boolean>;
  insertImageWithDialog(present: DialogPresenter<ImageDialogRequest, ImageDialogResult>): Promise<boolean>;
  insertTableWithDialog(present: DialogPresenter<TableDialogRequest, TableDialogResult>): Promise<boolean>;

  search(text: string, direction?: FindDirection): Promise<boolean>;
  searchNext(): Promise<boolean>;
  searchPrevious(): Promise<boolean>;
  /** Returns true when the key was consumed by an active search. */
  handleKey(key: string, modifiers?: KeyModifiers): Promise<boolean>;
  deactivateSearch(): Promise<boolean>;
  cancelSearch(): Promise<boolean>;

  paste(clipboard?: ClipboardReader): Promise<boolean>;
  pasteAndMatchStyle(clipboard?: ClipboardReader): Promise<boolean>;
  /** Copies the selected image; returns false when nothing was copied so the host runs its own copy. */
  copy(clipboard: ClipboardWriter): boolean;
  cut(): Promise<boolean>;

  canPerform(action: SelectionAction, clipboard?: ClipboardReader): boolean;
}

interface ActiveSearch {
  readonly surface: EditorSurface;
  readonly text: string;
}

/** A search whose modal input is still opening; `end` is set when it is closed before it opens. */
interface OpeningSearch {
  end: ((commands: EngineCommandSet) => EngineCommand) | null;
}

export const createCommandDispatcher = (options: CommandDispatcherOptions): CommandDispatcher => {
  const { registry } = options;
  const logger = options.logger ?? createNoopLogger();
  const refreshAfterCommand = options.refreshAfterCommand ?? true;
  const surfaces = new Map<EditorId, EditorSurface>();
  const listeners = new Set<() => void>();
  let modalState: ModalInputState = "idle";
  let modalKind: ModalInputKind | null = null;
  let activeSearch: ActiveSearch | null = null;
  let openingSearch: OpeningSearch | null = null;

  const notify = () => {
    listeners.forEach((listener) => {
      try {
        listener();
      } catch (error) {
        logger.error("Dispatcher listener threw", {
          message: error instanceof Error ? error.message : String(error)
        });
      }
    });
  };

  const setModal = (state: ModalInputState, kind: ModalInputKind | null) => {
    modalState = state;
    modalKind = kind;
    notify();
  };

  const getActiveSurface = (): EditorSurface | null => {
    const editorId = registry.getActiveEditorId();
    return editorId === null ? null : surfaces.get(editorId) ?? null;
  };

  const requireSurface = (action: string): EditorSurface | null => {
    const surface = getActiveSurface();
    if (!surface) {
      logger.debug("No active editor", { action });
    }
    return surface;
  };

  const refresh = async (surface: EditorSurface) => {
    if (refreshAfterCommand) {
      await surface.refreshSelection();
    }
  };

  const runSimple = async (
    action: string,
    build: (commands: EngineCommandSet, surface: EditorSurface) => EngineCommand
  ): Promise<boolean> => {
    const surface = requireSurface(action);
    if (!surface) {
      return false;
    }
    await surface.execute(build(surface.commands, surface));
    await refresh(surface);
    return true;
  };

  const runModalInput = async <T>(
    kind: ModalInputKind,
    present: (surface: EditorSurface) => Promise<T>
  ): Promise<T | null> => {
    if (modalState !== "idle") {
      logger.warn("Modal input refused while another is open", { requested: kind, current: modalKind });
      return null;
    }
    const surface = requireSurface(kind);
    if (!surface) {
      return null;
    }
    setModal("modal-pending", kind);
    try {
      await surface.execute(surface.commands.startModalInput());
      setModal("modal-active", kind);
      return await present(surface);
    } finally {
      await surface.execute(surface.commands.endModalInput());
      setModal("idle", null);
    }
  };

  const insertLinkWithDialog = async (
    present: DialogPresenter<LinkDialogRequest, LinkDialogResult>
  ): Promise<boolean> => {
    const applied = await runModalInput("link", async (surface) => {
      const snapshot = surface.selection.getSnapshot();
      const result = await present({ snapshot, href: snapshot.href });
      if (result === null) {
        return false;
      }
      await surface.insertLink(result.href);
      await refresh(surface);
      return true;
    });
    return applied ?? false;
  };

  const insertImageWithDialog = async (
    present: DialogPresenter<ImageDialogRequest, ImageDialogResult>
  ): Promise<boolean> => {
    const applied = await runModalInput("image", async (surface) => {
      const snapshot = surface.selection.getSnapshot();
      const result = await present({ snapshot, src: snapshot.src, alt: snapshot.alt });
      if (result === null) {
        return false;
      }
      if (computeCapabilities(snapshot).isInImage) {
        await surface.modifyImage(result.src, result.alt);
      } else if (result.src !== null) {
        await surface.insertImage(result.src, result.alt);
      } else {
        return false;
      }
      await refresh(surface);
      return true;
    });
    return applied ?? false;
  };

  const insertTableWithDialog = async (
    present: DialogPresenter<TableDialogRequest, TableDialogResult>
  ): Promise<boolean> => {
    const applied = await runModalInput("table", async (surface) => {
      const result = await present({ snapshot: surface.selection.getSnapshot() });
      if (result === null) {
        return false;
      }
      await surface.execute(surface.commands.insertTable(result.rows, result.cols));
      await refresh(surface);
      return true;
    });
    return applied ?? false;
  };

  const search = async (text: string, direction: FindDirection = "forward"): Promise<boolean> => {
    if (activeSearch) {
      const { surface } = activeSearch;
      activeSearch = { surface, text };
      await surface.execute(surface.commands.searchFor(text, direction, true));
      return true;
    }
    if (modalState !== "idle") {
      logger.warn("Search refused while modal input is open", { current: modalKind });
      return false;
    }
    const surface = requireSurface("search");
    if (!surface) {
      return false;
    }
    setModal("modal-pending", "search");
    const opening: OpeningSearch = { end: null };
    openingSearch = opening;
    await surface.execute(surface.commands.startModalInput());
    openingSearch = null;
    const { end } = opening;
    if (end) {
      await surface.execute(surface.commands.endModalInput());
      await surface.execute(end(surface.commands));
      setModal("idle", null);
      return false;
    }
    activeSearch = { surface, text };
    setModal("modal-active", "search");
    await surface.execute(surface.commands.searchFor(text, direction, true));
    return true;
  };

  const continueSearch = async (direction: FindDirection): Promise<boolean> => {
    if (!activeSearch) {
      return false;
    }
    const { surface, text } = activeSearch;
    await surface.execute(surface.commands.searchFor(text, direction, true));
    return true;
  };

  const endSearch = async (build: (commands: EngineCommandSet) => EngineCommand): Promise<boolean> => {
    if (openingSearch) {
      // The opening search sends the end commands once its modal input is open.
      openingSearch.end = build;
      return true;
    }
    if (!activeSearch) {
      return false;
    }
    const { surface } = activeSearch;
    activeSearch = null;
    await surface.execute(surface.commands.endModalInput());
    await surface.execute(build(surface.commands));
    setModal("idle", null);
    return true;
  };

  const paste = async (clipboard: ClipboardReader | undefined = options.clipboard): Promise<boolean> => {
    const surface = requireSurface("paste");
    if (!surface || !clipboard) {
      return false;
    }
    const type = classifyClipboard(clipboard);
    logger.debug("Paste", { editorId: surface.id, type });
    switch (type) {
      case "local-image":
        // The marker holds the <img> HTML written by copy, sized as it was in the document.
        return surface.pasteHtml(clipboard.getData(LOCAL_IMAGE_CLIPBOARD_TYPE));
      case "external-image":
        return surface.pasteImage(clipboard.getImage());
      case "url":
        return surface.pasteUrl(clipboard.getUrl());
      case "html":
        return surface.pasteHtml(clipboard.getData(HTML_CLIPBOARD_TYPE));
      case "rtf": {
        const rtf = clipboard.getData(RTF_CLIPBOARD_TYPE);
        const html = rtf !== null && clipboard.rtfToHtml ? clipboard.rtfToHtml(rtf) : null;
        if (html !== null) {
          return surface.pasteHtml(html);
        }
        logger.warn("Could not convert RTF to HTML; pasting text", { editorId: surface.id });
        return surface.pasteText(clipboard.getString());
      }
      case "text":
        return surface.pasteText(clipboard.getString());
      case null:
        return false;
    }
  };

  const pasteAndMatchStyle = async (
    clipboard: ClipboardReader | undefined = options.clipboard
  ): Promise<boolean> => {
    const surface = requireSurface("pasteAndMatchStyle");
    if (!surface || !clipboard) {
      return false;
    }
    switch (classifyClipboard(clipboard)) {
      case "text":
      case "rtf":
        return surface.pasteText(clipboard.getString());
      case "html":
        return surface.pasteText(clipboard.getData(HTML_CLIPBOARD_TYPE));
      default:
        return false;
    }
  };

  const isInImage = (surface: EditorSurface): boolean => surface.selection.getCapabilities().isInImage;

  return {
    addSurface(surface) {
      surfaces.set(surface.id, surface);
      return () => {
        if (surfaces.get(surface.id) === surface) {
          surfaces.delete(surface.id);
        }
      };
    },
    getActiveSurface,
    getModalState: () => modalState,
    getModalKind: () => modalKind,
    isSearchActive: () => activeSearch !== null,
    subscribe(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },

    toggleFormat: (format) => runSimple(format, (commands) => commands.toggleFormat(format)),
    indent: () => runSimple("indent", (commands) => commands.indent()),
    outdent: () => runSimple("outdent", (commands) => commands.outdent()),
    toggleList: (type) => runSimple("toggleList", (commands) => commands.toggleListItem(type)),
    replaceStyle: (newStyle) =>
      runSimple("replaceStyle", (commands, surface) => {
        const oldStyle = surface.selection.getSnapshot().style;
        return commands.replaceStyle(oldStyle === "Undefined" ? null : oldStyle, newStyle);
      }),
    undo: () => runSimple("undo", (commands) => commands.undo()),
    redo: () => runSimple("redo", (commands) => commands.redo()),
    deleteLink: () => runSimple("deleteLink", (commands) => commands.deleteLink()),
    removeImage: () => runSimple("removeImage", (commands) => commands.modifyImage(null)),

    insertTable: (rows, cols) => runSimple("insertTable", (commands) => commands.insertTable(rows, cols)),
    addRow: (direction) => runSimple("addRow", (commands) => commands.addRow(direction)),
    deleteRow: () => runSimple("deleteRow", (commands) => commands.deleteRow()),
    addCol: (direction) => runSimple("addCol", (commands) => commands.addCol(direction)),
    deleteCol: () => runSimple("deleteCol", (commands) => commands.deleteCol()),
    addHeader: (colspan = true) => runSimple("addHeader", (commands) => commands.addHeader(colspan)),
    deleteTable: () => runSimple("deleteTable", (commands) => commands.deleteTable()),
    borderTable: (border) => runSimple("borderTable", (commands) => commands.borderTable(border)),
    nextCell: () => runSimple("nextCell", (commands) => commands.nextCell()),
    prevCell: () => runSimple("prevCell", (commands) => commands.prevCell()),

    runModalInput,
    insertLinkWithDialog,
    insertImageWithDialog,
    insertTableWithDialog,

    search,
    searchNext: () => continueSearch("forward"),
    searchPrevious: () => continueSearch("backward"),
    handleKey: async (key, modifiers = {}) => {
      if (key !== "Enter" || !activeSearch) {
        return false;
      }
      return continueSearch(modifiers.shiftKey ? "backward" : "forward");
    },
    deactivateSearch: () => endSearch((commands) => commands.deactivateSearch()),
    cancelSearch: () => endSearch((commands) => commands.cancelSearch()),

    paste,
    pasteAndMatchStyle,
    copy(clipboard) {
      const surface = requireSurface("copy");
      if (!surface || !isInImage(surface)) {
        return false;
      }
      return surface.copyImage(clipboard);
    },
    cut: async () => {
      const surface = requireSurface("cut");
      if (!surface || !isInImage(surface)) {
        return false;
      }
      await surface.cutImage();
      return true;
    },

    canPerform(action, clipboard) {
      if (!getActiveSurface()) {
        return false;
      }
      const table = registry.activeSelection.getCapabilityTable();
      return isActionEnabled(table, action, { pasteable: isPasteable(clipboard ?? options.clipboard) });
    }
  };
};
