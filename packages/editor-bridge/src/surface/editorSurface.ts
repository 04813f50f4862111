/**
 * One editor instance: its command channel, its local selection cache, its load lifecycle and the
 * paste guard. The surface observes the injected registry and, whenever it sees its own id become
 * active, re-acquires the engine selection and publishes it to the registry's shared store.
 */
import {
  createConsoleLogger,
  createEditorId,
  createEngineCommands,
  createNoopLogger,
  createSelectionStateStore,
  decodeSelectionStateWithIssue,
  isImageUrl,
  resolveEditorConfig,
  type ClipboardImage,
  type ClipboardWriter,
  type CommandChannelError,
  type EditorConfig,
  type EditorConfigInput,
  type EditorErrorReporter,
  type EditorId,
  type EngineCommand,
  type EngineCommandSet,
  type Logger,
  type SelectionSnapshot,
  type SelectionStateStore,
  type SetRangeOptions
} from "@richedit/editor-core";

import {
  createCommandChannel,
  type CommandChannel,
  type CommandCompletion,
  type CommandOutcome,
  type EngineTransport
} from "../channel/commandChannel";
import type { EngineEvent } from "../engine/engineEvents";
import type { ActiveEditorRegistry, RegisteredEditor } from "../registry/activeEditorRegistry";
import { prepareImageCopy } from "./clipboardImage";
import type { ImageStore } from "./imageStore";

export interface EditorSurfaceDelegate {
  onReady?(surface: EditorSurface): void;
  onFocus?(surface: EditorSurface): void;
  onBlur?(surface: EditorSurface): void;
  onSelectionChange?(surface: EditorSurface, snapshot: SelectionSnapshot): void;
  onInput?(surface: EditorSurface): void;
  /** Receives the engine's client height plus the configured pad. */
  onHeightChange?(surface: EditorSurface, height: number): void;
  onError?: EditorErrorReporter;
}

export interface EditorSurfaceOptions {
  readonly transport: EngineTransport;
  readonly registry: ActiveEditorRegistry;
  readonly id?: EditorId;
  readonly config?: EditorConfigInput;
  /** HTML loaded when the engine reports `ready`. */
  readonly html?: string;
  readonly delegate?: EditorSurfaceDelegate;
  readonly imageStore?: ImageStore;
  readonly logger?: Logger;
}

export interface GetHtmlOptions {
  readonly pretty?: boolean;
  readonly clean?: boolean;
}

export interface EditorSurface extends RegisteredEditor {
  readonly config: EditorConfig;
  readonly commands: EngineCommandSet;
  readonly channel: CommandChannel;
  /** Local cache of this editor's selection, refreshed on every query. */
  readonly selection: SelectionStateStore;
  hasFocus(): boolean;
  isPasteInFlight(): boolean;
  execute(command: EngineCommand, completion?: CommandCompletion): Promise<CommandOutcome>;
  /** Resolves once every engine-event reaction started so far has finished. */
  idle(): Promise<void>;

  loadInitialHtml(html?: string): Promise<void>;
  becomeFirstResponderIfReady(): Promise<boolean>;
  focus(): Promise<boolean>;
  getSelectionState(): Promise<SelectionSnapshot>;
  /** Queries the selection and publishes it when this editor is the active one. */
  refreshSelection(): Promise<SelectionSnapshot>;
  resetSelection(): Promise<void>;
  setRange(options: SetRangeOptions): Promise<boolean>;

  getHtml(options?: GetHtmlOptions): Promise<string | null>;
  getRawHtml(): Promise<string | null>;
  setHtml(html: string): Promise<void>;
  setHtmlIfChanged(html: string): Promise<boolean>;
  emptyDocument(): Promise<void>;
  cleanUpHtml(): Promise<CommandChannelError | null>;
  setPlaceholder(): Promise<void>;
  loadUserFiles(): Promise<void>;
  setTopLevelAttributes(): Promise<void>;
  /** Returns the padded height when it changed since the last update, otherwise null. */
  updateHeight(): Promise<number | null>;
  padBottom(frameHeight: number): Promise<void>;

  insertLink(href: string | null): Promise<void>;
  insertImage(src: string, alt?: string | null): Promise<void>;
  modifyImage(src: string | null, alt?: string | null): Promise<void>;
  cutImage(): Promise<void>;

  /** Each paste returns false when it was dropped: nothing to paste, or another paste in flight. */
  pasteText(text: string | null): Promise<boolean>;
  pasteHtml(html: string | null): Promise<boolean>;
  pasteImage(image: ClipboardImage | null): Promise<boolean>;
  pasteUrl(url: string | null): Promise<boolean>;
  copyImage(clipboard: ClipboardWriter): boolean;

  handleEngineEvent(event: EngineEvent): void;
  destroy(): void;
}

export const createEditorSurface = (options: EditorSurfaceOptions): EditorSurface => {
  const { registry, transport } = options;
  const id = options.id ?? createEditorId();
  const config = resolveEditorConfig(options.config);
  const logger =
    options.logger
    ?? (config.debugLoggingEnabled
      ? createConsoleLogger({ scope: `richedit:${id}`, debugEnabled: true })
      : createNoopLogger());
  const delegate = options.delegate ?? {};
  const imageStore = options.imageStore ?? null;
  const commands = createEngineCommands(config.commandNamespace);
  const channel = createCommandChannel({ transport, logger });
  const selection = createSelectionStateStore();
  const inFlight = new Set<Promise<unknown>>();

  let ready = false;
  let focused = false;
  let pasteInFlight = false;
  let destroyed = false;
  let currentHtml: string | null = options.html ?? null;
  let editorHeight: number | null = null;

  const track = (label: string, promise: Promise<unknown>): void => {
    inFlight.add(promise);
    promise.then(
      () => {
        inFlight.delete(promise);
      },
      (error: unknown) => {
        inFlight.delete(promise);
        logger.error("Engine event handling failed", {
          editorId: id,
          task: label,
          message: error instanceof Error ? error.message : String(error)
        });
      }
    );
  };

  const run = (command: EngineCommand, completion?: CommandCompletion) => channel.execute(command, completion);

  const reportError: EditorErrorReporter = (report) => {
    logger.warn(report.message, { code: report.code, info: report.info });
    delegate.onError?.(report);
  };

  const getSelectionState = async (): Promise<SelectionSnapshot> => {
    const outcome = await run(commands.getSelectionState());
    if (outcome.error) {
      selection.reset();
      return selection.getSnapshot();
    }
    const { snapshot, issue } = decodeSelectionStateWithIssue(outcome.result);
    if (issue === "malformed" || issue === "not-object") {
      logger.warn("Could not decode selection state", { editorId: id, issue });
    }
    selection.reset(snapshot);
    return selection.getSnapshot();
  };

  const publish = (snapshot: SelectionSnapshot) => {
    registry.publishSelection(id, snapshot);
  };

  const refreshSelection = async (): Promise<SelectionSnapshot> => {
    const snapshot = await getSelectionState();
    publish(snapshot);
    return snapshot;
  };

  const resetSelection = async (): Promise<void> => {
    await run(commands.resetSelection());
  };

  const focus = async (): Promise<boolean> => {
    const outcome = await run(commands.focus());
    focused = outcome.error === null;
    return focused;
  };

  // A first selection query can come back invalid when the document has never held a caret;
  // placing one at the start of the document and asking again recovers from that.
  const acquireSelection = async (): Promise<void> => {
    if (!focused && !(await focus())) {
      return;
    }
    let snapshot = await getSelectionState();
    if (!snapshot.valid) {
      await resetSelection();
      snapshot = await getSelectionState();
      if (!snapshot.valid) {
        logger.error("Could not reset selection state", { editorId: id });
        return;
      }
    }
    publish(snapshot);
  };

  let acquisition: Promise<void> | null = null;
  const latestAcquisition = (): Promise<void> | null => acquisition;

  const unsubscribeRegistry = registry.subscribe((activeEditorId) => {
    if (activeEditorId !== id || destroyed) {
      return;
    }
    const pending = acquireSelection();
    acquisition = pending;
    track("acquireSelection", pending);
  });

  const becomeFirstResponderIfReady = async (): Promise<boolean> => {
    if (!ready || destroyed) {
      return false;
    }
    acquisition = null;
    if (!registry.requestFocus(id)) {
      return false;
    }
    // Null when the request was queued behind a notification round already in progress.
    const pending = latestAcquisition();
    if (pending) {
      await pending;
    }
    return true;
  };

  const setHtml = async (html: string): Promise<void> => {
    currentHtml = html;
    await run(commands.setHTML(html, config.selectAfterLoad));
  };

  const setPlaceholder = async (): Promise<void> => {
    if (config.placeholder === null) {
      return;
    }
    await run(commands.setPlaceholder(config.placeholder));
  };

  const loadUserFiles = async (): Promise<void> => {
    if (config.userScriptFile === null && config.userCssFile === null) {
      return;
    }
    await run(commands.loadUserFiles(config.userScriptFile, config.userCssFile));
  };

  const setTopLevelAttributes = async (): Promise<void> => {
    if (Object.keys(config.topLevelAttributes).length === 0) {
      return;
    }
    await run(commands.setTopLevelAttributes(JSON.stringify(config.topLevelAttributes)));
  };

  const loadInitialHtml = async (html?: string): Promise<void> => {
    await loadUserFiles();
    await setTopLevelAttributes();
    await setPlaceholder();
    await setHtml(html ?? currentHtml ?? "");
    ready = true;
    logger.debug("Editor ready", { editorId: id });
    delegate.onReady?.(surface);
    if (config.selectAfterLoad) {
      await becomeFirstResponderIfReady();
    }
  };

  const getHtml = async (htmlOptions: GetHtmlOptions = {}): Promise<string | null> => {
    const outcome = await run(commands.getHTML(htmlOptions.pretty ?? true, htmlOptions.clean ?? true));
    return typeof outcome.result === "string" ? outcome.result : null;
  };

  const applyHeight = (clientHeight: number): number | null => {
    if (editorHeight === clientHeight) {
      return null;
    }
    editorHeight = clientHeight;
    const padded = clientHeight + config.clientHeightPad;
    delegate.onHeightChange?.(surface, padded);
    return padded;
  };

  const updateHeight = async (): Promise<number | null> => {
    const outcome = await run(commands.getHeight());
    const clientHeight = typeof outcome.result === "number" && Number.isInteger(outcome.result) ? outcome.result : 0;
    return applyHeight(clientHeight);
  };

  const guardedPaste = async (describe: string, perform: (release: () => void) => Promise<void>): Promise<boolean> => {
    if (pasteInFlight) {
      logger.debug("Dropping paste while another is in flight", { editorId: id, paste: describe });
      return false;
    }
    pasteInFlight = true;
    let released = false;
    const release = () => {
      released = true;
      pasteInFlight = false;
    };
    try {
      await perform(release);
    } catch (error) {
      logger.error("Paste failed", {
        editorId: id,
        paste: describe,
        message: error instanceof Error ? error.message : String(error)
      });
    } finally {
      if (!released) {
        release();
      }
    }
    return true;
  };

  const pasteText = async (text: string | null): Promise<boolean> => {
    if (text === null) {
      return false;
    }
    return guardedPaste("text", async (release) => {
      await run(commands.pasteText(text), release);
    });
  };

  const pasteHtml = async (html: string | null): Promise<boolean> => {
    if (html === null) {
      return false;
    }
    return guardedPaste("html", async (release) => {
      await run(commands.pasteHTML(html), release);
    });
  };

  const pasteImage = async (image: ClipboardImage | null): Promise<boolean> => {
    if (image === null) {
      return false;
    }
    if (!imageStore) {
      logger.warn("No image store configured; dropping pasted image", { editorId: id });
      return false;
    }
    return guardedPaste("image", async (release) => {
      const src = await imageStore.save(image);
      await run(commands.insertImage(src), release);
    });
  };

  const pasteUrl = async (url: string | null): Promise<boolean> => {
    if (url === null) {
      return false;
    }
    return guardedPaste("url", async (release) => {
      // Nothing presents a dialog here, but the engine still needs the selection saved first.
      await run(commands.startModalInput());
      try {
        await run(isImageUrl(url) ? commands.insertImage(url) : commands.insertLink(url));
      } finally {
        await run(commands.endModalInput(), release);
      }
    });
  };

  const copyImage = (clipboard: ClipboardWriter): boolean => {
    const snapshot = selection.getSnapshot();
    if (!snapshot.valid || snapshot.src === null) {
      return false;
    }
    const result = prepareImageCopy(
      { src: snapshot.src, alt: snapshot.alt, width: snapshot.width, height: snapshot.height },
      imageStore
    );
    if (!result.ok) {
      reportError(result.report);
      return false;
    }
    clipboard.setItems(result.items, result.image);
    return true;
  };

  const handleEngineEvent = (event: EngineEvent) => {
    if (destroyed) {
      return;
    }
    logger.debug("Engine event", { editorId: id, event: event.type });
    switch (event.type) {
      case "ready":
        track("loadInitialHtml", loadInitialHtml());
        return;
      case "focus":
        focused = true;
        delegate.onFocus?.(surface);
        if (ready && registry.getActiveEditorId() !== id) {
          registry.requestFocus(id);
        }
        return;
      case "blur":
        focused = false;
        delegate.onBlur?.(surface);
        return;
      case "selectionChange":
        track(
          "refreshSelection",
          refreshSelection().then((snapshot) => {
            delegate.onSelectionChange?.(surface, snapshot);
          })
        );
        return;
      case "input":
        delegate.onInput?.(surface);
        track("updateHeight", updateHeight());
        return;
      case "updateHeight":
        applyHeight(event.height);
        return;
    }
  };

  const unsubscribeEvents = transport.onEvent ? transport.onEvent(handleEngineEvent) : () => {};

  const unregister = registry.register({ id, isReady: () => ready && !destroyed });

  const destroy = () => {
    if (destroyed) {
      return;
    }
    destroyed = true;
    unsubscribeEvents();
    unsubscribeRegistry();
    unregister();
    transport.close?.();
  };

  const surface: EditorSurface = {
    id,
    config,
    commands,
    channel,
    selection,
    isReady: () => ready && !destroyed,
    hasFocus: () => focused,
    isPasteInFlight: () => pasteInFlight,
    execute: run,
    idle: async () => {
      while (inFlight.size > 0) {
        await Promise.allSettled(Array.from(inFlight));
      }
    },
    loadInitialHtml,
    becomeFirstResponderIfReady,
    focus,
    getSelectionState,
    refreshSelection,
    resetSelection,
    setRange: async (rangeOptions) => (await run(commands.setRange(rangeOptions))).result === true,
    getHtml,
    getRawHtml: () => getHtml({ pretty: false, clean: true }),
    setHtml,
    setHtmlIfChanged: async (html) => {
      if (html === currentHtml) {
        return false;
      }
      await setHtml(html);
      return true;
    },
    emptyDocument: async () => {
      await run(commands.emptyDocument());
    },
    cleanUpHtml: async () => (await run(commands.cleanUpHTML())).error,
    setPlaceholder,
    loadUserFiles,
    setTopLevelAttributes,
    updateHeight,
    padBottom: async (frameHeight) => {
      await run(commands.padBottom(frameHeight));
    },
    insertLink: async (href) => {
      await run(href === null ? commands.deleteLink() : commands.insertLink(href));
    },
    insertImage: async (src, alt) => {
      await run(commands.insertImage(src, alt));
    },
    modifyImage: async (src, alt) => {
      await run(commands.modifyImage(src, alt));
    },
    cutImage: async () => {
      await run(commands.cutImage());
    },
    pasteText,
    pasteHtml,
    pasteImage,
    pasteUrl,
    copyImage,
    handleEngineEvent,
    destroy
  };

  return surface;
};
