import { createContext, useContext, useMemo, useSyncExternalStore, type ReactNode } from "react";

import {
  createNoopLogger,
  type CapabilityTable,
  type EditorId,
  type Logger,
  type SelectionSnapshot
} from "@richedit/editor-core";
import type { ActiveEditorRegistry, CommandDispatcher, ModalInputState } from "@richedit/editor-bridge";

interface ToolbarContextValue {
  readonly registry: ActiveEditorRegistry;
  readonly dispatcher: CommandDispatcher;
  readonly logger: Logger;
}

const ToolbarContext = createContext<ToolbarContextValue | null>(null);

export interface ToolbarProviderProps {
  readonly registry: ActiveEditorRegistry;
  readonly dispatcher: CommandDispatcher;
  readonly logger?: Logger;
  readonly children?: ReactNode;
}

export const ToolbarProvider = ({ registry, dispatcher, logger, children }: ToolbarProviderProps): JSX.Element => {
  const value = useMemo<ToolbarContextValue>(
    () => ({ registry, dispatcher, logger: logger ?? createNoopLogger() }),
    [registry, dispatcher, logger]
  );
  return <ToolbarContext.Provider value={value}>{children}</ToolbarContext.Provider>;
};

const useToolbarContext = (): ToolbarContextValue => {
  const context = useContext(ToolbarContext);
  if (!context) {
    throw new Error("Toolbar hooks must be used inside ToolbarProvider");
  }
  return context;
};

export const useCommandDispatcher = (): CommandDispatcher => useToolbarContext().dispatcher;

export const useToolbarLogger = (): Logger => useToolbarContext().logger;

export const useActiveEditorId = (): EditorId | null => {
  const { registry } = useToolbarContext();
  return useSyncExternalStore(registry.subscribe, registry.getActiveEditorId, registry.getActiveEditorId);
};

export const useActiveSelection = (): SelectionSnapshot => {
  const store = useToolbarContext().registry.activeSelection;
  return useSyncExternalStore(store.subscribe, store.getSnapshot, store.getSnapshot);
};

export const useCapabilityTable = (): CapabilityTable => {
  const store = useToolbarContext().registry.activeSelection;
  return useSyncExternalStore(store.subscribe, store.getCapabilityTable, store.getCapabilityTable);
};

export const useModalInputState = (): ModalInputState => {
  const { dispatcher } = useToolbarContext();
  return useSyncExternalStore(dispatcher.subscribe, dispatcher.getModalState, dispatcher.getModalState);
};
