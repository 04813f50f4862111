export {
  ToolbarProvider,
  useActiveEditorId,
  useActiveSelection,
  useCapabilityTable,
  useCommandDispatcher,
  useModalInputState,
  useToolbarLogger
} from "./ToolbarProvider";
export type { ToolbarProviderProps } from "./ToolbarProvider";

export { getToolbarActionDefinitions, isToolbarActionActive, runToolbarAction } from "./toolbarActions";
export type { ToolbarActionDefinition, ToolbarActionType } from "./toolbarActions";

export { EditorToolbar } from "./components/EditorToolbar";
export type { EditorToolbarProps } from "./components/EditorToolbar";
export { ToolbarButton } from "./components/ToolbarButton";
export type { ToolbarButtonProps } from "./components/ToolbarButton";
