import { Fragment, useCallback, useMemo, useRef, useState, type CSSProperties, type KeyboardEvent } from "react";

import { isActionEnabled, type SelectionAction } from "@richedit/editor-core";

import {
  useActiveEditorId,
  useActiveSelection,
  useCapabilityTable,
  useCommandDispatcher,
  useModalInputState,
  useToolbarLogger
} from "../ToolbarProvider";
import {
  getToolbarActionDefinitions,
  isToolbarActionActive,
  runToolbarAction,
  type ToolbarActionDefinition
} from "../toolbarActions";
import { ToolbarButton } from "./ToolbarButton";

export interface EditorToolbarProps {
  readonly ariaLabel?: string;
  /** Restricts and orders the buttons; defaults to every toolbar action. */
  readonly actions?: readonly SelectionAction[];
}

const toolbarStyle: CSSProperties = {
  display: "inline-flex",
  gap: "0.25rem",
  alignItems: "center",
  backgroundColor: "rgba(17, 24, 39, 0.95)",
  color: "#f9fafb",
  borderRadius: "0.5rem",
  padding: "0.35rem 0.6rem"
};

const dividerStyle: CSSProperties = {
  width: "1px",
  height: "20px",
  backgroundColor: "rgba(255, 255, 255, 0.24)"
};

const selectDefinitions = (actions: readonly SelectionAction[] | undefined): readonly ToolbarActionDefinition[] => {
  const definitions = getToolbarActionDefinitions();
  if (!actions) {
    return definitions;
  }
  return actions.flatMap((id) => definitions.filter((definition) => definition.id === id));
};

export const EditorToolbar = ({ ariaLabel = "Formatting", actions }: EditorToolbarProps): JSX.Element => {
  const dispatcher = useCommandDispatcher();
  const logger = useToolbarLogger();
  const activeEditorId = useActiveEditorId();
  const snapshot = useActiveSelection();
  const table = useCapabilityTable();
  const modalState = useModalInputState();
  const buttonRefs = useRef<Array<HTMLButtonElement | null>>([]);
  const [focusedIndex, setFocusedIndex] = useState(0);

  const definitions = useMemo(() => selectDefinitions(actions), [actions]);

  const focusButtonAtIndex = useCallback((index: number) => {
    const button = buttonRefs.current[index];
    if (button) {
      button.focus();
      setFocusedIndex(index);
    }
  }, []);

  const handleKeyDown = useCallback(
    (event: KeyboardEvent<HTMLButtonElement>, index: number) => {
      const total = definitions.length;
      if (event.key === "ArrowRight" || event.key === "ArrowLeft") {
        event.preventDefault();
        const delta = event.key === "ArrowRight" ? 1 : -1;
        focusButtonAtIndex((index + delta + total) % total);
        return;
      }
      if (event.key === "Home") {
        event.preventDefault();
        focusButtonAtIndex(0);
        return;
      }
      if (event.key === "End") {
        event.preventDefault();
        focusButtonAtIndex(total - 1);
      }
    },
    [definitions.length, focusButtonAtIndex]
  );

  const run = useCallback(
    (id: SelectionAction) => {
      runToolbarAction(id, dispatcher).catch((error: unknown) => {
        logger.error("Toolbar action failed", {
          action: id,
          message: error instanceof Error ? error.message : String(error)
        });
      });
    },
    [dispatcher, logger]
  );

  const blocked = activeEditorId === null || modalState === "modal-pending";

  return (
    <div role="toolbar" aria-label={ariaLabel} style={toolbarStyle}>
      {definitions.map((definition, index) => {
        const previous = definitions[index - 1];
        const showDivider = previous !== undefined && previous.group !== definition.group;
        return (
          <Fragment key={definition.id}>
            {showDivider ? <span aria-hidden="true" style={dividerStyle} /> : null}
            <ToolbarButton
              label={definition.toolbarLabel}
              ariaLabel={definition.ariaLabel}
              ariaKeyShortcut={definition.ariaKeyShortcut}
              shortcutHint={definition.shortcutHint}
              isToggle={definition.isToggle}
              isActive={isToolbarActionActive(definition.id, snapshot)}
              disabled={blocked || !isActionEnabled(table, definition.id)}
              tabIndex={index === focusedIndex ? 0 : -1}
              buttonRef={(element) => {
                buttonRefs.current[index] = element;
              }}
              onRun={() => run(definition.id)}
              onKeyDown={(event) => handleKeyDown(event, index)}
            />
          </Fragment>
        );
      })}
    </div>
  );
};
