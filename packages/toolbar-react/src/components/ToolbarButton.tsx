import type { CSSProperties, KeyboardEvent, MouseEvent, Ref } from "react";

export interface ToolbarButtonProps {
  readonly label: string;
  readonly ariaLabel: string;
  readonly ariaKeyShortcut?: string;
  readonly shortcutHint?: string;
  readonly isToggle: boolean;
  readonly isActive: boolean;
  readonly disabled: boolean;
  readonly tabIndex: number;
  readonly buttonRef?: Ref<HTMLButtonElement>;
  readonly onRun: () => void;
  readonly onKeyDown?: (event: KeyboardEvent<HTMLButtonElement>) => void;
}

const baseButtonStyle: CSSProperties = {
  backgroundColor: "transparent",
  border: "none",
  color: "inherit",
  padding: "0.3rem 0.45rem",
  borderRadius: "0.375rem",
  fontSize: "0.82rem",
  fontWeight: 600,
  lineHeight: 1,
  cursor: "pointer"
};

const activeButtonStyle: CSSProperties = {
  backgroundColor: "rgba(59, 130, 246, 0.25)"
};

const disabledButtonStyle: CSSProperties = {
  opacity: 0.4,
  cursor: "default"
};

export const ToolbarButton = ({
  label,
  ariaLabel,
  ariaKeyShortcut,
  shortcutHint,
  isToggle,
  isActive,
  disabled,
  tabIndex,
  buttonRef,
  onRun,
  onKeyDown
}: ToolbarButtonProps): JSX.Element => {
  // Keep focus (and the engine selection) in the editor.
  const handleMouseDown = (event: MouseEvent<HTMLButtonElement>) => {
    event.preventDefault();
  };

  return (
    <button
      ref={buttonRef}
      type="button"
      aria-label={ariaLabel}
      aria-keyshortcuts={ariaKeyShortcut}
      aria-pressed={isToggle ? isActive : undefined}
      title={shortcutHint ? `${ariaLabel} (${shortcutHint})` : ariaLabel}
      disabled={disabled}
      tabIndex={tabIndex}
      style={{
        ...baseButtonStyle,
        ...(isActive ? activeButtonStyle : null),
        ...(disabled ? disabledButtonStyle : null)
      }}
      onMouseDown={handleMouseDown}
      onClick={onRun}
      onKeyDown={onKeyDown}
    >
      {label}
    </button>
  );
};
