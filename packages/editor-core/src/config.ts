/**
 * Editor configuration. Hosts pass partial options; anything left out falls back to the defaults
 * below. `editorConfigFromEnv` lets test harnesses and demo hosts drive the same settings from
 * `RICHEDIT_*` environment variables.
 */

interface RawEnv {
  readonly [key: string]: string | undefined;
}

export type TopLevelAttributes = Readonly<Record<string, string | boolean>>;

export interface EditorConfig {
  /** Global object the engine script installs its API on. */
  readonly commandNamespace: string;
  readonly selectAfterLoad: boolean;
  readonly placeholder: string | null;
  /** Added to the engine-reported client height when the host sizes the surface. */
  readonly clientHeightPad: number;
  readonly debugLoggingEnabled: boolean;
  readonly userScriptFile: string | null;
  readonly userCssFile: string | null;
  readonly topLevelAttributes: TopLevelAttributes;
}

export type EditorConfigInput = Partial<EditorConfig>;

export const DEFAULT_COMMAND_NAMESPACE = "MU";
export const DEFAULT_CLIENT_HEIGHT_PAD = 8;

export const DEFAULT_TOP_LEVEL_ATTRIBUTES: TopLevelAttributes = {
  contenteditable: true,
  spellcheck: false,
  autocorrect: true
};

export const defaultEditorConfig = (): EditorConfig => ({
  commandNamespace: DEFAULT_COMMAND_NAMESPACE,
  selectAfterLoad: true,
  placeholder: null,
  clientHeightPad: DEFAULT_CLIENT_HEIGHT_PAD,
  debugLoggingEnabled: false,
  userScriptFile: null,
  userCssFile: null,
  topLevelAttributes: { ...DEFAULT_TOP_LEVEL_ATTRIBUTES }
});

const NAMESPACE_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*(\.[A-Za-z_$][A-Za-z0-9_$]*)*$/;

const normaliseNamespace = (value: string | undefined, fallback: string): string => {
  if (value === undefined) {
    return fallback;
  }
  const trimmed = value.trim();
  return NAMESPACE_PATTERN.test(trimmed) ? trimmed : fallback;
};

const normaliseOptionalString = (value: string | null | undefined): string | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const resolveEditorConfig = (input: EditorConfigInput = {}): EditorConfig => {
  const defaults = defaultEditorConfig();
  const pad = input.clientHeightPad;
  return {
    commandNamespace: normaliseNamespace(input.commandNamespace, defaults.commandNamespace),
    selectAfterLoad: input.selectAfterLoad ?? defaults.selectAfterLoad,
    placeholder: input.placeholder === undefined ? defaults.placeholder : input.placeholder,
    clientHeightPad:
      typeof pad === "number" && Number.isInteger(pad) && pad >= 0 ? pad : defaults.clientHeightPad,
    debugLoggingEnabled: input.debugLoggingEnabled ?? defaults.debugLoggingEnabled,
    userScriptFile: normaliseOptionalString(input.userScriptFile),
    userCssFile: normaliseOptionalString(input.userCssFile),
    topLevelAttributes: input.topLevelAttributes
      ? { ...input.topLevelAttributes }
      : defaults.topLevelAttributes
  };
};

const toInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const boolFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }
  const normalised = value.trim().toLowerCase();
  if (normalised === "1" || normalised === "true" || normalised === "yes" || normalised === "on") {
    return true;
  }
  if (normalised === "0" || normalised === "false" || normalised === "no" || normalised === "off") {
    return false;
  }
  return fallback;
};

export const editorConfigFromEnv = (
  env: RawEnv = process.env,
  overrides: EditorConfigInput = {}
): EditorConfig => {
  const defaults = defaultEditorConfig();
  return resolveEditorConfig({
    commandNamespace: env.RICHEDIT_COMMAND_NAMESPACE ?? defaults.commandNamespace,
    selectAfterLoad: boolFromEnv(env.RICHEDIT_SELECT_AFTER_LOAD, defaults.selectAfterLoad),
    placeholder: normaliseOptionalString(env.RICHEDIT_PLACEHOLDER),
    clientHeightPad: toInt(env.RICHEDIT_CLIENT_HEIGHT_PAD, defaults.clientHeightPad),
    debugLoggingEnabled: boolFromEnv(env.RICHEDIT_DEBUG, defaults.debugLoggingEnabled),
    userScriptFile: normaliseOptionalString(env.RICHEDIT_USER_SCRIPT_FILE),
    userCssFile: normaliseOptionalString(env.RICHEDIT_USER_CSS_FILE),
    ...overrides
  });
};
