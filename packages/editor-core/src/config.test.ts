import { describe, expect, it } from "vitest";

import {
  DEFAULT_CLIENT_HEIGHT_PAD,
  DEFAULT_TOP_LEVEL_ATTRIBUTES,
  defaultEditorConfig,
  editorConfigFromEnv,
  resolveEditorConfig
} from "./config";

describe("editor config", () => {
  it("provides defaults", () => {
    const config = defaultEditorConfig();
    expect(config.commandNamespace).toBe("MU");
    expect(config.selectAfterLoad).toBe(true);
    expect(config.clientHeightPad).toBe(DEFAULT_CLIENT_HEIGHT_PAD);
    expect(config.topLevelAttributes).toEqual(DEFAULT_TOP_LEVEL_ATTRIBUTES);
  });

  it("falls back on invalid options", () => {
    const config = resolveEditorConfig({
      commandNamespace: "1bad",
      clientHeightPad: -2,
      userScriptFile: "   ",
      userCssFile: " editor.css "
    });
    expect(config.commandNamespace).toBe("MU");
    expect(config.clientHeightPad).toBe(8);
    expect(config.userScriptFile).toBeNull();
    expect(config.userCssFile).toBe("editor.css");
  });

  it("reads RICHEDIT_ variables", () => {
    const config = editorConfigFromEnv({
      RICHEDIT_COMMAND_NAMESPACE: "Editor",
      RICHEDIT_SELECT_AFTER_LOAD: "no",
      RICHEDIT_CLIENT_HEIGHT_PAD: "12",
      RICHEDIT_DEBUG: "on",
      RICHEDIT_PLACEHOLDER: " Type here "
    });
    expect(config.commandNamespace).toBe("Editor");
    expect(config.selectAfterLoad).toBe(false);
    expect(config.clientHeightPad).toBe(12);
    expect(config.debugLoggingEnabled).toBe(true);
    expect(config.placeholder).toBe("Type here");
  });

  it("ignores unparseable values and applies overrides last", () => {
    const config = editorConfigFromEnv(
      { RICHEDIT_CLIENT_HEIGHT_PAD: "tall", RICHEDIT_DEBUG: "maybe" },
      { selectAfterLoad: false }
    );
    expect(config.clientHeightPad).toBe(8);
    expect(config.debugLoggingEnabled).toBe(false);
    expect(config.selectAfterLoad).toBe(false);
  });
});
