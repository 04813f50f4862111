import { afterEach, describe, expect, it, vi } from "vitest";

import { createConsoleLogger } from "./logger";

describe("console logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = createConsoleLogger({ scope: "bridge" });
    logger.info("ready", { editorId: "editor-1" });
    logger.info("idle");
    expect(info).toHaveBeenNthCalledWith(1, "[bridge] ready", { editorId: "editor-1" });
    expect(info).toHaveBeenNthCalledWith(2, "[bridge] idle", {});
  });

  it("drops debug output unless enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    createConsoleLogger({ scope: "bridge" }).debug("hidden");
    expect(debug).not.toHaveBeenCalled();
    createConsoleLogger({ scope: "bridge", debugEnabled: true }).debug("shown");
    expect(debug).toHaveBeenCalledWith("[bridge] shown", {});
  });
});
