import { describe, expect, it, vi } from "vitest";

import { parseEngineEvent } from "../engineEvents";
import { ScriptedEngine } from "../scriptedEngine";

describe("ScriptedEngine", () => {
  it("records commands and answers from the newest matching responder", async () => {
    const engine = new ScriptedEngine()
      .respondTo("getHeight", 10)
      .respondTo(/^MU\.getHeight/, 20);

    await expect(engine.evaluate("MU.getHeight()")).resolves.toBe(20);
    await expect(engine.evaluate("MU.focus()")).resolves.toBeNull();
    expect(engine.commands).toEqual(["MU.getHeight()", "MU.focus()"]);
    expect(engine.commandsNamed("getHeight")).toEqual(["MU.getHeight()"]);
  });

  it("matches function names exactly", async () => {
    const engine = new ScriptedEngine().respondTo("getHTML", "<p>x</p>");
    await expect(engine.evaluate("MU.getHTMLish()")).resolves.toBeNull();
  });

  it("rejects while not ready and announces readiness", async () => {
    const engine = new ScriptedEngine({ ready: false });
    const listener = vi.fn();
    engine.onEvent(listener);

    await expect(engine.evaluate("MU.focus()")).rejects.toMatchObject({ code: "engine-not-ready" });
    expect(engine.commands).toEqual([]);

    engine.setReady(true);
    expect(listener).toHaveBeenCalledWith({ type: "ready" });
    await expect(engine.evaluate("MU.focus()")).resolves.toBeNull();
  });

  it("uses the configured namespace", async () => {
    const engine = new ScriptedEngine({ namespace: "Editor" }).respondTo("undo", true);
    await expect(engine.evaluate("Editor.undo()")).resolves.toBe(true);
  });
});

describe("parseEngineEvent", () => {
  it("accepts known events and rejects the rest", () => {
    expect(parseEngineEvent({ type: "blur" })).toEqual({ type: "blur" });
    expect(parseEngineEvent({ type: "updateHeight", height: 42 })).toEqual({ type: "updateHeight", height: 42 });
    expect(parseEngineEvent({ type: "updateHeight", height: Number.NaN })).toBeNull();
    expect(parseEngineEvent(["focus"])).toBeNull();
  });
});
