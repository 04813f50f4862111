import { describe, expect, it, vi } from "vitest";

import { EngineTransportError, type EngineCommand, type Logger } from "@richedit/editor-core";

import { ScriptedEngine } from "../../engine/scriptedEngine";
import { createCommandChannel, type CommandOutcome, type EngineTransport } from "../commandChannel";

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

const createLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
}) satisfies Logger;

const createManualTransport = () => {
  const calls: Array<{ command: EngineCommand; resolve: (value: unknown) => void }> = [];
  const transport: EngineTransport = {
    evaluate: (command) =>
      new Promise<unknown>((resolve) => {
        calls.push({ command, resolve });
      })
  };
  return { transport, calls };
};

describe("command channel", () => {
  it("hands commands to the transport one at a time in issue order", async () => {
    const { transport, calls } = createManualTransport();
    const channel = createCommandChannel({ transport });
    const completed: string[] = [];

    const first = channel.execute("MU.toggleBold()", (outcome) => completed.push(`bold:${String(outcome.result)}`));
    const second = channel.execute("MU.undo()", (outcome) => completed.push(`undo:${String(outcome.result)}`));
    await flush();

    expect(calls.map((call) => call.command)).toEqual(["MU.toggleBold()"]);
    expect(channel.getPendingCount()).toBe(2);

    calls[0]?.resolve(true);
    await flush();
    expect(calls.map((call) => call.command)).toEqual(["MU.toggleBold()", "MU.undo()"]);

    calls[1]?.resolve("done");
    await expect(first).resolves.toEqual({ result: true, error: null });
    await expect(second).resolves.toEqual({ result: "done", error: null });
    expect(completed).toEqual(["bold:true", "undo:done"]);
    expect(channel.getPendingCount()).toBe(0);
  });

  it("completes with a null result and a recoverable error when the engine is not ready", async () => {
    const engine = new ScriptedEngine({ ready: false });
    const logger = createLogger();
    const channel = createCommandChannel({ transport: engine, logger });
    const completion = vi.fn();

    const outcome = await channel.execute("MU.focus()", completion);

    expect(outcome.result).toBeNull();
    expect(outcome.error?.code).toBe("engine-not-ready");
    expect(outcome.error?.recoverable).toBe(true);
    expect(completion).toHaveBeenCalledTimes(1);
    expect(completion).toHaveBeenCalledWith(outcome);
    expect(logger.error).toHaveBeenCalledWith("Engine command failed", {
      command: "MU.focus()",
      code: "engine-not-ready",
      message: "Scripted engine is not ready"
    });
  });

  it("maps engine exceptions and keeps the queue moving", async () => {
    const engine = new ScriptedEngine().failOn("toggleBold", "boom").respondTo("undo", "ok");
    const channel = createCommandChannel({ transport: engine });

    const failed = channel.execute("MU.toggleBold()");
    const next = channel.execute("MU.undo()");

    const failedOutcome = await failed;
    expect(failedOutcome.result).toBeNull();
    expect(failedOutcome.error?.code).toBe("engine-exception");
    expect(failedOutcome.error?.message).toBe("boom");
    await expect(next).resolves.toEqual({ result: "ok", error: null });
  });

  it("maps plain errors to engine exceptions", async () => {
    const transport: EngineTransport = {
      evaluate: () => Promise.reject(new Error("script error"))
    };
    const outcome = await createCommandChannel({ transport }).execute("MU.indent()");
    expect(outcome.error).toMatchObject({ code: "engine-exception", message: "script error", recoverable: true });
  });

  it("marks a closed transport as unrecoverable", async () => {
    const transport: EngineTransport = {
      evaluate: () => Promise.reject(new EngineTransportError("transport-closed", "gone"))
    };
    const outcome = await createCommandChannel({ transport }).execute("MU.indent()");
    expect(outcome.error).toMatchObject({ code: "transport-closed", recoverable: false });
  });

  it("treats non-primitive results as unexpected", async () => {
    const transport: EngineTransport = { evaluate: () => Promise.resolve({ nested: true }) };
    const logger = createLogger();
    const outcome = await createCommandChannel({ transport, logger }).execute("MU.getHeight()");

    expect(outcome.result).toBeNull();
    expect(outcome.error?.code).toBe("unexpected-result");
    expect(logger.warn).toHaveBeenCalledWith("Unexpected engine result", { command: "MU.getHeight()", kind: "object" });
  });

  it("treats an undefined result as null without an error", async () => {
    const transport: EngineTransport = { evaluate: () => Promise.resolve(undefined) };
    const outcome: CommandOutcome = await createCommandChannel({ transport }).execute("MU.focus()");
    expect(outcome).toEqual({ result: null, error: null });
  });

  it("logs a throwing completion and runs later commands", async () => {
    const engine = new ScriptedEngine();
    const logger = createLogger();
    const channel = createCommandChannel({ transport: engine, logger });

    const first = channel.execute("MU.undo()", () => {
      throw new Error("handler failed");
    });
    const second = channel.execute("MU.redo()");

    await expect(first).resolves.toEqual({ result: null, error: null });
    await expect(second).resolves.toEqual({ result: null, error: null });
    expect(engine.commands).toEqual(["MU.undo()", "MU.redo()"]);
    expect(logger.error).toHaveBeenCalledWith("Command completion threw", {
      command: "MU.undo()",
      message: "handler failed"
    });
  });
});
