/**
 * In-process stand-in for the document engine. It records every command it receives and answers
 * from a script of responders, so surfaces and dispatchers can run without a rendering host.
 */
import {
  DEFAULT_COMMAND_NAMESPACE,
  EngineTransportError,
  type EngineCommand,
  type EngineValue
} from "@richedit/editor-core";

import type { EngineTransport } from "../channel/commandChannel";
import type { EngineEvent, EngineEventListener } from "./engineEvents";

export type ScriptedResponder = (command: EngineCommand) => EngineValue | Promise<EngineValue>;

export type ScriptedResponse = EngineValue | ScriptedResponder;

/** A function name (matched as `<namespace>.<name>(`) or a pattern tested against the full command. */
export type CommandMatcher = string | RegExp;

interface ScriptEntry {
  readonly matcher: CommandMatcher;
  readonly respond: ScriptedResponder;
}

export interface ScriptedEngineOptions {
  readonly namespace?: string;
  readonly ready?: boolean;
}

export class ScriptedEngine implements EngineTransport {
  readonly commands: EngineCommand[] = [];

  private readonly namespace: string;
  private readonly entries: ScriptEntry[] = [];
  private readonly eventListeners = new Set<EngineEventListener>();
  private ready: boolean;
  private closed = false;

  constructor(options: ScriptedEngineOptions = {}) {
    this.namespace = options.namespace ?? DEFAULT_COMMAND_NAMESPACE;
    this.ready = options.ready ?? true;
  }

  /** Later registrations win over earlier ones for the same command. */
  respondTo(matcher: CommandMatcher, response: ScriptedResponse): this {
    if (typeof response === "function") {
      this.entries.unshift({ matcher, respond: response });
    } else {
      const value = response;
      this.entries.unshift({ matcher, respond: () => value });
    }
    return this;
  }

  failOn(matcher: CommandMatcher, message: string): this {
    return this.respondTo(matcher, () => {
      throw new EngineTransportError("engine-exception", message);
    });
  }

  setReady(ready: boolean): void {
    this.ready = ready;
    if (ready) {
      this.emit({ type: "ready" });
    }
  }

  emit(event: EngineEvent): void {
    this.eventListeners.forEach((listener) => listener(event));
  }

  onEvent(listener: EngineEventListener): () => void {
    this.eventListeners.add(listener);
    return () => this.eventListeners.delete(listener);
  }

  evaluate(command: EngineCommand): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new EngineTransportError("transport-closed", "Scripted engine is closed"));
    }
    if (!this.ready) {
      return Promise.reject(new EngineTransportError("engine-not-ready", "Scripted engine is not ready"));
    }
    this.commands.push(command);
    const entry = this.entries.find((candidate) => this.matches(candidate.matcher, command));
    // Answer asynchronously, as a real engine would.
    return Promise.resolve().then(() => (entry ? entry.respond(command) : null));
  }

  /** Commands received whose function name is `name`. */
  commandsNamed(name: string): EngineCommand[] {
    return this.commands.filter((command) => this.matches(name, command));
  }

  clearCommands(): void {
    this.commands.length = 0;
  }

  close(): void {
    this.closed = true;
    this.eventListeners.clear();
  }

  private matches(matcher: CommandMatcher, command: EngineCommand): boolean {
    if (typeof matcher === "string") {
      return command.startsWith(`${this.namespace}.${matcher}(`);
    }
    return matcher.test(command);
  }
}
