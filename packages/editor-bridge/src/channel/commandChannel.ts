import {
  EngineTransportError,
  createCommandChannelError,
  createNoopLogger,
  type CommandChannelError,
  type EngineCommand,
  type EngineValue,
  type Logger
} from "@richedit/editor-core";

import type { EngineEventListener } from "../engine/engineEvents";

/**
 * Lower layer under a command channel. `evaluate` resolves with whatever the engine returned and
 * rejects when the engine or the link to it fails.
 */
export interface EngineTransport {
  evaluate(command: EngineCommand): Promise<unknown>;
  /** Engine-originated events; transports that cannot observe the engine leave this out. */
  onEvent?(listener: EngineEventListener): () => void;
  close?(): void;
}

export interface CommandOutcome {
  readonly result: EngineValue;
  readonly error: CommandChannelError | null;
}

export type CommandCompletion = (outcome: CommandOutcome) => void;

export interface CommandChannel {
  /**
   * Queues the command behind every call already issued on this channel. The completion runs
   * exactly once, before the next queued command is handed to the transport, and the returned
   * promise never rejects.
   */
  execute(command: EngineCommand, completion?: CommandCompletion): Promise<CommandOutcome>;
  getPendingCount(): number;
}

export interface CommandChannelOptions {
  readonly transport: EngineTransport;
  readonly logger?: Logger;
}

const isEngineValue = (value: unknown): value is EngineValue =>
  value === null
  || typeof value === "string"
  || typeof value === "number"
  || typeof value === "boolean";

const describeValue = (value: unknown): string => (Array.isArray(value) ? "array" : typeof value);

export const createCommandChannel = (options: CommandChannelOptions): CommandChannel => {
  const { transport } = options;
  const logger = options.logger ?? createNoopLogger();
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  const run = async (command: EngineCommand): Promise<CommandOutcome> => {
    try {
      const value = await transport.evaluate(command);
      if (value === undefined) {
        return { result: null, error: null };
      }
      if (isEngineValue(value)) {
        return { result: value, error: null };
      }
      const error = createCommandChannelError(
        new EngineTransportError("unexpected-result", `Engine returned a non-primitive ${describeValue(value)}`)
      );
      logger.warn("Unexpected engine result", { command, kind: describeValue(value) });
      return { result: null, error };
    } catch (cause) {
      const error = createCommandChannelError(cause);
      logger.error("Engine command failed", { command, code: error.code, message: error.message });
      return { result: null, error };
    }
  };

  const complete = (command: EngineCommand, completion: CommandCompletion | undefined, outcome: CommandOutcome) => {
    pending -= 1;
    if (!completion) {
      return;
    }
    try {
      completion(outcome);
    } catch (error) {
      logger.error("Command completion threw", {
        command,
        message: error instanceof Error ? error.message : String(error)
      });
    }
  };

  const execute = (command: EngineCommand, completion?: CommandCompletion): Promise<CommandOutcome> => {
    pending += 1;
    logger.debug("Queue command", { command, pending });
    const outcome = tail
      .then(() => run(command))
      .then((result) => {
        complete(command, completion, result);
        return result;
      });
    tail = outcome.then(() => undefined);
    return outcome;
  };

  return {
    execute,
    getPendingCount: () => pending
  };
};
