/**
 * Engine transport over a postMessage-style link (an iframe, a web view message handler, a worker
 * port). Requests carry a request id; the engine answers each id once. Calls made before the
 * engine announces `ready` are held and flushed in order when it does.
 */
import {
  EngineTransportError,
  createNoopLogger,
  createRequestId,
  type CommandChannelErrorCode,
  type EngineCommand,
  type Logger,
  type RequestId
} from "@richedit/editor-core";

import { parseEngineEvent, type EngineEvent, type EngineEventListener } from "../engine/engineEvents";
import type { EngineTransport } from "./commandChannel";

export interface EvaluateMessage {
  readonly type: "evaluate";
  readonly requestId: RequestId;
  readonly command: EngineCommand;
}

export interface ReadyMessage {
  readonly type: "ready";
}

export interface ResultMessage {
  readonly type: "result";
  readonly requestId: RequestId;
  readonly value: unknown;
}

export interface ErrorMessage {
  readonly type: "error";
  readonly requestId: RequestId;
  readonly message: string;
  readonly code?: CommandChannelErrorCode;
}

export interface EventMessage {
  readonly type: "event";
  readonly event: EngineEvent;
}

export type HostToEngineMessage = EvaluateMessage;

export type EngineToHostMessage = ReadyMessage | ResultMessage | ErrorMessage | EventMessage;

export interface MessageEndpoint {
  postMessage(message: HostToEngineMessage): void;
  /** Registers for messages from the engine; returns the unsubscribe function. */
  subscribe(listener: (message: unknown) => void): () => void;
}

export interface MessageTransport extends EngineTransport {
  isReady(): boolean;
  onEvent(listener: EngineEventListener): () => void;
  close(): void;
}

export interface MessageTransportOptions {
  readonly endpoint: MessageEndpoint;
  readonly logger?: Logger;
  readonly createRequestId?: () => RequestId;
}

interface PendingRequest {
  readonly resolve: (value: unknown) => void;
  readonly reject: (error: EngineTransportError) => void;
}

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toErrorCode = (value: unknown): CommandChannelErrorCode =>
  value === "engine-not-ready" || value === "transport-closed" || value === "unexpected-result"
    ? value
    : "engine-exception";

export const parseEngineMessage = (value: unknown): EngineToHostMessage | null => {
  if (!isRecord(value)) {
    return null;
  }
  switch (value.type) {
    case "ready":
      return { type: "ready" };
    case "result":
      return typeof value.requestId === "string"
        ? { type: "result", requestId: value.requestId, value: value.value }
        : null;
    case "error":
      if (typeof value.requestId !== "string") {
        return null;
      }
      return {
        type: "error",
        requestId: value.requestId,
        message: typeof value.message === "string" ? value.message : "Engine reported an error",
        code: toErrorCode(value.code)
      };
    case "event": {
      const event = parseEngineEvent(value.event);
      return event ? { type: "event", event } : null;
    }
    default:
      return null;
  }
};

export const createMessageTransport = (options: MessageTransportOptions): MessageTransport => {
  const { endpoint } = options;
  const logger = options.logger ?? createNoopLogger();
  const nextRequestId = options.createRequestId ?? createRequestId;
  const pending = new Map<RequestId, PendingRequest>();
  const buffered: EvaluateMessage[] = [];
  const eventListeners = new Set<EngineEventListener>();
  let ready = false;
  let closed = false;

  const emit = (event: EngineEvent) => {
    eventListeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        logger.error("Engine event listener threw", {
          event: event.type,
          message: error instanceof Error ? error.message : String(error)
        });
      }
    });
  };

  const flush = () => {
    const queued = buffered.splice(0, buffered.length);
    if (queued.length > 0) {
      logger.debug("Flushing buffered commands", { count: queued.length });
    }
    queued.forEach((message) => endpoint.postMessage(message));
  };

  // Engines may announce readiness as a top-level message or as a wrapped event.
  const markReady = () => {
    ready = true;
    flush();
    emit({ type: "ready" });
  };

  const settle = (requestId: RequestId, settleRequest: (request: PendingRequest) => void) => {
    const request = pending.get(requestId);
    if (!request) {
      logger.warn("Response for unknown request", { requestId });
      return;
    }
    pending.delete(requestId);
    settleRequest(request);
  };

  const handleMessage = (raw: unknown) => {
    const message = parseEngineMessage(raw);
    if (!message) {
      logger.debug("Ignoring unrecognised engine message");
      return;
    }
    switch (message.type) {
      case "ready":
        markReady();
        return;
      case "result":
        settle(message.requestId, (request) => request.resolve(message.value));
        return;
      case "error":
        settle(message.requestId, (request) =>
          request.reject(new EngineTransportError(message.code ?? "engine-exception", message.message))
        );
        return;
      case "event":
        if (message.event.type === "ready") {
          markReady();
        } else {
          emit(message.event);
        }
        return;
    }
  };

  const unsubscribe = endpoint.subscribe(handleMessage);

  const evaluate = (command: EngineCommand): Promise<unknown> => {
    if (closed) {
      return Promise.reject(new EngineTransportError("transport-closed", "Transport is closed"));
    }
    const requestId = nextRequestId();
    const message: EvaluateMessage = { type: "evaluate", requestId, command };
    return new Promise<unknown>((resolve, reject) => {
      pending.set(requestId, { resolve, reject });
      if (ready) {
        endpoint.postMessage(message);
      } else {
        buffered.push(message);
      }
    });
  };

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    unsubscribe();
    buffered.length = 0;
    const outstanding = Array.from(pending.values());
    pending.clear();
    outstanding.forEach((request) =>
      request.reject(new EngineTransportError("transport-closed", "Transport closed before the engine replied"))
    );
    eventListeners.clear();
  };

  return {
    evaluate,
    isReady: () => ready,
    onEvent(listener) {
      eventListeners.add(listener);
      return () => eventListeners.delete(listener);
    },
    close
  };
};
