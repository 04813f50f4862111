/**
 * Error shapes shared by the bridge. Caller bugs throw `EditorBridgeError`; everything that can
 * go wrong at run time (engine failures, bad clipboard content) travels as a plain record so it
 * can be logged or reported without unwinding the host.
 */

export class EditorBridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EditorBridgeError";
  }
}

export type CommandChannelErrorCode =
  | "engine-exception"
  | "engine-not-ready"
  | "transport-closed"
  | "unexpected-result";

export interface CommandChannelError {
  readonly code: CommandChannelErrorCode;
  readonly message: string;
  readonly recoverable: boolean;
  readonly cause?: unknown;
}

/**
 * Problem the host may want to show the user. `alert` is advisory; the bridge never presents UI.
 */
export interface EditorErrorReport {
  readonly code: string;
  readonly message: string;
  readonly info: string;
  readonly alert: boolean;
}

export type EditorErrorReporter = (report: EditorErrorReport) => void;

const isCommandChannelErrorCode = (value: unknown): value is CommandChannelErrorCode =>
  value === "engine-exception"
  || value === "engine-not-ready"
  || value === "transport-closed"
  || value === "unexpected-result";

export class EngineTransportError extends Error {
  readonly code: CommandChannelErrorCode;

  constructor(code: CommandChannelErrorCode, message: string) {
    super(message);
    this.name = "EngineTransportError";
    this.code = code;
  }
}

export const createCommandChannelError = (
  cause: unknown,
  fallbackCode: CommandChannelErrorCode = "engine-exception"
): CommandChannelError => {
  if (cause instanceof EngineTransportError) {
    return {
      code: cause.code,
      message: cause.message,
      recoverable: cause.code !== "transport-closed",
      cause
    };
  }
  const candidateCode =
    typeof cause === "object" && cause !== null && "code" in cause
      ? cause.code
      : undefined;
  const code = isCommandChannelErrorCode(candidateCode) ? candidateCode : fallbackCode;
  return {
    code,
    message: cause instanceof Error ? cause.message : String(cause),
    recoverable: code !== "transport-closed",
    cause
  };
};
