export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  readonly scope: string;
  readonly debugEnabled?: boolean;
}

const toStructuredLogArgs = (
  scope: string,
  message: string,
  context?: Record<string, unknown>
): [string, Record<string, unknown>] => {
  const scoped = `[${scope}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    return [scoped, context];
  }
  return [scoped, {}];
};

export const createConsoleLogger = (options: ConsoleLoggerOptions): Logger => {
  const { scope } = options;
  const debugEnabled = options.debugEnabled ?? false;
  return {
    debug(message, context) {
      if (!debugEnabled || typeof console.debug !== "function") {
        return;
      }
      const [msg, ctx] = toStructuredLogArgs(scope, message, context);
      console.debug(msg, ctx);
    },
    info(message, context) {
      const [msg, ctx] = toStructuredLogArgs(scope, message, context);
      console.info(msg, ctx);
    },
    warn(message, context) {
      const [msg, ctx] = toStructuredLogArgs(scope, message, context);
      console.warn(msg, ctx);
    },
    error(message, context) {
      const [msg, ctx] = toStructuredLogArgs(scope, message, context);
      console.error(msg, ctx);
    }
  };
};

export const createNoopLogger = (): Logger => ({
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
});
