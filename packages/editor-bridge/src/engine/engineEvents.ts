/** Notifications the engine pushes to the host without being asked. */
export type EngineEvent =
  | { readonly type: "ready" }
  | { readonly type: "focus" }
  | { readonly type: "blur" }
  | { readonly type: "selectionChange" }
  | { readonly type: "input" }
  | { readonly type: "updateHeight"; readonly height: number };

export type EngineEventListener = (event: EngineEvent) => void;

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Validates an event received over a loosely typed link; anything unrecognised yields null. */
export const parseEngineEvent = (value: unknown): EngineEvent | null => {
  if (!isRecord(value)) {
    return null;
  }
  switch (value.type) {
    case "ready":
      return { type: "ready" };
    case "focus":
      return { type: "focus" };
    case "blur":
      return { type: "blur" };
    case "selectionChange":
      return { type: "selectionChange" };
    case "input":
      return { type: "input" };
    case "updateHeight": {
      const { height } = value;
      return typeof height === "number" && Number.isFinite(height) ? { type: "updateHeight", height } : null;
    }
    default:
      return null;
  }
};
