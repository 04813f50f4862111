/**
 * Identifier utilities. Editor and request IDs are ULIDs so they sort by creation time while
 * staying unique across every editor hosted by the process.
 */
import { ulid } from "ulidx";

export type EditorId = string;
export type RequestId = string;

export const createEditorId = (): EditorId => ulid();

export const createRequestId = (): RequestId => ulid();
