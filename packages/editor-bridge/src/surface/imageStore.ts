import { createRequestId, type ClipboardImage } from "@richedit/editor-core";

/**
 * Where pasted raster images are kept so the document can reference them by `src`. Hosts back
 * this with their cache directory; the memory store serves tests and hosts without storage.
 */
export interface ImageStore {
  save(image: ClipboardImage): Promise<string>;
  load(src: string): ClipboardImage | null;
}

const EXTENSIONS: Readonly<Record<string, string>> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/gif": "gif",
  "image/webp": "webp",
  "image/svg+xml": "svg"
};

export const extensionForMimeType = (mimeType: string): string => EXTENSIONS[mimeType.toLowerCase()] ?? "png";

export interface MemoryImageStoreOptions {
  /** Prefix for generated sources; should end with a slash. */
  readonly baseUrl?: string;
  readonly createId?: () => string;
}

export const DEFAULT_IMAGE_BASE_URL = "file:///richedit/images/";

export const createMemoryImageStore = (options: MemoryImageStoreOptions = {}): ImageStore => {
  const baseUrl = options.baseUrl ?? DEFAULT_IMAGE_BASE_URL;
  const createId = options.createId ?? createRequestId;
  const images = new Map<string, ClipboardImage>();
  return {
    save(image) {
      const src = `${baseUrl}${createId()}.${extensionForMimeType(image.mimeType)}`;
      images.set(src, { data: image.data.slice(), mimeType: image.mimeType });
      return Promise.resolve(src);
    },
    load(src) {
      return images.get(src) ?? null;
    }
  };
};
