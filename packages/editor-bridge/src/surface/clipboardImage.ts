/**
 * Builds the clipboard contents for copying the selected image. The `<img>` HTML always goes under
 * the private marker so pasting back into an editor keeps the size; remote images also get plain
 * HTML for other apps, while local images carry their bytes instead.
 */
import {
  HTML_CLIPBOARD_TYPE,
  LOCAL_IMAGE_CLIPBOARD_TYPE,
  type ClipboardImage,
  type EditorErrorReport
} from "@richedit/editor-core";

import type { ImageStore } from "./imageStore";

export interface ImageCopyRequest {
  readonly src: string;
  readonly alt: string | null;
  readonly width: number | null;
  readonly height: number | null;
}

export type ImageCopyResult =
  | {
      readonly ok: true;
      readonly html: string;
      readonly items: Readonly<Record<string, string>>;
      readonly image: ClipboardImage | null;
    }
  | { readonly ok: false; readonly report: EditorErrorReport };

// Relative sources resolve against this so that only genuinely malformed sources fail.
const RELATIVE_BASE = "relative:///";

export const escapeHtmlAttribute = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");

export const buildImageHtml = (request: ImageCopyRequest): string => {
  let html = `<img src="${escapeHtmlAttribute(request.src)}"`;
  if (request.alt !== null) {
    html += ` alt="${escapeHtmlAttribute(request.alt)}"`;
  }
  if (request.width !== null && request.height !== null) {
    html += ` width="${request.width}" height="${request.height}"`;
  }
  return `${html}>`;
};

const resolveSource = (src: string): URL | null => {
  if (src.trim().length === 0 || /\s/.test(src)) {
    return null;
  }
  try {
    return new URL(src, RELATIVE_BASE);
  } catch (_error) {
    return null;
  }
};

export const prepareImageCopy = (request: ImageCopyRequest, imageStore: ImageStore | null): ImageCopyResult => {
  const url = resolveSource(request.src);
  if (!url) {
    return {
      ok: false,
      report: {
        code: "Invalid image URL",
        message: "The url for the image to copy was invalid.",
        info: `src: ${request.src}`,
        alert: true
      }
    };
  }
  const html = buildImageHtml(request);
  if (url.protocol === "file:") {
    const image = imageStore ? imageStore.load(request.src) : null;
    if (!image) {
      return {
        ok: false,
        report: {
          code: "Invalid local image",
          message: "Could not copy image data to the clipboard.",
          info: `src: ${request.src}`,
          alert: true
        }
      };
    }
    return { ok: true, html, items: { [LOCAL_IMAGE_CLIPBOARD_TYPE]: html }, image };
  }
  return {
    ok: true,
    html,
    items: { [LOCAL_IMAGE_CLIPBOARD_TYPE]: html, [HTML_CLIPBOARD_TYPE]: html },
    image: null
  };
};
