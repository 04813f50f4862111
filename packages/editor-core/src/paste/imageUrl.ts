const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
  "apng",
  "avif",
  "bmp",
  "gif",
  "heic",
  "heif",
  "ico",
  "jpeg",
  "jpg",
  "png",
  "svg",
  "tif",
  "tiff",
  "webp",
  "m4v",
  "mov",
  "mp4",
  "webm"
]);

export const parseUrl = (value: string): URL | null => {
  try {
    return new URL(value);
  } catch (_error) {
    return null;
  }
};

const pathExtension = (url: URL): string | null => {
  const lastSegment = url.pathname.split("/").pop() ?? "";
  const dot = lastSegment.lastIndexOf(".");
  if (dot <= 0 || dot === lastSegment.length - 1) {
    return null;
  }
  return lastSegment.slice(dot + 1).toLowerCase();
};

/**
 * Whether a pasted URL should become an image rather than a link. Only the path extension is
 * consulted; query strings and fragments are ignored.
 */
export const isImageUrl = (value: string): boolean => {
  const url = parseUrl(value);
  if (!url) {
    return false;
  }
  const extension = pathExtension(url);
  return extension !== null && MEDIA_EXTENSIONS.has(extension);
};

export const isFileUrl = (value: string): boolean => parseUrl(value)?.protocol === "file:";
