/**
 * Clipboard boundary and paste classification. The host adapts its platform clipboard to
 * `ClipboardReader`/`ClipboardWriter`; classification picks the richest representation present.
 */

/** Private marker written when an image is copied from inside an editor; holds `<img>` HTML. */
export const LOCAL_IMAGE_CLIPBOARD_TYPE = "richedit.image";
export const HTML_CLIPBOARD_TYPE = "public.html";
export const RTF_CLIPBOARD_TYPE = "public.rtf";

export type PasteableType = "local-image" | "external-image" | "url" | "html" | "rtf" | "text";

export interface ClipboardImage {
  readonly data: Uint8Array;
  readonly mimeType: string;
}

export interface ClipboardReader {
  hasType(type: string): boolean;
  hasImage(): boolean;
  getImage(): ClipboardImage | null;
  getUrl(): string | null;
  hasStrings(): boolean;
  getString(): string | null;
  getData(type: string): string | null;
  /** Converts RTF to HTML when the host can; hosts without a converter leave this out. */
  rtfToHtml?(rtf: string): string | null;
}

export interface ClipboardWriter {
  /** Replaces the clipboard contents with typed text items and, optionally, a raster image. */
  setItems(items: Readonly<Record<string, string>>, image?: ClipboardImage | null): void;
}

/**
 * First match wins: local rich image, external image, URL, HTML, RTF, text. A clipboard with
 * nothing usable yields null.
 */
export const classifyClipboard = (clipboard: ClipboardReader): PasteableType | null => {
  if (clipboard.hasType(LOCAL_IMAGE_CLIPBOARD_TYPE)) {
    return "local-image";
  }
  if (clipboard.hasImage()) {
    return "external-image";
  }
  if (clipboard.getUrl() !== null) {
    return "url";
  }
  if (clipboard.hasType(HTML_CLIPBOARD_TYPE)) {
    return "html";
  }
  if (clipboard.hasType(RTF_CLIPBOARD_TYPE)) {
    return "rtf";
  }
  if (clipboard.hasStrings()) {
    return "text";
  }
  return null;
};

export const isPasteable = (clipboard: ClipboardReader | null | undefined): boolean =>
  clipboard ? classifyClipboard(clipboard) !== null : false;

export interface MemoryClipboardContents {
  readonly items?: Readonly<Record<string, string>>;
  readonly image?: ClipboardImage | null;
  readonly url?: string | null;
  readonly text?: string | null;
}

/**
 * Clipboard held in memory, for hosts without a system clipboard and for tests. `setItems`
 * replaces everything, as a platform clipboard write does.
 */
export class MemoryClipboard implements ClipboardReader, ClipboardWriter {
  private items = new Map<string, string>();
  private image: ClipboardImage | null = null;
  private url: string | null = null;
  private text: string | null = null;
  private readonly rtfConverter: ((rtf: string) => string | null) | null;

  constructor(contents: MemoryClipboardContents = {}, rtfConverter?: (rtf: string) => string | null) {
    this.rtfConverter = rtfConverter ?? null;
    this.load(contents);
  }

  load(contents: MemoryClipboardContents): void {
    this.items = new Map(Object.entries(contents.items ?? {}));
    this.image = contents.image ?? null;
    this.url = contents.url ?? null;
    this.text = contents.text ?? null;
  }

  hasType(type: string): boolean {
    return this.items.has(type);
  }

  hasImage(): boolean {
    return this.image !== null;
  }

  getImage(): ClipboardImage | null {
    return this.image;
  }

  getUrl(): string | null {
    return this.url;
  }

  hasStrings(): boolean {
    return this.text !== null;
  }

  getString(): string | null {
    return this.text;
  }

  getData(type: string): string | null {
    return this.items.get(type) ?? null;
  }

  rtfToHtml(rtf: string): string | null {
    return this.rtfConverter ? this.rtfConverter(rtf) : null;
  }

  setItems(items: Readonly<Record<string, string>>, image: ClipboardImage | null = null): void {
    this.load({ items, image });
  }
}
