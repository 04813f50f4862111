import { describe, expect, it } from "vitest";

import { isFileUrl, isImageUrl } from "../imageUrl";
import {
  HTML_CLIPBOARD_TYPE,
  LOCAL_IMAGE_CLIPBOARD_TYPE,
  MemoryClipboard,
  RTF_CLIPBOARD_TYPE,
  classifyClipboard,
  isPasteable
} from "../pasteClassification";

const png = { data: new Uint8Array([137, 80, 78, 71]), mimeType: "image/png" };

describe("classifyClipboard", () => {
  it("prefers the local image marker over a generic image", () => {
    const clipboard = new MemoryClipboard({
      items: { [LOCAL_IMAGE_CLIPBOARD_TYPE]: "<img src=\"cat.png\">" },
      image: png
    });
    expect(classifyClipboard(clipboard)).toBe("local-image");
  });

  it("prefers an external image over a URL", () => {
    const clipboard = new MemoryClipboard({ image: png, url: "https://example.com/cat.png" });
    expect(classifyClipboard(clipboard)).toBe("external-image");
  });

  it("prefers a URL over a plain string", () => {
    const clipboard = new MemoryClipboard({ url: "https://example.com", text: "https://example.com" });
    expect(classifyClipboard(clipboard)).toBe("url");
  });

  it("prefers a URL over HTML", () => {
    const clipboard = new MemoryClipboard({
      url: "https://example.com",
      items: { [HTML_CLIPBOARD_TYPE]: "<a href=\"https://example.com\">x</a>" }
    });
    expect(classifyClipboard(clipboard)).toBe("url");
  });

  it("prefers HTML over RTF and text", () => {
    const clipboard = new MemoryClipboard({
      items: { [HTML_CLIPBOARD_TYPE]: "<b>x</b>", [RTF_CLIPBOARD_TYPE]: "{\\rtf1 x}" },
      text: "x"
    });
    expect(classifyClipboard(clipboard)).toBe("html");
  });

  it("prefers RTF over text", () => {
    const clipboard = new MemoryClipboard({ items: { [RTF_CLIPBOARD_TYPE]: "{\\rtf1 x}" }, text: "x" });
    expect(classifyClipboard(clipboard)).toBe("rtf");
  });

  it("falls back to text, then nothing", () => {
    expect(classifyClipboard(new MemoryClipboard({ text: "plain" }))).toBe("text");
    expect(classifyClipboard(new MemoryClipboard())).toBeNull();
    expect(isPasteable(new MemoryClipboard())).toBe(false);
    expect(isPasteable(null)).toBe(false);
  });

  it("replaces all contents on write", () => {
    const clipboard = new MemoryClipboard({ image: png, text: "old" });
    clipboard.setItems({ [HTML_CLIPBOARD_TYPE]: "<p>new</p>" });
    expect(clipboard.hasImage()).toBe(false);
    expect(clipboard.getString()).toBeNull();
    expect(clipboard.getData(HTML_CLIPBOARD_TYPE)).toBe("<p>new</p>");
    expect(classifyClipboard(clipboard)).toBe("html");
  });
});

describe("isImageUrl", () => {
  it("recognises image and movie extensions", () => {
    expect(isImageUrl("https://example.com/pics/cat.PNG?size=2")).toBe(true);
    expect(isImageUrl("file:///tmp/clip.mov")).toBe(true);
  });

  it("rejects pages, unknown extensions and invalid URLs", () => {
    expect(isImageUrl("https://example.com/page")).toBe(false);
    expect(isImageUrl("https://example.com/archive.tar.gz")).toBe(false);
    expect(isImageUrl("https://example.com/.png")).toBe(false);
    expect(isImageUrl("not a url")).toBe(false);
  });

  it("detects file URLs", () => {
    expect(isFileUrl("file:///tmp/cat.png")).toBe(true);
    expect(isFileUrl("https://example.com/cat.png")).toBe(false);
    expect(isFileUrl("cat.png")).toBe(false);
  });
});
