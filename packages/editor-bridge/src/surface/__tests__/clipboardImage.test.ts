import { describe, expect, it } from "vitest";

import { HTML_CLIPBOARD_TYPE, LOCAL_IMAGE_CLIPBOARD_TYPE } from "@richedit/editor-core";

import { buildImageHtml, prepareImageCopy } from "../clipboardImage";
import { createMemoryImageStore } from "../imageStore";

describe("buildImageHtml", () => {
  it("escapes attributes and includes dimensions only as a pair", () => {
    expect(buildImageHtml({ src: "cat.png?a=1&b=2", alt: "Say \"hi\" <now>", width: 40, height: 30 })).toBe(
      "<img src=\"cat.png?a=1&amp;b=2\" alt=\"Say &quot;hi&quot; &lt;now&gt;\" width=\"40\" height=\"30\">"
    );
    expect(buildImageHtml({ src: "cat.png", alt: null, width: 40, height: null })).toBe("<img src=\"cat.png\">");
  });
});

describe("prepareImageCopy", () => {
  it("offers remote images as marker and plain html", () => {
    const result = prepareImageCopy(
      { src: "https://example.com/cat.png", alt: "Cat", width: 40, height: 30 },
      null
    );
    const html = "<img src=\"https://example.com/cat.png\" alt=\"Cat\" width=\"40\" height=\"30\">";
    expect(result).toEqual({
      ok: true,
      html,
      items: { [LOCAL_IMAGE_CLIPBOARD_TYPE]: html, [HTML_CLIPBOARD_TYPE]: html },
      image: null
    });
  });

  it("treats relative sources as remote", () => {
    const result = prepareImageCopy({ src: "images/cat.png", alt: null, width: null, height: null }, null);
    expect(result.ok).toBe(true);
  });

  it("reports sources that are not urls", () => {
    expect(prepareImageCopy({ src: "bad src.png", alt: null, width: null, height: null }, null)).toEqual({
      ok: false,
      report: {
        code: "Invalid image URL",
        message: "The url for the image to copy was invalid.",
        info: "src: bad src.png",
        alert: true
      }
    });
  });

  it("reports local images missing from the store", () => {
    const result = prepareImageCopy(
      { src: "file:///richedit/images/gone.png", alt: null, width: null, height: null },
      createMemoryImageStore()
    );
    expect(result).toEqual({
      ok: false,
      report: {
        code: "Invalid local image",
        message: "Could not copy image data to the clipboard.",
        info: "src: file:///richedit/images/gone.png",
        alert: true
      }
    });
  });

  it("carries stored bytes for local images", async () => {
    const store = createMemoryImageStore({ createId: () => "img-1" });
    const src = await store.save({ data: new Uint8Array([7, 8]), mimeType: "image/png" });

    const result = prepareImageCopy({ src, alt: null, width: null, height: null }, store);

    const html = "<img src=\"file:///richedit/images/img-1.png\">";
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.items).toEqual({ [LOCAL_IMAGE_CLIPBOARD_TYPE]: html });
      expect(result.image?.mimeType).toBe("image/png");
      expect(Array.from(result.image?.data ?? [])).toEqual([7, 8]);
    }
  });
});
