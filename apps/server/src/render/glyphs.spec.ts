import { describe, it, expect } from "vitest";

import { BLACK, RED, WHITE, makeCanvas, tinyFont } from "./__fixtures__/canvas";
import { GlyphFont, loadDefaultFont } from "./glyphs";

// 'A' carries one pixel of each coverage level
const font = tinyFont({ A: ["ff80", "0040"] });

describe("GlyphFont", () => {
  it("should reject a table with missing glyphs", () => {
    expect(() =>
      GlyphFont.fromTable({ width: 2, height: 2, first: 32, glyphs: [["0000", "0000"]] }),
    ).toThrow();
  });

  it("should reject a glyph of the wrong size", () => {
    const glyphs = Array.from({ length: 95 }, () => ["0000", "0000"]);
    glyphs[5] = ["00", "00"];
    expect(() => GlyphFont.fromTable({ width: 2, height: 2, first: 32, glyphs })).toThrow(
      /glyph 5 is not 2x2/,
    );
  });

  it("should decode coverage bytes row by row", () => {
    expect(Array.from(font.glyph(0x41))).toEqual([255, 128, 0, 64]);
  });

  it("should substitute the space glyph outside printable ASCII", () => {
    const space = font.glyph(0x20);
    expect(font.glyph(0x0a)).toBe(space);
    expect(font.glyph(0x7f)).toBe(space);
    expect(font.glyph(0xe9)).toBe(space);
  });

  it("should measure and truncate at a fixed pitch", () => {
    expect(font.textWidth("abc")).toBe(6);
    expect(font.truncate("abcdef", 7)).toBe("abc");
    expect(font.truncate("abc", 1)).toBe("");
  });
});

describe("loadDefaultFont", () => {
  it("should load the bundled font once", () => {
    const first = loadDefaultFont();
    expect(loadDefaultFont()).toBe(first);
    expect(first.width).toBe(12);
    expect(first.height).toBe(18);
  });

  it("should have a blank space and inked letters", () => {
    const defaultFont = loadDefaultFont();
    expect(Array.from(defaultFont.glyph(0x20)).every((c) => c === 0)).toBe(true);
    expect(Array.from(defaultFont.glyph(0x41)).some((c) => c === 255)).toBe(true);
  });
});

describe("ChartCanvas.text", () => {
  it("should interpolate between background and ink by coverage", () => {
    const canvas = makeCanvas({ font });
    canvas.text({ x: 0, y: 0 }, "A", BLACK);

    expect(canvas.pixel(0, 0)).toEqual([0, 0, 0]);
    expect(canvas.pixel(1, 0)).toEqual([127, 127, 127]);
    expect(canvas.pixel(0, 1)).toEqual([255, 255, 255]);
    expect(canvas.pixel(1, 1)).toEqual([191, 191, 191]);
  });

  it("should blend each channel independently", () => {
    const canvas = makeCanvas({ font });
    canvas.text({ x: 0, y: 0 }, "A", RED);

    expect(canvas.pixel(1, 0)).toEqual([255, 127, 127]);
  });

  it("should advance one cell width per character", () => {
    const canvas = makeCanvas({ font });
    canvas.text({ x: 1, y: 3 }, "AA", BLACK);

    expect(canvas.pixel(1, 3)).toEqual([0, 0, 0]);
    expect(canvas.pixel(3, 3)).toEqual([0, 0, 0]);
    expect(canvas.pixel(4, 3)).toEqual([127, 127, 127]);
  });

  it("should composite against the background, not what is underneath", () => {
    const canvas = makeCanvas({ font });
    canvas.fillRect(0, 0, 3, 1, RED);
    canvas.text({ x: 0, y: 0 }, "A\u0001", BLACK);

    // zero coverage writes the background colour back
    expect(canvas.pixel(0, 1)).toEqual([255, 255, 255]);
    // the control character rendered as a blank cell
    expect(canvas.pixel(2, 0)).toEqual([255, 255, 255]);
    expect(canvas.pixel(3, 1)).toEqual([255, 255, 255]);
  });

  it("should draw nothing with a transparent ink", () => {
    const canvas = makeCanvas({ font });
    canvas.fillRect(0, 0, 1, 1, RED);
    canvas.text({ x: 0, y: 0 }, "A", 0x00000000);

    expect(canvas.pixel(0, 1)).toEqual([255, 0, 0]);
  });

  it("should clip glyphs at the canvas edge", () => {
    const canvas = makeCanvas({ font });
    canvas.text({ x: 19, y: 13 }, "A", BLACK);

    expect(canvas.pixel(19, 13)).toEqual([0, 0, 0]);
  });

  it("should use the canvas background as the blend base", () => {
    const canvas = makeCanvas({ font, background: 0x000000ff });
    canvas.text({ x: 0, y: 0 }, "A", WHITE);

    expect(canvas.pixel(1, 0)).toEqual([128, 128, 128]);
  });
});
