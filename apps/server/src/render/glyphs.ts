import { readFileSync } from "fs";
import { z } from "zod";
import type { PixelPoint, Rgb } from "@shared/types/chart";

import type { PixelBuffer } from "./raster";

const FIRST_PRINTABLE = 0x20;
const LAST_PRINTABLE = 0x7e;
const GLYPH_COUNT = LAST_PRINTABLE - FIRST_PRINTABLE + 1;

const fontTableSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    first: z.literal(FIRST_PRINTABLE),
    // one entry per glyph, one hex string of coverage bytes per row
    glyphs: z.array(z.array(z.string().regex(/^(?:[0-9a-f]{2})+$/i))).length(GLYPH_COUNT),
  })
  .superRefine((table, ctx) => {
    table.glyphs.forEach((rows, index) => {
      const ok =
        rows.length === table.height && rows.every((row) => row.length === table.width * 2);
      if (!ok) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `glyph ${index} is not ${table.width}x${table.height}`,
          path: ["glyphs", index],
        });
      }
    });
  });

export type FontTable = z.input<typeof fontTableSchema>;

/**
 * Fixed-pitch bitmap font. Each glyph is a width x height grid of coverage
 * values, 0 (background) to 255 (ink).
 */
export class GlyphFont {
  private constructor(
    readonly width: number,
    readonly height: number,
    private readonly glyphs: readonly Uint8Array[],
  ) {}

  static fromTable(table: unknown): GlyphFont {
    const parsed = fontTableSchema.parse(table);
    const glyphs = parsed.glyphs.map((rows) => Uint8Array.from(Buffer.from(rows.join(""), "hex")));
    return new GlyphFont(parsed.width, parsed.height, Object.freeze(glyphs));
  }

  /**
   * Coverage grid for a code point; anything outside printable ASCII
   * renders as a space.
   */
  glyph(codePoint: number): Uint8Array {
    const printable = codePoint >= FIRST_PRINTABLE && codePoint <= LAST_PRINTABLE;
    const glyph = this.glyphs[printable ? codePoint - FIRST_PRINTABLE : 0];
    if (!glyph) {
      throw new Error(`font has no glyph for code point ${codePoint}`);
    }
    return glyph;
  }

  textWidth(text: string): number {
    return Array.from(text).length * this.width;
  }

  /** Longest prefix of `text` that fits in `maxWidth` pixels. */
  truncate(text: string, maxWidth: number): string {
    const fits = Math.max(0, Math.floor(maxWidth / this.width));
    return Array.from(text).slice(0, fits).join("");
  }
}

let defaultFont: GlyphFont | undefined;

/**
 * Font shipped in ./font/glyphs.json, read once and shared for the life of
 * the process.
 */
export function loadDefaultFont(): GlyphFont {
  if (!defaultFont) {
    const raw = readFileSync(new URL("./font/glyphs.json", import.meta.url), "utf8");
    defaultFont = GlyphFont.fromTable(JSON.parse(raw));
  }
  return defaultFont;
}

function blend(coverage: number, ink: number, background: number): number {
  return Math.round((coverage * ink + (255 - coverage) * background) / 255);
}

/**
 * Blit `text` left to right from `origin` (top-left of the first cell).
 * Every glyph pixel is interpolated between the background colour and the
 * ink by its coverage; what was already drawn underneath is not consulted.
 */
export function drawText(
  buffer: PixelBuffer,
  font: GlyphFont,
  origin: PixelPoint,
  text: string,
  ink: Rgb,
  background: Rgb,
): void {
  const x0 = Math.floor(origin.x);
  const y0 = Math.floor(origin.y);
  let cell = 0;

  for (const char of text) {
    const glyph = font.glyph(char.codePointAt(0) ?? FIRST_PRINTABLE);
    const cellX = x0 + cell * font.width;

    for (let gy = 0; gy < font.height; gy++) {
      for (let gx = 0; gx < font.width; gx++) {
        const coverage = glyph[gy * font.width + gx] ?? 0;
        buffer.writeRgb(cellX + gx, y0 + gy, [
          blend(coverage, ink[0], background[0]),
          blend(coverage, ink[1], background[1]),
          blend(coverage, ink[2], background[2]),
        ]);
      }
    }

    cell++;
  }
}
