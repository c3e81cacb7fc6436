import type { Margin } from "@shared/types/chart";

import { ChartCanvas, type ChartCanvasInit } from "../canvas";
import { GlyphFont } from "../glyphs";

export const WHITE = 0xffffffff;
export const BLACK = 0x000000ff;
export const RED = 0xff0000ff;
export const GREEN = 0x00ff00ff;
export const BLUE = 0x0000ffff;

/**
 * 2x2 font: space is blank, every other glyph is solid ink except the ones
 * given in `overrides` (hex rows keyed by character).
 */
export function tinyFont(overrides: Record<string, [string, string]> = {}): GlyphFont {
  const glyphs: string[][] = [];
  for (let code = 0x20; code <= 0x7e; code++) {
    const char = String.fromCharCode(code);
    glyphs.push(overrides[char] ?? (code === 0x20 ? ["0000", "0000"] : ["ffff", "ffff"]));
  }
  return GlyphFont.fromTable({ width: 2, height: 2, first: 0x20, glyphs });
}

const DEFAULT_MARGIN: Margin = { top: 2, bottom: 2, left: 2, right: 2 };

/**
 * 20x14 canvas with 2px margins: a 16x10 plot of prices 0..10 over
 * 240 seconds, so y = 12 - price and x = 2 + elapsed / 15.
 */
export function makeCanvas(overrides: Partial<ChartCanvasInit> = {}): ChartCanvas {
  return new ChartCanvas({
    width: 20,
    height: 14,
    margin: DEFAULT_MARGIN,
    high: 10,
    low: 0,
    timeSpan: 240,
    background: WHITE,
    font: tinyFont(),
    ...overrides,
  });
}
