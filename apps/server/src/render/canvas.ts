import {
  unpackColour,
  type Colour,
  type Margin,
  type PixelPoint,
  type Rgb,
} from "@shared/types/chart";

import { drawText, loadDefaultFont, type GlyphFont } from "./glyphs";
import { CoordinateMapper } from "./mapper";
import { PixelBuffer } from "./raster";

export interface ChartCanvasInit {
  width: number;
  height: number;
  margin: Margin;
  high: number;
  low: number;
  /** Seconds covered by the whole series */
  timeSpan: number;
  background: Colour;
  font?: GlyphFont;
}

/**
 * The drawing surface handed to every layer for the duration of one
 * render: pixel buffer, geometry, price/time ranges and the font.
 */
export class ChartCanvas {
  readonly width: number;
  readonly height: number;
  readonly margin: Margin;
  readonly high: number;
  readonly low: number;
  readonly background: Colour;
  readonly font: GlyphFont;

  private readonly pixels: PixelBuffer;
  private readonly mapper: CoordinateMapper;
  private readonly backgroundRgb: Rgb;

  constructor(init: ChartCanvasInit) {
    this.width = init.width;
    this.height = init.height;
    this.margin = init.margin;
    this.high = init.high;
    this.low = init.low;
    this.background = init.background;
    this.font = init.font ?? loadDefaultFont();

    this.pixels = new PixelBuffer(init.width, init.height, init.background);
    this.mapper = new CoordinateMapper(init, { high: init.high, low: init.low }, init.timeSpan);
    this.backgroundRgb = unpackColour(init.background).rgb;
  }

  get timeSpan(): number {
    return this.mapper.timeSpan;
  }

  get drawableWidth(): number {
    return this.mapper.drawableWidth;
  }

  get drawableHeight(): number {
    return this.mapper.drawableHeight;
  }

  toPixel(price: number, elapsed: number): PixelPoint {
    return this.mapper.toPixel(price, elapsed);
  }

  timeToX(elapsed: number): number {
    return this.mapper.timeToX(elapsed);
  }

  priceToY(price: number): number {
    return this.mapper.priceToY(price);
  }

  setPixel(x: number, y: number, colour: Colour): void {
    this.pixels.setPixel(x, y, colour);
  }

  pixel(x: number, y: number): Rgb | undefined {
    return this.pixels.pixel(x, y);
  }

  line(p1: PixelPoint, p2: PixelPoint, colour: Colour): void {
    this.pixels.line(p1, p2, colour);
  }

  fillRect(x0: number, y0: number, x1: number, y1: number, colour: Colour): void {
    this.pixels.fillRect(x0, y0, x1, y1, colour);
  }

  text(origin: PixelPoint, text: string, colour: Colour): void {
    const { rgb, alpha } = unpackColour(colour);
    if (alpha === 0) return;
    drawText(this.pixels, this.font, origin, text, rgb, this.backgroundRgb);
  }

  textWidth(text: string): number {
    return this.font.textWidth(text);
  }

  /** Packed RGB bytes, 3 per pixel, for the codec. */
  rgbBytes(): Buffer {
    return this.pixels.data;
  }
}
