import { unpackColour, type Colour, type PixelPoint, type Rgb } from "@shared/types/chart";

export const CHANNELS = 3;

/**
 * Row-major RGB pixel grid. Writes outside the grid are dropped, and a
 * colour with zero alpha leaves the target pixel untouched; every other
 * colour overwrites it outright.
 */
export class PixelBuffer {
  readonly data: Buffer;

  constructor(
    readonly width: number,
    readonly height: number,
    background: Colour,
  ) {
    this.data = Buffer.alloc(width * height * CHANNELS);

    const [r, g, b] = unpackColour(background).rgb;
    for (let offset = 0; offset < this.data.length; offset += CHANNELS) {
      this.data[offset] = r;
      this.data[offset + 1] = g;
      this.data[offset + 2] = b;
    }
  }

  private offsetOf(x: number, y: number): number | null {
    const px = Math.floor(x);
    const py = Math.floor(y);
    if (px < 0 || py < 0 || px >= this.width || py >= this.height) return null;
    return (py * this.width + px) * CHANNELS;
  }

  setPixel(x: number, y: number, colour: Colour): void {
    const { rgb, alpha } = unpackColour(colour);
    if (alpha === 0) return;
    this.writeRgb(x, y, rgb);
  }

  /** Raw write, bypassing the transparent-colour check. */
  writeRgb(x: number, y: number, [r, g, b]: Rgb): void {
    const offset = this.offsetOf(x, y);
    if (offset === null) return;

    this.data[offset] = r;
    this.data[offset + 1] = g;
    this.data[offset + 2] = b;
  }

  pixel(x: number, y: number): Rgb | undefined {
    const offset = this.offsetOf(x, y);
    if (offset === null) return undefined;

    return [this.data[offset] ?? 0, this.data[offset + 1] ?? 0, this.data[offset + 2] ?? 0];
  }

  /**
   * Inclusive rectangle; corners may come in any order.
   */
  fillRect(x0: number, y0: number, x1: number, y1: number, colour: Colour): void {
    if (unpackColour(colour).alpha === 0) return;

    const left = Math.max(0, Math.floor(Math.min(x0, x1)));
    const right = Math.min(this.width - 1, Math.floor(Math.max(x0, x1)));
    const top = Math.max(0, Math.floor(Math.min(y0, y1)));
    const bottom = Math.min(this.height - 1, Math.floor(Math.max(y0, y1)));

    for (let y = top; y <= bottom; y++) {
      for (let x = left; x <= right; x++) {
        this.setPixel(x, y, colour);
      }
    }
  }

  /**
   * Supercover segment between the rounded endpoints: every pixel the ideal
   * line passes through, both ends included. Where it passes exactly through
   * a pixel corner, both side neighbours are painted as well.
   */
  line(p1: PixelPoint, p2: PixelPoint, colour: Colour): void {
    let x = Math.round(p1.x);
    let y = Math.round(p1.y);
    const x2 = Math.round(p2.x);
    const y2 = Math.round(p2.y);

    const nx = Math.abs(x2 - x);
    const ny = Math.abs(y2 - y);
    const sx = x < x2 ? 1 : -1;
    const sy = y < y2 ? 1 : -1;

    this.setPixel(x, y, colour);

    for (let ix = 0, iy = 0; ix < nx || iy < ny; ) {
      // < 0: the next vertical cell border comes first; > 0: the horizontal one
      const decision = (1 + 2 * ix) * ny - (1 + 2 * iy) * nx;

      if (decision === 0) {
        this.setPixel(x + sx, y, colour);
        this.setPixel(x, y + sy, colour);
        x += sx;
        y += sy;
        ix++;
        iy++;
      } else if (decision < 0) {
        x += sx;
        ix++;
      } else {
        y += sy;
        iy++;
      }

      this.setPixel(x, y, colour);
    }
  }
}
