import type { Margin, PixelPoint } from "@shared/types/chart";

export interface PlotGeometry {
  width: number;
  height: number;
  margin: Margin;
}

export interface PriceRange {
  high: number;
  low: number;
}

/**
 * Maps (price, elapsed seconds) into the margin-inset drawing rectangle.
 * Higher prices land on smaller y.
 */
export class CoordinateMapper {
  constructor(
    private readonly geometry: PlotGeometry,
    private readonly range: PriceRange,
    readonly timeSpan: number,
  ) {}

  get drawableWidth(): number {
    const { width, margin } = this.geometry;
    return width - margin.left - margin.right;
  }

  get drawableHeight(): number {
    const { height, margin } = this.geometry;
    return height - margin.top - margin.bottom;
  }

  timeToX(elapsed: number): number {
    const { width, margin } = this.geometry;
    if (this.timeSpan <= 0) return margin.left;

    const x = margin.left + (elapsed / this.timeSpan) * this.drawableWidth;
    return Math.min(Math.max(x, margin.left), width - margin.right);
  }

  priceToY(price: number): number {
    const { top } = this.geometry.margin;
    const { high, low } = this.range;

    // flat series: no vertical scale to speak of
    if (high === low) return top + this.drawableHeight / 2;

    return top + ((high - price) / (high - low)) * this.drawableHeight;
  }

  toPixel(price: number, elapsed: number): PixelPoint {
    return { x: this.timeToX(elapsed), y: this.priceToY(price) };
  }
}
